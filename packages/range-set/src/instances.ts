/**
 * Typeclass instances for range sets and their interval views.
 */

import { type Eq, type Hash, type Discrete, Hasher } from "@intervalkit/std";
import type { RangeSet } from "./range-set.js";
import type { IntervalBounds, Intervals } from "./intervals.js";
import type { Seq, SetLike } from "./typeclasses.js";

// ============================================================================
// RangeSet instances
// ============================================================================

/**
 * Sets of one domain as a `SetLike`. `size` converts the domain's size type
 * to a number, which is exact up to `Number.MAX_SAFE_INTEGER` elements.
 */
export function rangeSetLike<T, N>(domain: Discrete<T, N>): SetLike<RangeSet<T, N>, T> {
  return {
    fold: (i, z, f) => {
      let acc = z;
      for (const k of i) acc = f(acc, k);
      return acc;
    },
    iterator: (i) => i[Symbol.iterator](),
    has: (s, k) => s.contains(k),
    size: (s) => domain.counting.toNumber(s.size()),
  };
}

export function eqRangeSet<T, N>(): Eq<RangeSet<T, N>> {
  return {
    equals: (a, b) => a.equals(b),
    notEquals: (a, b) => !a.equals(b),
  };
}

/**
 * Content hash of a set: its endpoint count, then each endpoint's hash.
 * Consistent with {@link eqRangeSet} when `hash` agrees with the domain's order.
 */
export function hashRangeSet<T, N>(hash: Hash<T>): Hash<RangeSet<T, N>> {
  return {
    hash: (s) => {
      const endpoints = s.endpoints();
      const h = new Hasher().update(endpoints.length);
      for (const e of endpoints) h.update(hash.hash(e));
      return h.digest();
    },
  };
}

// ============================================================================
// Intervals instances
// ============================================================================

export function intervalsSeq<T>(): Seq<Intervals<T>, IntervalBounds<T>> {
  return {
    fold: (i, z, f) => {
      let acc = z;
      for (const interval of i) acc = f(acc, interval);
      return acc;
    },
    iterator: (i) => i[Symbol.iterator](),
    length: (s) => s.length,
    nth: (s, index) => (Number.isInteger(index) && index >= 0 && index < s.length ? s.at(index) : undefined),
  };
}
