/**
 * Discrete — totally ordered, bounded domains with successor/predecessor.
 *
 * The element contract of interval sets: every value has a well-defined
 * neighbour on each side (except at the bounds), and the number of steps
 * between two values can be counted in the domain's size type `N`.
 *
 * Reference instances cover the fixed-width integers. `int64` and `uint64`
 * use `bigint` for both elements and sizes; the narrower widths use
 * `number`, whose integers are exact well past their cardinalities.
 *
 * @example
 * ```typescript
 * import { int32, makeDiscrete } from "@intervalkit/std";
 *
 * int32.next(41);          // 42
 * int32.distance(-2, 3);   // 5
 * int32.prev(int32.min()); // PreconditionError
 * ```
 */

import { requires } from "@intervalkit/contracts";
import {
  type BigIntKind,
  type NumberKind,
  integerBounds,
  isExactlyRepresentable,
} from "../data/cast.js";
import {
  type Bounded,
  type Enum,
  type Numeric,
  type Ord,
  numericBigInt,
  numericNumber,
} from "./index.js";

/**
 * Discrete typeclass.
 *
 * Laws:
 * - `!less(v, min()) && !less(max(), v)` for every value `v`
 * - `less(v, next(v))` and `prev(next(v)) === v` for `v < max()`
 * - `distance(a, next(b)) === distance(a, b) + 1` for `a <= b < max()`
 */
export interface Discrete<A, N = number> {
  /** Used in diagnostics. */
  readonly name: string;
  min(): A;
  max(): A;
  /** Predecessor. Requires `v > min()`. */
  prev(v: A): A;
  /** Successor. Requires `v < max()`. */
  next(v: A): A;
  /** Strict total order. */
  less(a: A, b: A): boolean;
  /** Steps from `a` to `b`, the element count of `[a, b)`. Requires `a <= b`. */
  distance(a: A, b: A): N;
  /** Is `v` a value of this domain? */
  includes(v: A): boolean;
  /** Arithmetic on the size type. */
  readonly counting: Numeric<N>;
}

/**
 * The parts {@link makeDiscrete} assembles a domain from.
 */
export interface DiscreteParts<A, N> {
  name?: string;
  bounded: Bounded<A>;
  ord: Ord<A>;
  enum: Enum<A>;
  distance: (a: A, b: A) => N;
  counting: Numeric<N>;
  /** Membership beyond the bounds check, e.g. rejecting fractions. */
  includes?: (v: A) => boolean;
}

/**
 * Build a domain from Bounded, Ord and Enum instances.
 *
 * Bound preconditions are added around `prev`, `next` and `distance`, so the
 * parts themselves only need to handle the values they are defined on.
 */
export function makeDiscrete<A, N>(parts: DiscreteParts<A, N>): Discrete<A, N> {
  const { bounded, ord } = parts;
  const name = parts.name ?? "discrete";
  const extra = parts.includes;

  return {
    name,
    min: () => bounded.minBound(),
    max: () => bounded.maxBound(),
    prev(v) {
      requires(() => ord.lessThan(bounded.minBound(), v), `prev() of the ${name} minimum`);
      return parts.enum.pred(v);
    },
    next(v) {
      requires(() => ord.lessThan(v, bounded.maxBound()), `next() of the ${name} maximum`);
      return parts.enum.succ(v);
    },
    less: (a, b) => ord.lessThan(a, b),
    distance(a, b) {
      requires(() => ord.lessThanOrEqual(a, b), `${name} distance() with a > b`);
      return parts.distance(a, b);
    },
    includes: (v) =>
      ord.greaterThanOrEqual(v, bounded.minBound()) &&
      ord.lessThanOrEqual(v, bounded.maxBound()) &&
      (extra === undefined || extra(v)),
    counting: parts.counting,
  };
}

// ============================================================================
// Fixed-width integers
// ============================================================================

function numberDomain(kind: NumberKind): Discrete<number, number> {
  const { min, max } = integerBounds(kind);
  return {
    name: kind,
    min: () => min,
    max: () => max,
    prev(v) {
      requires(v > min, () => `prev(${v}) is below the ${kind} minimum`);
      return v - 1;
    },
    next(v) {
      requires(v < max, () => `next(${v}) is above the ${kind} maximum`);
      return v + 1;
    },
    less: (a, b) => a < b,
    distance(a, b) {
      requires(a <= b, () => `${kind} distance(${a}, ${b}) with a > b`);
      return b - a;
    },
    includes: (v) => isExactlyRepresentable(v, kind),
    counting: numericNumber,
  };
}

function bigIntDomain(kind: BigIntKind): Discrete<bigint, bigint> {
  const { min, max } = integerBounds(kind);
  return {
    name: kind,
    min: () => min,
    max: () => max,
    prev(v) {
      requires(v > min, () => `prev(${v}) is below the ${kind} minimum`);
      return v - 1n;
    },
    next(v) {
      requires(v < max, () => `next(${v}) is above the ${kind} maximum`);
      return v + 1n;
    },
    less: (a, b) => a < b,
    distance(a, b) {
      requires(a <= b, () => `${kind} distance(${a}, ${b}) with a > b`);
      return b - a;
    },
    includes: (v) => isExactlyRepresentable(v, kind),
    counting: numericBigInt,
  };
}

export const int8: Discrete<number, number> = numberDomain("int8");
export const uint8: Discrete<number, number> = numberDomain("uint8");
export const int16: Discrete<number, number> = numberDomain("int16");
export const uint16: Discrete<number, number> = numberDomain("uint16");
export const int32: Discrete<number, number> = numberDomain("int32");
export const uint32: Discrete<number, number> = numberDomain("uint32");
export const int64: Discrete<bigint, bigint> = bigIntDomain("int64");
export const uint64: Discrete<bigint, bigint> = bigIntDomain("uint64");
