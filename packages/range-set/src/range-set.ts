/**
 * RangeSet<T, N> — an immutable subset of a discrete domain, stored as the
 * sorted endpoints of its maximal half-open intervals.
 *
 * Endpoints at even indices are inclusive starts and endpoints at odd indices
 * are exclusive ends. An odd endpoint count means the last interval extends
 * through `domain.max()`. Every subset has exactly one such encoding, so
 * structural equality is set equality.
 *
 * @example
 * ```typescript
 * import { int32 } from "@intervalkit/std";
 * import { RangeSet, makeUnion } from "@intervalkit/range-set";
 *
 * const small = RangeSet.makeInterval(int32, 2, true, 5, false);
 * small.size();                 // 3
 * [...small];                   // [2, 3, 4]
 *
 * const odd = makeUnion(small, RangeSet.makeGreater(int32, 9));
 * odd.toString();               // "{[2, 4], [10, 2147483647]}"
 * odd.complement().contains(7); // true
 * ```
 */

import { invariant, requires } from "@intervalkit/contracts";
import type { Discrete } from "@intervalkit/std";
import { ElementsIterator } from "./elements.js";
import { Intervals } from "./intervals.js";
import {
  type BooleanOp,
  differenceOp,
  intersectionOp,
  mergeEndpoints,
  symmetricDifferenceOp,
  unionOp,
} from "./merge.js";

function same<T>(domain: Discrete<T, unknown>, a: T, b: T): boolean {
  return !domain.less(a, b) && !domain.less(b, a);
}

function requireMember<T>(domain: Discrete<T, unknown>, value: T): void {
  requires(
    () => domain.includes(value),
    () => `${String(value)} is not a value of ${domain.name}`
  );
}

function isCanonical<T>(domain: Discrete<T, unknown>, endpoints: readonly T[]): boolean {
  for (let i = 0; i < endpoints.length; i++) {
    if (!domain.includes(endpoints[i])) return false;
    if (i > 0 && !domain.less(endpoints[i - 1], endpoints[i])) return false;
  }
  return true;
}

/**
 * Factories bound to one domain. See {@link RangeSet.over}.
 */
export interface RangeSetFactory<T, N> {
  readonly domain: Discrete<T, N>;
  makeEmpty(): RangeSet<T, N>;
  makeAll(): RangeSet<T, N>;
  makeSingleValue(value: T): RangeSet<T, N>;
  makeGreaterEqual(value: T): RangeSet<T, N>;
  makeGreater(value: T): RangeSet<T, N>;
  makeLess(value: T): RangeSet<T, N>;
  makeLessEqual(value: T): RangeSet<T, N>;
  makeInterval(lo: T, loIncluded: boolean, hi: T, hiIncluded: boolean): RangeSet<T, N>;
  fromEndpoints(endpoints: readonly T[]): RangeSet<T, N>;
}

export class RangeSet<T, N = number> {
  readonly domain: Discrete<T, N>;
  private readonly _endpoints: readonly T[];

  private constructor(domain: Discrete<T, N>, endpoints: T[]) {
    invariant(
      () => isCanonical(domain, endpoints),
      () => `endpoints must be strictly ascending values of ${domain.name}`
    );
    this.domain = domain;
    this._endpoints = Object.freeze(endpoints);
  }

  // ==========================================================================
  // Factories
  // ==========================================================================

  static makeEmpty<T, N>(domain: Discrete<T, N>): RangeSet<T, N> {
    return new RangeSet(domain, []);
  }

  static makeAll<T, N>(domain: Discrete<T, N>): RangeSet<T, N> {
    return new RangeSet(domain, [domain.min()]);
  }

  static makeSingleValue<T, N>(domain: Discrete<T, N>, value: T): RangeSet<T, N> {
    requireMember(domain, value);
    if (same(domain, value, domain.max())) return new RangeSet(domain, [value]);
    return new RangeSet(domain, [value, domain.next(value)]);
  }

  /** `{ x | x >= value }` */
  static makeGreaterEqual<T, N>(domain: Discrete<T, N>, value: T): RangeSet<T, N> {
    requireMember(domain, value);
    return new RangeSet(domain, [value]);
  }

  /** `{ x | x > value }` */
  static makeGreater<T, N>(domain: Discrete<T, N>, value: T): RangeSet<T, N> {
    requireMember(domain, value);
    if (same(domain, value, domain.max())) return new RangeSet(domain, []);
    return new RangeSet(domain, [domain.next(value)]);
  }

  /** `{ x | x < value }` */
  static makeLess<T, N>(domain: Discrete<T, N>, value: T): RangeSet<T, N> {
    requireMember(domain, value);
    if (same(domain, value, domain.min())) return new RangeSet(domain, []);
    return new RangeSet(domain, [domain.min(), value]);
  }

  /** `{ x | x <= value }` */
  static makeLessEqual<T, N>(domain: Discrete<T, N>, value: T): RangeSet<T, N> {
    requireMember(domain, value);
    if (same(domain, value, domain.max())) return new RangeSet(domain, [domain.min()]);
    return new RangeSet(domain, [domain.min(), domain.next(value)]);
  }

  /**
   * The values between `lo` and `hi`, each bound included or excluded.
   * Requires `lo <= hi`. Bounds that exclude everything give the empty set.
   */
  static makeInterval<T, N>(
    domain: Discrete<T, N>,
    lo: T,
    loIncluded: boolean,
    hi: T,
    hiIncluded: boolean
  ): RangeSet<T, N> {
    requireMember(domain, lo);
    requireMember(domain, hi);
    requires(
      () => !domain.less(hi, lo),
      () => `interval bounds out of order: ${String(lo)} > ${String(hi)}`
    );

    const max = domain.max();
    if (!loIncluded && same(domain, lo, max)) return new RangeSet(domain, []);
    const start = loIncluded ? lo : domain.next(lo);

    if (hiIncluded && same(domain, hi, max)) return new RangeSet(domain, [start]);
    const end = hiIncluded ? domain.next(hi) : hi;

    if (!domain.less(start, end)) return new RangeSet(domain, []);
    return new RangeSet(domain, [start, end]);
  }

  /**
   * Combine two sets elementwise: `x` is in the result when
   * `op(lhs.contains(x), rhs.contains(x))`. Requires `op(false, false)` to
   * be false and both sets to share a domain.
   */
  static makeBoolean<T, N>(lhs: RangeSet<T, N>, rhs: RangeSet<T, N>, op: BooleanOp): RangeSet<T, N> {
    requires(lhs.domain === rhs.domain, "combining sets over different domains");
    requires(() => !op(false, false), "boolean op must map (false, false) to false");
    const domain = lhs.domain;
    return new RangeSet(
      domain,
      mergeEndpoints((a: T, b: T) => domain.less(a, b), lhs._endpoints, rhs._endpoints, op)
    );
  }

  /**
   * Rebuild a set from its endpoint encoding, e.g. the output of
   * {@link RangeSet.endpoints}. Throws `InvariantError` unless the endpoints
   * are strictly ascending values of the domain.
   */
  static fromEndpoints<T, N>(domain: Discrete<T, N>, endpoints: readonly T[]): RangeSet<T, N> {
    return new RangeSet(domain, [...endpoints]);
  }

  /**
   * Factories with the domain applied.
   *
   * @example
   * ```typescript
   * const R = RangeSet.over(uint8);
   * R.makeLess(10).union(R.makeGreater(250)).size(); // 15
   * ```
   */
  static over<T, N>(domain: Discrete<T, N>): RangeSetFactory<T, N> {
    return {
      domain,
      makeEmpty: () => RangeSet.makeEmpty(domain),
      makeAll: () => RangeSet.makeAll(domain),
      makeSingleValue: (value) => RangeSet.makeSingleValue(domain, value),
      makeGreaterEqual: (value) => RangeSet.makeGreaterEqual(domain, value),
      makeGreater: (value) => RangeSet.makeGreater(domain, value),
      makeLess: (value) => RangeSet.makeLess(domain, value),
      makeLessEqual: (value) => RangeSet.makeLessEqual(domain, value),
      makeInterval: (lo, loIncluded, hi, hiIncluded) =>
        RangeSet.makeInterval(domain, lo, loIncluded, hi, hiIncluded),
      fromEndpoints: (endpoints) => RangeSet.fromEndpoints(domain, endpoints),
    };
  }

  // ==========================================================================
  // Set algebra
  // ==========================================================================

  union(other: RangeSet<T, N>): RangeSet<T, N> {
    return RangeSet.makeBoolean(this, other, unionOp);
  }

  intersection(other: RangeSet<T, N>): RangeSet<T, N> {
    return RangeSet.makeBoolean(this, other, intersectionOp);
  }

  difference(other: RangeSet<T, N>): RangeSet<T, N> {
    return RangeSet.makeBoolean(this, other, differenceOp);
  }

  symmetricDifference(other: RangeSet<T, N>): RangeSet<T, N> {
    return RangeSet.makeBoolean(this, other, symmetricDifferenceOp);
  }

  complement(): RangeSet<T, N> {
    const endpoints = this._endpoints;
    const min = this.domain.min();
    if (endpoints.length > 0 && same(this.domain, endpoints[0], min)) {
      return new RangeSet(this.domain, endpoints.slice(1));
    }
    return new RangeSet(this.domain, [min, ...endpoints]);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  isEmpty(): boolean {
    return this._endpoints.length === 0;
  }

  isAll(): boolean {
    return this._endpoints.length === 1 && same(this.domain, this._endpoints[0], this.domain.min());
  }

  /** Membership by binary search, `O(log n)`. */
  contains(value: T): boolean {
    requireMember(this.domain, value);
    // Count of endpoints <= value.
    let lo = 0;
    let hi = this._endpoints.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.domain.less(value, this._endpoints[mid])) {
        hi = mid;
      } else {
        lo = mid + 1;
      }
    }
    return lo % 2 === 1;
  }

  min(): T {
    requires(() => !this.isEmpty(), "min() of an empty set");
    return this._endpoints[0];
  }

  max(): T {
    requires(() => !this.isEmpty(), "max() of an empty set");
    const n = this._endpoints.length;
    return n % 2 === 0 ? this.domain.prev(this._endpoints[n - 1]) : this.domain.max();
  }

  /** Number of elements, in the domain's size type. */
  size(): N {
    const { counting } = this.domain;
    const endpoints = this._endpoints;
    let result = counting.zero();
    for (let i = 0; i + 1 < endpoints.length; i += 2) {
      result = counting.add(result, this.domain.distance(endpoints[i], endpoints[i + 1]));
    }
    if (endpoints.length % 2 === 1) {
      const tail = this.domain.distance(endpoints[endpoints.length - 1], this.domain.max());
      result = counting.add(result, counting.add(tail, counting.one()));
    }
    return result;
  }

  intervals(): Intervals<T> {
    return new Intervals(this.domain, this._endpoints);
  }

  /** Copy of the endpoint encoding. */
  endpoints(): T[] {
    return [...this._endpoints];
  }

  equals(other: RangeSet<T, N>): boolean {
    requires(this.domain === other.domain, "comparing sets over different domains");
    const a = this._endpoints;
    const b = other._endpoints;
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!same(this.domain, a[i], b[i])) return false;
    }
    return true;
  }

  // ==========================================================================
  // Iteration
  // ==========================================================================

  begin(): ElementsIterator<T> {
    return ElementsIterator.startOf(this.domain, this.intervals().begin());
  }

  end(): ElementsIterator<T> {
    return ElementsIterator.startOf(this.domain, this.intervals().end());
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (const it = this.begin(); it.isValid(); it.increment()) {
      yield it.get();
    }
  }

  /** Elements in descending order. */
  *reversed(): IterableIterator<T> {
    const first = this.begin();
    for (const it = this.end(); !it.equals(first); ) {
      yield it.decrement().get();
    }
  }

  toString(): string {
    const parts = this.intervals()
      .toArray()
      .map(({ lo, hi }) => `[${String(lo)}, ${String(hi)}]`);
    return `{${parts.join(", ")}}`;
  }

  [Symbol.for("nodejs.util.inspect.custom")](): string {
    return this.toString();
  }
}
