/**
 * Intervals view and its random-access iterator.
 *
 * Both are read-only windows onto the endpoint array of a `RangeSet`. An
 * endpoint array `[s0, e0, s1, e1, ...]` holds half-open intervals
 * `[s_k, e_k)`; when its length is odd the last interval runs through
 * `domain.max()`. The view presents each interval with inclusive bounds.
 */

import { requires } from "@intervalkit/contracts";
import { type Discrete, type Ordering, EQ_ORD, GT, LT, exactCast } from "@intervalkit/std";

/**
 * An interval with inclusive bounds, `lo <= hi`.
 */
export interface IntervalBounds<T> {
  readonly lo: T;
  readonly hi: T;
}

/**
 * The part of a domain the interval and element views need.
 */
export type DomainOrder<T> = Pick<Discrete<T, unknown>, "name" | "max" | "prev" | "next" | "less">;

function endIndexOf(length: number): number {
  return length + (length % 2);
}

/**
 * Random-access iterator over the intervals of a set.
 *
 * The position is kept as an index into the endpoint array, so it is always
 * even and lies in `[0, endIndex]`, where `endIndex` is the endpoint count
 * rounded up to the next even number. Iterators are mutable; `plus`,
 * `minus` and `clone` return fresh ones.
 */
export class IntervalsIterator<T> {
  private readonly _domain: DomainOrder<T>;
  private readonly _endpoints: readonly T[];
  private _index: number;

  constructor(domain: DomainOrder<T>, endpoints: readonly T[], index: number) {
    this._domain = domain;
    this._endpoints = endpoints;
    this._index = index;
  }

  /** Position in intervals, 0 for the first one. */
  get position(): number {
    return this._index / 2;
  }

  /** True unless the iterator is past the last interval. */
  isValid(): boolean {
    return this._index < this._endpoints.length;
  }

  get(): IntervalBounds<T> {
    requires(() => this.isValid(), "get() of a past-the-end intervals iterator");
    const i = this._index;
    const lo = this._endpoints[i];
    const hi =
      i === this._endpoints.length - 1
        ? this._domain.max()
        : this._domain.prev(this._endpoints[i + 1]);
    return { lo, hi };
  }

  /** The interval `n` positions away. */
  at(n: number): IntervalBounds<T> {
    return this.plus(n).get();
  }

  advance(n: number): this {
    requires(Number.isInteger(n), () => `non-integer iterator offset ${n}`);
    const next = this._index + 2 * n;
    requires(
      next >= 0 && next <= endIndexOf(this._endpoints.length),
      () => `intervals iterator moved out of range (offset ${n} from ${this.position})`
    );
    this._index = next;
    return this;
  }

  retreat(n: number): this {
    return this.advance(-n);
  }

  increment(): this {
    return this.advance(1);
  }

  decrement(): this {
    return this.advance(-1);
  }

  plus(n: number): IntervalsIterator<T> {
    return this.clone().advance(n);
  }

  minus(n: number): IntervalsIterator<T> {
    return this.clone().advance(-n);
  }

  /** Number of intervals from `other` to this iterator. */
  difference(other: IntervalsIterator<T>): number {
    this.requireSameSet(other);
    return exactCast((this._index - other._index) / 2, "safe");
  }

  compare(other: IntervalsIterator<T>): Ordering {
    this.requireSameSet(other);
    return this._index < other._index ? LT : this._index > other._index ? GT : EQ_ORD;
  }

  equals(other: IntervalsIterator<T>): boolean {
    return this.compare(other) === EQ_ORD;
  }

  lessThan(other: IntervalsIterator<T>): boolean {
    return this.compare(other) === LT;
  }

  lessThanOrEqual(other: IntervalsIterator<T>): boolean {
    return this.compare(other) !== GT;
  }

  greaterThan(other: IntervalsIterator<T>): boolean {
    return this.compare(other) === GT;
  }

  greaterThanOrEqual(other: IntervalsIterator<T>): boolean {
    return this.compare(other) !== LT;
  }

  clone(): IntervalsIterator<T> {
    return new IntervalsIterator(this._domain, this._endpoints, this._index);
  }

  private requireSameSet(other: IntervalsIterator<T>): void {
    requires(
      this._endpoints === other._endpoints,
      "comparing iterators of different sets"
    );
  }
}

/**
 * The maximal intervals of a set, in ascending order.
 *
 * @example
 * ```typescript
 * const set = makeUnion(
 *   RangeSet.makeInterval(int32, 1, true, 3, true),
 *   RangeSet.makeGreaterEqual(int32, 10),
 * );
 * set.intervals().toArray();
 * // [{ lo: 1, hi: 3 }, { lo: 10, hi: 2147483647 }]
 * ```
 */
export class Intervals<T> {
  private readonly _domain: DomainOrder<T>;
  private readonly _endpoints: readonly T[];

  constructor(domain: DomainOrder<T>, endpoints: readonly T[]) {
    this._domain = domain;
    this._endpoints = endpoints;
  }

  get length(): number {
    return Math.floor((this._endpoints.length + 1) / 2);
  }

  at(index: number): IntervalBounds<T> {
    requires(
      Number.isInteger(index) && index >= 0 && index < this.length,
      () => `interval index ${index} out of range [0, ${this.length})`
    );
    return this.begin().at(index);
  }

  begin(): IntervalsIterator<T> {
    return new IntervalsIterator(this._domain, this._endpoints, 0);
  }

  end(): IntervalsIterator<T> {
    return new IntervalsIterator(this._domain, this._endpoints, endIndexOf(this._endpoints.length));
  }

  *[Symbol.iterator](): IterableIterator<IntervalBounds<T>> {
    for (const it = this.begin(); it.isValid(); it.increment()) {
      yield it.get();
    }
  }

  /** Intervals in descending order. */
  *reversed(): IterableIterator<IntervalBounds<T>> {
    const first = this.begin();
    for (const it = this.end(); it.greaterThan(first); ) {
      yield it.decrement().get();
    }
  }

  toArray(): IntervalBounds<T>[] {
    return [...this];
  }
}
