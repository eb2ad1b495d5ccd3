/**
 * Bidirectional iterator over the individual elements of a set.
 */

import { requires } from "@intervalkit/contracts";
import type { DomainOrder, IntervalsIterator } from "./intervals.js";

/**
 * Walks a set element by element, ascending on `increment()` and
 * descending on `decrement()`.
 *
 * The position is an intervals iterator plus the current element. Past the
 * end, the element is pinned at `domain.max()`, so every past-the-end
 * iterator of a set compares equal.
 */
export class ElementsIterator<T> {
  private readonly _domain: DomainOrder<T>;
  private readonly _interval: IntervalsIterator<T>;
  private _element: T;

  private constructor(domain: DomainOrder<T>, interval: IntervalsIterator<T>, element: T) {
    this._domain = domain;
    this._interval = interval;
    this._element = element;
  }

  /** An iterator at the first element of `interval`, or past the end. */
  static startOf<T>(domain: DomainOrder<T>, interval: IntervalsIterator<T>): ElementsIterator<T> {
    const element = interval.isValid() ? interval.get().lo : domain.max();
    return new ElementsIterator(domain, interval, element);
  }

  isValid(): boolean {
    return this._interval.isValid();
  }

  get(): T {
    requires(() => this.isValid(), "get() of a past-the-end elements iterator");
    return this._element;
  }

  increment(): this {
    requires(() => this.isValid(), "increment() of a past-the-end elements iterator");
    const { hi } = this._interval.get();
    if (this._domain.less(this._element, hi)) {
      this._element = this._domain.next(this._element);
      return this;
    }
    this._interval.increment();
    this._element = this._interval.isValid() ? this._interval.get().lo : this._domain.max();
    return this;
  }

  decrement(): this {
    if (this.isValid() && this._domain.less(this._interval.get().lo, this._element)) {
      this._element = this._domain.prev(this._element);
      return this;
    }
    requires(this._interval.position > 0, "decrement() of the first element");
    this._element = this._interval.decrement().get().hi;
    return this;
  }

  equals(other: ElementsIterator<T>): boolean {
    const domain = this._domain;
    return (
      this._interval.equals(other._interval) &&
      !domain.less(this._element, other._element) &&
      !domain.less(other._element, this._element)
    );
  }

  clone(): ElementsIterator<T> {
    return new ElementsIterator(this._domain, this._interval.clone(), this._element);
  }
}
