/**
 * @intervalkit/range-set — interval sets over discrete domains
 *
 * `RangeSet` stores a subset of a bounded, discrete domain as the endpoints
 * of its maximal intervals, so sets like "every int32 except 0…9" take two
 * endpoints. Sets are immutable; union, intersection, difference and
 * symmetric difference run in linear time over the endpoints.
 *
 * @example
 * ```typescript
 * import { int32 } from "@intervalkit/std";
 * import { RangeSet, makeIntersection } from "@intervalkit/range-set";
 *
 * const R = RangeSet.over(int32);
 * makeIntersection(R.makeLessEqual(42), R.makeGreaterEqual(42))
 *   .equals(R.makeSingleValue(42)); // true
 * ```
 */

// Core
export { RangeSet, type RangeSetFactory } from "./range-set.js";
export {
  makeUnion,
  makeIntersection,
  makeDifference,
  makeSymmetricDifference,
} from "./operations.js";
export {
  type BooleanOp,
  unionOp,
  intersectionOp,
  differenceOp,
  symmetricDifferenceOp,
} from "./merge.js";

// Views and iterators
export {
  Intervals,
  IntervalsIterator,
  type IntervalBounds,
  type DomainOrder,
} from "./intervals.js";
export { ElementsIterator } from "./elements.js";

// Typeclasses
export type { IterableOnce, Iterable, Seq, SetLike } from "./typeclasses.js";
export { rangeSetLike, intervalsSeq, eqRangeSet, hashRangeSet } from "./instances.js";

// Laws
export { rangeSetLaws } from "./laws.js";
