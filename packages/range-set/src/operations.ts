/**
 * Set algebra as free functions. Each is `RangeSet.makeBoolean` with the
 * matching membership rule, and requires both sets to share a domain.
 */

import { RangeSet } from "./range-set.js";
import { differenceOp, intersectionOp, symmetricDifferenceOp, unionOp } from "./merge.js";

export function makeUnion<T, N>(lhs: RangeSet<T, N>, rhs: RangeSet<T, N>): RangeSet<T, N> {
  return RangeSet.makeBoolean(lhs, rhs, unionOp);
}

export function makeIntersection<T, N>(lhs: RangeSet<T, N>, rhs: RangeSet<T, N>): RangeSet<T, N> {
  return RangeSet.makeBoolean(lhs, rhs, intersectionOp);
}

export function makeDifference<T, N>(lhs: RangeSet<T, N>, rhs: RangeSet<T, N>): RangeSet<T, N> {
  return RangeSet.makeBoolean(lhs, rhs, differenceOp);
}

export function makeSymmetricDifference<T, N>(
  lhs: RangeSet<T, N>,
  rhs: RangeSet<T, N>
): RangeSet<T, N> {
  return RangeSet.makeBoolean(lhs, rhs, symmetricDifferenceOp);
}
