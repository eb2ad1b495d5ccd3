/**
 * Boolean combination of endpoint arrays.
 */

/**
 * Decides membership in a combined set from membership in its operands.
 * Must map `(false, false)` to `false`.
 */
export type BooleanOp = (insideLhs: boolean, insideRhs: boolean) => boolean;

export const unionOp: BooleanOp = (a, b) => a || b;
export const intersectionOp: BooleanOp = (a, b) => a && b;
export const differenceOp: BooleanOp = (a, b) => a && !b;
export const symmetricDifferenceOp: BooleanOp = (a, b) => a !== b;

/**
 * Sorted merge of two canonical endpoint arrays in `O(n + m)`.
 *
 * Each endpoint toggles membership of the operand it came from; an endpoint
 * shared by both toggles both at once. The combined set changes membership
 * exactly where `op` changes its answer, and those are the endpoints emitted.
 */
export function mergeEndpoints<T>(
  less: (a: T, b: T) => boolean,
  lhs: readonly T[],
  rhs: readonly T[],
  op: BooleanOp
): T[] {
  const out: T[] = [];
  let inside = false;
  let insideLhs = false;
  let insideRhs = false;
  let i = 0;
  let j = 0;

  while (i < lhs.length || j < rhs.length) {
    let value: T;
    if (j === rhs.length || (i < lhs.length && less(lhs[i], rhs[j]))) {
      insideLhs = !insideLhs;
      value = lhs[i++];
    } else if (i === lhs.length || less(rhs[j], lhs[i])) {
      insideRhs = !insideRhs;
      value = rhs[j++];
    } else {
      insideLhs = !insideLhs;
      insideRhs = !insideRhs;
      i++;
      value = rhs[j++];
    }

    const next = op(insideLhs, insideRhs);
    if (next !== inside) {
      inside = next;
      out.push(value);
    }
  }

  return out;
}
