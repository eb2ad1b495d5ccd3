/**
 * Algebraic laws of range sets.
 *
 * Structural laws compare sets with `equals`; membership laws probe every
 * value where either operand can change membership (each endpoint and its
 * predecessor, plus the domain bounds), which covers every interval of the
 * result.
 *
 * @example
 * ```typescript
 * import { verifyLawsAtRuntime } from "@intervalkit/contracts";
 *
 * const summary = verifyLawsAtRuntime(rangeSetLaws(int32), arbitraryInt32Sets);
 * summary.disproven; // 0
 * ```
 */

import { type LawSet, defineLaw } from "@intervalkit/contracts";
import type { Discrete } from "@intervalkit/std";
import type { RangeSet } from "./range-set.js";

function probes<T, N>(domain: Discrete<T, N>, sets: readonly RangeSet<T, N>[]): T[] {
  const min = domain.min();
  const values = [min, domain.max()];
  for (const s of sets) {
    for (const e of s.endpoints()) {
      values.push(e);
      if (domain.less(min, e)) values.push(domain.prev(e));
    }
  }
  return values;
}

function agreesOnMembership<T, N>(
  domain: Discrete<T, N>,
  result: RangeSet<T, N>,
  a: RangeSet<T, N>,
  b: RangeSet<T, N>,
  rule: (inA: boolean, inB: boolean) => boolean
): boolean {
  return probes(domain, [a, b]).every((v) => result.contains(v) === rule(a.contains(v), b.contains(v)));
}

export function rangeSetLaws<T, N>(domain: Discrete<T, N>): LawSet<RangeSet<T, N>> {
  return [
    defineLaw<RangeSet<T, N>>({
      name: "complement involution",
      arity: 1,
      proofHint: "involution",
      category: "complement",
      check: (a) => a.complement().complement().equals(a),
    }),
    defineLaw<RangeSet<T, N>>({
      name: "difference via complement",
      arity: 2,
      category: "complement",
      description: "a \\ b === a ∩ ¬b",
      check: (a, b) => a.difference(b).equals(a.intersection(b.complement())),
    }),
    defineLaw<RangeSet<T, N>>({
      name: "De Morgan (union)",
      arity: 2,
      category: "complement",
      description: "¬(a ∪ b) === ¬a ∩ ¬b",
      check: (a, b) => a.union(b).complement().equals(a.complement().intersection(b.complement())),
    }),
    defineLaw<RangeSet<T, N>>({
      name: "symmetric difference as union of differences",
      arity: 2,
      category: "boolean",
      check: (a, b) => a.symmetricDifference(b).equals(a.difference(b).union(b.difference(a))),
    }),
    defineLaw<RangeSet<T, N>>({
      name: "union commutativity",
      arity: 2,
      proofHint: "commutativity",
      category: "boolean",
      check: (a, b) => a.union(b).equals(b.union(a)),
    }),
    defineLaw<RangeSet<T, N>>({
      name: "intersection commutativity",
      arity: 2,
      proofHint: "commutativity",
      category: "boolean",
      check: (a, b) => a.intersection(b).equals(b.intersection(a)),
    }),
    defineLaw<RangeSet<T, N>>({
      name: "intersection associativity",
      arity: 3,
      proofHint: "associativity",
      category: "boolean",
      check: (a, b, c) => a.intersection(b).intersection(c).equals(a.intersection(b.intersection(c))),
    }),
    defineLaw<RangeSet<T, N>>({
      name: "intersection distributes over union",
      arity: 3,
      proofHint: "distributivity",
      category: "boolean",
      check: (a, b, c) =>
        a.intersection(b.union(c)).equals(a.intersection(b).union(a.intersection(c))),
    }),
    defineLaw<RangeSet<T, N>>({
      name: "union membership",
      arity: 2,
      proofHint: "homomorphism",
      category: "membership",
      check: (a, b) => agreesOnMembership(domain, a.union(b), a, b, (x, y) => x || y),
    }),
    defineLaw<RangeSet<T, N>>({
      name: "intersection membership",
      arity: 2,
      proofHint: "homomorphism",
      category: "membership",
      check: (a, b) => agreesOnMembership(domain, a.intersection(b), a, b, (x, y) => x && y),
    }),
  ];
}
