import { describe, it, expect, afterEach } from "vitest";
import {
  type Arbitrary,
  type LawSet,
  combineLaws,
  defineLaw,
  filterByHint,
  filterLaws,
  formatVerificationSummary,
  getLawsConfig,
  resetLawsConfig,
  setLawsConfig,
  verifyLaw,
  verifyLawsAtRuntime,
} from "../src/index.js";

/** Yields 0, 1, 2, ... */
function counting(): Arbitrary<number> {
  let next = 0;
  return { arbitrary: () => next++ };
}

const additionLaws: LawSet<number> = [
  defineLaw({
    name: "commutativity",
    arity: 2,
    proofHint: "commutativity",
    category: "addition",
    check: (a, b) => a + b === b + a,
  }),
  defineLaw({
    name: "left identity",
    arity: 1,
    proofHint: ["identity-left"],
    category: "addition",
    check: (a) => 0 + a === a,
  }),
];

const belowThree = defineLaw<number>({
  name: "below three",
  arity: 1,
  check: (a) => a < 3,
});

describe("law builders", () => {
  it("combines and filters law sets", () => {
    const all = combineLaws(additionLaws, [belowThree]);
    expect(all.map((l) => l.name)).toEqual(["commutativity", "left identity", "below three"]);
    expect(filterLaws(all, "addition")).toHaveLength(2);
    expect(filterByHint(all, "identity-left").map((l) => l.name)).toEqual(["left identity"]);
    expect(filterByHint(all, "involution")).toEqual([]);
  });
});

describe("verifyLaw", () => {
  afterEach(() => {
    resetLawsConfig();
  });

  it("passes a law that holds", () => {
    expect(verifyLaw(additionLaws[0], counting(), { iterations: 20 })).toEqual({
      status: "passed",
      law: "commutativity",
      samples: 20,
    });
  });

  it("reports the first counterexample", () => {
    expect(verifyLaw(belowThree, counting(), { iterations: 10 })).toEqual({
      status: "disproven",
      law: "below three",
      counterexample: "3",
    });
  });

  it("records a throwing check as disproven", () => {
    const throwing = defineLaw<number>({
      name: "throws",
      arity: 2,
      check: () => {
        throw new Error("boom");
      },
    });
    expect(verifyLaw(throwing, counting())).toEqual({
      status: "disproven",
      law: "throws",
      counterexample: "0, 1",
      error: "boom",
    });
  });

  it("uses the configured iteration count", () => {
    setLawsConfig({ iterations: 7 });
    expect(getLawsConfig().iterations).toBe(7);
    expect(verifyLaw(additionLaws[1], counting())).toMatchObject({ samples: 7 });
  });
});

describe("verifyLawsAtRuntime", () => {
  it("summarizes results", () => {
    const summary = verifyLawsAtRuntime(combineLaws(additionLaws, [belowThree]), counting(), {
      iterations: 2,
    });
    // commutativity consumes 0..3, left identity 4..5, below three sees 6
    expect(summary.total).toBe(3);
    expect(summary.passed).toBe(2);
    expect(summary.disproven).toBe(1);
    expect(formatVerificationSummary(summary)).toBe(
      [
        "Law Verification: 2/3 passed",
        "  1 DISPROVEN",
        "",
        "  ✓ commutativity (2 samples)",
        "  ✓ left identity (2 samples)",
        "  ✗ below three: counterexample 6",
      ].join("\n")
    );
  });
});
