import { describe, it, expect } from "vitest";
import { PreconditionError } from "@intervalkit/contracts";
import { int8, int16, int32 } from "@intervalkit/std";
import {
  type BooleanOp,
  RangeSet,
  makeDifference,
  makeIntersection,
  makeSymmetricDifference,
  makeUnion,
} from "../src/index.js";
import { allValues, arbitraryRangeSet } from "./helpers/arbitrary.js";

const R = RangeSet.over(int32);

describe("boolean combinators", () => {
  it("union keeps disjoint intervals apart", () => {
    const set = makeUnion(R.makeInterval(-5, true, -1, false), R.makeInterval(1, false, 5, true));
    for (const v of [-5, -4, -3, -2, 2, 3, 4, 5]) {
      expect(set.contains(v)).toBe(true);
    }
    for (const v of [-6, -1, 0, 1, 6]) {
      expect(set.contains(v)).toBe(false);
    }
    expect(set.intervals().length).toBe(2);
  });

  it("union merges touching intervals", () => {
    const set = makeUnion(R.makeInterval(1, true, 5, false), R.makeInterval(5, true, 9, false));
    expect(set.endpoints()).toEqual([1, 9]);
    expect(set.intervals().length).toBe(1);
  });

  it("union of complementary rays is everything", () => {
    expect(makeUnion(R.makeLessEqual(0), R.makeGreater(0)).isAll()).toBe(true);
  });

  it("intersection of closed rays is their common point", () => {
    expect(makeIntersection(R.makeLessEqual(42), R.makeGreaterEqual(42)).equals(R.makeSingleValue(42))).toBe(
      true
    );
  });

  it("every int8 interval equals the intersection of its rays", () => {
    const I8 = RangeSet.over(int8);
    const inclusions: [boolean, boolean][] = [
      [true, true],
      [true, false],
      [false, true],
      [false, false],
    ];
    let mismatches = 0;
    for (let lo = int8.min(); lo <= int8.max(); lo++) {
      const rays = {
        from: I8.makeGreaterEqual(lo),
        after: I8.makeGreater(lo),
      };
      for (let hi = lo; hi <= int8.max(); hi++) {
        for (const [loIncluded, hiIncluded] of inclusions) {
          const lower = loIncluded ? rays.from : rays.after;
          const upper = hiIncluded ? I8.makeLessEqual(hi) : I8.makeLess(hi);
          if (!I8.makeInterval(lo, loIncluded, hi, hiIncluded).equals(makeIntersection(lower, upper))) {
            mismatches++;
          }
        }
      }
    }
    expect(mismatches).toBe(0);
  });

  it("intersection of disjoint sets is empty", () => {
    expect(makeIntersection(R.makeLess(0), R.makeGreater(0)).isEmpty()).toBe(true);
  });

  it("difference punches holes", () => {
    const s = makeDifference(RangeSet.makeAll(int8), RangeSet.makeSingleValue(int8, 0));
    expect(s.endpoints()).toEqual([-128, 0, 1]);
    expect(s.toString()).toBe("{[-128, -1], [1, 127]}");
    expect(s.size()).toBe(255);
  });

  it("symmetric difference keeps what is in exactly one side", () => {
    const s = makeSymmetricDifference(R.makeInterval(1, true, 5, false), R.makeInterval(3, true, 8, false));
    expect(s.endpoints()).toEqual([1, 3, 5, 8]);
    expect([...s]).toEqual([1, 2, 5, 6, 7]);
  });

  it("identities", () => {
    const s = R.makeInterval(-3, true, 7, true);
    expect(s.union(R.makeEmpty()).equals(s)).toBe(true);
    expect(s.intersection(R.makeAll()).equals(s)).toBe(true);
    expect(s.symmetricDifference(s).isEmpty()).toBe(true);
    expect(s.difference(s).isEmpty()).toBe(true);
    expect(R.makeAll().symmetricDifference(R.makeAll()).isEmpty()).toBe(true);
  });

  it("instance methods match the free functions", () => {
    const a = R.makeInterval(0, true, 10, false);
    const b = R.makeGreaterEqual(5);
    expect(a.union(b).equals(makeUnion(a, b))).toBe(true);
    expect(a.intersection(b).equals(makeIntersection(a, b))).toBe(true);
    expect(a.difference(b).equals(makeDifference(a, b))).toBe(true);
    expect(a.symmetricDifference(b).equals(makeSymmetricDifference(a, b))).toBe(true);
  });

  it("makeBoolean accepts a custom membership rule", () => {
    const onlyRhs: BooleanOp = (x, y) => !x && y;
    const a = R.makeLess(0);
    const b = R.makeLess(10);
    expect(RangeSet.makeBoolean(a, b, onlyRhs).endpoints()).toEqual([0, 10]);
  });

  it("makeBoolean rejects rules that hold outside both sets", () => {
    const nor: BooleanOp = (x, y) => !x && !y;
    expect(() => RangeSet.makeBoolean(R.makeEmpty(), R.makeEmpty(), nor)).toThrow(PreconditionError);
  });

  it("refuses to combine sets over different domains", () => {
    expect(() => makeUnion(RangeSet.makeAll(int8), RangeSet.makeAll(int16))).toThrow(
      "combining sets over different domains"
    );
  });

  it("agrees with elementwise boolean logic on random int8 sets", () => {
    const arbitrary = arbitraryRangeSet(int8, 7);
    const values = allValues(int8);
    const rules: [string, (a: RangeSet<number>, b: RangeSet<number>) => RangeSet<number>, BooleanOp][] = [
      ["union", makeUnion, (x, y) => x || y],
      ["intersection", makeIntersection, (x, y) => x && y],
      ["difference", makeDifference, (x, y) => x && !y],
      ["symmetric difference", makeSymmetricDifference, (x, y) => x !== y],
    ];

    for (let i = 0; i < 50; i++) {
      const a = arbitrary.arbitrary();
      const b = arbitrary.arbitrary();
      for (const [name, combine, rule] of rules) {
        const result = combine(a, b);
        const expected = values.filter((v) => rule(a.contains(v), b.contains(v)));
        expect([...result], `${name} of ${a} and ${b}`).toEqual(expected);
        expect(result.size()).toBe(expected.length);
      }
    }
  });
});
