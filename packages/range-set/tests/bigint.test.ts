import { describe, it, expect } from "vitest";
import { int64, uint64 } from "@intervalkit/std";
import { RangeSet, rangeSetLike } from "../src/index.js";

const I = RangeSet.over(int64);
const U = RangeSet.over(uint64);

describe("RangeSet over 64-bit domains", () => {
  it("counts past the safe integer range", () => {
    expect(I.makeAll().size()).toBe(2n ** 64n);
    expect(U.makeAll().size()).toBe(2n ** 64n);
    expect(I.makeSingleValue(0n).complement().size()).toBe(2n ** 64n - 1n);
    expect(I.makeGreaterEqual(0n).size()).toBe(2n ** 63n);
  });

  it("iterates at the top of the domain", () => {
    const max = int64.max();
    const top = I.makeGreaterEqual(max - 2n);
    expect([...top]).toEqual([max - 2n, max - 1n, max]);
    expect([...top.reversed()]).toEqual([max, max - 1n, max - 2n]);
  });

  it("starts unsigned sets at zero", () => {
    const small = U.makeLess(3n);
    expect([...small]).toEqual([0n, 1n, 2n]);
    expect(small.toString()).toBe("{[0, 2]}");
    expect(small.complement().min()).toBe(3n);
    expect(small.complement().max()).toBe(2n ** 64n - 1n);
  });

  it("combines and compares", () => {
    const evensBelowSix = [0n, 2n, 4n]
      .map((v) => I.makeSingleValue(v))
      .reduce((acc, s) => acc.union(s), I.makeEmpty());
    expect(evensBelowSix.intervals().length).toBe(3);
    expect(evensBelowSix.union(I.makeInterval(0n, true, 5n, true)).equals(I.makeInterval(0n, true, 6n, false))).toBe(
      true
    );
    expect(rangeSetLike(int64).size(I.makeInterval(0n, true, 9n, true))).toBe(10);
  });

  it("rejects values outside the domain", () => {
    expect(() => U.makeSingleValue(-1n)).toThrow("-1 is not a value of uint64");
    expect(() => I.makeSingleValue(2n ** 63n)).toThrow("9223372036854775808 is not a value of int64");
  });
});
