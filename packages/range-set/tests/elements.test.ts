import { describe, it, expect } from "vitest";
import { PreconditionError } from "@intervalkit/contracts";
import { int8, int32 } from "@intervalkit/std";
import { RangeSet, makeUnion } from "../src/index.js";

describe("element iteration", () => {
  it("yields elements in ascending order", () => {
    expect([...RangeSet.makeInterval(int32, 2, true, 5, false)]).toEqual([2, 3, 4]);
    expect([...RangeSet.makeEmpty(int32)]).toEqual([]);
  });

  it("yields elements in descending order with reversed()", () => {
    expect([...RangeSet.makeInterval(int32, -2, true, 2, true).reversed()]).toEqual([2, 1, 0, -1, -2]);
    expect([...RangeSet.makeEmpty(int32).reversed()]).toEqual([]);
  });

  it("walks sets touching both domain bounds", () => {
    const s = makeUnion(RangeSet.makeLessEqual(int8, -127), RangeSet.makeGreaterEqual(int8, 126));
    expect([...s]).toEqual([-128, -127, 126, 127]);
    expect([...s.reversed()]).toEqual([127, 126, -127, -128]);
  });

  it("visits every value of the full domain once", () => {
    const values = [...RangeSet.makeAll(int8)];
    expect(values).toHaveLength(256);
    expect(values[0]).toBe(-128);
    expect(values[255]).toBe(127);
  });
});

describe("ElementsIterator", () => {
  const s = makeUnion(RangeSet.makeLessEqual(int8, -127), RangeSet.makeGreaterEqual(int8, 126));

  it("steps forward across intervals and off the end", () => {
    const it = s.begin();
    expect(it.get()).toBe(-128);
    expect(it.increment().get()).toBe(-127);
    expect(it.increment().get()).toBe(126);
    expect(it.increment().get()).toBe(127);
    it.increment();
    expect(it.isValid()).toBe(false);
    expect(it.equals(s.end())).toBe(true);
  });

  it("steps back from past the end into the last element", () => {
    const it = s.end();
    expect(it.decrement().get()).toBe(127);
    expect(it.decrement().get()).toBe(126);
    expect(it.decrement().get()).toBe(-127);
    expect(it.decrement().get()).toBe(-128);
    expect(it.equals(s.begin())).toBe(true);
  });

  it("begin equals end for the empty set", () => {
    const empty = RangeSet.makeEmpty(int32);
    expect(empty.begin().equals(empty.end())).toBe(true);
    expect(empty.begin().isValid()).toBe(false);
  });

  it("guards both ends", () => {
    expect(() => s.end().get()).toThrow(PreconditionError);
    expect(() => s.end().increment()).toThrow("increment() of a past-the-end elements iterator");
    expect(() => s.begin().decrement()).toThrow("decrement() of the first element");
  });

  it("clones are independent", () => {
    const a = s.begin();
    const b = a.clone();
    a.increment();
    expect(a.get()).toBe(-127);
    expect(b.get()).toBe(-128);
    expect(a.equals(b)).toBe(false);
    b.increment();
    expect(a.equals(b)).toBe(true);
  });
});
