import { describe, it, expect } from "vitest";
import { exactCast, integerBounds, isExactlyRepresentable } from "../src/index.js";

describe("exactCast", () => {
  it("passes values that fit through unchanged", () => {
    expect(exactCast(200, "uint8")).toBe(200);
    expect(exactCast(-128, "int8")).toBe(-128);
    expect(exactCast(2n ** 40n, "safe")).toBe(1099511627776);
  });

  it("converts between number and bigint kinds", () => {
    expect(exactCast(7, "int64")).toBe(7n);
    expect(exactCast(-1, "int64")).toBe(-1n);
    expect(exactCast(4294967295n, "uint32")).toBe(4294967295);
  });

  it("throws RangeError when out of bounds", () => {
    expect(() => exactCast(200, "int8")).toThrow(RangeError);
    expect(() => exactCast(200, "int8")).toThrow("200 is not exactly representable as int8");
    expect(() => exactCast(-1, "uint64")).toThrow(RangeError);
    expect(() => exactCast(2n ** 63n, "int64")).toThrow(RangeError);
  });

  it("throws RangeError for fractions and non-finite numbers", () => {
    expect(() => exactCast(1.5, "int32")).toThrow(RangeError);
    expect(() => exactCast(NaN, "int32")).toThrow("NaN is not exactly representable as int32");
    expect(() => exactCast(Infinity, "int64")).toThrow(RangeError);
  });
});

describe("isExactlyRepresentable", () => {
  it("checks both integrality and bounds", () => {
    expect(isExactlyRepresentable(65535, "uint16")).toBe(true);
    expect(isExactlyRepresentable(65536, "uint16")).toBe(false);
    expect(isExactlyRepresentable(-32768, "int16")).toBe(true);
    expect(isExactlyRepresentable(0.5, "int16")).toBe(false);
    expect(isExactlyRepresentable(2n ** 64n - 1n, "uint64")).toBe(true);
  });
});

describe("integerBounds", () => {
  it("reports inclusive bounds in the kind's representation", () => {
    expect(integerBounds("int32")).toEqual({ min: -2147483648, max: 2147483647 });
    expect(integerBounds("uint8")).toEqual({ min: 0, max: 255 });
    expect(integerBounds("int64")).toEqual({ min: -(2n ** 63n), max: 2n ** 63n - 1n });
  });
});
