import { describe, it, expect } from "vitest";
import { Hasher, hashBigInt, hashNumber, hashString } from "../src/index.js";

describe("Hasher", () => {
  it("starts at the FNV-1a offset basis", () => {
    expect(new Hasher().digest()).toBe(2166136261);
  });

  it("folds 32-bit integers as one word", () => {
    expect(new Hasher().update(0).digest()).toBe(84696351);
    expect(new Hasher().update(1).digest()).toBe(67918732);
  });

  it("is order sensitive", () => {
    expect(new Hasher().update(1).update(2).digest()).toBe(3983810698);
    expect(new Hasher().update(2).update(1).digest()).toBe(1551600396);
  });

  it("folds other numbers by their bit pattern", () => {
    expect(new Hasher().update(1.5).digest()).toBe(3987642317);
  });

  it("treats -0 and 0 alike", () => {
    expect(hashNumber.hash(-0)).toBe(hashNumber.hash(0));
  });

  it("hashes strings by code unit and length", () => {
    expect(hashString.hash("ab")).toBe(961026520);
    expect(hashString.hash("ab")).not.toBe(hashString.hash("ba"));
  });

  it("hashes bigints by sign, limbs and limb count", () => {
    expect(hashBigInt.hash(5n)).toBe(2376373565);
    expect(hashBigInt.hash(-5n)).not.toBe(hashBigInt.hash(5n));
    expect(hashBigInt.hash(2n ** 64n - 1n)).toBe(hashBigInt.hash(18446744073709551615n));
  });

  it("always produces an unsigned 32-bit integer", () => {
    for (const value of [-1, 0.1, 2 ** 40, Number.MIN_SAFE_INTEGER, Infinity]) {
      const h = hashNumber.hash(value);
      expect(Number.isInteger(h)).toBe(true);
      expect(h).toBeGreaterThanOrEqual(0);
      expect(h).toBeLessThan(2 ** 32);
    }
  });
});
