/**
 * @intervalkit/std — Standard Library
 *
 * Typeclasses and data utilities the interval set is built on.
 *
 * ## Typeclasses
 *
 * - Eq, Ord, Bounded, Enum, Numeric, Hash with primitive instances
 * - Discrete, plus fixed-width integer domains (int8 … uint64)
 *
 * ## Data
 *
 * - `exactCast` / `isExactlyRepresentable` for lossless integer conversion
 * - `Hasher`, incremental FNV-1a content hashing
 *
 * @example
 * ```ts
 * import { exactCast, int32, ordNumber } from "@intervalkit/std";
 *
 * int32.next(7);              // 8
 * ordNumber.compare(1, 2);    // -1
 * exactCast(300, "uint8");    // RangeError
 * ```
 */

// Typeclasses
export * from "./typeclasses/index.js";
export * from "./typeclasses/discrete.js";

// Data types
export * from "./data/index.js";
