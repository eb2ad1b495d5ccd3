/**
 * Exact numeric conversion.
 *
 * `exactCast` converts between integer representations and throws a
 * `RangeError` instead of truncating, wrapping or rounding when the value
 * has no exact counterpart in the target kind.
 *
 * @example
 * ```typescript
 * exactCast(200, "uint8");       // 200
 * exactCast(200, "int8");        // RangeError
 * exactCast(2n ** 40n, "safe");  // 1099511627776
 * exactCast(7, "int64");         // 7n
 * exactCast(1.5, "int32");       // RangeError
 * ```
 */

/** Integer kinds represented as `number`. */
export type NumberKind = "int8" | "uint8" | "int16" | "uint16" | "int32" | "uint32" | "safe";

/** Integer kinds represented as `bigint`. */
export type BigIntKind = "int64" | "uint64";

export type IntegerKind = NumberKind | BigIntKind;

const RANGES = {
  int8: [-(2n ** 7n), 2n ** 7n - 1n],
  uint8: [0n, 2n ** 8n - 1n],
  int16: [-(2n ** 15n), 2n ** 15n - 1n],
  uint16: [0n, 2n ** 16n - 1n],
  int32: [-(2n ** 31n), 2n ** 31n - 1n],
  uint32: [0n, 2n ** 32n - 1n],
  safe: [BigInt(Number.MIN_SAFE_INTEGER), BigInt(Number.MAX_SAFE_INTEGER)],
  int64: [-(2n ** 63n), 2n ** 63n - 1n],
  uint64: [0n, 2n ** 64n - 1n],
} as const satisfies Record<IntegerKind, readonly [bigint, bigint]>;

function isBigIntKind(kind: IntegerKind): kind is BigIntKind {
  return kind === "int64" || kind === "uint64";
}

function toExactBigInt(value: number | bigint): bigint | undefined {
  if (typeof value === "bigint") return value;
  return Number.isInteger(value) ? BigInt(value) : undefined;
}

/**
 * Inclusive bounds of an integer kind.
 */
export function integerBounds(kind: NumberKind): { readonly min: number; readonly max: number };
export function integerBounds(kind: BigIntKind): { readonly min: bigint; readonly max: bigint };
export function integerBounds(
  kind: IntegerKind
): { readonly min: number | bigint; readonly max: number | bigint } {
  const [min, max] = RANGES[kind];
  return isBigIntKind(kind) ? { min, max } : { min: Number(min), max: Number(max) };
}

/**
 * True when `value` is an integer inside the bounds of `kind`.
 */
export function isExactlyRepresentable(value: number | bigint, kind: IntegerKind): boolean {
  const exact = toExactBigInt(value);
  if (exact === undefined) return false;
  const [min, max] = RANGES[kind];
  return exact >= min && exact <= max;
}

/**
 * Convert `value` to `kind`, failing loudly when it is not exactly representable.
 *
 * @throws RangeError if the value is fractional, non-finite or out of bounds
 */
export function exactCast(value: number | bigint, kind: NumberKind): number;
export function exactCast(value: number | bigint, kind: BigIntKind): bigint;
export function exactCast(value: number | bigint, kind: IntegerKind): number | bigint {
  const exact = toExactBigInt(value);
  const [min, max] = RANGES[kind];
  if (exact === undefined || exact < min || exact > max) {
    throw new RangeError(`${String(value)} is not exactly representable as ${kind}`);
  }
  return isBigIntKind(kind) ? exact : Number(exact);
}
