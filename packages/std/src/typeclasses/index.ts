/**
 * Standard Typeclasses
 *
 * The small set of typeclasses intervalkit builds on, drawing from:
 * - Haskell (Eq, Ord, Bounded, Enum, Num)
 * - Scala 3 (Ordering, Numeric)
 * - Rust (PartialEq/Eq, Ord, Hash)
 *
 * Instances are plain objects; pass them explicitly wherever a function
 * takes a typeclass parameter.
 */

import { Hasher } from "../data/hasher.js";

// ============================================================================
// Eq — Haskell Eq, Rust PartialEq/Eq, Scala CanEqual
// Types supporting equality comparison.
// ============================================================================

/**
 * Eq typeclass - equality comparison.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

/**
 * Create an Eq instance from a custom equality function.
 */
export function makeEq<A>(eq: (a: A, b: A) => boolean): Eq<A> {
  return {
    equals: eq,
    notEquals: (a, b) => !eq(a, b),
  };
}

// ============================================================================
// Ord — Haskell Ord, Rust Ord, Scala Ordering
// Types supporting total ordering.
// ============================================================================

/**
 * Ordering result type.
 */
export type Ordering = -1 | 0 | 1;
export const LT: Ordering = -1;
export const EQ_ORD: Ordering = 0;
export const GT: Ordering = 1;

/**
 * Ord typeclass - total ordering.
 *
 * Laws (in addition to Eq laws):
 * - Antisymmetry: `compare(x, y) <= 0 && compare(y, x) <= 0 => equals(x, y)`
 * - Transitivity: `compare(x, y) <= 0 && compare(y, z) <= 0 => compare(x, z) <= 0`
 * - Totality: `compare(x, y) <= 0 || compare(y, x) <= 0`
 */
export interface Ord<A> extends Eq<A> {
  compare(a: A, b: A): Ordering;
  lessThan(a: A, b: A): boolean;
  lessThanOrEqual(a: A, b: A): boolean;
  greaterThan(a: A, b: A): boolean;
  greaterThanOrEqual(a: A, b: A): boolean;
}

export const ordNumber: Ord<number> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
  compare: (a, b) => (a < b ? LT : a > b ? GT : EQ_ORD),
  lessThan: (a, b) => a < b,
  lessThanOrEqual: (a, b) => a <= b,
  greaterThan: (a, b) => a > b,
  greaterThanOrEqual: (a, b) => a >= b,
};

export const ordBigInt: Ord<bigint> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
  compare: (a, b) => (a < b ? LT : a > b ? GT : EQ_ORD),
  lessThan: (a, b) => a < b,
  lessThanOrEqual: (a, b) => a <= b,
  greaterThan: (a, b) => a > b,
  greaterThanOrEqual: (a, b) => a >= b,
};

/**
 * Create an Ord instance from a compare function.
 */
export function makeOrd<A>(compare: (a: A, b: A) => Ordering): Ord<A> {
  return {
    equals: (a, b) => compare(a, b) === EQ_ORD,
    notEquals: (a, b) => compare(a, b) !== EQ_ORD,
    compare,
    lessThan: (a, b) => compare(a, b) === LT,
    lessThanOrEqual: (a, b) => compare(a, b) !== GT,
    greaterThan: (a, b) => compare(a, b) === GT,
    greaterThanOrEqual: (a, b) => compare(a, b) !== LT,
  };
}

/**
 * Create an Ord instance by mapping to a comparable value.
 */
export function ordBy<A, B>(f: (a: A) => B, O: Ord<B>): Ord<A> {
  return {
    equals: (a, b) => O.equals(f(a), f(b)),
    notEquals: (a, b) => O.notEquals(f(a), f(b)),
    compare: (a, b) => O.compare(f(a), f(b)),
    lessThan: (a, b) => O.lessThan(f(a), f(b)),
    lessThanOrEqual: (a, b) => O.lessThanOrEqual(f(a), f(b)),
    greaterThan: (a, b) => O.greaterThan(f(a), f(b)),
    greaterThanOrEqual: (a, b) => O.greaterThanOrEqual(f(a), f(b)),
  };
}

// ============================================================================
// Bounded — Haskell Bounded, Rust: MIN/MAX constants
// Types with a least and a greatest value.
// ============================================================================

/**
 * Bounded typeclass - types with minimum and maximum values.
 */
export interface Bounded<A> {
  minBound(): A;
  maxBound(): A;
}

// ============================================================================
// Enum — Haskell Enum
// Types with successors and predecessors, convertible to/from integers.
// ============================================================================

/**
 * Enum typeclass - types with successors/predecessors, convertible to/from integers.
 */
export interface Enum<A> {
  succ(a: A): A;
  pred(a: A): A;
  toEnum(n: number): A;
  fromEnum(a: A): number;
}

export const enumNumber: Enum<number> = {
  succ: (a) => a + 1,
  pred: (a) => a - 1,
  toEnum: (n) => n,
  fromEnum: (a) => a,
};

export const enumBigInt: Enum<bigint> = {
  succ: (a) => a + 1n,
  pred: (a) => a - 1n,
  toEnum: (n) => BigInt(n),
  fromEnum: (a) => Number(a),
};

// ============================================================================
// Numeric — Haskell Num, Scala Numeric
// Types supporting basic arithmetic.
// ============================================================================

/**
 * Numeric typeclass - types supporting basic arithmetic operations.
 *
 * This is the Ring abstraction: add, sub, mul with identity elements.
 */
export interface Numeric<A> {
  add(a: A, b: A): A;
  sub(a: A, b: A): A;
  mul(a: A, b: A): A;
  negate(a: A): A;
  fromNumber(n: number): A;
  toNumber(a: A): number;
  zero(): A;
  one(): A;
}

export const numericNumber: Numeric<number> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  negate: (a) => -a,
  fromNumber: (n) => n,
  toNumber: (a) => a,
  zero: () => 0,
  one: () => 1,
};

export const numericBigInt: Numeric<bigint> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  negate: (a) => -a,
  fromNumber: (n) => BigInt(Math.trunc(n)),
  toNumber: (a) => Number(a),
  zero: () => 0n,
  one: () => 1n,
};

// ============================================================================
// Hash — Rust Hash, Swift Hashable
// Types with a content hash consistent with equality.
// ============================================================================

/**
 * Hash typeclass - content hashing.
 *
 * Law: `equals(a, b) => hash(a) === hash(b)` for the type's Eq.
 */
export interface Hash<A> {
  hash(a: A): number;
}

export const hashNumber: Hash<number> = {
  hash: (a) => new Hasher().update(a).digest(),
};

export const hashBigInt: Hash<bigint> = {
  hash: (a) => new Hasher().updateBigInt(a).digest(),
};

export const hashString: Hash<string> = {
  hash: (a) => new Hasher().updateString(a).digest(),
};
