/**
 * Generic Law Definition Types
 *
 * Provides a framework for defining and verifying algebraic laws
 * for any value type. Laws are predicates that must hold for every
 * input; they are checked at runtime against generated values.
 *
 * @example
 * ```typescript
 * import { type LawSet, defineLaw } from "@intervalkit/contracts";
 *
 * function additionLaws(): LawSet<number> {
 *   return [
 *     defineLaw({
 *       name: "commutativity",
 *       arity: 2,
 *       proofHint: "commutativity",
 *       check: (a, b) => a + b === b + a,
 *     }),
 *   ];
 * }
 * ```
 *
 * @module
 */

// ============================================================================
// Proof Hints
// ============================================================================

/**
 * Algebraic property a law expresses. Used to group and filter laws.
 */
export type ProofHint =
  | "identity-left"
  | "identity-right"
  | "associativity"
  | "commutativity"
  | "reflexivity"
  | "symmetry"
  | "transitivity"
  | "homomorphism"
  | "distributivity"
  | "absorption"
  | "idempotence"
  | "involution";

// ============================================================================
// Core Law Type
// ============================================================================

/**
 * A law over values of type `A`.
 *
 * @example
 * ```typescript
 * const associativityLaw: Law<number> = {
 *   name: "associativity",
 *   arity: 3,
 *   proofHint: "associativity",
 *   description: "(a + b) + c === a + (b + c)",
 *   check: (a, b, c) => (a + b) + c === a + (b + c),
 * };
 * ```
 */
export interface Law<A = unknown> {
  /**
   * Human-readable name of the law.
   * Used in error messages and test descriptions.
   */
  readonly name: string;

  /**
   * The law predicate. Receives `arity` arbitrary values.
   */
  readonly check: (...args: A[]) => boolean;

  /**
   * Number of arbitrary values the law needs.
   */
  readonly arity: number;

  /**
   * The algebraic property (or properties) the law expresses.
   */
  readonly proofHint?: ProofHint | ProofHint[];

  /**
   * Optional description explaining the law in plain English.
   * Shown in failure reports.
   */
  readonly description?: string;

  /**
   * Optional category for grouping related laws.
   * @example "complement", "boolean", "membership"
   */
  readonly category?: string;
}

// ============================================================================
// Law Collections
// ============================================================================

/**
 * A collection of laws over one value type.
 */
export type LawSet<A = unknown> = readonly Law<A>[];

// ============================================================================
// Arbitrary (for property testing)
// ============================================================================

/**
 * Source of random test values.
 *
 * @template A - The type of values to generate
 */
export interface Arbitrary<A> {
  /**
   * Generate a random value of type A.
   * Should produce a variety of values including edge cases.
   */
  readonly arbitrary: () => A;
}

// ============================================================================
// Verification Options
// ============================================================================

export interface VerifyOptions {
  /**
   * Number of samples per law. Defaults to the laws config (100).
   */
  readonly iterations?: number;
}

// ============================================================================
// Verification Results
// ============================================================================

/**
 * Result of checking one law against generated inputs.
 */
export type LawVerificationResult =
  | {
      readonly status: "passed";
      readonly law: string;
      readonly samples: number;
    }
  | {
      readonly status: "disproven";
      readonly law: string;
      readonly counterexample: string;
      readonly error?: string;
    };

/**
 * Summary of verification for a set of laws.
 */
export interface VerificationSummary {
  readonly total: number;
  readonly passed: number;
  readonly disproven: number;
  readonly results: readonly LawVerificationResult[];
}

// ============================================================================
// Law Builder Utilities
// ============================================================================

/**
 * Create a law with type inference for the check function.
 */
export function defineLaw<A>(law: Law<A>): Law<A> {
  return law;
}

/**
 * Combine multiple law sets into one.
 */
export function combineLaws<A>(...lawSets: LawSet<A>[]): LawSet<A> {
  return lawSets.flat();
}

/**
 * Filter laws by category.
 */
export function filterLaws<A>(laws: LawSet<A>, category: string): LawSet<A> {
  return laws.filter((law) => law.category === category);
}

/**
 * Filter laws by proof hint.
 */
export function filterByHint<A>(laws: LawSet<A>, hint: ProofHint): LawSet<A> {
  return laws.filter((law) => {
    if (!law.proofHint) return false;
    if (Array.isArray(law.proofHint)) {
      return law.proofHint.includes(hint);
    }
    return law.proofHint === hint;
  });
}
