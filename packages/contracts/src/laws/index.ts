/**
 * Generic Law Verification System
 *
 * Infrastructure for defining algebraic laws for any value type and
 * checking them against generated inputs.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { defineLaw, verifyLawsAtRuntime } from "@intervalkit/contracts";
 *
 * const laws = [
 *   defineLaw<number>({
 *     name: "double negation",
 *     arity: 1,
 *     proofHint: "involution",
 *     check: (a) => -(-a) === a,
 *   }),
 * ];
 *
 * const summary = verifyLawsAtRuntime(laws, { arbitrary: () => Math.random() });
 * ```
 *
 * @module
 */

export {
  type Law,
  type LawSet,
  type ProofHint,
  type Arbitrary,
  type VerifyOptions,
  type LawVerificationResult,
  type VerificationSummary,
  defineLaw,
  combineLaws,
  filterLaws,
  filterByHint,
} from "./types.js";

export {
  type LawsConfig,
  setLawsConfig,
  getLawsConfig,
  resetLawsConfig,
  verifyLaw,
  verifyLawsAtRuntime,
  formatVerificationSummary,
} from "./verify.js";
