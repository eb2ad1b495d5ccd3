/**
 * Law Verification Engine
 *
 * Checks laws at runtime by feeding them generated values. This is the
 * property-test mode of law verification: each law is evaluated
 * `iterations` times and the first failing input is reported.
 *
 * @module
 */

import { debugLog } from "../config.js";
import type {
  Arbitrary,
  Law,
  LawSet,
  LawVerificationResult,
  VerificationSummary,
  VerifyOptions,
} from "./types.js";

// ============================================================================
// Configuration
// ============================================================================

export interface LawsConfig {
  /** Property test iterations */
  iterations: number;
}

const DEFAULT_CONFIG: LawsConfig = {
  iterations: 100,
};

let lawsConfig: LawsConfig = { ...DEFAULT_CONFIG };

/**
 * Set the global laws configuration.
 */
export function setLawsConfig(config: Partial<LawsConfig>): void {
  lawsConfig = { ...lawsConfig, ...config };
}

/**
 * Get the current laws configuration.
 */
export function getLawsConfig(): LawsConfig {
  return { ...lawsConfig };
}

/**
 * Reset to default configuration.
 */
export function resetLawsConfig(): void {
  lawsConfig = { ...DEFAULT_CONFIG };
}

// ============================================================================
// Law Verification
// ============================================================================

function describeInputs(args: readonly unknown[]): string {
  return args.map((arg) => String(arg)).join(", ");
}

/**
 * Check a single law against `iterations` generated inputs.
 */
export function verifyLaw<A>(
  law: Law<A>,
  arbitrary: Arbitrary<A>,
  options?: VerifyOptions
): LawVerificationResult {
  const iterations = options?.iterations ?? lawsConfig.iterations;

  for (let i = 0; i < iterations; i++) {
    const args = Array.from({ length: law.arity }, () => arbitrary.arbitrary());
    let holds: boolean;
    try {
      holds = law.check(...args);
    } catch (e) {
      return {
        status: "disproven",
        law: law.name,
        counterexample: describeInputs(args),
        error: e instanceof Error ? e.message : String(e),
      };
    }
    if (!holds) {
      return { status: "disproven", law: law.name, counterexample: describeInputs(args) };
    }
  }

  debugLog("laws", `${law.name}: held for ${iterations} samples`);
  return { status: "passed", law: law.name, samples: iterations };
}

/**
 * Check every law in a set and summarize.
 */
export function verifyLawsAtRuntime<A>(
  laws: LawSet<A>,
  arbitrary: Arbitrary<A>,
  options?: VerifyOptions
): VerificationSummary {
  const results = laws.map((law) => verifyLaw(law, arbitrary, options));
  const passed = results.filter((r) => r.status === "passed").length;

  return {
    total: results.length,
    passed,
    disproven: results.length - passed,
    results,
  };
}

// ============================================================================
// Diagnostic Utilities
// ============================================================================

/**
 * Format a verification summary for diagnostic output.
 */
export function formatVerificationSummary(summary: VerificationSummary): string {
  const lines: string[] = [];
  lines.push(`Law Verification: ${summary.passed}/${summary.total} passed`);

  if (summary.disproven > 0) {
    lines.push(`  ${summary.disproven} DISPROVEN`);
  }

  lines.push("");
  for (const result of summary.results) {
    if (result.status === "passed") {
      lines.push(`  ✓ ${result.law} (${result.samples} samples)`);
    } else {
      const error = result.error ? ` threw: ${result.error}` : "";
      lines.push(`  ✗ ${result.law}: counterexample ${result.counterexample}${error}`);
    }
  }

  return lines.join("\n");
}
