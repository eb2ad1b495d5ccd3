/**
 * Runtime contract checks.
 *
 * `requires()` guards arguments at API entry points and `invariant()` guards
 * representation invariants. Both consult the contract configuration on every
 * call, so they can be disabled without touching call sites:
 *
 * - `contracts.mode: "full"` — both kinds run (default)
 * - `contracts.mode: "assertions"` — only invariants run
 * - `contracts.mode: "none"` — nothing runs
 *
 * A condition may be passed as a thunk when computing it is not O(1); the
 * thunk is only called when the check is enabled.
 *
 * @example
 * ```typescript
 * function head<T>(xs: readonly T[]): T {
 *   requires(xs.length > 0, "head() of an empty array");
 *   return xs[0];
 * }
 * ```
 */

import { shouldEmitCheck } from "../config.js";
import { InvariantError, PreconditionError } from "./errors.js";

export type Condition = boolean | (() => boolean);

export type Message = string | (() => string);

function holds(condition: Condition): boolean {
  return typeof condition === "function" ? condition() : condition;
}

function render(message: Message | undefined, fallback: string): string {
  if (message === undefined) return fallback;
  return typeof message === "function" ? message() : message;
}

/**
 * Precondition check. Throws {@link PreconditionError} when enabled and the
 * condition is false.
 */
export function requires(condition: Condition, message?: Message): void {
  if (!shouldEmitCheck("precondition")) return;
  if (!holds(condition)) {
    throw new PreconditionError(render(message, "Precondition failed"));
  }
}

/**
 * Invariant check. Throws {@link InvariantError} when enabled and the
 * condition is false.
 */
export function invariant(condition: Condition, message?: Message): void {
  if (!shouldEmitCheck("invariant")) return;
  if (!holds(condition)) {
    throw new InvariantError(render(message, "Invariant violated"));
  }
}
