/**
 * @intervalkit/contracts — Design by Contract for intervalkit
 *
 * - `requires(condition, message?)` — Precondition check
 * - `invariant(condition, message?)` — Representation invariant check
 * - `config` — Unified configuration (env vars, config files, programmatic)
 * - Laws — algebraic law definitions checked against generated inputs
 *
 * Contracts can be disabled via configuration:
 * - `contracts.mode: "full"` — All checks (default)
 * - `contracts.mode: "assertions"` — Only invariants
 * - `contracts.mode: "none"` — No checks
 *
 * @example
 * ```typescript
 * import { requires } from "@intervalkit/contracts";
 *
 * function withdraw(account: Account, amount: number): number {
 *   requires(account.balance >= amount, "Insufficient funds");
 *   account.balance -= amount;
 *   return account.balance;
 * }
 * ```
 */

// --- Runtime API ---
export { requires, invariant, type Condition, type Message } from "./runtime/checks.js";
export { ContractError, PreconditionError, InvariantError } from "./runtime/errors.js";

// --- Configuration ---
export {
  type ContractMode,
  type ContractType,
  type ContractsConfig,
  type ContractConfig,
  type IntervalkitConfig,
  config,
  defineConfig,
  debugLog,
  getContractConfig,
  setContractConfig,
  shouldEmitCheck,
} from "./config.js";

// --- Laws ---
export * from "./laws/index.js";
