/**
 * Contract Error Types
 *
 * Specialized error classes for contract violations, providing clear
 * diagnostics about which contract failed.
 */

/**
 * Base class for all contract violations.
 */
export class ContractError extends Error {
  constructor(
    message: string,
    public readonly contractType: "precondition" | "invariant"
  ) {
    super(message);
    this.name = "ContractError";
  }
}

/**
 * Thrown when a precondition (requires) is violated.
 */
export class PreconditionError extends ContractError {
  constructor(message: string) {
    super(message, "precondition");
    this.name = "PreconditionError";
  }
}

/**
 * Thrown when a representation invariant is violated.
 */
export class InvariantError extends ContractError {
  constructor(message: string) {
    super(message, "invariant");
    this.name = "InvariantError";
  }
}
