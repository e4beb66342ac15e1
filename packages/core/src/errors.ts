/**
 * Contract Error Types
 *
 * Errors thrown for contract violations. A rule that simply does not match
 * never throws; these classes are reserved for callers that break the API's
 * contract, either while building rules and grammars or while using them.
 */

/** The kind of contract a {@link ContractError} reports. */
export type ContractType = "construction" | "precondition" | "invariant";

/**
 * Base class for all contract violations.
 */
export class ContractError extends Error {
  constructor(
    message: string,
    public readonly contractType: ContractType
  ) {
    super(message);
    this.name = "ContractError";
  }
}

/**
 * Thrown when an object is constructed with invalid parameters
 * (e.g. `max < min`, an empty rule list, a duplicate rule name).
 */
export class ConstructionError extends ContractError {
  constructor(message: string) {
    super(message, "construction");
    this.name = "ConstructionError";
  }
}

/**
 * Thrown when an operation is called with an argument or in a state it does
 * not accept (e.g. a stream index outside the token list).
 */
export class PreconditionError extends ContractError {
  constructor(message: string) {
    super(message, "precondition");
    this.name = "PreconditionError";
  }
}

/**
 * Thrown when an internal invariant no longer holds.
 */
export class InvariantError extends ContractError {
  constructor(message: string) {
    super(message, "invariant");
    this.name = "InvariantError";
  }
}
