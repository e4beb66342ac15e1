/**
 * Runtime Safety Primitives
 *
 * Low-level helpers for asserting contracts, marking unreachable code paths,
 * and conditionally running debug code.
 *
 * - `requires(condition, message)` — Caller-facing precondition
 * - `ensures(condition, message)` — Construction-time parameter check
 * - `invariant(condition, message)` — Internal assertion
 * - `unreachable(value?)` — Mark impossible code paths
 * - `debugOnly(fn)` — Code that only runs when `debug` is configured
 *
 * @example
 * ```typescript
 * function lengthBetween(min: number, max: number) {
 *   ensures(min >= 0, "Minimum length must not be negative");
 *   ensures(max >= min, "Maximum length must not be less than the minimum");
 *   // ...
 * }
 *
 * type Scope = "document" | "line";
 * function describe(scope: Scope): string {
 *   switch (scope) {
 *     case "document": return "document";
 *     case "line": return "line";
 *     default: return unreachable(scope); // Type error if Scope is extended
 *   }
 * }
 * ```
 */

import { config } from "./config.js";
import { ConstructionError, InvariantError, PreconditionError } from "./errors.js";

/**
 * Precondition check for arguments passed by a caller.
 *
 * @throws PreconditionError if condition is false
 */
export function requires(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new PreconditionError(message);
  }
}

/**
 * Parameter check performed while constructing rules, actions and grammars.
 *
 * @throws ConstructionError if condition is false
 */
export function ensures(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new ConstructionError(message);
  }
}

/**
 * Runtime invariant check.
 *
 * @throws InvariantError if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new InvariantError(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 *
 * @param value - A value of type `never` (for type-level exhaustiveness)
 */
export function unreachable(value?: never): never {
  throw new InvariantError(`Unreachable code reached${value === undefined ? "" : `: ${String(value)}`}`);
}

/**
 * Run `fn` only when the `debug` configuration flag is set.
 */
export function debugOnly(fn: () => void): void {
  if (config.get<boolean>("debug")) {
    fn();
  }
}
