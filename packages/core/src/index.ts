/**
 * @tokenloom/core
 *
 * Shared infrastructure for tokenloom packages:
 * - Configuration loading (defaults, config files, TOKENLOOM_* env vars)
 * - Scoped console logging
 * - Contract error classes and runtime safety primitives
 */

// Configuration System
export {
  config,
  defineConfig,
  type TokenloomConfig,
  type EngineConfig,
  type LogLevel,
} from "./config.js";

// Logging
export { createLogger, currentLogLevel, type Logger, type LogMessage } from "./logger.js";

// Contract Errors
export {
  ContractError,
  ConstructionError,
  PreconditionError,
  InvariantError,
  type ContractType,
} from "./errors.js";

// Runtime Safety Primitives
export { requires, ensures, invariant, unreachable, debugOnly } from "./safety.js";
