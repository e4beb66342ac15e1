/**
 * Scoped console logging, filtered by the configured log level.
 *
 * @example
 * ```typescript
 * const log = createLogger("engine");
 * log.debug(() => `matched ${rule.kind} at ${index}`); // built only when enabled
 * log.warn("grammar has no active rules");
 * ```
 */

import { config, type LogLevel } from "./config.js";

export type { LogLevel };

/** A message, or a thunk producing one when the level is enabled. */
export type LogMessage = string | (() => string);

export interface Logger {
  readonly scope: string;
  debug(message: LogMessage): void;
  info(message: LogMessage): void;
  warn(message: LogMessage): void;
  error(message: LogMessage): void;
  isEnabled(level: Exclude<LogLevel, "silent">): boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/** The level currently in effect; `debug: true` overrides `logLevel`. */
export function currentLogLevel(): LogLevel {
  if (config.get<boolean>("debug")) return "debug";
  const level = config.get("logLevel");
  return isLogLevel(level) ? level : "warn";
}

/**
 * Create a logger whose output is prefixed with `[tokenloom:<scope>]`.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[tokenloom:${scope}]`;

  function isEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLogLevel()];
  }

  function write(level: Exclude<LogLevel, "silent">, message: LogMessage): void {
    if (!isEnabled(level)) return;
    const text = typeof message === "function" ? message() : message;
    console[level](`${prefix} ${text}`);
  }

  return {
    scope,
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
    isEnabled,
  };
}
