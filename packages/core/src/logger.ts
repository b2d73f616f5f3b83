/**
 * packages/core/src/logger.ts — Logging port.
 *
 * Why: The core never owns a logging sink. Hosts inject a Logger at
 * construction and components derive scoped children from it, so the same
 * core runs silently under tests and writes to stderr under the Node package.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Structured context attached to a log record. */
export type LogFields = Readonly<Record<string, unknown>>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Derive a logger whose records carry `scope` appended to this logger's scope. */
  child(scope: string): Logger;
}

/** Numeric rank of each level; records below the configured rank are dropped. */
export const LOG_LEVEL_RANK: Readonly<Record<LogLevel, number>> = Object.freeze({
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
});

export const noopLogger: Logger = Object.freeze({
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
});

export function joinScope(parent: string, scope: string): string {
  if (parent.length === 0) return scope;
  if (scope.length === 0) return parent;
  return `${parent}.${scope}`;
}
