/**
 * packages/node/src/logger.ts — Line-oriented Logger for Node hosts.
 *
 * Configure with:
 *   DROIDLET_LOG_LEVEL=debug|info|warn|error|silent   (default: info)
 *   DROIDLET_LOG_FORMAT=text|json                     (default: text)
 *
 * Text records:
 *   2026-01-01T00:00:00.000Z - Counter.Activity.Main - INFO - Activity Main started {"from":"created"}
 *
 * JSON records are one object per line (NDJSON).
 */

import {
  DroidletError,
  LOG_LEVEL_RANK,
  type LogFields,
  type LogLevel,
  type Logger,
  joinScope,
} from "@droidlet/core";

export type NodeLogLevel = LogLevel | "silent";
export type NodeLogFormat = "text" | "json";

/** Minimal sink: process.stderr, a file stream or an in-memory collector. */
export type LogSink = Readonly<{ write: (chunk: string) => unknown }>;

export type NodeLoggerOptions = Readonly<{
  scope?: string;
  level?: NodeLogLevel;
  format?: NodeLogFormat;
  sink?: LogSink;
  now?: () => Date;
}>;

const LEVELS: readonly NodeLogLevel[] = Object.freeze(["debug", "info", "warn", "error", "silent"]);
const FORMATS: readonly NodeLogFormat[] = Object.freeze(["text", "json"]);

function readEnv(name: string): string | null {
  const raw = process.env[name];
  if (typeof raw !== "string") return null;
  const value = raw.trim();
  return value.length > 0 ? value : null;
}

function isLevel(value: string): value is NodeLogLevel {
  return LEVELS.some((level) => level === value);
}

function isFormat(value: string): value is NodeLogFormat {
  return FORMATS.some((format) => format === value);
}

export function resolveLogLevel(explicit: NodeLogLevel | undefined): NodeLogLevel {
  if (explicit !== undefined) {
    if (!isLevel(explicit)) {
      throw new DroidletError("DL_INVALID_PROPS", `log level must be one of ${LEVELS.join("|")}`);
    }
    return explicit;
  }
  const env = readEnv("DROIDLET_LOG_LEVEL")?.toLowerCase() ?? null;
  return env !== null && isLevel(env) ? env : "info";
}

export function resolveLogFormat(explicit: NodeLogFormat | undefined): NodeLogFormat {
  if (explicit !== undefined) {
    if (!isFormat(explicit)) {
      throw new DroidletError("DL_INVALID_PROPS", `log format must be one of ${FORMATS.join("|")}`);
    }
    return explicit;
  }
  const env = readEnv("DROIDLET_LOG_FORMAT")?.toLowerCase() ?? null;
  return env !== null && isFormat(env) ? env : "text";
}

function hasFields(fields: LogFields | undefined): fields is LogFields {
  return fields !== undefined && Object.keys(fields).length > 0;
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v));
  } catch {
    return '"[unserializable]"';
  }
}

export function formatTextRecord(
  ts: string,
  scope: string,
  level: LogLevel,
  message: string,
  fields?: LogFields,
): string {
  const head = `${ts} - ${scope} - ${level.toUpperCase()} - ${message}`;
  return hasFields(fields) ? `${head} ${safeJson(fields)}` : head;
}

export function formatJsonRecord(
  ts: string,
  scope: string,
  level: LogLevel,
  message: string,
  fields?: LogFields,
): string {
  return safeJson({ ts, level, scope, message, ...(fields ?? {}) });
}

export function createNodeLogger(opts: NodeLoggerOptions = {}): Logger {
  const level = resolveLogLevel(opts.level);
  const format = resolveLogFormat(opts.format);
  const sink: LogSink = opts.sink ?? process.stderr;
  const now = opts.now ?? (() => new Date());
  const threshold = level === "silent" ? Number.POSITIVE_INFINITY : LOG_LEVEL_RANK[level];
  const formatRecord = format === "json" ? formatJsonRecord : formatTextRecord;

  const build = (scope: string): Logger => {
    const emit = (recordLevel: LogLevel, message: string, fields?: LogFields): void => {
      if (LOG_LEVEL_RANK[recordLevel] < threshold) return;
      const line = formatRecord(now().toISOString(), scope, recordLevel, message, fields);
      sink.write(`${line}\n`);
    };
    return Object.freeze({
      debug: (message: string, fields?: LogFields) => emit("debug", message, fields),
      info: (message: string, fields?: LogFields) => emit("info", message, fields),
      warn: (message: string, fields?: LogFields) => emit("warn", message, fields),
      error: (message: string, fields?: LogFields) => emit("error", message, fields),
      child: (childScope: string) => build(joinScope(scope, childScope)),
    });
  };

  return build(opts.scope ?? "Droidlet");
}
