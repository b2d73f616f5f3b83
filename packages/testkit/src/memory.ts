/**
 * packages/testkit/src/memory.ts — In-process stand-ins for output sinks and loggers.
 */

import { type LogFields, type LogLevel, type Logger, joinScope } from "@droidlet/core";

export type MemorySink = Readonly<{
  write: (chunk: string) => boolean;
  /** Everything written so far, concatenated. */
  text: () => string;
  /** Written text split into lines, without the trailing empty line. */
  lines: () => readonly string[];
  clear: () => void;
}>;

export function createMemorySink(): MemorySink {
  let chunks: string[] = [];
  const text = (): string => chunks.join("");
  return Object.freeze({
    write: (chunk: string) => {
      chunks.push(chunk);
      return true;
    },
    text,
    lines: () => {
      const all = text().split("\n");
      if (all[all.length - 1] === "") all.pop();
      return all;
    },
    clear: () => {
      chunks = [];
    },
  });
}

export type RecordedLog = Readonly<{
  level: LogLevel;
  scope: string;
  message: string;
  fields: LogFields | undefined;
}>;

export type RecordingLogger = Logger &
  Readonly<{
    records: readonly RecordedLog[];
    messages: (level?: LogLevel) => readonly string[];
  }>;

/** Logger that keeps every record in memory, children included. */
export function createRecordingLogger(scope = ""): RecordingLogger {
  const records: RecordedLog[] = [];

  const build = (s: string): Logger => {
    const push = (level: LogLevel, message: string, fields?: LogFields): void => {
      records.push(Object.freeze({ level, scope: s, message, fields }));
    };
    return Object.freeze({
      debug: (message: string, fields?: LogFields) => push("debug", message, fields),
      info: (message: string, fields?: LogFields) => push("info", message, fields),
      warn: (message: string, fields?: LogFields) => push("warn", message, fields),
      error: (message: string, fields?: LogFields) => push("error", message, fields),
      child: (childScope: string) => build(joinScope(s, childScope)),
    });
  };

  return Object.freeze({
    ...build(scope),
    records,
    messages: (level?: LogLevel) =>
      records.filter((r) => level === undefined || r.level === level).map((r) => r.message),
  });
}
