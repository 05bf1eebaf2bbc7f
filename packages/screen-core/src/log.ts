import { appendFileSync, mkdirSync } from "node:fs";
import path from "node:path";

import { canonicalJson } from "./canonical.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogRecord {
  readonly level: LogLevel;
  readonly component: string;
  readonly msg: string;
  readonly [field: string]: unknown;
}

export type LogSink = {
  write: (record: LogRecord) => void;
};

export interface Logger {
  readonly component: string;
  debug(msg: string, fields?: Record<string, unknown>): void;
  info(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;
  error(msg: string, fields?: Record<string, unknown>): void;
  child(component: string): Logger;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const silentSink: LogSink = {
  write: () => {},
};

export interface LineWriter {
  write(chunk: string): unknown;
}

export function streamSink(stream: LineWriter = process.stderr): LogSink {
  return {
    write: (record) => {
      stream.write(canonicalJson(record));
    },
  };
}

// Appends synchronously so records survive a process that exits right after logging.
export function fileSink(targetPath: string): LogSink {
  const target = path.resolve(targetPath);
  mkdirSync(path.dirname(target), { recursive: true });
  return {
    write: (record) => {
      appendFileSync(target, canonicalJson(record), "utf-8");
    },
  };
}

export function memorySink(): LogSink & { readonly records: LogRecord[] } {
  const records: LogRecord[] = [];
  return {
    records,
    write: (record) => {
      records.push(record);
    },
  };
}

/** `-` logs to stderr, any other value is a file path, undefined is silent. */
export function openLogSink(target: string | undefined): LogSink {
  if (target === undefined || target === "") return silentSink;
  if (target === "-") return streamSink(process.stderr);
  return fileSink(target);
}

export function createLogger(component: string, sink: LogSink, minLevel: LogLevel = "info"): Logger {
  const emit = (level: LogLevel, msg: string, fields: Record<string, unknown> = {}): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
    sink.write({ ...fields, level, component, msg });
  };
  return {
    component,
    debug: (msg, fields) => emit("debug", msg, fields),
    info: (msg, fields) => emit("info", msg, fields),
    warn: (msg, fields) => emit("warn", msg, fields),
    error: (msg, fields) => emit("error", msg, fields),
    child: (name) => createLogger(`${component}.${name}`, sink, minLevel),
  };
}

export const noopLogger: Logger = createLogger("noop", silentSink, "error");
