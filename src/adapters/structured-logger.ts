/**
 * JSON-lines logger for the converter.
 *
 * One object per call with `time`, `level`, `msg` and an optional
 * `component`; context fields follow and may not replace those four. Error
 * values are flattened so a failed conversion logs its message, stable
 * `code` and stack as plain fields.
 * @module
 */

import type { Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

const RESERVED_FIELDS = new Set(["time", "level", "msg", "component"]);

/** `--verbose` turns on debug lines; otherwise INFO and above. */
export function logLevelFor(verbose: boolean): LogLevel {
  return verbose ? LogLevel.DEBUG : LogLevel.INFO;
}

export interface StructuredLoggerOptions {
  /** Receives each serialized line; stderr when omitted. */
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
  clock?: () => Date;
}

function flattenContext(entry: Record<string, unknown>, ctx: Record<string, unknown>): void {
  for (const [key, value] of Object.entries(ctx)) {
    if (RESERVED_FIELDS.has(key)) continue;
    if (!(value instanceof Error)) {
      entry[key] = value;
      continue;
    }
    entry[key] = value.message;
    if ("code" in value && typeof value.code === "string") entry[`${key}Code`] = value.code;
    entry[`${key}Stack`] = value.stack;
  }
}

export class StructuredLogger implements Logger {
  private readonly writer: (line: string) => void;
  private readonly level: LogLevel;
  private readonly component: string | undefined;
  private readonly clock: () => Date;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.INFO;
    this.component = options.component;
    this.clock = options.clock ?? (() => new Date());
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, msg, ctx);
  }

  private emit(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (level < this.level) return;

    const head: Record<string, unknown> = {
      time: this.clock().toISOString(),
      level: LEVEL_NAMES[level],
      msg,
    };
    if (this.component) head.component = this.component;

    const entry = { ...head };
    if (ctx) flattenContext(entry, ctx);

    try {
      this.writer(JSON.stringify(entry));
    } catch {
      // Circular context: the header fields alone still serialize
      this.writer(JSON.stringify({ ...head, serializationError: true }));
    }
  }
}
