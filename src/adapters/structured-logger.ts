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

/** Map a level name ("debug", "INFO", ...) to a LogLevel; undefined when unrecognised. */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  switch (name?.toLowerCase()) {
    case "debug":
      return LogLevel.DEBUG;
    case "info":
      return LogLevel.INFO;
    case "warn":
    case "warning":
      return LogLevel.WARN;
    case "error":
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}

const RESERVED_KEYS = new Set(["time", "level", "msg", "component"]);

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
}

/** JSON-lines logger. One object per line on stderr unless a writer is given. */
export class StructuredLogger implements Logger {
  private readonly writer: (line: string) => void;
  private readonly level: LogLevel;
  private readonly component: string | undefined;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.DEBUG;
    this.component = options.component;
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

    const entry: Record<string, unknown> = {
      time: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      msg,
    };

    if (this.component) entry.component = this.component;

    for (const [key, value] of Object.entries(ctx ?? {})) {
      if (RESERVED_KEYS.has(key)) continue;
      if (value instanceof Error) {
        entry[key] = value.message;
        entry[`${key}Code`] = "code" in value ? value.code : undefined;
        entry[`${key}Stack`] = value.stack;
      } else if (value instanceof URL) {
        entry[key] = value.href;
      } else {
        entry[key] = value;
      }
    }

    try {
      this.writer(JSON.stringify(entry));
    } catch {
      // Circular reference or BigInt in ctx
      this.writer(
        JSON.stringify({ time: entry.time, level: entry.level, msg, serializationError: true }),
      );
    }
  }
}
