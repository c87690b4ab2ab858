/**
 * Category loggers that write into a {@link LogBuffer}.
 */

import { isLevelEnabled, type LogEntry, type LogLevel } from "@appshell/core";

import type { LogBuffer } from "./buffer.js";

export interface Logger {
  readonly category: string;
  isEnabled(level: LogLevel): boolean;
  log(level: LogLevel, message: string, error?: unknown): void;
  trace(message: string, error?: unknown): void;
  debug(message: string, error?: unknown): void;
  info(message: string, error?: unknown): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
  critical(message: string, error?: unknown): void;
}

export interface LoggerProviderOptions {
  /** Timestamp source. Default: `() => new Date()`. */
  clock?: () => Date;
}

class CategoryLogger implements Logger {
  constructor(
    readonly category: string,
    private readonly buffer: LogBuffer,
    private readonly clock: () => Date,
  ) {}

  isEnabled(level: LogLevel): boolean {
    return isLevelEnabled(level, this.buffer.minLevel);
  }

  log(level: LogLevel, message: string, error?: unknown): void {
    if (!this.isEnabled(level)) return;
    const entry: LogEntry =
      error === undefined
        ? { timestamp: this.clock(), level, category: this.category, message }
        : { timestamp: this.clock(), level, category: this.category, message, error };
    this.buffer.addEntry(entry);
  }

  trace(message: string, error?: unknown): void {
    this.log("trace", message, error);
  }

  debug(message: string, error?: unknown): void {
    this.log("debug", message, error);
  }

  info(message: string, error?: unknown): void {
    this.log("info", message, error);
  }

  warn(message: string, error?: unknown): void {
    this.log("warning", message, error);
  }

  error(message: string, error?: unknown): void {
    this.log("error", message, error);
  }

  critical(message: string, error?: unknown): void {
    this.log("critical", message, error);
  }
}

export class LoggerProvider {
  private readonly loggers = new Map<string, Logger>();
  private readonly clock: () => Date;

  constructor(
    readonly buffer: LogBuffer,
    options: LoggerProviderOptions = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  /** Logger for a category. Repeated calls return the same instance. */
  createLogger(category: string): Logger {
    let logger = this.loggers.get(category);
    if (!logger) {
      logger = new CategoryLogger(category, this.buffer, this.clock);
      this.loggers.set(category, logger);
    }
    return logger;
  }
}
