/**
 * Log level ordering and display helpers.
 */

import type { LogLevel } from "./types.js";

/** All levels, lowest severity first. */
export const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warning",
  "error",
  "critical",
];

/** Three-letter tags used in the console text format. */
export const LEVEL_ABBREVIATIONS: Record<LogLevel, string> = {
  trace: "TRC",
  debug: "DBG",
  info: "INF",
  warning: "WRN",
  error: "ERR",
  critical: "CRT",
};

const LEVEL_ALIASES = new Map<string, LogLevel>([
  ["trace", "trace"],
  ["trc", "trace"],
  ["debug", "debug"],
  ["dbg", "debug"],
  ["info", "info"],
  ["information", "info"],
  ["inf", "info"],
  ["warn", "warning"],
  ["warning", "warning"],
  ["wrn", "warning"],
  ["error", "error"],
  ["err", "error"],
  ["critical", "critical"],
  ["crit", "critical"],
  ["crt", "critical"],
  ["fatal", "critical"],
]);

export function levelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/** True when `level` is at or above `threshold`. */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return levelRank(level) >= levelRank(threshold);
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Parse a level name from user input (CLI flags, env vars).
 * Accepts the canonical names, common aliases and the three-letter tags,
 * case-insensitively. Returns null for anything else.
 */
export function parseLogLevel(input: string): LogLevel | null {
  return LEVEL_ALIASES.get(input.trim().toLowerCase()) ?? null;
}
