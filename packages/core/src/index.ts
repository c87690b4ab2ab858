/**
 * @appshell/core
 *
 * Shared types, log levels, errors and the listener registry for the
 * appshell packages. This is the contract layer: every other `@appshell/*`
 * package depends on it.
 *
 * Zero npm dependencies. No I/O. Just types and pure functions.
 *
 * @packageDocumentation
 */

// Log levels: ordering, three-letter tags, parsing user input
export {
  LEVEL_ABBREVIATIONS,
  LOG_LEVELS,
  isLevelEnabled,
  isLogLevel,
  levelRank,
  parseLogLevel,
} from "./levels.js";

// Errors raised by contract violations, and helpers for logging thrown values
export {
  AppShellError,
  CapacityExceededError,
  InvalidPatternError,
  formatErrorDetail,
  getErrorMessage,
  normalizeError,
  type NormalizedError,
} from "./errors.js";

// Observer registry used for every change notification
export { Listeners } from "./listeners.js";

export type {
  Clipboard,
  DialogService,
  FileFilter,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  Listener,
  LogEntry,
  LogLevel,
  MessageBoxButtons,
  MessageBoxResult,
  RecentFile,
  Unsubscribe,
} from "./types.js";
