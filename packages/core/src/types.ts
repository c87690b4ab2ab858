/**
 * Core types for the appshell packages.
 *
 * These are the public contracts that the logger, workspace, settings and
 * shell packages share. Zero external dependencies.
 */

// --- Log entries ---

/**
 * Severity of a log entry, lowest first.
 *
 * The order matters: the buffer and the loggers compare levels by their
 * position in {@link LOG_LEVELS}.
 */
export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warning"
  | "error"
  | "critical";

/**
 * A single captured log record.
 *
 * Entries are frozen when they enter the buffer. Redaction produces a new
 * entry rather than editing an existing one.
 */
export interface LogEntry {
  readonly timestamp: Date;
  readonly level: LogLevel;
  /** Logger category, usually the component that produced the entry. */
  readonly category: string;
  readonly message: string;
  /** Failure attached at the call site, rendered on its own line. */
  readonly error?: unknown;
}

// --- JSON values (settings persistence) ---

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonObject | JsonValue[];
export type JsonObject = { [key: string]: JsonValue };

// --- Observers ---

export type Listener<T> = (value: T) => void;

/** Returned by every `on*` registration; call it to stop listening. */
export type Unsubscribe = () => void;

// --- Dialog collaborator ---

export type MessageBoxResult = "none" | "ok" | "cancel" | "yes" | "no";

export type MessageBoxButtons = "ok" | "ok-cancel" | "yes-no" | "yes-no-cancel";

/**
 * File type filter for open/save pickers.
 * Extensions include the leading dot (".csv"); ".*" means any file.
 */
export interface FileFilter {
  name: string;
  extensions: string[];
}

/**
 * Platform-agnostic dialog service, supplied by the host UI toolkit.
 *
 * Pickers resolve to null when the user cancels.
 */
export interface DialogService {
  showMessage(message: string, title: string): Promise<void>;
  show(message: string, title: string, buttons: MessageBoxButtons): Promise<MessageBoxResult>;
  showOpenFile(title: string, filters: FileFilter[]): Promise<string | null>;
  showSaveFile(title: string, filters: FileFilter[]): Promise<string | null>;
  /** Ask whether a document with unsaved changes may be closed. */
  showConfirmClose(documentName: string): Promise<boolean>;
}

/** Clipboard collaborator used by the debug console's copy commands. */
export interface Clipboard {
  writeText(text: string): Promise<void>;
}

// --- Recent files ---

export interface RecentFile {
  path: string;
  displayName: string;
  /** ISO 8601 timestamp of the last time the file was opened. */
  lastOpened: string;
}
