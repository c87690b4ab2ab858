/**
 * View model for a debug console window.
 *
 * Mirrors a {@link LogBuffer}: existing entries are loaded on
 * construction and new ones follow through `schedule`, which a UI host
 * points at its event loop. Rendering is left to the host; it listens to
 * `onChange` and reads `filteredEntries`.
 */

import {
  Listeners,
  getErrorMessage,
  isLevelEnabled,
  type Clipboard,
  type Listener,
  type LogEntry,
  type LogLevel,
  type Unsubscribe,
} from "@appshell/core";

import type { LogBuffer } from "./buffer.js";

export type Scheduler = (task: () => void) => void;

export interface DebugConsoleOptions {
  /** Target of the copy commands. Without one, copying is a no-op. */
  clipboard?: Clipboard;
  /** Runs view updates. Default: immediately. */
  schedule?: Scheduler;
  /** Display filter. Default: "debug". */
  displayLevel?: LogLevel;
  clock?: () => Date;
}

/** Category used by {@link DebugConsole.log}. */
export const CONSOLE_CATEGORY = "App";

export class DebugConsole {
  private readonly all: LogEntry[] = [];
  private filtered: LogEntry[] = [];
  private level: LogLevel;
  private visible = false;
  private unsubscribe: Unsubscribe | null;
  private readonly changed = new Listeners<void>();
  private readonly clipboard: Clipboard | null;
  private readonly schedule: Scheduler;
  private readonly clock: () => Date;

  constructor(
    readonly buffer: LogBuffer,
    options: DebugConsoleOptions = {},
  ) {
    this.clipboard = options.clipboard ?? null;
    this.schedule = options.schedule ?? ((task) => task());
    this.clock = options.clock ?? (() => new Date());
    this.level = options.displayLevel ?? "debug";

    // As stored, the same form onEntryAdded delivers
    for (const entry of buffer.getEntries()) {
      this.append(entry);
    }
    this.unsubscribe = buffer.onEntryAdded((entry) => {
      this.schedule(() => {
        this.append(entry);
        this.changed.emit();
      });
    });
  }

  // --- View state ---

  get entries(): LogEntry[] {
    return [...this.all];
  }

  get filteredEntries(): LogEntry[] {
    return [...this.filtered];
  }

  get entryCount(): number {
    return this.all.length;
  }

  get filteredCount(): number {
    return this.filtered.length;
  }

  get displayLevel(): LogLevel {
    return this.level;
  }

  setDisplayLevel(level: LogLevel): void {
    this.level = level;
    this.filtered = this.all.filter((e) => isLevelEnabled(e.level, level));
    this.changed.emit();
  }

  get isVisible(): boolean {
    return this.visible;
  }

  show(): void {
    this.setVisible(true);
  }

  hide(): void {
    this.setVisible(false);
  }

  toggle(): void {
    this.setVisible(!this.visible);
  }

  onChange(listener: Listener<void>): Unsubscribe {
    return this.changed.add(listener);
  }

  // --- Commands ---

  /** Log a message under the "App" category. */
  log(level: LogLevel, message: string): void {
    this.buffer.addEntry({ timestamp: this.clock(), level, category: CONSOLE_CATEGORY, message });
  }

  /** Log a failure at error level, categorized by where it happened. */
  logException(error: unknown, context: string): void {
    this.buffer.addEntry({
      timestamp: this.clock(),
      level: "error",
      category: context,
      message: getErrorMessage(error),
      error,
    });
  }

  /** Empty the view and the underlying buffer. */
  clear(): void {
    this.all.length = 0;
    this.filtered = [];
    this.buffer.clear();
    this.changed.emit();
  }

  getLogs(redacted = true): string {
    return this.buffer.getLogsAsText(redacted);
  }

  /** Copy the redacted log text. Resolves false when there is no clipboard. */
  copyRedacted(): Promise<boolean> {
    return this.copy(this.getLogs(true));
  }

  /** Copy the log text without read-time redaction. */
  copyFull(): Promise<boolean> {
    return this.copy(this.getLogs(false));
  }

  /** Stop following the buffer. */
  dispose(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.changed.clear();
  }

  /** Keeps the view no larger than the buffer it mirrors. */
  private append(entry: LogEntry): void {
    this.all.push(entry);
    if (isLevelEnabled(entry.level, this.level)) this.filtered.push(entry);

    const excess = this.all.length - this.buffer.maxEntries;
    if (excess <= 0) return;
    // filtered is an ordered subsequence of all
    for (const dropped of this.all.splice(0, excess)) {
      if (this.filtered[0] === dropped) this.filtered.shift();
    }
  }

  private setVisible(visible: boolean): void {
    if (this.visible === visible) return;
    this.visible = visible;
    this.changed.emit();
  }

  private async copy(text: string): Promise<boolean> {
    if (!this.clipboard) return false;
    await this.clipboard.writeText(text);
    return true;
  }
}
