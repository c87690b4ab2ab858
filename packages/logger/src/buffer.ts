/**
 * Bounded in-memory log store.
 *
 * Entries below `minLevel` are dropped on the way in. With redaction
 * enabled, messages are scrubbed before they are stored, so the raw text
 * of those entries is gone for good: an "unredacted" read of them gives
 * back a re-redaction of what was stored. Entries that went in while
 * redaction was off are returned as stored, whichever way they are read.
 *
 * Only messages are redacted. Error details are stored and rendered as
 * given.
 *
 * Every operation is synchronous, which serializes producers on the
 * event loop.
 */

import {
  Listeners,
  isLevelEnabled,
  type Listener,
  type LogEntry,
  type LogLevel,
  type Unsubscribe,
} from "@appshell/core";
import { RedactionEngine } from "@appshell/redact";

import { formatLogEntry } from "./format.js";
import { RingBuffer } from "./ring.js";

export const DEFAULT_MAX_ENTRIES = 10_000;

export interface LogBufferOptions {
  /** Capacity; oldest entries are evicted past it. Default: 10000. */
  maxEntries?: number;
  /** Entries below this level are dropped. Default: "debug". */
  minLevel?: LogLevel;
  /** Redact messages on ingest. Default: true. */
  redact?: boolean;
  /** Engine used for redaction. Default: a new engine with the default rules. */
  engine?: RedactionEngine;
}

interface StoredEntry {
  entry: LogEntry;
  redactedAtIngest: boolean;
}

export class LogBuffer {
  readonly engine: RedactionEngine;
  private readonly ring: RingBuffer<StoredEntry>;
  private readonly added = new Listeners<LogEntry>();
  private level: LogLevel;
  private redactOnIngest: boolean;
  private evicted = 0;

  constructor(options: LogBufferOptions = {}) {
    this.ring = new RingBuffer(options.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.level = options.minLevel ?? "debug";
    this.redactOnIngest = options.redact ?? true;
    this.engine = options.engine ?? new RedactionEngine();
  }

  // --- Configuration ---

  get maxEntries(): number {
    return this.ring.capacity;
  }

  /** Lowering the cap evicts the oldest entries immediately. */
  set maxEntries(value: number) {
    this.evicted += this.ring.resize(value);
  }

  get minLevel(): LogLevel {
    return this.level;
  }

  set minLevel(value: LogLevel) {
    this.level = value;
  }

  get redact(): boolean {
    return this.redactOnIngest;
  }

  set redact(value: boolean) {
    this.redactOnIngest = value;
  }

  /** Entries dropped by the capacity cap since construction. */
  get evictedCount(): number {
    return this.evicted;
  }

  get size(): number {
    return this.ring.size;
  }

  // --- Entries ---

  /**
   * Store an entry. Returns false (and notifies nobody) when the entry is
   * below the minimum level.
   */
  addEntry(entry: LogEntry): boolean {
    if (!isLevelEnabled(entry.level, this.level)) return false;

    const stored = this.redactOnIngest
      ? this.redactEntry(entry)
      : Object.freeze({ ...entry });

    this.evicted += this.ring.push({ entry: stored, redactedAtIngest: this.redactOnIngest });
    this.added.emit(stored);
    return true;
  }

  /**
   * Snapshot of the stored entries, oldest first. Only entries redacted
   * on ingest are affected by `redacted`; the rest come back as stored.
   */
  getEntries(redacted = true): LogEntry[] {
    return this.ring.toArray().map(({ entry, redactedAtIngest }) =>
      redactedAtIngest && !redacted ? this.redactEntry(entry) : entry,
    );
  }

  /** All entries in console text form, joined with "\n". */
  getLogsAsText(redacted = true): string {
    return this.getEntries(redacted).map(formatLogEntry).join("\n");
  }

  /** Drop every entry. Configuration and listeners are kept. */
  clear(): void {
    this.ring.clear();
  }

  /** Called with each stored entry, as stored. */
  onEntryAdded(listener: Listener<LogEntry>): Unsubscribe {
    return this.added.add(listener);
  }

  private redactEntry(entry: LogEntry): LogEntry {
    return Object.freeze({ ...entry, message: this.engine.redact(entry.message) });
  }
}
