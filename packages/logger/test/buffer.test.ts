import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { LogEntry, LogLevel } from "@appshell/core";
import { RedactionEngine } from "@appshell/redact";

import { LogBuffer } from "../src/buffer.js";
import { formatLogEntry } from "../src/format.js";
import { RingBuffer } from "../src/ring.js";

const T0 = new Date(2024, 0, 2, 9, 5, 7);

function entry(message: string, level: LogLevel = "info", category = "Test"): LogEntry {
  return { timestamp: T0, level, category, message };
}

describe("RingBuffer", () => {
  it("evicts oldest first once full", () => {
    const ring = new RingBuffer<{ n: number }>(3);
    let evicted = 0;
    for (let n = 1; n <= 5; n++) evicted += ring.push({ n });
    assert.equal(evicted, 2);
    assert.deepEqual(ring.toArray().map((x) => x.n), [3, 4, 5]);
  });

  it("keeps the newest items when shrunk", () => {
    const ring = new RingBuffer<{ n: number }>(4);
    for (let n = 1; n <= 4; n++) ring.push({ n });
    assert.equal(ring.resize(2), 2);
    assert.deepEqual(ring.toArray().map((x) => x.n), [3, 4]);
    ring.push({ n: 5 });
    assert.deepEqual(ring.toArray().map((x) => x.n), [4, 5]);
  });

  it("rejects capacities below one", () => {
    assert.throws(() => new RingBuffer(0), RangeError);
    assert.throws(() => new RingBuffer(1.5), RangeError);
  });
});

describe("LogBuffer", () => {
  it("uses the documented defaults", () => {
    const buffer = new LogBuffer();
    assert.equal(buffer.maxEntries, 10000);
    assert.equal(buffer.minLevel, "debug");
    assert.equal(buffer.redact, true);
    assert.equal(buffer.size, 0);
  });

  it("drops entries below the minimum level without notifying", () => {
    const buffer = new LogBuffer();
    const seen: LogEntry[] = [];
    buffer.onEntryAdded((e) => seen.push(e));

    assert.equal(buffer.addEntry(entry("noise", "trace")), false);
    assert.equal(buffer.size, 0);
    assert.equal(seen.length, 0);

    assert.equal(buffer.addEntry(entry("kept", "debug")), true);
    assert.equal(seen.length, 1);
  });

  it("redacts on ingest and notifies with the stored entry", () => {
    const buffer = new LogBuffer();
    const seen: LogEntry[] = [];
    buffer.onEntryAdded((e) => seen.push(e));

    buffer.addEntry(entry("login password=secret123"));

    assert.equal(seen[0].message, "login password=[REDACTED]");
    assert.equal(buffer.getEntries()[0], seen[0]);
    assert.ok(Object.isFrozen(seen[0]));
  });

  it("cannot recover the raw text of entries redacted on ingest", () => {
    const buffer = new LogBuffer();
    buffer.addEntry(entry("token=abc"));
    assert.equal(buffer.getEntries(false)[0].message, "token=[REDACTED]");
  });

  it("returns entries as stored when ingest redaction is off", () => {
    const buffer = new LogBuffer({ redact: false });
    const original = entry("token=abc");
    buffer.addEntry(original);

    assert.equal(buffer.getEntries(false)[0].message, "token=abc");
    assert.equal(buffer.getEntries(true)[0].message, "token=abc");
    assert.equal(buffer.getEntries()[0].message, "token=abc");
    assert.equal(Object.isFrozen(original), false);
  });

  it("mixes entries stored under both settings", () => {
    const buffer = new LogBuffer();
    buffer.addEntry(entry("secret=one"));
    buffer.redact = false;
    buffer.addEntry(entry("secret=two"));

    assert.deepEqual(
      buffer.getEntries(false).map((e) => e.message),
      ["secret=[REDACTED]", "secret=two"],
    );
    assert.deepEqual(
      buffer.getEntries(true).map((e) => e.message),
      ["secret=[REDACTED]", "secret=two"],
    );
  });

  it("evicts the oldest entries past maxEntries", () => {
    const buffer = new LogBuffer({ maxEntries: 2 });
    buffer.addEntry(entry("a"));
    buffer.addEntry(entry("b"));
    buffer.addEntry(entry("c"));

    assert.deepEqual(buffer.getEntries().map((e) => e.message), ["b", "c"]);
    assert.equal(buffer.evictedCount, 1);
  });

  it("evicts immediately when maxEntries is lowered", () => {
    const buffer = new LogBuffer();
    for (const m of ["a", "b", "c", "d"]) buffer.addEntry(entry(m));

    buffer.maxEntries = 1;

    assert.deepEqual(buffer.getEntries().map((e) => e.message), ["d"]);
    assert.equal(buffer.evictedCount, 3);
    assert.throws(() => {
      buffer.maxEntries = 0;
    }, RangeError);
    assert.equal(buffer.maxEntries, 1);
  });

  it("clear empties the store but keeps configuration and listeners", () => {
    const buffer = new LogBuffer({ maxEntries: 5, minLevel: "warning" });
    let notified = 0;
    buffer.onEntryAdded(() => notified++);
    buffer.addEntry(entry("x", "error"));

    buffer.clear();

    assert.equal(buffer.size, 0);
    assert.equal(buffer.maxEntries, 5);
    assert.equal(buffer.minLevel, "warning");
    buffer.addEntry(entry("y", "error"));
    assert.equal(notified, 2);
  });

  it("redacts with a supplied engine", () => {
    const engine = new RedactionEngine({ preset: "none" });
    engine.addPattern("acct-\\d+", "acct-#");
    const buffer = new LogBuffer({ engine });
    buffer.addEntry(entry("moved acct-991 password=x"));
    assert.equal(buffer.getEntries()[0].message, "moved acct-# password=x");
  });

  it("does not redact error details", () => {
    const buffer = new LogBuffer();
    buffer.addEntry({ ...entry("failed"), error: "password=raw" });
    assert.equal(buffer.getEntries()[0].error, "password=raw");
  });
});

describe("text output", () => {
  it("formats one line per entry with three-letter levels", () => {
    const buffer = new LogBuffer({ minLevel: "trace" });
    buffer.addEntry(entry("starting", "trace", "Boot"));
    buffer.addEntry(entry("password=x", "warning", "Auth"));
    buffer.addEntry(entry("gone", "critical", "Core"));

    assert.equal(
      buffer.getLogsAsText(),
      [
        "[09:05:07] [TRC] Boot: starting",
        "[09:05:07] [WRN] Auth: password=[REDACTED]",
        "[09:05:07] [CRT] Core: gone",
      ].join("\n"),
    );
  });

  it("appends the error detail on the next line", () => {
    const error = new Error("disk full");
    error.stack = "Error: disk full\n    at save (file.ts:1:1)";
    assert.equal(
      formatLogEntry({ ...entry("save failed", "error", "Save"), error }),
      "[09:05:07] [ERR] Save: save failed\nError: disk full\n    at save (file.ts:1:1)",
    );
  });

  it("is empty for an empty buffer", () => {
    assert.equal(new LogBuffer().getLogsAsText(), "");
  });
});
