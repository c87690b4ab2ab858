import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { Clipboard } from "@appshell/core";

import { LogBuffer } from "../src/buffer.js";
import { DebugConsole } from "../src/console.js";

const clock = () => new Date(2024, 0, 1, 8, 0, 0);

function fakeClipboard(): Clipboard & { texts: string[] } {
  const texts: string[] = [];
  return {
    texts,
    async writeText(text: string) {
      texts.push(text);
    },
  };
}

describe("DebugConsole", () => {
  it("loads existing entries and follows new ones", () => {
    const buffer = new LogBuffer();
    buffer.addEntry({ timestamp: clock(), level: "info", category: "Boot", message: "ready" });

    const view = new DebugConsole(buffer, { clock });
    assert.equal(view.entryCount, 1);

    view.log("warning", "low disk");
    assert.equal(view.entryCount, 2);
    assert.equal(view.entries[1].category, "App");
    assert.equal(view.entries[1].message, "low disk");
  });

  it("defers updates to the scheduler", () => {
    const queued: Array<() => void> = [];
    const buffer = new LogBuffer();
    const view = new DebugConsole(buffer, { schedule: (task) => queued.push(task), clock });

    view.log("info", "later");
    assert.equal(view.entryCount, 0);
    assert.equal(buffer.size, 1);

    for (const task of queued) task();
    assert.equal(view.entryCount, 1);
  });

  it("filters the view by display level", () => {
    const buffer = new LogBuffer({ minLevel: "trace" });
    const view = new DebugConsole(buffer, { clock });
    view.log("trace", "t");
    view.log("debug", "d");
    view.log("error", "e");

    assert.equal(view.entryCount, 3);
    assert.equal(view.filteredCount, 2);

    view.setDisplayLevel("error");
    assert.deepEqual(view.filteredEntries.map((e) => e.message), ["e"]);
    assert.equal(view.entryCount, 3);
  });

  it("logs exceptions at error level under the context category", () => {
    const buffer = new LogBuffer();
    const view = new DebugConsole(buffer, { clock });
    const failure = new Error("file locked");

    view.logException(failure, "Save");

    const [stored] = buffer.getEntries();
    assert.equal(stored.level, "error");
    assert.equal(stored.category, "Save");
    assert.equal(stored.message, "file locked");
    assert.equal(stored.error, failure);
  });

  it("tracks visibility and notifies on change", () => {
    const view = new DebugConsole(new LogBuffer());
    let changes = 0;
    view.onChange(() => changes++);

    assert.equal(view.isVisible, false);
    view.toggle();
    assert.equal(view.isVisible, true);
    view.show();
    assert.equal(changes, 1);
    view.hide();
    assert.equal(view.isVisible, false);
    assert.equal(changes, 2);
  });

  it("clear empties both the view and the buffer", () => {
    const buffer = new LogBuffer();
    const view = new DebugConsole(buffer, { clock });
    view.log("info", "x");

    view.clear();

    assert.equal(view.entryCount, 0);
    assert.equal(view.filteredCount, 0);
    assert.equal(buffer.size, 0);
  });

  it("copies the log text to the clipboard", async () => {
    const buffer = new LogBuffer();
    const clipboard = fakeClipboard();
    const view = new DebugConsole(buffer, { clipboard, clock });
    view.log("info", "key secret=abc");

    assert.equal(await view.copyRedacted(), true);
    assert.equal(await view.copyFull(), true);
    assert.deepEqual(clipboard.texts, [
      "[08:00:00] [INF] App: key secret=[REDACTED]",
      "[08:00:00] [INF] App: key secret=[REDACTED]",
    ]);
  });

  it("copies raw text when the buffer stores it raw", async () => {
    const buffer = new LogBuffer({ redact: false });
    const clipboard = fakeClipboard();
    const view = new DebugConsole(buffer, { clipboard, clock });
    view.log("info", "key secret=abc");

    await view.copyRedacted();
    assert.deepEqual(clipboard.texts, ["[08:00:00] [INF] App: key secret=abc"]);
    assert.equal(view.getLogs(false), "[08:00:00] [INF] App: key secret=abc");
  });

  it("shows entries from before and after it was created the same way", () => {
    const buffer = new LogBuffer({ redact: false });
    buffer.addEntry({ timestamp: clock(), level: "info", category: "Auth", message: "password=hunter2" });

    const view = new DebugConsole(buffer, { clock });
    buffer.addEntry({ timestamp: clock(), level: "info", category: "Auth", message: "password=hunter2" });

    assert.deepEqual(view.entries.map((e) => e.message), ["password=hunter2", "password=hunter2"]);
  });

  it("holds no more entries than the buffer keeps", () => {
    const buffer = new LogBuffer({ maxEntries: 3 });
    const view = new DebugConsole(buffer, { clock, displayLevel: "warning" });

    for (let n = 1; n <= 10; n++) {
      view.log(n % 2 === 0 ? "warning" : "info", `line ${n}`);
    }

    assert.equal(buffer.size, 3);
    assert.equal(view.entryCount, 3);
    assert.deepEqual(view.entries.map((e) => e.message), ["line 8", "line 9", "line 10"]);
    assert.deepEqual(view.filteredEntries.map((e) => e.message), ["line 8", "line 10"]);
    assert.equal(view.filteredCount, 2);

    view.setDisplayLevel("debug");
    assert.equal(view.filteredCount, 3);
  });

  it("does nothing when copying without a clipboard", async () => {
    const view = new DebugConsole(new LogBuffer());
    assert.equal(await view.copyFull(), false);
  });

  it("stops following the buffer once disposed", () => {
    const buffer = new LogBuffer();
    const view = new DebugConsole(buffer, { clock });
    view.dispose();
    view.log("info", "after");
    assert.equal(view.entryCount, 0);
    assert.equal(buffer.size, 1);
  });
});
