import { describe, it, after } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { PassThrough } from "node:stream";

import { formatTime } from "@appshell/logger";

import type { ConsoleArgs, RedactArgs } from "../src/args.js";
import {
  parseSettingValue,
  runConsole,
  runRecent,
  runRedact,
  runSettings,
  type CommandIO,
  type StartCommand,
} from "../src/commands.js";

const root = fs.mkdtempSync(join(tmpdir(), "appshell-cli-test-"));
let counter = 0;
const clock = () => new Date(2024, 0, 15, 9, 30, 5);
const time = formatTime(clock());

function freshDir(): string {
  return join(root, `case-${counter++}`);
}

after(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

function captureIO(stdin = "") {
  const out: string[] = [];
  const err: string[] = [];
  const io: CommandIO = {
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    readStdin: async () => stdin,
  };
  return { io, out, err };
}

function redactArgs(overrides: Partial<RedactArgs> = {}): RedactArgs {
  return {
    command: "redact",
    file: null,
    preset: "default",
    policy: null,
    check: false,
    stats: false,
    ...overrides,
  };
}

function consoleArgs(overrides: Partial<ConsoleArgs> = {}): ConsoleArgs {
  return {
    command: "console",
    maxEntries: 100,
    minLevel: "debug",
    redact: true,
    tail: 0,
    wrap: ["build", "--fast"],
    ...overrides,
  };
}

/** A finished command with fixed output. */
function fakeStart(stdout: string, stderr: string, code: number) {
  const started: string[][] = [];
  const start: StartCommand = (command, args) => {
    started.push([command, ...args]);
    const out = new PassThrough();
    const err = new PassThrough();
    out.end(stdout);
    err.end(stderr);
    return { stdout: out, stderr: err, exited: Promise.resolve(code) };
  };
  return { start, started };
}

describe("runRedact", () => {
  it("redacts stdin to stdout", async () => {
    const { io, out } = captureIO("user=alice password=hunter2\n");
    assert.equal(await runRedact(redactArgs(), io), 0);
    assert.deepEqual(out, ["user=alice password=[REDACTED]\n"]);
  });

  it("reads a file", async () => {
    const file = join(root, `input-${counter++}.log`);
    fs.writeFileSync(file, "api_key=abc123");
    const { io, out } = captureIO();
    assert.equal(await runRedact(redactArgs({ file }), io), 0);
    assert.deepEqual(out, ["api_key=[REDACTED]"]);
  });

  it("prints per-rule counts with --stats", async () => {
    const { io, err } = captureIO("password=a token=b");
    await runRedact(redactArgs({ stats: true }), io);
    assert.deepEqual(err, ["password: 1\n", "token: 1\n", "total: 2\n"]);
  });

  it("exits 1 with --check when something is sensitive, silently", async () => {
    const dirty = captureIO("token=abc");
    assert.equal(await runRedact(redactArgs({ check: true }), dirty.io), 1);
    assert.deepEqual(dirty.out, []);

    const clean = captureIO("nothing to see");
    assert.equal(await runRedact(redactArgs({ check: true }), clean.io), 0);
  });

  it("applies a JSONC policy file", async () => {
    const policy = join(root, `policy-${counter++}.jsonc`);
    fs.writeFileSync(
      policy,
      `{
        // only ticket numbers
        "extends": "none",
        "rules": [{ "id": "ticket", "pattern": "TCK-\\\\d+", "replacement": "TCK-?" }]
      }`,
    );
    const { io, out } = captureIO("see TCK-123, password=x");
    assert.equal(await runRedact(redactArgs({ policy }), io), 0);
    assert.deepEqual(out, ["see TCK-?, password=x"]);
  });

  it("exits 2 when the input cannot be read", async () => {
    const { io, out, err } = captureIO();
    assert.equal(await runRedact(redactArgs({ file: join(root, "missing.log") }), io), 2);
    assert.deepEqual(out, []);
    assert.equal(err.length, 1);
  });
});

describe("runConsole", () => {
  it("prints each stored entry and returns the exit code", async () => {
    const { start, started } = fakeStart("password=test-secret\n\nplain\n", "", 3);
    const { io, out } = captureIO();

    assert.equal(await runConsole(consoleArgs(), io, start, clock), 3);
    assert.deepEqual(started, [["build", "--fast"]]);
    assert.deepEqual(out, [
      `[${time}] [INF] stdout: password=[REDACTED]\n`,
      `[${time}] [INF] stdout: plain\n`,
    ]);
  });

  it("stores stderr at error level and honours the minimum level", async () => {
    const { start } = fakeStart("progress\n", "boom\r\n", 1);
    const { io, out } = captureIO();

    assert.equal(await runConsole(consoleArgs({ minLevel: "error" }), io, start, clock), 1);
    assert.deepEqual(out, [`[${time}] [ERR] stderr: boom\n`]);
  });

  it("prints the buffered tail after exit", async () => {
    const { start } = fakeStart("a\nb\nc\n", "", 0);
    const { io, out } = captureIO();

    await runConsole(consoleArgs({ maxEntries: 2, tail: 5, redact: false }), io, start, clock);
    assert.deepEqual(out, [
      `[${time}] [INF] stdout: a\n`,
      `[${time}] [INF] stdout: b\n`,
      `[${time}] [INF] stdout: c\n`,
      "--- last 2 of 2 entries ---\n",
      `[${time}] [INF] stdout: b\n`,
      `[${time}] [INF] stdout: c\n`,
    ]);
  });

  it("keeps messages unredacted with redaction off", async () => {
    const { start } = fakeStart("token=abc\n", "", 0);
    const { io, out } = captureIO();

    await runConsole(consoleArgs({ redact: false, tail: 1 }), io, start, clock);
    assert.deepEqual(out, [
      `[${time}] [INF] stdout: token=abc\n`,
      "--- last 1 of 1 entries ---\n",
      `[${time}] [INF] stdout: token=abc\n`,
    ]);
  });
});

describe("runSettings", () => {
  it("sets, gets and lists values", () => {
    const dir = freshDir();
    const base = { command: "settings", dir } as const;

    assert.equal(runSettings({ ...base, action: "set", key: "theme", value: "dark" }, captureIO().io), 0);
    assert.equal(runSettings({ ...base, action: "set", key: "n", value: "42" }, captureIO().io), 0);

    const got = captureIO();
    assert.equal(runSettings({ ...base, action: "get", key: "theme", value: null }, got.io), 0);
    assert.deepEqual(got.out, ['"dark"\n']);

    const listed = captureIO();
    runSettings({ ...base, action: "list", key: null, value: null }, listed.io);
    assert.deepEqual(listed.out, ['{\n  "n": 42,\n  "theme": "dark"\n}\n']);

    const path = captureIO();
    runSettings({ ...base, action: "path", key: null, value: null }, path.io);
    assert.deepEqual(path.out, [`${join(dir, "settings.json")}\n`]);
  });

  it("exits 1 for a missing key", () => {
    const { io, err } = captureIO();
    const code = runSettings({ command: "settings", action: "get", key: "nope", value: null, dir: freshDir() }, io);
    assert.equal(code, 1);
    assert.deepEqual(err, ["Setting not found: nope\n"]);
  });

  it("parses values as JSON when possible", () => {
    assert.equal(parseSettingValue("true"), true);
    assert.deepEqual(parseSettingValue('{"w": 3}'), { w: 3 });
    assert.equal(parseSettingValue("dark"), "dark");
  });
});

describe("runRecent", () => {
  it("adds, lists and clears", () => {
    const dir = freshDir();
    const fixed = () => new Date("2024-02-03T04:05:06.000Z");

    const added = captureIO();
    runRecent({ command: "recent", action: "add", path: "/data/q3.csv", name: "Q3", dir }, added.io, fixed);
    assert.deepEqual(added.out, ["Q3\t/data/q3.csv\n"]);

    const listed = captureIO();
    runRecent({ command: "recent", action: "list", path: null, name: null, dir }, listed.io);
    assert.deepEqual(listed.out, ["Q3\t/data/q3.csv\t2024-02-03T04:05:06.000Z\n"]);

    runRecent({ command: "recent", action: "clear", path: null, name: null, dir }, captureIO().io);
    const empty = captureIO();
    runRecent({ command: "recent", action: "list", path: null, name: null, dir }, empty.io);
    assert.deepEqual(empty.out, ["No recent files\n"]);
  });
});
