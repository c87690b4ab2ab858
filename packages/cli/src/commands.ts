/**
 * Command implementations.
 *
 * Each `run*` function takes its parsed args plus an {@link CommandIO}
 * and returns the process exit code, so the entry point stays a thin
 * dispatcher and the commands can run in-process.
 */

import { spawn } from "node:child_process";
import fs from "node:fs";
import { resolve } from "node:path";
import { createInterface } from "node:readline";

import { getErrorMessage, type JsonValue, type LogEntry } from "@appshell/core";
import { LogBuffer, formatLogEntry } from "@appshell/logger";
import { fromPreset, loadPolicyFile, type RedactionEngine } from "@appshell/redact";
import { AppSettingsStore, RecentFilesStore, isJsonValue } from "@appshell/settings";

import type { ConsoleArgs, RecentArgs, RedactArgs, SettingsArgs } from "./args.js";

export interface CommandIO {
  /** Raw write to stdout. Lines carry their own "\n". */
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readStdin: () => Promise<string>;
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

export const processIO: CommandIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  readStdin: () => readStream(process.stdin),
};

// --- redact ---

function buildEngine(args: RedactArgs): RedactionEngine {
  return args.policy ? loadPolicyFile(args.policy) : fromPreset(args.preset);
}

/**
 * Redact a file or stdin.
 *
 * @returns 0 on success (or clean input with --check), 1 when --check
 * finds sensitive data, 2 on error.
 */
export async function runRedact(args: RedactArgs, io: CommandIO = processIO): Promise<number> {
  let engine: RedactionEngine;
  let input: string;
  try {
    engine = buildEngine(args);
    input = args.file ? fs.readFileSync(args.file, "utf8") : await io.readStdin();
  } catch (err: unknown) {
    io.stderr(`${getErrorMessage(err)}\n`);
    return 2;
  }

  if (args.check) {
    return engine.containsSensitiveData(input) ? 1 : 0;
  }

  const { text, stats } = engine.redactWithStats(input);
  io.stdout(text);

  if (args.stats) {
    for (const rule of engine.ruleList) {
      const count = stats.byRule[rule.name];
      if (count) io.stderr(`${rule.name}: ${count}\n`);
    }
    io.stderr(`total: ${stats.totalReplacements}\n`);
  }
  return 0;
}

// --- console ---

/** A running command whose output the console follows. */
export interface ConsoleChild {
  stdout: NodeJS.ReadableStream;
  stderr: NodeJS.ReadableStream;
  /** Resolves with the exit code once the process is gone. */
  exited: Promise<number>;
}

export type StartCommand = (command: string, args: string[]) => ConsoleChild;

/** Spawn a real process with piped output and inherited stdin. */
export const spawnCommand: StartCommand = (command, args) => {
  const child = spawn(command, args, { stdio: ["inherit", "pipe", "pipe"] });

  const exited = new Promise<number>((resolveExit) => {
    child.on("error", (err: NodeJS.ErrnoException) => {
      if (err.code === "ENOENT") {
        console.error(`Command not found: ${command}`);
        resolveExit(127);
        return;
      }
      console.error(`Failed to start ${command}: ${err.message}`);
      resolveExit(1);
    });
    child.on("close", (code, signal) => {
      resolveExit(signal ? 128 + (signal === "SIGINT" ? 2 : 15) : code ?? 0);
    });
  });

  return { stdout: child.stdout, stderr: child.stderr, exited };
};

function followLines(
  stream: NodeJS.ReadableStream,
  onLine: (line: string) => void,
): Promise<void> {
  return new Promise((resolveDone) => {
    const rl = createInterface({ input: stream, crlfDelay: Infinity });
    rl.on("line", (line) => {
      if (line) onLine(line);
    });
    rl.on("close", () => resolveDone());
    // A pipe torn down by a failed spawn closes without ending
    stream.on("close", () => resolveDone());
  });
}

/**
 * Run a command with its output routed through a log buffer.
 *
 * Every stored entry is printed as it arrives. With `tail`, the last
 * entries still in the buffer are printed again once the command exits.
 *
 * @returns The command's exit code.
 */
export async function runConsole(
  args: ConsoleArgs,
  io: CommandIO = processIO,
  start: StartCommand = spawnCommand,
  clock: () => Date = () => new Date(),
): Promise<number> {
  const buffer = new LogBuffer({
    maxEntries: args.maxEntries,
    minLevel: args.minLevel,
    redact: args.redact,
  });
  const unsubscribe = buffer.onEntryAdded((entry) => io.stdout(`${formatLogEntry(entry)}\n`));

  const [command, ...commandArgs] = args.wrap;
  const child = start(command, commandArgs);

  const add = (isError: boolean) => (line: string) => {
    const entry: LogEntry = {
      timestamp: clock(),
      level: isError ? "error" : "info",
      category: isError ? "stderr" : "stdout",
      message: line,
    };
    buffer.addEntry(entry);
  };

  const [, , exitCode] = await Promise.all([
    followLines(child.stdout, add(false)),
    followLines(child.stderr, add(true)),
    child.exited,
  ]);
  unsubscribe();

  if (args.tail > 0) {
    // As stored: redacted only when ingest redaction was on
    const entries = buffer.getEntries(args.redact);
    const shown = entries.slice(-args.tail);
    io.stdout(`--- last ${shown.length} of ${entries.length} entries ---\n`);
    for (const entry of shown) io.stdout(`${formatLogEntry(entry)}\n`);
  }

  return exitCode;
}

// --- settings ---

/** Parse a CLI value as JSON; anything that is not valid JSON stays a string. */
export function parseSettingValue(raw: string): JsonValue {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (isJsonValue(parsed)) return parsed;
  } catch {
    // not JSON: store the text itself
  }
  return raw;
}

export function runSettings(args: SettingsArgs, io: CommandIO = processIO): number {
  const store = new AppSettingsStore({ directory: args.dir ?? undefined });

  switch (args.action) {
    case "path":
      io.stdout(`${store.filePath}\n`);
      return 0;

    case "list":
      io.stdout(`${JSON.stringify(store.toJSON(), null, 2)}\n`);
      return 0;

    case "get": {
      const key = args.key ?? "";
      const value = store.get(key);
      if (value === undefined) {
        io.stderr(`Setting not found: ${key}\n`);
        return 1;
      }
      io.stdout(`${JSON.stringify(value)}\n`);
      return 0;
    }

    case "set": {
      const key = args.key ?? "";
      store.set(key, parseSettingValue(args.value ?? ""));
      if (!store.save()) return 1;
      return 0;
    }
  }
}

// --- recent ---

export function runRecent(
  args: RecentArgs,
  io: CommandIO = processIO,
  clock?: () => Date,
): number {
  const store = new RecentFilesStore({ directory: args.dir ?? undefined, clock });

  switch (args.action) {
    case "list": {
      const files = store.files;
      if (files.length === 0) {
        io.stdout("No recent files\n");
        return 0;
      }
      for (const file of files) {
        io.stdout(`${file.displayName}\t${file.path}\t${file.lastOpened}\n`);
      }
      return 0;
    }

    case "add": {
      const added = store.add(resolve(args.path ?? ""), args.name ?? undefined);
      io.stdout(`${added.displayName}\t${added.path}\n`);
      return 0;
    }

    case "clear":
      store.clear();
      return 0;
  }
}
