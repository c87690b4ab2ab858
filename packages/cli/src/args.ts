/**
 * Argument parser for the appshell CLI.
 *
 * Hand-rolled to keep the project zero external dependencies.
 * Supports subcommands, boolean flags, and options with values.
 */

import { parseLogLevel, type LogLevel } from "@appshell/core";
import { DEFAULT_MAX_ENTRIES } from "@appshell/logger";
import { isPresetName, PRESET_NAMES, type PresetName } from "@appshell/redact";

export interface RedactArgs {
  command: "redact";
  /** Input file. Null reads stdin. */
  file: string | null;
  preset: PresetName;
  /** JSONC policy file; takes precedence over `preset`. */
  policy: string | null;
  /** Print nothing; exit 1 when sensitive data is present. */
  check: boolean;
  /** Per-rule counts to stderr. */
  stats: boolean;
}

export interface ConsoleArgs {
  command: "console";
  maxEntries: number;
  minLevel: LogLevel;
  redact: boolean;
  /** Entries repeated as a summary after the command exits. 0 = none. */
  tail: number;
  /** The command and its arguments (everything after --). */
  wrap: string[];
}

export interface SettingsArgs {
  command: "settings";
  action: "path" | "get" | "set" | "list";
  key: string | null;
  value: string | null;
  /** Settings directory override. */
  dir: string | null;
}

export interface RecentArgs {
  command: "recent";
  action: "list" | "add" | "clear";
  path: string | null;
  name: string | null;
  dir: string | null;
}

export interface HelpArgs {
  command: "help";
  topic: string | null;
}

export interface VersionArgs {
  command: "version";
}

export type ParsedArgs =
  | RedactArgs
  | ConsoleArgs
  | SettingsArgs
  | RecentArgs
  | HelpArgs
  | VersionArgs;

export interface ParseError {
  error: string;
}

export type ParseResult = ParsedArgs | ParseError;

export function isError(result: ParseResult): result is ParseError {
  return "error" in result;
}

const REDACT_HELP = `
appshell redact [file] [options]

Redact secrets and personal data from a file (or stdin) and write the
result to stdout.

Options:
  --preset <name>   Rule set: ${PRESET_NAMES.join(", ")} (default: default)
  --policy <path>   JSONC policy file (overrides --preset)
  --check           Print nothing; exit 1 if anything would be redacted
  --stats           Print per-rule replacement counts to stderr
  -h, --help        Show this help

Exit codes: 0 ok (or clean with --check), 1 sensitive data found with
--check, 2 error.

Examples:
  appshell redact app.log > app.redacted.log
  cat app.log | appshell redact --preset strict --stats
  appshell redact --check app.log || echo "log contains secrets"
`.trim();

const CONSOLE_HELP = `
appshell console [options] -- <command> [args...]

Run a command and feed its output through the debug console log buffer.
Each stdout line is stored at info level, each stderr line at error level,
and every stored entry is printed as it arrives. Exits with the command's
exit code.

Options:
  --max-entries <n>  Buffer capacity (default: ${DEFAULT_MAX_ENTRIES})
  --min-level <lvl>  Drop entries below this level (default: debug)
  --no-redact        Store messages without redaction
  --tail <n>         After exit, print the last n buffered entries again
  -h, --help         Show this help

Examples:
  appshell console -- npm run build
  appshell console --min-level error --tail 20 -- ./import.sh data.csv
`.trim();

const SETTINGS_HELP = `
appshell settings <action> [options]

Read and write the application settings file.

Actions:
  path               Print the settings file location
  get <key>          Print a value as JSON
  set <key> <value>  Store a value (parsed as JSON, else kept as a string)
  list               Print all settings as JSON

Options:
  --dir <path>       Settings directory (default: per-user config directory)
  -h, --help         Show this help
`.trim();

const RECENT_HELP = `
appshell recent <action> [options]

Manage the recent files list (newest first).

Actions:
  list               Print recent files
  add <path>         Record a file as just opened
  clear              Forget all recent files

Options:
  --name <display>   Display name for add (default: the file name)
  --dir <path>       Settings directory (default: per-user config directory)
  -h, --help         Show this help
`.trim();

const MAIN_HELP = `
appshell - desktop application shell toolkit

Usage:
  appshell <command> [options]

Commands:
  redact     Redact secrets from text
  console    Run a command through the debug console log buffer
  settings   Read and write application settings
  recent     Manage the recent files list
  version    Show version
  help       Show help for a command

Run 'appshell help <command>' for details on a specific command.
`.trim();

export function getHelp(topic: string | null): string {
  switch (topic) {
    case "redact":
      return REDACT_HELP;
    case "console":
      return CONSOLE_HELP;
    case "settings":
      return SETTINGS_HELP;
    case "recent":
      return RECENT_HELP;
    default:
      return MAIN_HELP;
  }
}

export function parseArgs(argv: string[]): ParseResult {
  // Strip node and script path
  const args = argv.slice(2);

  if (args.length === 0) {
    return { command: "help", topic: null };
  }

  const sub = args[0];

  if (sub === "--version" || sub === "-v" || sub === "version") {
    return { command: "version" };
  }

  if (sub === "--help" || sub === "-h" || sub === "help") {
    return { command: "help", topic: args[1] ?? null };
  }

  switch (sub) {
    case "redact":
      return parseRedactArgs(args.slice(1));
    case "console":
      return parseConsoleArgs(args.slice(1));
    case "settings":
      return parseSettingsArgs(args.slice(1));
    case "recent":
      return parseRecentArgs(args.slice(1));
  }

  return { error: `Unknown command: ${sub}\n\n${MAIN_HELP}` };
}

function parseCount(flag: string, raw: string, min: number): number | ParseError {
  if (!/^\d+$/.test(raw)) return { error: `Invalid value for ${flag}: ${raw}` };
  const n = parseInt(raw, 10);
  if (n < min) return { error: `Invalid value for ${flag}: ${raw}` };
  return n;
}

function parseRedactArgs(args: string[]): ParseResult {
  const result: RedactArgs = {
    command: "redact",
    file: null,
    preset: "default",
    policy: null,
    check: false,
    stats: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      return { command: "help", topic: "redact" };
    }

    if (arg === "--preset") {
      i++;
      if (i >= args.length) return { error: "--preset requires a value" };
      const preset = args[i];
      if (!isPresetName(preset)) {
        return { error: `Invalid preset: ${preset}. Must be one of: ${PRESET_NAMES.join(", ")}` };
      }
      result.preset = preset;
    } else if (arg === "--policy") {
      i++;
      if (i >= args.length) return { error: "--policy requires a value" };
      result.policy = args[i];
    } else if (arg === "--check") {
      result.check = true;
    } else if (arg === "--stats") {
      result.stats = true;
    } else if (arg.startsWith("-") && arg !== "-") {
      return { error: `Unknown option: ${arg}\n\n${REDACT_HELP}` };
    } else if (result.file === null) {
      // "-" is an explicit stdin
      result.file = arg === "-" ? null : arg;
    } else {
      return { error: `Unexpected argument: ${arg}\n\n${REDACT_HELP}` };
    }

    i++;
  }

  return result;
}

function parseConsoleArgs(args: string[]): ParseResult {
  const result: ConsoleArgs = {
    command: "console",
    maxEntries: DEFAULT_MAX_ENTRIES,
    minLevel: "debug",
    redact: true,
    tail: 0,
    wrap: [],
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    // -- separator: everything after is the command to run
    if (arg === "--") {
      result.wrap = args.slice(i + 1);
      break;
    }

    if (arg === "--help" || arg === "-h") {
      return { command: "help", topic: "console" };
    }

    if (arg === "--max-entries") {
      i++;
      if (i >= args.length) return { error: "--max-entries requires a value" };
      const n = parseCount(arg, args[i], 1);
      if (typeof n !== "number") return n;
      result.maxEntries = n;
    } else if (arg === "--min-level") {
      i++;
      if (i >= args.length) return { error: "--min-level requires a value" };
      const level = parseLogLevel(args[i]);
      if (!level) return { error: `Invalid log level: ${args[i]}` };
      result.minLevel = level;
    } else if (arg === "--no-redact") {
      result.redact = false;
    } else if (arg === "--tail") {
      i++;
      if (i >= args.length) return { error: "--tail requires a value" };
      const n = parseCount(arg, args[i], 0);
      if (typeof n !== "number") return n;
      result.tail = n;
    } else if (arg.startsWith("-")) {
      return { error: `Unknown option: ${arg}\n\n${CONSOLE_HELP}` };
    } else {
      return { error: `Unexpected argument: ${arg} (put the command after --)\n\n${CONSOLE_HELP}` };
    }

    i++;
  }

  if (result.wrap.length === 0) {
    return { error: `No command specified after --\n\n${CONSOLE_HELP}` };
  }

  return result;
}

/**
 * Split options (`--dir`, `--name`) from positionals for the store
 * commands. Returns the collected values or an error.
 */
function splitStoreArgs(
  args: string[],
  allowed: readonly string[],
  topic: string,
): { positionals: string[]; options: Map<string, string> } | ParseError | HelpArgs {
  const positionals: string[] = [];
  const options = new Map<string, string>();

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      return { command: "help", topic };
    }
    if (allowed.includes(arg)) {
      i++;
      if (i >= args.length) return { error: `${arg} requires a value` };
      options.set(arg, args[i]);
    } else if (arg.startsWith("--")) {
      return { error: `Unknown option: ${arg}\n\n${getHelp(topic)}` };
    } else {
      positionals.push(arg);
    }
    i++;
  }

  return { positionals, options };
}

function parseSettingsArgs(args: string[]): ParseResult {
  const split = splitStoreArgs(args, ["--dir"], "settings");
  if (!("positionals" in split)) return split;

  const positionals: (string | undefined)[] = split.positionals;
  const [action, key, value, ...extra] = positionals;
  const dir = split.options.get("--dir") ?? null;

  if (extra.length > 0) {
    return { error: `Unexpected argument: ${extra[0]}\n\n${SETTINGS_HELP}` };
  }

  switch (action) {
    case "path":
    case "list":
      if (key !== undefined) return { error: `settings ${action} takes no arguments` };
      return { command: "settings", action, key: null, value: null, dir };
    case "get":
      if (key === undefined) return { error: "settings get requires a key" };
      if (value !== undefined) return { error: `Unexpected argument: ${value}` };
      return { command: "settings", action, key, value: null, dir };
    case "set":
      if (key === undefined || value === undefined) {
        return { error: "settings set requires a key and a value" };
      }
      return { command: "settings", action, key, value, dir };
    case undefined:
      return { error: `settings requires one of: path, get, set, list\n\n${SETTINGS_HELP}` };
    default:
      return { error: `Unknown settings action: ${action}\n\n${SETTINGS_HELP}` };
  }
}

function parseRecentArgs(args: string[]): ParseResult {
  const split = splitStoreArgs(args, ["--dir", "--name"], "recent");
  if (!("positionals" in split)) return split;

  const [action = "list", path, ...extra] = split.positionals;
  const dir = split.options.get("--dir") ?? null;
  const name = split.options.get("--name") ?? null;

  if (extra.length > 0) {
    return { error: `Unexpected argument: ${extra[0]}\n\n${RECENT_HELP}` };
  }

  if (action === "add") {
    if (path === undefined) return { error: "recent add requires a path" };
    return { command: "recent", action, path, name, dir };
  }

  if (action === "list" || action === "clear") {
    if (path !== undefined) return { error: `recent ${action} takes no arguments` };
    if (name !== null) return { error: "--name is only valid with recent add" };
    return { command: "recent", action, path: null, name: null, dir };
  }

  return { error: `Unknown recent action: ${action}\n\n${RECENT_HELP}` };
}
