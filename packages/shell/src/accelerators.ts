/**
 * Keyboard accelerators for the shell's standard commands.
 *
 * Accelerators are strings such as "Ctrl+Shift+S" or "F12". Matching is
 * exact on modifiers, so "Ctrl+S" does not fire for Ctrl+Shift+S. Cmd and
 * Meta count as Ctrl.
 */

export type ShellCommandId =
  | "save"
  | "saveAs"
  | "open"
  | "new"
  | "find"
  | "toggleConsole"
  | "undo"
  | "redo"
  | "closeTab"
  | "preferences";

export interface AcceleratorBinding {
  command: ShellCommandId;
  label: string;
  accelerator: string;
}

export interface ParsedAccelerator {
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
  /** Normalized key token: "s", "f12", ",", "escape", ... */
  key: string;
}

/** A key press as reported by the host toolkit. */
export interface KeyInput {
  key: string;
  ctrl?: boolean;
  alt?: boolean;
  shift?: boolean;
  meta?: boolean;
}

export interface ShellCommand {
  execute(): void;
  /** Default: always executable. */
  canExecute?(): boolean;
}

export type AcceleratorActions = Partial<Record<ShellCommandId, ShellCommand>>;

export const DEFAULT_ACCELERATORS: readonly AcceleratorBinding[] = [
  { command: "save", label: "Save", accelerator: "Ctrl+S" },
  { command: "saveAs", label: "Save As", accelerator: "Ctrl+Shift+S" },
  { command: "open", label: "Open", accelerator: "Ctrl+O" },
  { command: "new", label: "New", accelerator: "Ctrl+N" },
  { command: "find", label: "Find", accelerator: "Ctrl+F" },
  { command: "toggleConsole", label: "Toggle debug console", accelerator: "F12" },
  { command: "undo", label: "Undo", accelerator: "Ctrl+Z" },
  { command: "redo", label: "Redo", accelerator: "Ctrl+Y" },
  { command: "redo", label: "Redo", accelerator: "Ctrl+Shift+Z" },
  { command: "closeTab", label: "Close tab", accelerator: "Ctrl+W" },
  { command: "preferences", label: "Preferences", accelerator: "Ctrl+," },
];

const NAMED_KEYS = new Map<string, string>([
  ["esc", "escape"],
  ["escape", "escape"],
  ["enter", "enter"],
  ["return", "enter"],
  ["tab", "tab"],
  ["space", "space"],
  [" ", "space"],
  ["backspace", "backspace"],
  ["delete", "delete"],
  ["del", "delete"],
  ["insert", "insert"],
  ["home", "home"],
  ["end", "end"],
  ["pageup", "pageup"],
  ["pagedown", "pagedown"],
  ["up", "arrowup"],
  ["arrowup", "arrowup"],
  ["down", "arrowdown"],
  ["arrowdown", "arrowdown"],
  ["left", "arrowleft"],
  ["arrowleft", "arrowleft"],
  ["right", "arrowright"],
  ["arrowright", "arrowright"],
  ["comma", ","],
  ["oemcomma", ","],
]);

export function normalizeKey(token: string): string | null {
  if (token === " ") return "space";
  const lowered = token.trim().toLowerCase();
  if (!lowered) return null;
  if (/^[a-z0-9,.\/;\-=\[\]]$/.test(lowered)) return lowered;
  if (/^f([1-9]|1[0-9]|2[0-4])$/.test(lowered)) return lowered;
  return NAMED_KEYS.get(lowered) ?? null;
}

/** Parse an accelerator string. Returns null when it is not valid. */
export function parseAccelerator(accelerator: string): ParsedAccelerator | null {
  let ctrl = false;
  let alt = false;
  let shift = false;
  let key: string | null = null;

  const parts = accelerator.split("+").map((part) => part.trim()).filter(Boolean);
  if (parts.length === 0) return null;

  for (const part of parts) {
    const lowered = part.toLowerCase();
    if (["ctrl", "control", "cmd", "command", "meta"].includes(lowered)) {
      ctrl = true;
    } else if (lowered === "alt" || lowered === "option") {
      alt = true;
    } else if (lowered === "shift") {
      shift = true;
    } else {
      if (key) return null;
      key = normalizeKey(part);
      if (!key) return null;
    }
  }

  return key ? { ctrl, alt, shift, key } : null;
}

function displayKey(key: string): string {
  if (key.length === 1 || /^f\d+$/.test(key)) return key.toUpperCase();
  if (key.startsWith("arrow")) return `Arrow${key[5].toUpperCase()}${key.slice(6)}`;
  if (key === "pageup") return "PageUp";
  if (key === "pagedown") return "PageDown";
  return key[0].toUpperCase() + key.slice(1);
}

/** Canonical display form: "Ctrl+Alt+Shift+Key". */
export function formatAccelerator(parsed: ParsedAccelerator): string {
  const parts: string[] = [];
  if (parsed.ctrl) parts.push("Ctrl");
  if (parsed.alt) parts.push("Alt");
  if (parsed.shift) parts.push("Shift");
  parts.push(displayKey(parsed.key));
  return parts.join("+");
}

function matches(parsed: ParsedAccelerator, input: KeyInput): boolean {
  const key = normalizeKey(input.key);
  return (
    key === parsed.key &&
    parsed.ctrl === Boolean(input.ctrl || input.meta) &&
    parsed.alt === Boolean(input.alt) &&
    parsed.shift === Boolean(input.shift)
  );
}

/** The command bound to a key press, or null. */
export function matchAccelerator(
  input: KeyInput,
  bindings: readonly AcceleratorBinding[] = DEFAULT_ACCELERATORS,
): ShellCommandId | null {
  for (const binding of bindings) {
    const parsed = parseAccelerator(binding.accelerator);
    if (parsed && matches(parsed, input)) return binding.command;
  }
  return null;
}

/**
 * Run the command bound to a key press. Returns true when a command ran,
 * which tells the host to mark the key event handled.
 */
export function dispatchAccelerator(
  input: KeyInput,
  actions: AcceleratorActions,
  bindings: readonly AcceleratorBinding[] = DEFAULT_ACCELERATORS,
): boolean {
  const id = matchAccelerator(input, bindings);
  if (!id) return false;
  const command = actions[id];
  if (!command || command.canExecute?.() === false) return false;
  command.execute();
  return true;
}
