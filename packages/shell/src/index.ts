/**
 * @appshell/shell - Composition root for a desktop application shell.
 *
 * Resolves configuration and feature flags, then wires settings, recent
 * files, the log pipeline, the workspace registry and dirty tracking
 * together. Also home to the pieces of shell chrome that carry no UI
 * toolkit: keyboard accelerators, the navigation tree and open-file
 * filters.
 *
 * @packageDocumentation
 */

export type { FeatureFlags, ShellConfig, ShellConfigOverrides } from "./config.js";
export { resolveShellConfig, SHELL_DEFAULTS } from "./config.js";
export { buildOpenFileFilters, TEXT_IMPORT_EXTENSIONS, EXCEL_EXTENSIONS } from "./file-filters.js";
export type {
  AcceleratorActions,
  AcceleratorBinding,
  KeyInput,
  ParsedAccelerator,
  ShellCommand,
  ShellCommandId,
} from "./accelerators.js";
export {
  DEFAULT_ACCELERATORS,
  dispatchAccelerator,
  formatAccelerator,
  matchAccelerator,
  normalizeKey,
  parseAccelerator,
} from "./accelerators.js";
export type { NavigatorItemInit, SelectionChange } from "./navigation.js";
export { Navigator, NavigatorItem, walkItems } from "./navigation.js";
export type { AppShell, AppShellOptions } from "./app.js";
export { createAppShell, OPEN_FILE_TITLE, SHELL_CATEGORY } from "./app.js";
