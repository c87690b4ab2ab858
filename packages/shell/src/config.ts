/**
 * Shell configuration resolution.
 *
 * Merges programmatic overrides with environment variables and applies
 * defaults. Capacities, the log pipeline and feature flags are all fixed
 * here, before the shell is composed.
 */

import { parseLogLevel, type LogLevel } from "@appshell/core";

/**
 * Optional capabilities, decided at configuration time. Nothing probes
 * for plugins at runtime.
 */
export interface FeatureFlags {
  /** Spreadsheet (.xlsx/.xls/.xlsm) import is available. */
  excelImport: boolean;
}

/**
 * Fully resolved config with all defaults applied.
 */
export interface ShellConfig {
  appName: string;
  /** Settings directory. Undefined means the platform default for `appName`. */
  settingsDir: string | undefined;
  maxWorkspaces: number;
  maxLogEntries: number;
  minLogLevel: LogLevel;
  redactLogs: boolean;
  captureStdio: boolean;
  verbose: boolean;
  features: FeatureFlags;
}

export type ShellConfigOverrides = Partial<Omit<ShellConfig, "features">> & {
  features?: Partial<FeatureFlags>;
};

export const SHELL_DEFAULTS: ShellConfig = {
  appName: "appshell",
  settingsDir: undefined,
  maxWorkspaces: 10,
  maxLogEntries: 10_000,
  minLogLevel: "debug",
  redactLogs: true,
  captureStdio: false,
  verbose: false,
  features: { excelImport: false },
};

function envInt(value: string | undefined): number | undefined {
  if (!value || !/^\d+$/.test(value.trim())) return undefined;
  const n = parseInt(value, 10);
  return n >= 1 ? n : undefined;
}

function envBool(value: string | undefined): boolean | undefined {
  switch (value?.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "0":
    case "false":
    case "no":
    case "off":
      return false;
    default:
      return undefined;
  }
}

function positiveInt(value: number | undefined): number | undefined {
  return value !== undefined && Number.isInteger(value) && value >= 1 ? value : undefined;
}

/**
 * Resolve the shell config.
 *
 * Priority: programmatic overrides > environment variables > defaults.
 * Values that do not parse (or are out of range) fall through to the next
 * source.
 *
 * Environment variables:
 * - `APPSHELL_APP_NAME`, `APPSHELL_SETTINGS_DIR`
 * - `APPSHELL_MAX_WORKSPACES`, `APPSHELL_MAX_LOG_ENTRIES` (integers >= 1)
 * - `APPSHELL_LOG_LEVEL` (trace, debug, info, warning, error, critical)
 * - `APPSHELL_REDACT_LOGS`, `APPSHELL_CAPTURE_STDIO`, `APPSHELL_VERBOSE`,
 *   `APPSHELL_EXCEL_IMPORT` (1/0, true/false, yes/no, on/off)
 */
export function resolveShellConfig(
  overrides: ShellConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): ShellConfig {
  const envLevel = env.APPSHELL_LOG_LEVEL ? parseLogLevel(env.APPSHELL_LOG_LEVEL) : null;

  return {
    appName: overrides.appName || env.APPSHELL_APP_NAME || SHELL_DEFAULTS.appName,
    settingsDir: overrides.settingsDir || env.APPSHELL_SETTINGS_DIR || SHELL_DEFAULTS.settingsDir,
    maxWorkspaces:
      positiveInt(overrides.maxWorkspaces) ??
      envInt(env.APPSHELL_MAX_WORKSPACES) ??
      SHELL_DEFAULTS.maxWorkspaces,
    maxLogEntries:
      positiveInt(overrides.maxLogEntries) ??
      envInt(env.APPSHELL_MAX_LOG_ENTRIES) ??
      SHELL_DEFAULTS.maxLogEntries,
    minLogLevel: overrides.minLogLevel ?? envLevel ?? SHELL_DEFAULTS.minLogLevel,
    redactLogs: overrides.redactLogs ?? envBool(env.APPSHELL_REDACT_LOGS) ?? SHELL_DEFAULTS.redactLogs,
    captureStdio:
      overrides.captureStdio ?? envBool(env.APPSHELL_CAPTURE_STDIO) ?? SHELL_DEFAULTS.captureStdio,
    verbose: overrides.verbose ?? envBool(env.APPSHELL_VERBOSE) ?? SHELL_DEFAULTS.verbose,
    features: {
      excelImport:
        overrides.features?.excelImport ??
        envBool(env.APPSHELL_EXCEL_IMPORT) ??
        SHELL_DEFAULTS.features.excelImport,
    },
  };
}
