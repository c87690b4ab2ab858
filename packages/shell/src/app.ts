/**
 * Shell composition.
 *
 * Builds every long-lived service once, wires their notifications
 * together, and hands back a single object the host UI binds to.
 */

import type { DialogService, FileFilter, Unsubscribe } from "@appshell/core";
import {
  LogBuffer,
  LoggerProvider,
  StdioCapture,
  pipeToBuffer,
  type CaptureStream,
  type Logger,
} from "@appshell/logger";
import type { RedactionEngine } from "@appshell/redact";
import { AppSettingsStore, RecentFilesStore } from "@appshell/settings";
import {
  ProjectDirtyTracker,
  WorkspaceBase,
  WorkspaceRegistry,
  type Workspace,
} from "@appshell/workspace";

import { resolveShellConfig, type ShellConfig, type ShellConfigOverrides } from "./config.js";
import { buildOpenFileFilters } from "./file-filters.js";

export const SHELL_CATEGORY = "Shell";
export const OPEN_FILE_TITLE = "Open Data File";

export interface AppShellOptions {
  /** Host dialogs. Needed only by {@link AppShell.openDataFile}. */
  dialogs?: DialogService;
  /** Redaction engine for the log buffer. Default: the default preset. */
  engine?: RedactionEngine;
  clock?: () => Date;
  /** Streams patched when `captureStdio` is on. Default: process.stdout/stderr. */
  stdout?: CaptureStream;
  stderr?: CaptureStream;
  env?: NodeJS.ProcessEnv;
}

export interface AppShell {
  readonly config: ShellConfig;
  readonly settings: AppSettingsStore;
  readonly recentFiles: RecentFilesStore;
  readonly buffer: LogBuffer;
  readonly loggers: LoggerProvider;
  readonly registry: WorkspaceRegistry;
  readonly dirtyTracker: ProjectDirtyTracker;
  /** Present only when `captureStdio` is on. */
  readonly capture: StdioCapture | null;
  /** Whether this launch was the first one (decided before it was recorded). */
  readonly wasFirstRun: boolean;
  /** Filters for the open-file picker, respecting feature flags. */
  openFileFilters(): FileFilter[];
  /**
   * Ask the user for a data file. The chosen path goes to the recent files
   * list; null when the picker was cancelled.
   */
  openDataFile(): Promise<string | null>;
  /** Stop capture and detach every internal subscription. */
  dispose(): void;
}

/**
 * Create the application shell.
 *
 * ```typescript
 * import { createAppShell } from "@appshell/shell";
 *
 * const shell = createAppShell({ maxWorkspaces: 5 }, { dialogs });
 * shell.loggers.createLogger("Import").info("ready");
 * ```
 */
export function createAppShell(
  overrides: ShellConfigOverrides = {},
  options: AppShellOptions = {},
): AppShell {
  const config = resolveShellConfig(overrides, options.env);
  const clock = options.clock ?? (() => new Date());

  const settings = new AppSettingsStore({ appName: config.appName, directory: config.settingsDir });
  const recentFiles = new RecentFilesStore({
    appName: config.appName,
    directory: config.settingsDir,
    clock,
  });

  const buffer = new LogBuffer({
    maxEntries: config.maxLogEntries,
    minLevel: config.minLogLevel,
    redact: config.redactLogs,
    engine: options.engine,
  });
  const loggers = new LoggerProvider(buffer, { clock });
  const log = loggers.createLogger(SHELL_CATEGORY);

  const registry = new WorkspaceRegistry({ maxWorkspaces: config.maxWorkspaces });
  const dirtyTracker = new ProjectDirtyTracker();
  const subscriptions: Unsubscribe[] = [];
  const tracked = new Map<Workspace, Unsubscribe>();

  subscriptions.push(
    registry.onChange((change) => {
      switch (change.type) {
        case "added": {
          const ws = change.workspace;
          if (ws instanceof WorkspaceBase) {
            tracked.set(ws, dirtyTracker.track(ws));
          } else if (ws.isDirty) {
            dirtyTracker.markWorkspaceDirty(ws.id);
          }
          log.debug(`Workspace opened: ${ws.title}`);
          break;
        }
        case "removed": {
          const ws = change.workspace;
          tracked.get(ws)?.();
          tracked.delete(ws);
          dirtyTracker.removeWorkspace(ws.id);
          log.debug(`Workspace closed: ${ws.title}`);
          break;
        }
        case "activated":
          break;
      }
    }),
  );

  let capture: StdioCapture | null = null;
  if (config.captureStdio) {
    capture = new StdioCapture({ stdout: options.stdout, stderr: options.stderr });
    subscriptions.push(pipeToBuffer(capture, buffer, clock));
    capture.start();
  }

  const wasFirstRun = runFirstRunCheck(settings, log);
  if (config.verbose) {
    console.error(`[appshell] Settings: ${settings.filePath}`);
  }

  let disposed = false;

  return {
    config,
    settings,
    recentFiles,
    buffer,
    loggers,
    registry,
    dirtyTracker,
    capture,
    wasFirstRun,

    openFileFilters() {
      return buildOpenFileFilters(config.features);
    },

    async openDataFile() {
      if (!options.dialogs) {
        throw new Error("openDataFile requires a dialog service");
      }
      const path = await options.dialogs.showOpenFile(OPEN_FILE_TITLE, buildOpenFileFilters(config.features));
      if (path === null) return null;
      recentFiles.add(path);
      log.info(`Opened ${path}`);
      return path;
    },

    dispose() {
      if (disposed) return;
      disposed = true;
      capture?.stop();
      for (const unsubscribe of subscriptions) unsubscribe();
      for (const unsubscribe of tracked.values()) unsubscribe();
      tracked.clear();
    },
  };
}

function runFirstRunCheck(settings: AppSettingsStore, log: Logger): boolean {
  if (!settings.isFirstRun) {
    log.debug("Settings loaded");
    return false;
  }
  log.info("First run: initializing settings");
  settings.markFirstRunComplete();
  return true;
}
