/**
 * @appshell/logger - In-memory log pipeline for a desktop shell.
 *
 * A bounded, level-filtered {@link LogBuffer} that redacts messages on
 * ingest, category loggers that feed it, a debug console view model that
 * follows it, and opt-in stdout/stderr capture.
 *
 * ```typescript
 * import { LogBuffer, LoggerProvider } from "@appshell/logger";
 *
 * const buffer = new LogBuffer({ maxEntries: 5000 });
 * const log = new LoggerProvider(buffer).createLogger("Import");
 * log.info("connecting with password=hunter2");
 * buffer.getLogsAsText(); // "[12:00:00] [INF] Import: connecting with password=[REDACTED]"
 * ```
 *
 * @packageDocumentation
 */

export type { LogBufferOptions } from "./buffer.js";
export { LogBuffer, DEFAULT_MAX_ENTRIES } from "./buffer.js";
export { formatLogEntry, formatTime } from "./format.js";
export type { Logger, LoggerProviderOptions } from "./provider.js";
export { LoggerProvider } from "./provider.js";
export type { DebugConsoleOptions, Scheduler } from "./console.js";
export { DebugConsole, CONSOLE_CATEGORY } from "./console.js";
export type { CaptureStream, CapturedOutput, StdioCaptureOptions } from "./capture.js";
export { StdioCapture, pipeToBuffer } from "./capture.js";
export { RingBuffer } from "./ring.js";
