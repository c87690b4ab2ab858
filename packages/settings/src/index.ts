/**
 * @appshell/settings - Application settings and recent files, stored as
 * JSON in the per-user configuration directory.
 *
 * @packageDocumentation
 */

export type { AppSettingsStoreOptions } from "./settings.js";
export { AppSettingsStore, SETTINGS_VERSION, SETTINGS_FILE, FIRST_RUN_KEY } from "./settings.js";
export type { RecentFilesStoreOptions } from "./recent-files.js";
export { RecentFilesStore, DEFAULT_MAX_RECENT_FILES, RECENT_FILES_FILE } from "./recent-files.js";
export type { PlatformInfo } from "./paths.js";
export { appDataDir } from "./paths.js";
export { isJsonObject, isJsonValue, readJsonFile, writeJsonAtomic } from "./persist.js";
