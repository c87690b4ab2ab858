/**
 * Key/value application settings persisted as one JSON file.
 *
 * Settings are not critical: a file that cannot be read or parsed means
 * "start fresh", and a failed save is reported and skipped. Neither
 * throws.
 */

import { join } from "node:path";

import { getErrorMessage, type JsonObject, type JsonValue } from "@appshell/core";

import { appDataDir } from "./paths.js";
import { isJsonObject, readJsonFile, writeJsonAtomic } from "./persist.js";

export const SETTINGS_VERSION = 1;
export const SETTINGS_FILE = "settings.json";
export const FIRST_RUN_KEY = "firstRunComplete";

export interface AppSettingsStoreOptions {
  /** Used to derive the platform directory. Default: "appshell". */
  appName?: string;
  /** Explicit directory; overrides the platform default. */
  directory?: string;
}

export class AppSettingsStore {
  readonly filePath: string;
  readonly settingsVersion = SETTINGS_VERSION;
  private values = new Map<string, JsonValue>();
  private firstRun = true;

  constructor(options: AppSettingsStoreOptions = {}) {
    const dir = options.directory ?? appDataDir(options.appName ?? "appshell");
    this.filePath = join(dir, SETTINGS_FILE);
    this.load();
  }

  /** True until the first run has been marked complete. */
  get isFirstRun(): boolean {
    return this.firstRun;
  }

  get(key: string): JsonValue | undefined {
    return this.values.get(key);
  }

  getString(key: string): string | undefined {
    const value = this.values.get(key);
    return typeof value === "string" ? value : undefined;
  }

  getNumber(key: string): number | undefined {
    const value = this.values.get(key);
    return typeof value === "number" ? value : undefined;
  }

  getBoolean(key: string): boolean | undefined {
    const value = this.values.get(key);
    return typeof value === "boolean" ? value : undefined;
  }

  /** Set a value in memory. Call {@link save} to persist. */
  set(key: string, value: JsonValue): void {
    this.values.set(key, value);
  }

  delete(key: string): boolean {
    return this.values.delete(key);
  }

  /** All settings as a plain object, keys sorted. */
  toJSON(): JsonObject {
    const out: JsonObject = {};
    for (const key of [...this.values.keys()].sort()) {
      const value = this.values.get(key);
      // defineProperty so a "__proto__" key stays an own property
      if (value !== undefined) {
        Object.defineProperty(out, key, { value, enumerable: true, writable: true, configurable: true });
      }
    }
    return out;
  }

  /** Persist to disk. Returns false (after reporting) when the write fails. */
  save(): boolean {
    try {
      writeJsonAtomic(this.filePath, this.toJSON());
      return true;
    } catch (err: unknown) {
      console.error(`[settings] Failed to save ${this.filePath}: ${getErrorMessage(err)}`);
      return false;
    }
  }

  /** Reload from disk, replacing everything in memory. */
  load(): void {
    this.values = new Map();
    this.firstRun = true;

    let parsed: unknown;
    try {
      parsed = readJsonFile(this.filePath);
    } catch (err: unknown) {
      console.error(`[settings] Failed to read ${this.filePath}, starting fresh: ${getErrorMessage(err)}`);
      return;
    }
    if (parsed === undefined) return;
    if (!isJsonObject(parsed)) {
      console.error(`[settings] Ignoring ${this.filePath}: expected a JSON object`);
      return;
    }

    this.values = new Map(Object.entries(parsed));
    this.firstRun = this.values.get(FIRST_RUN_KEY) !== true;
  }

  markFirstRunComplete(): void {
    this.firstRun = false;
    this.set(FIRST_RUN_KEY, true);
    this.save();
  }
}
