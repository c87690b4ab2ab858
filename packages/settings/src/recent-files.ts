/**
 * Most-recently-used file list, newest first.
 */

import { basename, join } from "node:path";

import {
  Listeners,
  getErrorMessage,
  type Listener,
  type RecentFile,
  type Unsubscribe,
} from "@appshell/core";

import { appDataDir } from "./paths.js";
import { readJsonFile, writeJsonAtomic } from "./persist.js";

export const DEFAULT_MAX_RECENT_FILES = 10;
export const RECENT_FILES_FILE = "recent_files.json";

export interface RecentFilesStoreOptions {
  appName?: string;
  directory?: string;
  /** Default: 10. */
  maxFiles?: number;
  clock?: () => Date;
}

function isRecentFile(value: unknown): value is RecentFile {
  return (
    typeof value === "object" &&
    value !== null &&
    "path" in value &&
    "displayName" in value &&
    "lastOpened" in value &&
    typeof value.path === "string" &&
    typeof value.displayName === "string" &&
    typeof value.lastOpened === "string"
  );
}

function samePath(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export class RecentFilesStore {
  readonly filePath: string;
  readonly maxFiles: number;
  private list: RecentFile[] = [];
  private readonly changed = new Listeners<RecentFile[]>();
  private readonly clock: () => Date;

  constructor(options: RecentFilesStoreOptions = {}) {
    const dir = options.directory ?? appDataDir(options.appName ?? "appshell");
    this.filePath = join(dir, RECENT_FILES_FILE);
    this.maxFiles = options.maxFiles ?? DEFAULT_MAX_RECENT_FILES;
    this.clock = options.clock ?? (() => new Date());
    this.load();
  }

  get files(): RecentFile[] {
    return [...this.list];
  }

  /**
   * Put a file at the front. An existing entry for the same path
   * (compared case-insensitively) is replaced; the list is trimmed to
   * `maxFiles`.
   */
  add(path: string, displayName?: string): RecentFile {
    const file: RecentFile = {
      path,
      displayName: displayName ?? basename(path),
      lastOpened: this.clock().toISOString(),
    };
    this.list = [file, ...this.list.filter((f) => !samePath(f.path, path))].slice(0, this.maxFiles);
    this.commit();
    return file;
  }

  remove(path: string): boolean {
    const before = this.list.length;
    this.list = this.list.filter((f) => !samePath(f.path, path));
    if (this.list.length === before) return false;
    this.commit();
    return true;
  }

  clear(): void {
    this.list = [];
    this.commit();
  }

  onChange(listener: Listener<RecentFile[]>): Unsubscribe {
    return this.changed.add(listener);
  }

  private commit(): void {
    this.save();
    this.changed.emit(this.files);
  }

  private save(): void {
    try {
      writeJsonAtomic(
        this.filePath,
        this.list.map((f) => ({ path: f.path, displayName: f.displayName, lastOpened: f.lastOpened })),
      );
    } catch (err: unknown) {
      console.error(`[recent] Failed to save ${this.filePath}: ${getErrorMessage(err)}`);
    }
  }

  private load(): void {
    let parsed: unknown;
    try {
      parsed = readJsonFile(this.filePath);
    } catch (err: unknown) {
      console.error(`[recent] Failed to read ${this.filePath}, starting fresh: ${getErrorMessage(err)}`);
      return;
    }
    if (!Array.isArray(parsed)) return;
    this.list = parsed.filter(isRecentFile).slice(0, this.maxFiles);
  }
}
