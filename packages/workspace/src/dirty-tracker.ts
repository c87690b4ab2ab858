/**
 * Unsaved-changes bookkeeping for a whole project: a global flag plus
 * one flag per workspace. Listeners hear about transitions of the
 * aggregate `isDirty` only.
 */

import { Listeners, type Listener, type Unsubscribe } from "@appshell/core";

import type { WorkspaceBase } from "./workspace.js";

export class ProjectDirtyTracker {
  private globalDirty = false;
  private readonly perWorkspace = new Map<string, boolean>();
  private readonly changed = new Listeners<boolean>();

  get isDirty(): boolean {
    if (this.globalDirty) return true;
    for (const dirty of this.perWorkspace.values()) {
      if (dirty) return true;
    }
    return false;
  }

  isWorkspaceDirty(id: string): boolean {
    return this.perWorkspace.get(id) ?? false;
  }

  markDirty(): void {
    this.update(() => {
      this.globalDirty = true;
    });
  }

  /** Clears the global flag and every workspace flag. */
  markClean(): void {
    this.update(() => {
      this.globalDirty = false;
      this.perWorkspace.clear();
    });
  }

  markWorkspaceDirty(id: string): void {
    this.update(() => {
      this.perWorkspace.set(id, true);
    });
  }

  markWorkspaceClean(id: string): void {
    this.update(() => {
      if (this.perWorkspace.has(id)) this.perWorkspace.set(id, false);
    });
  }

  removeWorkspace(id: string): void {
    this.update(() => {
      this.perWorkspace.delete(id);
    });
  }

  /**
   * Mirror a workspace's dirty flag until the returned function is called.
   * The current flag is recorded immediately.
   */
  track(ws: WorkspaceBase): Unsubscribe {
    const sync = () => {
      if (ws.isDirty) this.markWorkspaceDirty(ws.id);
      else this.markWorkspaceClean(ws.id);
    };
    sync();
    return ws.onPropertyChanged((property) => {
      if (property === "isDirty") sync();
    });
  }

  /** Called with the new aggregate state whenever it flips. */
  onChange(listener: Listener<boolean>): Unsubscribe {
    return this.changed.add(listener);
  }

  private update(mutate: () => void): void {
    const before = this.isDirty;
    mutate();
    const after = this.isDirty;
    if (before !== after) this.changed.emit(after);
  }
}
