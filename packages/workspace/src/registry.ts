/**
 * Ordered set of open workspaces with a single active one.
 *
 * Lifecycle per workspace: inactive -> active -> closing -> removed.
 * Mutations of the list and of the active slot happen synchronously
 * between awaits, so the registry never interleaves two changes to its
 * own state. Hooks run in between and may observe intermediate states.
 */

import {
  CapacityExceededError,
  Listeners,
  type Listener,
  type Unsubscribe,
} from "@appshell/core";

import type { Workspace } from "./workspace.js";

export const DEFAULT_MAX_WORKSPACES = 10;

export type WorkspaceState = "inactive" | "active" | "closing" | "removed";

export type WorkspaceChange<W extends Workspace = Workspace> =
  | { type: "added"; workspace: W; index: number }
  | { type: "activated"; previous: W | null; current: W | null }
  | { type: "removed"; workspace: W; index: number };

export interface WorkspaceRegistryOptions {
  /** Default: 10. */
  maxWorkspaces?: number;
}

export class WorkspaceRegistry<W extends Workspace = Workspace> {
  readonly maxWorkspaces: number;
  private readonly list: W[] = [];
  private active: W | null = null;
  /** Close operations in flight, shared by concurrent callers. */
  private readonly pending = new Map<W, Promise<boolean>>();
  /** Confirmed closes that have not finished their cleanup yet. */
  private readonly tearingDown = new Set<W>();
  private readonly removed = new WeakSet<W>();
  private readonly changed = new Listeners<WorkspaceChange<W>>();

  constructor(options: WorkspaceRegistryOptions = {}) {
    const max = options.maxWorkspaces ?? DEFAULT_MAX_WORKSPACES;
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`maxWorkspaces must be an integer >= 1, got ${max}`);
    }
    this.maxWorkspaces = max;
  }

  get workspaces(): W[] {
    return [...this.list];
  }

  get activeWorkspace(): W | null {
    return this.active;
  }

  get count(): number {
    return this.list.length;
  }

  get hasUnsavedChanges(): boolean {
    return this.list.some((ws) => ws.isDirty);
  }

  /** Lifecycle state, or undefined for a workspace this registry never held. */
  stateOf(ws: W): WorkspaceState | undefined {
    if (this.removed.has(ws)) return "removed";
    if (this.tearingDown.has(ws)) return "closing";
    if (this.active === ws) return "active";
    if (this.list.includes(ws)) return "inactive";
    return undefined;
  }

  onChange(listener: Listener<WorkspaceChange<W>>): Unsubscribe {
    return this.changed.add(listener);
  }

  /**
   * Append a workspace and make it active.
   *
   * @throws CapacityExceededError when the registry is full; nothing changes.
   */
  async addWorkspace(ws: W): Promise<void> {
    if (this.list.length >= this.maxWorkspaces) {
      throw new CapacityExceededError(this.maxWorkspaces);
    }
    if (this.list.includes(ws)) {
      throw new Error(`Workspace "${ws.title}" (${ws.id}) is already open`);
    }
    if (this.removed.has(ws)) {
      throw new Error(`Workspace "${ws.title}" (${ws.id}) has been closed`);
    }

    this.list.push(ws);
    this.changed.emit({ type: "added", workspace: ws, index: this.list.length - 1 });
    await this.switchTo(ws, this.active);
  }

  /**
   * Make a member workspace active. Returns false for workspaces that are
   * not open (or are being closed). Activating the active one is a no-op.
   */
  async activateWorkspace(ws: W): Promise<boolean> {
    if (!this.isOpen(ws)) return false;
    if (this.active === ws) return true;
    return this.switchTo(ws, this.active);
  }

  /**
   * Close one workspace. Resolves false when it declined (or is not
   * open); the registry is then unchanged.
   */
  closeWorkspace(ws: W): Promise<boolean> {
    const inFlight = this.pending.get(ws);
    if (inFlight) return inFlight;
    if (!this.isOpen(ws)) return Promise.resolve(false);

    const op = this.runClose(ws).finally(() => {
      this.pending.delete(ws);
    });
    this.pending.set(ws, op);
    return op;
  }

  /**
   * Close everything, most recently added first. Stops at the first
   * workspace that declines and resolves false; the rest stay open.
   */
  async closeAll(): Promise<boolean> {
    for (const ws of [...this.list].reverse()) {
      if (!this.list.includes(ws)) continue;
      if (!(await this.closeWorkspace(ws))) return false;
    }
    return true;
  }

  private isOpen(ws: W): boolean {
    return this.list.includes(ws) && !this.tearingDown.has(ws);
  }

  /**
   * Deactivate `previous` (if any and still open), then activate `ws`.
   * `previous` is only reported in the event when it is no longer open.
   */
  private async switchTo(ws: W, previous: W | null): Promise<boolean> {
    if (previous && previous !== ws && this.list.includes(previous)) {
      await previous.onDeactivated();
    }
    // The target may have been closed while the hook ran.
    if (!this.isOpen(ws)) return false;

    this.active = ws;
    await ws.onActivated();
    this.changed.emit({ type: "activated", previous, current: ws });
    return true;
  }

  private async runClose(ws: W): Promise<boolean> {
    if (!(await ws.canClose())) return false;

    this.tearingDown.add(ws);
    try {
      await ws.onClosing();
    } catch (err: unknown) {
      this.tearingDown.delete(ws);
      throw err;
    }

    const index = this.list.indexOf(ws);
    this.list.splice(index, 1);
    this.tearingDown.delete(ws);
    this.removed.add(ws);
    this.changed.emit({ type: "removed", workspace: ws, index });

    if (this.active !== ws) return true;

    // The removed workspace gets no deactivation hook.
    this.active = null;
    const next = this.list[Math.min(index, this.list.length - 1)];
    if (next) {
      await this.switchTo(next, ws);
    } else {
      this.changed.emit({ type: "activated", previous: ws, current: null });
    }
    return true;
  }
}
