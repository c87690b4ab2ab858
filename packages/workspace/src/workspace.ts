/**
 * Workspace contract and base classes.
 *
 * A workspace is one open document (one tab). The registry drives its
 * lifecycle through the async hooks below; none of them can veto
 * anything except `canClose`.
 */

import { randomUUID } from "node:crypto";

import { Listeners, type DialogService, type Listener, type Unsubscribe } from "@appshell/core";

export interface Workspace {
  readonly id: string;
  readonly title: string;
  readonly isDirty: boolean;
  /** Tag the host uses to pick a view for this workspace. */
  readonly viewType: string;
  /** Asked before closing. Resolve false to keep the workspace open. */
  canClose(): Promise<boolean>;
  onActivated(): Promise<void>;
  onDeactivated(): Promise<void>;
  /** Cleanup after a close was confirmed, before removal. */
  onClosing(): Promise<void>;
}

export type WorkspaceProperty = "title" | "isDirty" | "displayTitle";

/**
 * Observable title and dirty flag plus no-op hooks. Closing is always
 * allowed unless a subclass says otherwise.
 */
export abstract class WorkspaceBase implements Workspace {
  readonly id: string = randomUUID();
  abstract readonly viewType: string;

  private currentTitle: string;
  private dirty = false;
  private readonly changed = new Listeners<WorkspaceProperty>();

  constructor(title = "Untitled") {
    this.currentTitle = title;
  }

  get title(): string {
    return this.currentTitle;
  }

  set title(value: string) {
    if (value === this.currentTitle) return;
    this.currentTitle = value;
    this.changed.emit("title");
    this.changed.emit("displayTitle");
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  /** Title with an unsaved-changes marker: "Report *". */
  get displayTitle(): string {
    return this.dirty ? `${this.currentTitle} *` : this.currentTitle;
  }

  markDirty(): void {
    this.setDirty(true);
  }

  markClean(): void {
    this.setDirty(false);
  }

  onPropertyChanged(listener: Listener<WorkspaceProperty>): Unsubscribe {
    return this.changed.add(listener);
  }

  async canClose(): Promise<boolean> {
    return true;
  }

  async onActivated(): Promise<void> {}

  async onDeactivated(): Promise<void> {}

  async onClosing(): Promise<void> {}

  private setDirty(value: boolean): void {
    if (value === this.dirty) return;
    this.dirty = value;
    this.changed.emit("isDirty");
    this.changed.emit("displayTitle");
  }
}

export interface DocumentWorkspaceOptions {
  title?: string;
  /** Default: "document". */
  viewType?: string;
  dialogs: DialogService;
}

/**
 * A workspace backed by a document. Closing it with unsaved changes asks
 * the user first.
 */
export class DocumentWorkspace extends WorkspaceBase {
  readonly viewType: string;
  private readonly dialogs: DialogService;

  constructor(options: DocumentWorkspaceOptions) {
    super(options.title);
    this.viewType = options.viewType ?? "document";
    this.dialogs = options.dialogs;
  }

  override async canClose(): Promise<boolean> {
    if (!this.isDirty) return true;
    return this.dialogs.showConfirmClose(this.title);
  }
}
