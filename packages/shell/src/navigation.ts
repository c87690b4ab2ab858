/**
 * Navigation tree shown beside the workspace tabs.
 */

import { Listeners, type Listener, type Unsubscribe } from "@appshell/core";

export interface NavigatorItemInit<T = unknown> {
  title: string;
  iconKey?: string;
  /** Which view the host opens when the item is chosen. */
  viewType?: string;
  tag?: T;
  children?: NavigatorItem<T>[];
  isExpanded?: boolean;
}

export class NavigatorItem<T = unknown> {
  title: string;
  iconKey: string | undefined;
  viewType: string | undefined;
  tag: T | undefined;
  isExpanded: boolean;
  isSelected = false;
  readonly children: NavigatorItem<T>[];

  constructor(init: NavigatorItemInit<T>) {
    this.title = init.title;
    this.iconKey = init.iconKey;
    this.viewType = init.viewType;
    this.tag = init.tag;
    this.children = init.children ? [...init.children] : [];
    this.isExpanded = init.isExpanded ?? true;
  }

  get hasChildren(): boolean {
    return this.children.length > 0;
  }

  get isLeaf(): boolean {
    return this.children.length === 0;
  }

  /** A group node: a folder icon, no view of its own. */
  static createGroup<T = unknown>(
    title: string,
    children: NavigatorItem<T>[],
    iconKey = "folder",
  ): NavigatorItem<T> {
    return new NavigatorItem<T>({ title, iconKey, children });
  }
}

export interface SelectionChange<T = unknown> {
  previous: NavigatorItem<T> | null;
  current: NavigatorItem<T> | null;
}

/** Depth-first, pre-order. */
export function* walkItems<T>(items: readonly NavigatorItem<T>[]): Generator<NavigatorItem<T>> {
  for (const item of items) {
    yield item;
    yield* walkItems(item.children);
  }
}

/**
 * Owns the root items and keeps at most one of them selected.
 */
export class Navigator<T = unknown> {
  readonly items: NavigatorItem<T>[];
  private selectedItem: NavigatorItem<T> | null = null;
  private readonly listeners = new Listeners<SelectionChange<T>>();

  constructor(items: NavigatorItem<T>[] = []) {
    this.items = items;
  }

  get selected(): NavigatorItem<T> | null {
    return this.selectedItem;
  }

  /**
   * Select an item (or clear with null). Items outside this tree are
   * rejected. Returns whether the selection changed.
   */
  select(item: NavigatorItem<T> | null): boolean {
    if (item === this.selectedItem) return false;
    if (item && !this.contains(item)) {
      throw new Error(`Item "${item.title}" is not part of this navigator`);
    }

    const previous = this.selectedItem;
    if (previous) previous.isSelected = false;
    if (item) item.isSelected = true;
    this.selectedItem = item;

    this.listeners.emit({ previous, current: item });
    return true;
  }

  onSelectionChanged(listener: Listener<SelectionChange<T>>): Unsubscribe {
    return this.listeners.add(listener);
  }

  /** Look up an item by its title path from the root, e.g. ["Data", "Sales"]. */
  find(path: readonly string[]): NavigatorItem<T> | undefined {
    let level: readonly NavigatorItem<T>[] = this.items;
    let found: NavigatorItem<T> | undefined;
    for (const title of path) {
      found = level.find((item) => item.title === title);
      if (!found) return undefined;
      level = found.children;
    }
    return found;
  }

  contains(item: NavigatorItem<T>): boolean {
    for (const candidate of walkItems(this.items)) {
      if (candidate === item) return true;
    }
    return false;
  }

  expandAll(): void {
    for (const item of walkItems(this.items)) item.isExpanded = true;
  }

  collapseAll(): void {
    for (const item of walkItems(this.items)) item.isExpanded = false;
  }
}
