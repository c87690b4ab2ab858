/**
 * Minimal typed observer registry.
 *
 * Every notification in appshell (log entry added, workspace changed,
 * dirty state changed, ...) goes through one of these instead of a UI
 * toolkit's event system. Listeners run synchronously, in registration
 * order, on a snapshot of the registrations taken at emit time.
 */

import type { Listener, Unsubscribe } from "./types.js";

export class Listeners<T> {
  private readonly registered = new Set<Listener<T>>();

  /** Register a listener. The same function registered twice runs once. */
  add(listener: Listener<T>): Unsubscribe {
    this.registered.add(listener);
    return () => {
      this.registered.delete(listener);
    };
  }

  emit(value: T): void {
    for (const listener of [...this.registered]) {
      listener(value);
    }
  }

  clear(): void {
    this.registered.clear();
  }

  get size(): number {
    return this.registered.size;
  }
}
