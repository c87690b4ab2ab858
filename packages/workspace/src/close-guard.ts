/**
 * Window close guard.
 *
 * The host forwards its window's "closing" event here. The guard cancels
 * the event, asks the check, and closes the window itself once the check
 * approves. It disarms before closing so that second close goes through.
 */

import type { Workspace } from "./workspace.js";
import type { WorkspaceRegistry } from "./registry.js";

/** The host's cancellable close event. */
export interface CloseRequest {
  cancel: boolean;
}

export interface CloseGuardOptions {
  /** Resolves true when the window may close. */
  canClose: () => Promise<boolean>;
  /** Closes the window for real. */
  close: () => void;
}

export class CloseGuard {
  private armed = true;
  private inFlight: Promise<boolean> | null = null;

  constructor(private readonly options: CloseGuardOptions) {}

  get isArmed(): boolean {
    return this.armed;
  }

  arm(): void {
    this.armed = true;
  }

  disarm(): void {
    this.armed = false;
  }

  /**
   * Handle a close request. Resolves true when the window was (or may be)
   * closed, false when the check declined. Requests that arrive while a
   * check is pending are cancelled and share its result.
   */
  handleClosing(request: CloseRequest): Promise<boolean> {
    if (!this.armed) return Promise.resolve(true);

    request.cancel = true;
    if (this.inFlight) return this.inFlight;

    this.inFlight = this.check().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async check(): Promise<boolean> {
    const ok = await this.options.canClose();
    if (ok) {
      this.armed = false;
      this.options.close();
    }
    return ok;
  }
}

export function createCloseGuard(options: CloseGuardOptions): CloseGuard {
  return new CloseGuard(options);
}

/** Close check that closes every workspace, stopping at the first refusal. */
export function registryCloseCheck<W extends Workspace>(
  registry: WorkspaceRegistry<W>,
): () => Promise<boolean> {
  return () => registry.closeAll();
}
