/**
 * @appshell/workspace - Tab lifecycle for a desktop shell.
 *
 * ```typescript
 * import { DocumentWorkspace, WorkspaceRegistry } from "@appshell/workspace";
 *
 * const registry = new WorkspaceRegistry({ maxWorkspaces: 5 });
 * await registry.addWorkspace(new DocumentWorkspace({ title: "Q3.csv", dialogs }));
 * if (await registry.closeAll()) app.quit();
 * ```
 *
 * @packageDocumentation
 */

export type { Workspace, WorkspaceProperty, DocumentWorkspaceOptions } from "./workspace.js";
export { WorkspaceBase, DocumentWorkspace } from "./workspace.js";
export type { WorkspaceChange, WorkspaceRegistryOptions, WorkspaceState } from "./registry.js";
export { WorkspaceRegistry, DEFAULT_MAX_WORKSPACES } from "./registry.js";
export { ProjectDirtyTracker } from "./dirty-tracker.js";
export type { CloseGuardOptions, CloseRequest } from "./close-guard.js";
export { CloseGuard, createCloseGuard, registryCloseCheck } from "./close-guard.js";
