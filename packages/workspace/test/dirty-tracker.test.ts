import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ProjectDirtyTracker } from "../src/dirty-tracker.js";
import { WorkspaceBase } from "../src/workspace.js";

class Sheet extends WorkspaceBase {
  readonly viewType = "sheet";
}

function setup() {
  const tracker = new ProjectDirtyTracker();
  const changes: boolean[] = [];
  tracker.onChange((dirty) => changes.push(dirty));
  return { tracker, changes };
}

describe("ProjectDirtyTracker", () => {
  it("notifies only when the aggregate state flips", () => {
    const { tracker, changes } = setup();

    tracker.markWorkspaceDirty("a");
    tracker.markWorkspaceDirty("b");
    tracker.markDirty();
    assert.equal(tracker.isDirty, true);

    tracker.markClean();
    tracker.markClean();

    assert.equal(tracker.isDirty, false);
    assert.deepEqual(changes, [true, false]);
  });

  it("stays dirty until every workspace is clean", () => {
    const { tracker, changes } = setup();
    tracker.markWorkspaceDirty("a");
    tracker.markWorkspaceDirty("b");

    tracker.markWorkspaceClean("a");
    assert.equal(tracker.isDirty, true);
    assert.equal(tracker.isWorkspaceDirty("a"), false);

    tracker.removeWorkspace("b");
    assert.equal(tracker.isDirty, false);
    assert.deepEqual(changes, [true, false]);
  });

  it("keeps the global flag independent of workspace flags", () => {
    const { tracker } = setup();
    tracker.markDirty();
    tracker.markWorkspaceDirty("a");
    tracker.markWorkspaceClean("a");
    assert.equal(tracker.isDirty, true);
  });

  it("ignores cleaning an unknown workspace", () => {
    const { tracker, changes } = setup();
    tracker.markWorkspaceClean("ghost");
    assert.equal(tracker.isWorkspaceDirty("ghost"), false);
    assert.deepEqual(changes, []);
  });

  it("mirrors a tracked workspace until unsubscribed", () => {
    const { tracker, changes } = setup();
    const sheet = new Sheet("Budget");
    const stop = tracker.track(sheet);

    sheet.markDirty();
    assert.equal(tracker.isWorkspaceDirty(sheet.id), true);
    sheet.markClean();
    assert.equal(tracker.isDirty, false);

    stop();
    sheet.markDirty();
    assert.equal(tracker.isDirty, false);
    assert.deepEqual(changes, [true, false]);
  });
});
