import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { Navigator, NavigatorItem, type SelectionChange } from "../src/navigation.js";

function sampleTree(): Navigator<string> {
  return new Navigator<string>([
    NavigatorItem.createGroup("Data", [
      new NavigatorItem({ title: "Sales", viewType: "table", tag: "sales" }),
      new NavigatorItem({ title: "Costs", viewType: "table", tag: "costs" }),
    ]),
    new NavigatorItem({ title: "Reports", iconKey: "chart", viewType: "report" }),
  ]);
}

describe("NavigatorItem", () => {
  it("defaults to expanded and unselected", () => {
    const item = new NavigatorItem({ title: "Leaf" });
    assert.equal(item.isExpanded, true);
    assert.equal(item.isSelected, false);
    assert.equal(item.isLeaf, true);
    assert.equal(item.hasChildren, false);
  });

  it("creates groups with a folder icon", () => {
    const group = NavigatorItem.createGroup("Data", [new NavigatorItem({ title: "Sales" })]);
    assert.equal(group.iconKey, "folder");
    assert.equal(group.hasChildren, true);
    assert.equal(group.viewType, undefined);
  });
});

describe("Navigator", () => {
  it("finds items by title path", () => {
    const nav = sampleTree();
    assert.equal(nav.find(["Data", "Costs"])?.tag, "costs");
    assert.equal(nav.find(["Reports"])?.iconKey, "chart");
    assert.equal(nav.find(["Data", "Missing"]), undefined);
  });

  it("keeps a single selection and notifies changes", () => {
    const nav = sampleTree();
    const changes: SelectionChange<string>[] = [];
    nav.onSelectionChanged((change) => changes.push(change));

    const sales = nav.find(["Data", "Sales"]);
    const reports = nav.find(["Reports"]);
    assert.ok(sales && reports);

    assert.equal(nav.select(sales), true);
    assert.equal(nav.select(sales), false);
    assert.equal(nav.select(reports), true);

    assert.equal(sales.isSelected, false);
    assert.equal(reports.isSelected, true);
    assert.equal(nav.selected, reports);
    assert.deepEqual(
      changes.map((c) => [c.previous?.title ?? null, c.current?.title ?? null]),
      [
        [null, "Sales"],
        ["Sales", "Reports"],
      ],
    );
  });

  it("rejects items from another tree", () => {
    const nav = sampleTree();
    assert.throws(() => nav.select(new NavigatorItem({ title: "Stray" })), /not part of this navigator/);
  });

  it("collapses and expands every item", () => {
    const nav = sampleTree();
    nav.collapseAll();
    assert.equal(nav.find(["Data"])?.isExpanded, false);
    nav.expandAll();
    assert.equal(nav.find(["Data"])?.isExpanded, true);
  });
});
