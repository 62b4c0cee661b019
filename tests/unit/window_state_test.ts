/**
 * Window State Machine Tests
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import type { CompositorEvent, NiriWindow, Workspace } from "../../src/models.ts";
import { snapshots } from "../../src/services/window-stream.ts";
import { WindowSet } from "../../src/services/window-state.ts";
import { makeWindow, makeWorkspace } from "../fixtures/builders.ts";

function windowsChanged(windows: NiriWindow[]): CompositorEvent {
  return { type: "windows-changed", windows };
}

function workspacesChanged(workspaces: Workspace[]): CompositorEvent {
  return { type: "workspaces-changed", workspaces };
}

function readySet(windows: NiriWindow[], workspaces: Workspace[] = [makeWorkspace({ id: 1 })]): WindowSet {
  const set = new WindowSet();
  set.apply(workspacesChanged(workspaces));
  set.apply(windowsChanged(windows));
  return set;
}

test("WindowSet - windows first, then workspaces, becomes ready on the second list", () => {
  const set = new WindowSet();

  assert.equal(set.apply(windowsChanged([makeWindow({ id: 1 })])), null);
  assert.equal(set.stateName, "windows-only");

  const snapshot = set.apply(workspacesChanged([makeWorkspace({ id: 1 })]));
  assert.equal(set.stateName, "ready");
  assert.deepEqual(snapshot?.windows.map((w) => w.id), [1]);
});

test("WindowSet - workspaces first, then windows, becomes ready on the second list", () => {
  const set = new WindowSet();

  assert.equal(set.apply(workspacesChanged([makeWorkspace({ id: 1 })])), null);
  assert.equal(set.stateName, "workspaces-only");

  const snapshot = set.apply(windowsChanged([makeWindow({ id: 1 })]));
  assert.equal(set.isReady, true);
  assert.deepEqual(snapshot?.windows.map((w) => w.id), [1]);
});

test("WindowSet - repeated list of the same kind stays buffered and replaces the first", () => {
  const set = new WindowSet();

  assert.equal(set.apply(windowsChanged([makeWindow({ id: 1 })])), null);
  assert.equal(set.apply(windowsChanged([makeWindow({ id: 2 })])), null);
  assert.equal(set.stateName, "windows-only");

  const snapshot = set.apply(workspacesChanged([makeWorkspace({ id: 1 })]));
  assert.deepEqual(snapshot?.windows.map((w) => w.id), [2]);
});

test("WindowSet - incremental events before ready are ignored", () => {
  const set = new WindowSet();

  assert.equal(set.apply({ type: "window-closed", id: 1 }), null);
  assert.equal(set.apply({ type: "window-focus-changed", id: 1 }), null);
  assert.equal(set.apply({ type: "workspace-activated", id: 1, focused: true }), null);
  assert.equal(set.stateName, "uninitialized");
});

test("WindowSet - ignored events leave the state unchanged", () => {
  const set = new WindowSet();
  assert.equal(set.apply({ type: "ignored", name: "KeyboardLayoutsChanged" }), null);
  assert.equal(set.stateName, "uninitialized");

  const ready = readySet([makeWindow({ id: 1 })]);
  const snapshot = ready.apply({ type: "ignored", name: "OverviewOpenedOrClosed" });
  assert.deepEqual(snapshot?.windows.map((w) => w.id), [1]);
});

test("WindowSet - windows without a known, placed workspace are left out of snapshots", () => {
  const set = new WindowSet();
  set.apply(workspacesChanged([
    makeWorkspace({ id: 1, output: "DP-1" }),
    makeWorkspace({ id: 2, output: null }),
  ]));

  const snapshot = set.apply(windowsChanged([
    makeWindow({ id: 1, workspace_id: 1 }),
    makeWindow({ id: 2, workspace_id: null }),
    makeWindow({ id: 3, workspace_id: 99 }),
    makeWindow({ id: 4, workspace_id: 2 }),
  ]));

  assert.deepEqual(snapshot?.windows.map((w) => w.id), [1]);
  assert.equal(snapshot?.windows[0].output, "DP-1");
  assert.equal(snapshot?.workspaces.length, 2);
  for (const window of snapshot?.windows ?? []) {
    assert.ok(window.output.length > 0);
  }
});

test("WindowSet - snapshots are ordered by id", () => {
  const set = readySet(
    [makeWindow({ id: 30 }), makeWindow({ id: 10 }), makeWindow({ id: 20 })],
  );

  const snapshot = set.apply(workspacesChanged([makeWorkspace({ id: 2 }), makeWorkspace({ id: 1 })]));

  assert.deepEqual(snapshot?.windows.map((w) => w.id), [10, 20, 30]);
  assert.deepEqual(snapshot?.workspaces.map((w) => w.id), [1, 2]);
});

test("WindowSet - identical full window list twice yields identical snapshots", () => {
  const windows = [makeWindow({ id: 1, pid: 100 }), makeWindow({ id: 2, pid: 200 })];
  const set = readySet(windows);

  const first = set.apply(windowsChanged(windows));
  const second = set.apply(windowsChanged(windows));

  assert.deepEqual(first, second);
});

test("WindowSet - full window list in ready replaces the window map wholesale", () => {
  const set = readySet([makeWindow({ id: 1 }), makeWindow({ id: 2 })]);

  const snapshot = set.apply(windowsChanged([makeWindow({ id: 3 })]));

  assert.deepEqual(snapshot?.windows.map((w) => w.id), [3]);
});

test("WindowSet - full workspace list in ready re-attributes outputs", () => {
  const set = readySet([makeWindow({ id: 1, workspace_id: 1 })]);

  const snapshot = set.apply(workspacesChanged([makeWorkspace({ id: 1, output: "HDMI-A-1" })]));

  assert.equal(snapshot?.windows[0].output, "HDMI-A-1");
});

test("WindowSet - window closed removes it", () => {
  const set = readySet([makeWindow({ id: 1 }), makeWindow({ id: 2 })]);

  const snapshot = set.apply({ type: "window-closed", id: 1 });

  assert.deepEqual(snapshot?.windows.map((w) => w.id), [2]);
});

test("WindowSet - opened focused window takes focus from the others", () => {
  const set = readySet([makeWindow({ id: 1, is_focused: true }), makeWindow({ id: 2 })]);

  const snapshot = set.apply({
    type: "window-opened-or-changed",
    window: makeWindow({ id: 3, is_focused: true }),
  });

  assert.deepEqual(
    snapshot?.windows.map((w) => [w.id, w.is_focused]),
    [[1, false], [2, false], [3, true]],
  );
});

test("WindowSet - changed unfocused window keeps the current focus", () => {
  const set = readySet([makeWindow({ id: 1, is_focused: true }), makeWindow({ id: 2 })]);

  const snapshot = set.apply({
    type: "window-opened-or-changed",
    window: makeWindow({ id: 2, title: "Renamed" }),
  });

  assert.deepEqual(
    snapshot?.windows.map((w) => [w.id, w.is_focused, w.title]),
    [[1, true, "Window 1"], [2, false, "Renamed"]],
  );
});

test("WindowSet - focus change leaves exactly the matching window focused", () => {
  const set = readySet([
    makeWindow({ id: 1, is_focused: true }),
    makeWindow({ id: 2 }),
    makeWindow({ id: 3 }),
  ]);

  const snapshot = set.apply({ type: "window-focus-changed", id: 3 });

  assert.deepEqual(snapshot?.windows.filter((w) => w.is_focused).map((w) => w.id), [3]);
});

test("WindowSet - focus change to no window clears every focus flag", () => {
  const set = readySet([makeWindow({ id: 1, is_focused: true }), makeWindow({ id: 2 })]);

  const snapshot = set.apply({ type: "window-focus-changed", id: null });

  assert.deepEqual(snapshot?.windows.filter((w) => w.is_focused), []);
});

test("WindowSet - layout changes patch known windows only", () => {
  const set = readySet([makeWindow({ id: 1 })]);

  const snapshot = set.apply({
    type: "window-layouts-changed",
    changes: [
      [1, { pos_in_scrolling_layout: [2, 1] }],
      [42, { pos_in_scrolling_layout: [5, 1] }],
    ],
  });

  assert.deepEqual(snapshot?.windows.map((w) => w.id), [1]);
  assert.deepEqual(snapshot?.windows[0].layout, { pos_in_scrolling_layout: [2, 1] });
});

test("WindowSet - workspace activation moves focus between workspaces", () => {
  const set = readySet([], [
    makeWorkspace({ id: 1, is_focused: true }),
    makeWorkspace({ id: 2 }),
  ]);

  const focused = set.apply({ type: "workspace-activated", id: 2, focused: true });
  assert.deepEqual(focused?.workspaces.map((w) => [w.id, w.is_focused]), [[1, false], [2, true]]);

  // Activation on an unfocused output leaves no workspace focused.
  const unfocused = set.apply({ type: "workspace-activated", id: 1, focused: false });
  assert.deepEqual(unfocused?.workspaces.map((w) => [w.id, w.is_focused]), [[1, false], [2, false]]);
});

test("WindowSet - snapshots are copies that later events do not change", () => {
  const set = readySet([makeWindow({ id: 1, is_focused: true })]);
  const before = set.apply({ type: "ignored", name: "ConfigLoaded" });

  set.apply({ type: "window-focus-changed", id: null });

  assert.equal(before?.windows[0].is_focused, true);
});

test("snapshots - emits only once both lists have arrived", async () => {
  async function* events(): AsyncGenerator<CompositorEvent> {
    yield { type: "window-focus-changed", id: 1 };
    yield windowsChanged([makeWindow({ id: 1 })]);
    yield workspacesChanged([makeWorkspace({ id: 1 })]);
    yield { type: "window-closed", id: 1 };
  }

  const sizes: number[] = [];
  for await (const snapshot of snapshots(events())) {
    sizes.push(snapshot.windows.length);
  }

  assert.deepEqual(sizes, [1, 0]);
});
