/**
 * Builders for compositor and bus test data
 */

import type { Variant } from "dbus-next";
import type {
  BusMethodCall,
  EnrichedNotification,
  NiriWindow,
  Notification,
  Snapshot,
  SnapshotWindow,
  Workspace,
} from "../../src/models.ts";

export function makeWindow(overrides: Partial<NiriWindow> & { id: number }): NiriWindow {
  return {
    title: `Window ${overrides.id}`,
    app_id: "org.example.App",
    pid: null,
    workspace_id: 1,
    is_focused: false,
    is_floating: false,
    is_urgent: false,
    layout: null,
    ...overrides,
  };
}

export function makeWorkspace(overrides: Partial<Workspace> & { id: number }): Workspace {
  return {
    idx: overrides.id,
    name: null,
    output: "DP-1",
    is_urgent: false,
    is_active: true,
    is_focused: false,
    active_window_id: null,
    ...overrides,
  };
}

export function makeSnapshotWindow(
  overrides: Partial<SnapshotWindow> & { id: number },
): SnapshotWindow {
  return { output: "DP-1", ...makeWindow(overrides), ...overrides };
}

export function makeSnapshot(windows: SnapshotWindow[], workspaces?: Workspace[]): Snapshot {
  return { windows, workspaces: workspaces ?? [makeWorkspace({ id: 1 })] };
}

export function makeNotification(overrides: Partial<Notification> = {}): Notification {
  return {
    appName: "Example",
    replacesId: 0,
    appIcon: null,
    summary: "Hello",
    body: null,
    actions: [],
    hints: {},
    expireTimeout: -1,
    ...overrides,
  };
}

export function enriched(
  pid: number | null,
  overrides: Partial<Notification> = {},
): EnrichedNotification {
  return { notification: makeNotification(overrides), pid };
}

export function notifyCall(sender: string, body: unknown[]): BusMethodCall {
  return { sender, body };
}

/**
 * A Notify call body, signature `susssasa{sv}i`
 */
export function notifyBody(summary = "Hello", hints: Record<string, Variant> = {}): unknown[] {
  return ["Example", 0, "", summary, "", [], hints, -1];
}
