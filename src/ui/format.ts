/**
 * Human-readable rendering of snapshots and taskbar events
 */

import type { Snapshot, SnapshotWindow, TaskbarEvent } from "../models.ts";
import { bold, cyan, dim, gray, green, yellow } from "./ansi.ts";

function label(text: string | null, fallback: string): string {
  return text && text.length > 0 ? text : fallback;
}

/**
 * One line per window: focus marker, id, app id and title
 */
export function formatWindow(window: Readonly<SnapshotWindow>): string {
  const marker = window.is_focused ? green("●") : " ";
  const flags = [
    window.is_floating ? "floating" : null,
    window.is_urgent ? "urgent" : null,
  ].filter((flag): flag is string => flag !== null);

  const parts = [
    `${marker} ${cyan(String(window.id).padStart(4))}`,
    bold(label(window.app_id, "(no app id)")),
  ];
  if (window.title) {
    parts.push(window.title);
  }
  if (flags.length > 0) {
    parts.push(yellow(`[${flags.join(", ")}]`));
  }
  return parts.join("  ");
}

/**
 * Windows grouped under their output and workspace
 */
export function formatSnapshot(snapshot: Snapshot): string {
  const lines: string[] = [];

  for (const workspace of snapshot.workspaces) {
    const windows = snapshot.windows.filter((window) => window.workspace_id === workspace.id);
    const name = workspace.name ? ` ${workspace.name}` : "";
    const active = workspace.is_focused ? green(" (focused)") : workspace.is_active ? dim(" (active)") : "";

    lines.push(`${bold(label(workspace.output, "(no output)"))} ${gray(`workspace ${workspace.idx}`)}${name}${active}`);
    for (const window of windows) {
      lines.push(`  ${formatWindow(window)}`);
    }
  }

  if (snapshot.windows.length === 0) {
    lines.push(dim("No windows"));
  }

  return lines.join("\n");
}

/**
 * One-line summary of a taskbar event
 */
export function formatTaskbarEvent(event: TaskbarEvent): string {
  switch (event.type) {
    case "snapshot": {
      const focused = event.snapshot.windows.find((window) => window.is_focused);
      return (
        `${cyan("snapshot")} ${event.snapshot.windows.length} windows, ` +
        `${event.snapshot.workspaces.length} workspaces` +
        (focused ? `, focused ${focused.id}` : "")
      );
    }
    case "urgency":
      return `${yellow("urgency")} window ${event.windowId} ${event.urgent ? "marked urgent" : "cleared"}`;
  }
}
