/**
 * Output filtering for multi-monitor setups, where each bar shows only its own output's
 * windows.
 */

import type { OutputFilter, Snapshot } from "../models.ts";

export const ALL_OUTPUTS: OutputFilter = { kind: "all" };

export function parseOutputFilter(output?: string): OutputFilter {
  return output ? { kind: "only", output } : ALL_OUTPUTS;
}

export function shouldShow(filter: OutputFilter, output: string | null): boolean {
  switch (filter.kind) {
    case "all":
      return true;
    case "only":
      return output === filter.output;
  }
}

/**
 * Drop the windows and workspaces the filter hides
 */
export function filterSnapshot(snapshot: Snapshot, filter: OutputFilter): Snapshot {
  if (filter.kind === "all") {
    return snapshot;
  }
  return {
    windows: snapshot.windows.filter((window) => shouldShow(filter, window.output)),
    workspaces: snapshot.workspaces.filter((workspace) => shouldShow(filter, workspace.output)),
  };
}
