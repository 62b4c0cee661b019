/**
 * Window state machine
 *
 * Rebuilds the compositor's window and workspace state from its event stream. The stream
 * starts with one full window list and one full workspace list, in either order, before
 * any incremental event; nothing is emitted until both have been seen.
 */

import type {
  CompositorEvent,
  NiriWindow,
  Snapshot,
  SnapshotWindow,
  WindowLayout,
  Workspace,
} from "../models.ts";
import * as logger from "../utils/logger.ts";

export type WindowSetState =
  | { kind: "uninitialized" }
  | { kind: "windows-only"; windows: NiriWindow[] }
  | { kind: "workspaces-only"; workspaces: Workspace[] }
  | { kind: "ready"; windows: Map<number, NiriWindow>; workspaces: Map<number, Workspace> };

/**
 * The toplevel window set, updated one compositor event at a time
 */
export class WindowSet {
  #state: WindowSetState = { kind: "uninitialized" };

  /** Current state name, for logging */
  get stateName(): WindowSetState["kind"] {
    return this.#state.kind;
  }

  get isReady(): boolean {
    return this.#state.kind === "ready";
  }

  /**
   * Apply one event.
   *
   * @returns a fresh snapshot whenever the set is ready after the event, otherwise null
   */
  apply(event: CompositorEvent): Snapshot | null {
    const state = this.#state;

    switch (event.type) {
      case "windows-changed":
        if (state.kind === "workspaces-only") {
          this.#state = ready(event.windows, state.workspaces);
        } else if (state.kind === "ready") {
          state.windows = byId(event.windows);
        } else {
          this.#state = { kind: "windows-only", windows: event.windows };
        }
        break;

      case "workspaces-changed":
        if (state.kind === "windows-only") {
          this.#state = ready(state.windows, event.workspaces);
        } else if (state.kind === "ready") {
          state.workspaces = byId(event.workspaces);
        } else {
          this.#state = { kind: "workspaces-only", workspaces: event.workspaces };
        }
        break;

      case "window-closed":
        if (state.kind === "ready") {
          state.windows.delete(event.id);
        } else {
          this.unexpected(event);
        }
        break;

      case "window-opened-or-changed":
        if (state.kind === "ready") {
          upsertWindow(state.windows, event.window);
        } else {
          this.unexpected(event);
        }
        break;

      case "window-focus-changed":
        if (state.kind === "ready") {
          for (const window of state.windows.values()) {
            window.is_focused = window.id === event.id;
          }
        } else {
          this.unexpected(event);
        }
        break;

      case "window-layouts-changed":
        if (state.kind === "ready") {
          for (const [id, layout] of event.changes) {
            updateLayout(state.windows, id, layout);
          }
        } else {
          this.unexpected(event);
        }
        break;

      case "workspace-activated":
        if (state.kind === "ready") {
          for (const workspace of state.workspaces.values()) {
            workspace.is_focused = event.focused && workspace.id === event.id;
          }
        } else {
          this.unexpected(event);
        }
        break;

      case "ignored":
        break;
    }

    return this.#state.kind === "ready" ? snapshot(this.#state.windows, this.#state.workspaces) : null;
  }

  private unexpected(event: CompositorEvent): void {
    logger.warn(`Unexpected ${event.type} event while ${this.#state.kind}`);
  }
}

function byId<T extends { id: number }>(items: T[]): Map<number, T> {
  return new Map(items.map((item) => [item.id, { ...item }]));
}

function ready(windows: NiriWindow[], workspaces: Workspace[]): WindowSetState {
  return { kind: "ready", windows: byId(windows), workspaces: byId(workspaces) };
}

function upsertWindow(windows: Map<number, NiriWindow>, window: NiriWindow): void {
  // A newly focused window takes focus from every other window.
  if (window.is_focused) {
    for (const other of windows.values()) {
      other.is_focused = false;
    }
  }
  windows.set(window.id, { ...window });
}

function updateLayout(windows: Map<number, NiriWindow>, id: number, layout: WindowLayout): void {
  const window = windows.get(id);
  if (window) {
    window.layout = layout;
  }
}

/**
 * Copy the current state into a snapshot ordered by id.
 *
 * Windows whose workspace is unset, unknown, or not on an output are left out: they cannot
 * be placed on a taskbar yet.
 */
function snapshot(windows: Map<number, NiriWindow>, workspaces: Map<number, Workspace>): Snapshot {
  const placed: SnapshotWindow[] = [];

  for (const window of sortById(windows)) {
    if (window.workspace_id === null) {
      continue;
    }
    const output = workspaces.get(window.workspace_id)?.output;
    if (!output) {
      continue;
    }
    placed.push({ ...structuredClone(window), output });
  }

  return {
    windows: placed,
    workspaces: sortById(workspaces).map((workspace) => structuredClone(workspace)),
  };
}

function sortById<T extends { id: number }>(items: Map<number, T>): T[] {
  return [...items.values()].sort((a, b) => a.id - b.id);
}
