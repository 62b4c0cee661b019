/**
 * Type Definitions for the taskbar core
 *
 * Compositor-side types keep the field names of the niri IPC wire format; types decoded
 * from the message bus and produced for the rendering layer use camelCase.
 */

// ============================================================================
// Compositor Entities
// ============================================================================

/** An (x, y) or (width, height) pair as sent by the compositor */
export type Pair = [number, number];

export interface WindowLayout {
  /** (column, tile-in-column), 1-based; null for floating windows */
  pos_in_scrolling_layout: Pair | null;

  tile_size?: Pair;
  window_size?: Pair;
  tile_pos_in_workspace_view?: Pair | null;
  window_offset_in_tile?: Pair;
}

export interface NiriWindow {
  /** Stable window id; never reused while the window lives */
  id: number;

  title: string | null;

  /** Wayland app id, e.g. "org.gnome.Nautilus" */
  app_id: string | null;

  pid: number | null;

  workspace_id: number | null;

  is_focused: boolean;
  is_floating: boolean;
  is_urgent: boolean;

  layout: WindowLayout | null;
}

export interface Workspace {
  id: number;

  /** Position of the workspace on its output, 1-based */
  idx: number;

  name: string | null;

  /** Output (monitor) name, e.g. "eDP-1" */
  output: string | null;

  is_urgent: boolean;
  is_active: boolean;
  is_focused: boolean;
  active_window_id: number | null;
}

/**
 * A decoded compositor event. Events this core does not track decode to `ignored`.
 */
export type CompositorEvent =
  | { type: "windows-changed"; windows: NiriWindow[] }
  | { type: "workspaces-changed"; workspaces: Workspace[] }
  | { type: "window-closed"; id: number }
  | { type: "window-opened-or-changed"; window: NiriWindow }
  | { type: "window-focus-changed"; id: number | null }
  | { type: "window-layouts-changed"; changes: Array<[number, WindowLayout]> }
  | { type: "workspace-activated"; id: number; focused: boolean }
  | { type: "ignored"; name: string };

export type CompositorRequest =
  | "EventStream"
  | { Action: { FocusWindow: { id: number } } };

export type CompositorReply =
  | { ok: true; response: unknown }
  | { ok: false; error: string };

// ============================================================================
// Snapshots
// ============================================================================

/** A window placed on an output through its workspace */
export interface SnapshotWindow extends NiriWindow {
  output: string;
}

/**
 * Complete window and workspace view at one point in the event stream, ordered by id.
 * Consumers get their own copy.
 */
export interface Snapshot {
  readonly windows: readonly Readonly<SnapshotWindow>[];
  readonly workspaces: readonly Readonly<Workspace>[];
}

// ============================================================================
// Notifications
// ============================================================================

export interface NotificationAction {
  readonly id: string;
  readonly label: string;
}

/** Well-known hints of the desktop notifications specification */
export interface NotificationHints {
  readonly actionIcons?: boolean;
  readonly category?: string;
  readonly desktopEntry?: string;
  readonly imagePath?: string;
  readonly resident?: boolean;
  readonly soundFile?: string;
  readonly soundName?: string;
  readonly suppressSound?: boolean;
  readonly transient?: boolean;
  readonly senderPid?: number;
  readonly urgency?: number;
  readonly x?: number;
  readonly y?: number;
}

export interface Notification {
  readonly appName: string | null;
  readonly replacesId: number;
  readonly appIcon: string | null;
  readonly summary: string;
  readonly body: string | null;
  readonly actions: readonly NotificationAction[];
  readonly hints: NotificationHints;
  /** Milliseconds; -1 lets the server decide, 0 never expires */
  readonly expireTimeout: number;
}

/** A notification plus the pid of the bus peer that sent it, when that could be resolved */
export interface EnrichedNotification {
  readonly notification: Notification;
  readonly pid: number | null;
}

// ============================================================================
// Message Bus
// ============================================================================

/** A method call observed on the bus by a monitor */
export interface BusMethodCall {
  /** Unique name of the calling peer, e.g. ":1.42" */
  sender: string;
  body: unknown[];
}

/** `NameOwnerChanged` arguments; empty owners are reported as null */
export interface NameOwnerChange {
  name: string;
  oldOwner: string | null;
  newOwner: string | null;
}

// ============================================================================
// Rendering Layer Interface
// ============================================================================

export type TaskbarEvent =
  | { type: "snapshot"; snapshot: Snapshot }
  | { type: "urgency"; windowId: number; urgent: boolean };

export type TaskbarEventHandler = (event: TaskbarEvent) => void;

export interface Subscription {
  id: string;
  unsubscribe: () => void;
}

/** Which output's windows the rendering layer shows */
export type OutputFilter =
  | { kind: "all" }
  | { kind: "only"; output: string };

// ============================================================================
// CLI
// ============================================================================

/** Global flags every command receives */
export interface GlobalOptions {
  verbose?: boolean;
  debug?: boolean;
  /** Explicit configuration file path */
  config?: string;
}
