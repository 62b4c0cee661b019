/**
 * taskbar-core - Public API Exports
 *
 * The core a taskbar widget renders from, plus the pieces it is built out of.
 */

// Export types
export type * from "./src/models.ts";

// Export validation schemas
export * from "./src/validation.ts";

// Export core services
export { Config, getDefaultConfigPath, loadConfig } from "./src/services/config.ts";
export { ConnectionCache, PeerCache } from "./src/services/connection-cache.ts";
export type { ConnectionCacheOptions, PeerDirectory } from "./src/services/connection-cache.ts";
export { correlate, fuzzyAppIdMatch, matchByAncestry, matchByDesktopEntry } from "./src/services/correlator.ts";
export type { Correlation, CorrelationRule, CorrelatorSettings } from "./src/services/correlator.ts";
export { SessionBusDirectory, SessionBusMonitor } from "./src/services/dbus.ts";
export { NiriClient } from "./src/services/niri-client.ts";
export type { CompositorEventSource } from "./src/services/niri-client.ts";
export { decodeNotification, enrichNotifications } from "./src/services/notifications.ts";
export type { NotificationSource, PeerResolver } from "./src/services/notifications.ts";
export { filterSnapshot, parseOutputFilter, shouldShow } from "./src/services/output-filter.ts";
export { parseParentPid, ProcStatAncestry } from "./src/services/process.ts";
export type { ProcessAncestry } from "./src/services/process.ts";
export { createTaskbar, Taskbar } from "./src/services/taskbar.ts";
export type { CompositorControl, TaskbarDependencies } from "./src/services/taskbar.ts";
export { WindowSet } from "./src/services/window-state.ts";
export { snapshots, WindowStream } from "./src/services/window-stream.ts";

// Export utilities
export * from "./src/utils/channel.ts";
export * from "./src/utils/errors.ts";
export * from "./src/utils/socket.ts";

// Export UI utilities
export * from "./src/ui/ansi.ts";
export * from "./src/ui/format.ts";
