/**
 * Logger Utility
 *
 * Leveled stderr logging shared by the workers and the CLI.
 */

import * as ansi from "../ui/ansi.ts";

/**
 * Global logging configuration
 */
let verboseEnabled = false;
let debugEnabled = false;

/**
 * Enable verbose logging
 */
export function enableVerbose(): void {
  verboseEnabled = true;
}

/**
 * Enable debug logging (includes verbose)
 */
export function enableDebug(): void {
  debugEnabled = true;
  verboseEnabled = true; // Debug implies verbose
}

/**
 * Log verbose message
 */
export function verbose(message: string, ...args: unknown[]): void {
  if (verboseEnabled) {
    console.error(`${ansi.dim("[VERBOSE]")} ${message}`, ...args);
  }
}

/**
 * Log debug message
 */
export function debug(message: string, ...args: unknown[]): void {
  if (debugEnabled) {
    console.error(`${ansi.cyan("[DEBUG]")} ${message}`, ...args);
  }
}

/**
 * Log info message (always shown)
 */
export function info(message: string, ...args: unknown[]): void {
  console.error(`${ansi.green("[INFO]")} ${message}`, ...args);
}

/**
 * Log error message (always shown)
 */
export function error(message: string, ...args: unknown[]): void {
  console.error(`${ansi.red("[ERROR]")} ${message}`, ...args);
}

/**
 * Log warning message (always shown)
 */
export function warn(message: string, ...args: unknown[]): void {
  console.error(`${ansi.yellow("[WARN]")} ${message}`, ...args);
}

/**
 * Log JSON object for debugging
 */
export function debugJson(label: string, obj: unknown): void {
  if (debugEnabled) {
    console.error(`${ansi.cyan("[DEBUG]")} ${label}:`);
    console.error(JSON.stringify(obj, null, 2));
  }
}

/**
 * Log compositor request/reply traffic
 */
export function debugIpc(direction: "request" | "reply", payload: unknown): void {
  if (debugEnabled) {
    console.error(`${ansi.cyan("[DEBUG]")} IPC ${direction}: ${JSON.stringify(payload)}`);
  }
}

/**
 * Log socket connection details
 */
export function debugSocket(message: string, path?: string): void {
  if (debugEnabled) {
    console.error(`${ansi.cyan("[DEBUG]")} Socket: ${message}`);
    if (path) {
      console.error(`  Path: ${path}`);
    }
  }
}
