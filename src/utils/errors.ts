/**
 * Error Types and Formatting
 *
 * Transport failures end the worker that owns the connection, protocol errors go back to
 * the caller, lookup failures only stop an ancestry walk, and a closed channel tells a
 * worker to shut down.
 */

import { getSocketPath, SOCKET_ENV_VAR } from "./socket.ts";

/**
 * Socket or bus connect/read failure
 */
export class TransportError extends Error {
  constructor(message: string, public override cause?: Error) {
    super(message);
    this.name = "TransportError";
  }
}

/**
 * The compositor answered with a different response variant than the request expects
 */
export class ProtocolError extends Error {
  constructor(public expected: string, public reply: unknown) {
    super(`unexpected compositor response; expected ${expected}: ${JSON.stringify(reply)}`);
    this.name = "ProtocolError";
  }
}

/**
 * The compositor answered with an explicit `Err` reply
 */
export class CompositorReplyError extends Error {
  constructor(message: string) {
    super(`compositor reply: ${message}`);
    this.name = "CompositorReplyError";
  }
}

export type ProcessLookupErrorKind = "NotFound" | "Unreadable" | "Malformed" | "InvalidNumber";

/**
 * A process descriptor could not be used to find a parent pid
 */
export class ProcessLookupError extends Error {
  constructor(
    public kind: ProcessLookupErrorKind,
    public pid: number,
    public path: string,
    detail: string,
    public override cause?: Error,
  ) {
    super(`${path}: ${detail}`);
    this.name = "ProcessLookupError";
  }
}

/**
 * A value was sent to, or awaited from, a channel that has been closed
 */
export class ChannelClosedError extends Error {
  constructor(message = "channel closed") {
    super(message);
    this.name = "ChannelClosedError";
  }
}

/**
 * Configuration file could not be loaded
 */
export class ConfigError extends Error {
  constructor(message: string, public path: string, public override cause?: Error) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Format error for a missing compositor socket variable
 */
export function formatSocketUnsetError(): string {
  return (
    `Error: Compositor socket not configured\n` +
    `\n` +
    `The ${SOCKET_ENV_VAR} environment variable is not set.\n` +
    `Run this command from inside a niri session, or export the socket path:\n` +
    `  export ${SOCKET_ENV_VAR}=/run/user/$UID/niri.wayland-1.sock`
  );
}

/**
 * Format error for a compositor connection failure
 */
export function formatCompositorUnavailableError(socketPath: string, reason: string): string {
  return (
    `Error: Failed to talk to the compositor\n` +
    `\n` +
    `Socket path: ${socketPath}\n` +
    `Reason: ${reason}\n` +
    `\n` +
    `Check that niri is running and that the socket belongs to this session:\n` +
    `  ls -l ${socketPath}`
  );
}

/**
 * Format error for an invalid configuration file
 */
export function formatConfigError(err: ConfigError): string {
  return (
    `Error: Invalid configuration\n` +
    `\n` +
    `Path: ${err.path}\n` +
    `Reason: ${err.message}`
  );
}

/**
 * Turn any error raised by a command into a user-friendly message
 */
export function formatError(err: unknown): string {
  if (err instanceof ConfigError) {
    return formatConfigError(err);
  }

  if (err instanceof TransportError) {
    const socketPath = getSocketPath();
    if (socketPath === null) {
      return formatSocketUnsetError();
    }
    return formatCompositorUnavailableError(socketPath, err.cause?.message ?? err.message);
  }

  if (err instanceof ProtocolError || err instanceof CompositorReplyError) {
    return `Error: ${err.message}`;
  }

  return `Error: ${err instanceof Error ? err.message : String(err)}`;
}
