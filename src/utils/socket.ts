/**
 * Unix Socket Utilities
 *
 * Locates and connects to the compositor's IPC socket.
 */

import { createConnection, type Socket } from "node:net";
import { debugSocket } from "./logger.ts";

export const SOCKET_ENV_VAR = "NIRI_SOCKET";

/**
 * Get the compositor socket path from environment
 */
export function getSocketPath(): string | null {
  const path = process.env[SOCKET_ENV_VAR];
  return path && path.length > 0 ? path : null;
}

/**
 * Connect to Unix socket with timeout
 */
export function connectWithTimeout(path: string, timeoutMs = 5000): Promise<Socket> {
  debugSocket("Connecting", path);

  return new Promise<Socket>((resolve, reject) => {
    const socket = createConnection({ path });

    const timer = setTimeout(() => {
      socket.destroy();
      reject(new Error(`Connection timeout after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once("connect", () => {
      clearTimeout(timer);
      socket.removeAllListeners("error");
      debugSocket("Connected", path);
      resolve(socket);
    });

    socket.once("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });
  });
}
