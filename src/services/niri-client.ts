/**
 * Compositor IPC client
 *
 * Talks to niri over its Unix socket. Every message is one line of JSON: requests are the
 * serialized request enum, replies are `{"Ok": ...}` or `{"Err": "..."}`, and after a
 * successful `"EventStream"` request the connection carries one event per line until it
 * closes.
 */

import type { Socket } from "node:net";
import type { CompositorEvent, CompositorReply, CompositorRequest } from "../models.ts";
import { Channel } from "../utils/channel.ts";
import {
  CompositorReplyError,
  ProtocolError,
  TransportError,
} from "../utils/errors.ts";
import * as logger from "../utils/logger.ts";
import { connectWithTimeout, getSocketPath, SOCKET_ENV_VAR } from "../utils/socket.ts";
import { CompositorReplySchema, decodeEvent } from "../validation.ts";

/**
 * Anything that can produce the compositor's event stream
 */
export interface CompositorEventSource {
  events(signal?: AbortSignal): AsyncIterable<CompositorEvent>;
}

/**
 * Check that a reply is the bare `Handled` response
 *
 * @throws CompositorReplyError for an `Err` reply
 * @throws ProtocolError for any other `Ok` response
 */
export function expectHandled(reply: CompositorReply): void {
  if (!reply.ok) {
    throw new CompositorReplyError(reply.error);
  }
  if (reply.response !== "Handled") {
    throw new ProtocolError("Handled", reply.response);
  }
}

/**
 * Parse one reply line
 */
export function parseReply(line: string): CompositorReply {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    throw new ProtocolError("JSON reply", line);
  }

  const parsed = CompositorReplySchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProtocolError("Ok or Err reply", raw);
  }
  return parsed.data;
}

/**
 * Parse one event line. Lines that cannot be decoded are logged and skipped.
 */
export function parseEventLine(line: string): CompositorEvent | null {
  try {
    return decodeEvent(JSON.parse(line));
  } catch (err) {
    logger.warn(`Skipping undecodable compositor event: ${err instanceof Error ? err.message : String(err)}`);
    logger.debug(`  Line: ${line}`);
    return null;
  }
}

/**
 * Split a socket's incoming data into non-empty lines
 */
export function readLines(socket: Socket): Channel<string> {
  const lines = new Channel<string>();
  let partial = "";

  const push = (line: string) => {
    if (line.trim() && !lines.closed) {
      lines.send(line);
    }
  };

  socket.setEncoding("utf8");

  socket.on("data", (chunk: string) => {
    partial += chunk;
    const complete = partial.split("\n");
    partial = complete.pop() ?? "";
    complete.forEach(push);
  });

  socket.on("end", () => {
    push(partial);
    partial = "";
  });

  socket.on("error", (err) => {
    lines.close(new TransportError("compositor socket read failed", err));
  });

  socket.on("close", () => {
    lines.close();
  });

  return lines;
}

/**
 * Niri IPC client
 */
export class NiriClient implements CompositorEventSource {
  constructor(
    private readonly socketPath: string | null = getSocketPath(),
    private readonly timeoutMs = 5000,
  ) {}

  /**
   * Send a single request on its own connection
   */
  async request(request: CompositorRequest): Promise<CompositorReply> {
    const socket = await this.connect();
    try {
      return await this.send(socket, readLines(socket), request);
    } finally {
      socket.destroy();
    }
  }

  /**
   * Ask the compositor to focus the given window
   */
  async activateWindow(id: number): Promise<void> {
    expectHandled(await this.request({ Action: { FocusWindow: { id } } }));
  }

  /**
   * Open an event stream and yield its decoded events until the compositor disconnects or
   * `signal` is aborted
   *
   * @throws TransportError when the connection fails or breaks
   */
  async *events(signal?: AbortSignal): AsyncGenerator<CompositorEvent, void, undefined> {
    const socket = await this.connect();
    const lines = readLines(socket);
    signal?.addEventListener("abort", () => socket.destroy(), { once: true });

    try {
      expectHandled(await this.send(socket, lines, "EventStream"));
      logger.verbose("Compositor event stream started");

      for await (const line of lines) {
        const event = parseEventLine(line);
        if (event) {
          yield event;
        }
      }

      logger.verbose("Compositor event stream ended");
    } finally {
      socket.destroy();
    }
  }

  private async connect(): Promise<Socket> {
    if (!this.socketPath) {
      throw new TransportError(`${SOCKET_ENV_VAR} is not set`);
    }

    try {
      return await connectWithTimeout(this.socketPath, this.timeoutMs);
    } catch (err) {
      throw new TransportError(
        `cannot connect to compositor at ${this.socketPath}`,
        err instanceof Error ? err : undefined,
      );
    }
  }

  private async send(
    socket: Socket,
    lines: Channel<string>,
    request: CompositorRequest,
  ): Promise<CompositorReply> {
    logger.debugIpc("request", request);
    socket.write(JSON.stringify(request) + "\n");

    const line = await lines.recv();
    if (line === undefined) {
      throw new TransportError("compositor closed the connection before replying");
    }

    const reply = parseReply(line);
    logger.debugIpc("reply", reply);
    return reply;
  }
}
