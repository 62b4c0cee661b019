/**
 * Window stream worker
 *
 * Feeds the compositor's event stream through a `WindowSet` and hands every resulting
 * snapshot to its consumer over an unbounded channel.
 */

import type { CompositorEvent, Snapshot } from "../models.ts";
import { Channel } from "../utils/channel.ts";
import { ChannelClosedError } from "../utils/errors.ts";
import * as logger from "../utils/logger.ts";
import type { CompositorEventSource } from "./niri-client.ts";
import { WindowSet } from "./window-state.ts";

/**
 * Turn a stream of compositor events into a stream of snapshots
 */
export async function* snapshots(
  events: AsyncIterable<CompositorEvent>,
  windowSet = new WindowSet(),
): AsyncGenerator<Snapshot, void, undefined> {
  for await (const event of events) {
    const snapshot = windowSet.apply(event);
    if (snapshot) {
      yield snapshot;
    }
  }
}

/**
 * A running window stream. The worker ends when the compositor disconnects (the channel is
 * then closed with the transport error) or when the channel is closed by the consumer.
 */
export class WindowStream implements AsyncIterable<Snapshot> {
  readonly #channel = new Channel<Snapshot>();
  readonly #abort = new AbortController();
  readonly #worker: Promise<void>;

  constructor(source: CompositorEventSource) {
    this.#worker = this.run(source);
  }

  /** Resolves once the worker has exited */
  get finished(): Promise<void> {
    return this.#worker;
  }

  /**
   * Await the next snapshot; undefined once the stream has ended
   *
   * @throws TransportError if the compositor connection failed
   */
  next(): Promise<Snapshot | undefined> {
    return this.#channel.recv();
  }

  /**
   * Stop the worker and drop its compositor connection
   */
  close(): void {
    this.#channel.close();
    this.#abort.abort();
  }

  [Symbol.asyncIterator](): AsyncIterator<Snapshot, undefined> {
    return this.#channel[Symbol.asyncIterator]();
  }

  private async run(source: CompositorEventSource): Promise<void> {
    try {
      for await (const snapshot of snapshots(source.events(this.#abort.signal))) {
        this.#channel.send(snapshot);
      }
      this.#channel.close();
    } catch (err) {
      if (err instanceof ChannelClosedError) {
        logger.verbose("Window stream consumer went away, stopping");
        return;
      }
      this.#channel.close(err instanceof Error ? err : new Error(String(err)));
    }
  }
}
