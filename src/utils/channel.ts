/**
 * Unbounded Async Channel
 *
 * Hands values from a producing worker to a single consuming task. Sending never waits;
 * receiving suspends until a value arrives or the channel is closed.
 */

import { ChannelClosedError } from "./errors.ts";

type Waiter<T> = {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: Error) => void;
};

export class Channel<T> implements AsyncIterable<T> {
  #queue: T[] = [];
  #waiters: Waiter<T>[] = [];
  #closed = false;
  #reason: Error | null = null;

  /** Whether `close()` has been called */
  get closed(): boolean {
    return this.#closed;
  }

  /** Number of values waiting to be received */
  get size(): number {
    return this.#queue.length;
  }

  /**
   * Queue a value for the receiver.
   *
   * @throws ChannelClosedError once the channel has been closed
   */
  send(value: T): void {
    if (this.#closed) {
      throw new ChannelClosedError();
    }

    const waiter = this.#waiters.shift();
    if (waiter) {
      waiter.resolve({ value, done: false });
    } else {
      this.#queue.push(value);
    }
  }

  /**
   * Close the channel. Values already queued are still delivered; after them the receiver
   * sees the end of the stream, or `reason` thrown if one is given.
   */
  close(reason?: Error): void {
    if (this.#closed) {
      return;
    }

    this.#closed = true;
    this.#reason = reason ?? null;

    for (const waiter of this.#waiters.splice(0)) {
      if (this.#reason) {
        waiter.reject(this.#reason);
      } else {
        waiter.resolve({ value: undefined, done: true });
      }
    }
  }

  /**
   * Receive the next value, or `undefined` once the channel is closed and drained
   */
  async recv(): Promise<T | undefined> {
    const result = await this.next();
    return result.done ? undefined : result.value;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.#queue.length > 0) {
      const [value] = this.#queue.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }

    if (this.#closed) {
      if (this.#reason) {
        return Promise.reject(this.#reason);
      }
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve, reject) => {
      this.#waiters.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
    };
  }
}
