/**
 * Connection cache
 *
 * Maps message bus peers (unique connection names such as ":1.42") to the pid of the process
 * behind them. One worker owns the map; callers reach it only through its inbox, alongside
 * the bus's NameOwnerChanged signals and the periodic expiry sweep.
 *
 * Expiry is best effort: an entry can outlive its expiry until the next sweep runs.
 */

import type { NameOwnerChange } from "../models.ts";
import { Channel } from "../utils/channel.ts";
import { ChannelClosedError } from "../utils/errors.ts";
import * as logger from "../utils/logger.ts";

/**
 * The bus operations the cache depends on
 */
export interface PeerDirectory {
  /**
   * Resolve a peer to its process id
   *
   * @throws when the bus cannot resolve the peer
   */
  processIdOf(peer: string): Promise<number>;

  /**
   * NameOwnerChanged signals until `signal` is aborted
   */
  ownerChanges(signal?: AbortSignal): AsyncIterable<NameOwnerChange>;
}

interface Entry {
  pid: number | null;
  expiresAt: number;
}

/**
 * The cache map itself, with expiry bookkeeping
 */
export class PeerCache {
  readonly #entries = new Map<string, Entry>();

  constructor(
    private readonly expiryMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get size(): number {
    return this.#entries.size;
  }

  /**
   * Look up a peer, refreshing its expiry on a hit
   *
   * @returns the cached pid (possibly null when it could not be resolved), or undefined on a miss
   */
  get(peer: string): number | null | undefined {
    const entry = this.#entries.get(peer);
    if (!entry) {
      return undefined;
    }
    entry.expiresAt = this.now() + this.expiryMs;
    return entry.pid;
  }

  insert(peer: string, pid: number | null): void {
    this.#entries.set(peer, { pid, expiresAt: this.now() + this.expiryMs });
  }

  remove(peer: string): boolean {
    return this.#entries.delete(peer);
  }

  /**
   * Drop every entry whose expiry has passed
   *
   * @returns the number of entries removed
   */
  expire(now = this.now()): number {
    let removed = 0;
    for (const [peer, entry] of this.#entries) {
      if (entry.expiresAt <= now) {
        this.#entries.delete(peer);
        removed++;
      }
    }
    return removed;
  }
}

type CacheMessage =
  | { kind: "get"; peer: string; reply: (pid: number | null) => void }
  | { kind: "owner-changed"; change: NameOwnerChange }
  | { kind: "sweep" };

export interface ConnectionCacheOptions {
  /** How long an entry lives after its last use */
  expiryMs: number;
  /** How often expired entries are swept */
  sweepIntervalMs: number;
  now?: () => number;
}

/**
 * Handle to the cache worker
 */
export class ConnectionCache {
  readonly #inbox = new Channel<CacheMessage>();
  readonly #abort = new AbortController();
  readonly #cache: PeerCache;
  readonly #sweeper: NodeJS.Timeout;
  readonly #worker: Promise<void>;

  constructor(
    private readonly directory: PeerDirectory,
    options: ConnectionCacheOptions,
  ) {
    this.#cache = new PeerCache(options.expiryMs, options.now);

    this.#sweeper = setInterval(() => this.post({ kind: "sweep" }), options.sweepIntervalMs);
    this.#sweeper.unref();

    void this.forwardOwnerChanges();
    this.#worker = this.run();
  }

  /** Resolves once the worker has exited */
  get finished(): Promise<void> {
    return this.#worker;
  }

  /**
   * Return the pid behind a peer, asking the bus if it is not cached yet.
   *
   * Never rejects: an unknown peer, a failed lookup and a stopped cache all give null.
   */
  get(peer: string): Promise<number | null> {
    return new Promise((resolve) => {
      if (!this.post({ kind: "get", peer, reply: resolve })) {
        resolve(null);
      }
    });
  }

  /**
   * Stop the sweeper, the signal subscription and the worker
   */
  close(): void {
    clearInterval(this.#sweeper);
    this.#abort.abort();
    this.#inbox.close();
  }

  private post(message: CacheMessage): boolean {
    try {
      this.#inbox.send(message);
      return true;
    } catch (err) {
      if (err instanceof ChannelClosedError) {
        logger.verbose(`Connection cache is stopped; dropping ${message.kind} request`);
        return false;
      }
      throw err;
    }
  }

  private async run(): Promise<void> {
    for await (const message of this.#inbox) {
      switch (message.kind) {
        case "get":
          message.reply(await this.lookup(message.peer));
          break;

        case "owner-changed":
          await this.ownerChanged(message.change);
          break;

        case "sweep": {
          const removed = this.#cache.expire();
          if (removed > 0) {
            logger.debug(`Connection cache expired ${removed} entries (${this.#cache.size} left)`);
          }
          break;
        }
      }
    }
  }

  private async lookup(peer: string): Promise<number | null> {
    const cached = this.#cache.get(peer);
    if (cached !== undefined) {
      return cached;
    }

    const pid = await this.resolve(peer);
    this.#cache.insert(peer, pid);
    return pid;
  }

  private async ownerChanged(change: NameOwnerChange): Promise<void> {
    if (change.newOwner) {
      const pid = await this.resolve(change.newOwner);
      if (pid !== null) {
        this.#cache.insert(change.newOwner, pid);
      }
    } else if (change.oldOwner) {
      this.#cache.remove(change.oldOwner);
    }
  }

  private async resolve(peer: string): Promise<number | null> {
    try {
      return await this.directory.processIdOf(peer);
    } catch (err) {
      logger.debug(`Cannot resolve pid of bus peer ${peer}: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }

  private async forwardOwnerChanges(): Promise<void> {
    try {
      for await (const change of this.directory.ownerChanges(this.#abort.signal)) {
        if (!this.post({ kind: "owner-changed", change })) {
          return;
        }
      }
    } catch (err) {
      logger.error(`Bus lifecycle monitor failed: ${err instanceof Error ? err.message : String(err)}`);
      this.close();
    }
  }
}
