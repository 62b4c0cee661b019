/**
 * Taskbar
 *
 * The outward face of the core. Window snapshots and enriched notifications are merged into
 * a single inbox and handled one at a time, in arrival order, by one loop; subscribers get
 * snapshot and urgency events out of it.
 */

import type {
  EnrichedNotification,
  OutputFilter,
  Snapshot,
  Subscription,
  TaskbarEvent,
  TaskbarEventHandler,
} from "../models.ts";
import { Channel } from "../utils/channel.ts";
import { ChannelClosedError } from "../utils/errors.ts";
import * as logger from "../utils/logger.ts";
import type { Config } from "./config.ts";
import { ConnectionCache, type PeerDirectory } from "./connection-cache.ts";
import { correlate, type CorrelatorSettings } from "./correlator.ts";
import { SessionBusDirectory, SessionBusMonitor } from "./dbus.ts";
import { type CompositorEventSource, NiriClient } from "./niri-client.ts";
import { enrichNotifications, type NotificationSource } from "./notifications.ts";
import { ALL_OUTPUTS, filterSnapshot, shouldShow } from "./output-filter.ts";
import { type ProcessAncestry, ProcStatAncestry } from "./process.ts";
import { WindowStream } from "./window-stream.ts";

/** What the taskbar needs from the compositor */
export interface CompositorControl extends CompositorEventSource {
  activateWindow(id: number): Promise<void>;
}

export interface TaskbarDependencies {
  compositor: CompositorControl;
  /** Required, together with `peers`, when notifications are enabled */
  notifications?: NotificationSource;
  peers?: PeerDirectory & { close?(): void };
  ancestry?: ProcessAncestry;
  /** Clock for the connection cache */
  now?: () => number;
}

type TaskbarInput =
  | { kind: "snapshot"; snapshot: Snapshot }
  | { kind: "notification"; notification: EnrichedNotification };

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class Taskbar {
  readonly #inbox = new Channel<TaskbarInput>();
  readonly #abort = new AbortController();
  readonly #handlers = new Map<string, TaskbarEventHandler>();
  readonly #urgent = new Set<number>();
  readonly #workers: Promise<void>[] = [];
  readonly #ancestry: ProcessAncestry;
  readonly #settings: CorrelatorSettings;

  #subscriptionCounter = 0;
  #lastSnapshot: Snapshot | null = null;
  #windowStream: WindowStream | null = null;
  #cache: ConnectionCache | null = null;
  #loop: Promise<void> | null = null;
  #error: Error | null = null;

  constructor(
    private readonly config: Config,
    private readonly deps: TaskbarDependencies,
    private readonly outputFilter: OutputFilter = ALL_OUTPUTS,
  ) {
    this.#ancestry = deps.ancestry ?? new ProcStatAncestry();
    this.#settings = {
      useDesktopEntry: config.notifications.useDesktopEntry,
      useFuzzyMatching: config.notifications.useFuzzyMatching,
      mapAppId: (entry) => config.mapAppId(entry),
    };
  }

  /** Latest complete snapshot, unfiltered */
  get lastSnapshot(): Snapshot | null {
    return this.#lastSnapshot;
  }

  /** Ids of the windows currently marked urgent */
  get urgentWindows(): number[] {
    return [...this.#urgent].sort((a, b) => a - b);
  }

  /** Why the taskbar stopped on its own, if it did */
  get error(): Error | null {
    return this.#error;
  }

  /** Resolves once the event loop has stopped */
  get finished(): Promise<void> {
    return this.#loop ?? Promise.resolve();
  }

  /**
   * Start the workers and the event loop; calling it again does nothing
   */
  start(): void {
    if (this.#loop) {
      return;
    }

    const windows = new WindowStream(this.deps.compositor);
    this.#windowStream = windows;
    this.#workers.push(this.forwardSnapshots(windows));

    const settings = this.config.notifications;
    if (settings.enabled) {
      const { notifications, peers } = this.deps;
      if (notifications && peers) {
        const cache = new ConnectionCache(peers, {
          expiryMs: settings.cacheExpiryMs,
          sweepIntervalMs: settings.cacheSweepMs,
          now: this.deps.now,
        });
        this.#cache = cache;
        this.#workers.push(this.forwardNotifications(notifications, cache));
      } else {
        logger.warn("Notifications are enabled but no message bus is available");
      }
    }

    this.#loop = this.run();
  }

  subscribe(handler: TaskbarEventHandler): Subscription {
    const id = `subscription-${++this.#subscriptionCounter}`;
    this.#handlers.set(id, handler);
    return {
      id,
      unsubscribe: () => {
        this.#handlers.delete(id);
      },
    };
  }

  /**
   * Focus a window
   *
   * @throws ProtocolError | CompositorReplyError | TransportError
   */
  activateWindow(id: number): Promise<void> {
    return this.deps.compositor.activateWindow(id);
  }

  appClasses(appId: string): string[] {
    return this.config.appClasses(appId);
  }

  appMatches(appId: string, title: string): string[] {
    return this.config.appMatches(appId, title);
  }

  /**
   * Stop every worker and wait for the event loop to drain
   */
  async close(): Promise<void> {
    this.#inbox.close();
    if (this.#loop) {
      await this.#loop;
    } else {
      this.stopWorkers();
    }
  }

  private async run(): Promise<void> {
    try {
      for await (const input of this.#inbox) {
        switch (input.kind) {
          case "snapshot":
            this.handleSnapshot(input.snapshot);
            break;
          case "notification":
            await this.handleNotification(input.notification);
            break;
        }
      }
    } finally {
      this.stopWorkers();
      await Promise.all(this.#workers);
    }
  }

  private stopWorkers(): void {
    this.#windowStream?.close();
    this.#cache?.close();
    this.#abort.abort();
    this.deps.peers?.close?.();
  }

  private handleSnapshot(snapshot: Snapshot): void {
    this.#lastSnapshot = snapshot;
    this.emit({ type: "snapshot", snapshot: filterSnapshot(snapshot, this.outputFilter) });

    const windows = new Map(snapshot.windows.map((window) => [window.id, window]));
    for (const id of [...this.#urgent]) {
      const window = windows.get(id);
      if (!window || window.is_focused) {
        this.#urgent.delete(id);
        this.emit({ type: "urgency", windowId: id, urgent: false });
      }
    }
  }

  private async handleNotification(enriched: EnrichedNotification): Promise<void> {
    const snapshot = this.#lastSnapshot;
    if (!snapshot) {
      logger.verbose("Dropping notification received before the first window snapshot");
      return;
    }

    const correlation = await correlate(enriched, snapshot, this.#settings, this.#ancestry);
    if (!correlation) {
      logger.verbose(`No window matched notification "${enriched.notification.summary}"`);
      return;
    }
    logger.verbose(`Notification matched windows ${correlation.windowIds.join(", ")} by ${correlation.rule}`);

    const windows = new Map(snapshot.windows.map((window) => [window.id, window]));
    for (const id of correlation.windowIds) {
      const window = windows.get(id);
      // The focused window already has the user's attention, whichever rule matched it.
      if (!window || window.is_focused || !shouldShow(this.outputFilter, window.output) || this.#urgent.has(id)) {
        continue;
      }
      this.#urgent.add(id);
      this.emit({ type: "urgency", windowId: id, urgent: true });
    }
  }

  private emit(event: TaskbarEvent): void {
    for (const [id, handler] of this.#handlers) {
      try {
        handler(event);
      } catch (err) {
        logger.error(`Subscriber ${id} failed on ${event.type} event: ${toError(err).message}`);
      }
    }
  }

  private async forwardSnapshots(windows: WindowStream): Promise<void> {
    try {
      for await (const snapshot of windows) {
        this.#inbox.send({ kind: "snapshot", snapshot });
      }
      logger.verbose("Window stream ended");
    } catch (err) {
      if (err instanceof ChannelClosedError) {
        return;
      }
      this.#error = toError(err);
      logger.error(`Window stream stopped: ${this.#error.message}`);
    } finally {
      // Without windows there is nothing left to show.
      this.#inbox.close();
    }
  }

  private async forwardNotifications(source: NotificationSource, cache: ConnectionCache): Promise<void> {
    try {
      for await (const notification of enrichNotifications(source.methodCalls(this.#abort.signal), cache)) {
        this.#inbox.send({ kind: "notification", notification });
      }
    } catch (err) {
      if (err instanceof ChannelClosedError) {
        return;
      }
      logger.error(`Notification monitor stopped: ${toError(err).message}`);
    }
  }
}

/**
 * A taskbar wired to the real compositor socket, session bus and procfs
 */
export function createTaskbar(config: Config, outputFilter: OutputFilter = ALL_OUTPUTS): Taskbar {
  const withBus = config.notifications.enabled;
  return new Taskbar(
    config,
    {
      compositor: new NiriClient(),
      notifications: withBus ? new SessionBusMonitor() : undefined,
      peers: withBus ? new SessionBusDirectory() : undefined,
      ancestry: new ProcStatAncestry(),
    },
    outputFilter,
  );
}
