/**
 * Session bus adapters
 *
 * The only module that talks to the message bus; everything else sees the
 * `NotificationSource` and `PeerDirectory` interfaces.
 */

import dbus, { type ClientInterface, type Message, type MessageBus } from "dbus-next";
import { z } from "zod";
import type { BusMethodCall, NameOwnerChange } from "../models.ts";
import { Channel } from "../utils/channel.ts";
import { TransportError } from "../utils/errors.ts";
import * as logger from "../utils/logger.ts";
import type { PeerDirectory } from "./connection-cache.ts";
import { NOTIFICATIONS_INTERFACE, NOTIFY_MEMBER, type NotificationSource } from "./notifications.ts";

const DBUS_NAME = "org.freedesktop.DBus";
const DBUS_PATH = "/org/freedesktop/DBus";
const MONITORING_INTERFACE = "org.freedesktop.DBus.Monitoring";

const NOTIFY_MATCH_RULE =
  `type='method_call',interface='${NOTIFICATIONS_INTERFACE}',member='${NOTIFY_MEMBER}'`;

const ProcessIdSchema = z.union([z.number().int().nonnegative(), z.bigint()]).transform(Number);

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Observes Notify calls through a dedicated monitor connection.
 *
 * A monitor connection can no longer send anything, so each call to `methodCalls` opens its
 * own.
 */
export class SessionBusMonitor implements NotificationSource {
  methodCalls(signal?: AbortSignal): AsyncIterable<BusMethodCall> {
    const calls = new Channel<BusMethodCall>();
    const bus = dbus.sessionBus();

    const stop = (reason?: Error) => {
      calls.close(reason);
      bus.disconnect();
    };

    bus.on("error", (err: unknown) => {
      stop(new TransportError("session bus connection failed", toError(err)));
    });

    bus.addMethodHandler((message: Message): boolean => {
      if (
        message.interface === NOTIFICATIONS_INTERFACE &&
        message.member === NOTIFY_MEMBER &&
        !calls.closed
      ) {
        calls.send({ sender: message.sender, body: message.body });
      }
      // Claim every call: a monitor must never reply.
      return true;
    });

    signal?.addEventListener("abort", () => stop(), { once: true });

    void (async () => {
      try {
        await bus.call(
          new dbus.Message({
            destination: DBUS_NAME,
            path: DBUS_PATH,
            interface: MONITORING_INTERFACE,
            member: "BecomeMonitor",
            signature: "asu",
            body: [[NOTIFY_MATCH_RULE], 0],
          }),
        );
        logger.verbose("Monitoring the session bus for notifications");
      } catch (err) {
        stop(new TransportError("cannot monitor the session bus", toError(err)));
      }
    })();

    return calls;
  }
}

/**
 * Resolves peers and reports ownership changes through the bus daemon itself
 */
export class SessionBusDirectory implements PeerDirectory {
  #bus: MessageBus | null = null;
  #daemon: Promise<ClientInterface> | null = null;
  #closed = false;

  async processIdOf(peer: string): Promise<number> {
    const daemon = await this.daemon();
    const pid: unknown = await daemon.GetConnectionUnixProcessID(peer);
    return ProcessIdSchema.parse(pid);
  }

  ownerChanges(signal?: AbortSignal): AsyncIterable<NameOwnerChange> {
    const changes = new Channel<NameOwnerChange>();

    const listener = (name: string, oldOwner: string, newOwner: string) => {
      if (!changes.closed) {
        changes.send({ name, oldOwner: oldOwner || null, newOwner: newOwner || null });
      }
    };

    void (async () => {
      try {
        const daemon = await this.daemon();
        if (signal?.aborted) {
          changes.close();
          return;
        }
        daemon.on("NameOwnerChanged", listener);
        signal?.addEventListener("abort", () => {
          daemon.removeListener("NameOwnerChanged", listener);
          changes.close();
        }, { once: true });
      } catch (err) {
        changes.close(new TransportError("cannot subscribe to bus ownership changes", toError(err)));
      }
    })();

    return changes;
  }

  close(): void {
    this.#closed = true;
    this.#bus?.disconnect();
    this.#bus = null;
    this.#daemon = null;
  }

  private daemon(): Promise<ClientInterface> {
    if (this.#closed) {
      return Promise.reject(new TransportError("session bus directory is closed"));
    }
    if (!this.#daemon) {
      const bus = dbus.sessionBus();
      bus.on("error", (err: unknown) => {
        logger.error(`Session bus connection failed: ${toError(err).message}`);
      });
      this.#bus = bus;
      this.#daemon = bus
        .getProxyObject(DBUS_NAME, DBUS_PATH)
        .then((object) => object.getInterface(DBUS_NAME));
    }
    return this.#daemon;
  }
}
