/**
 * Notification monitor
 *
 * Turns observed `org.freedesktop.Notifications.Notify` calls into enriched notifications:
 * the decoded body plus the pid of the peer that sent it.
 */

import type { BusMethodCall, EnrichedNotification, Notification } from "../models.ts";
import * as logger from "../utils/logger.ts";
import { NotifyBodySchema } from "../validation.ts";

export const NOTIFICATIONS_INTERFACE = "org.freedesktop.Notifications";
export const NOTIFY_MEMBER = "Notify";

/**
 * Where observed Notify calls come from
 */
export interface NotificationSource {
  /** Notify calls seen on the bus until `signal` is aborted */
  methodCalls(signal?: AbortSignal): AsyncIterable<BusMethodCall>;
}

/** Anything that can resolve a bus peer to a pid; normally the connection cache */
export interface PeerResolver {
  get(peer: string): Promise<number | null>;
}

/**
 * Decode a Notify call body; undecodable bodies are logged and give null
 */
export function decodeNotification(call: BusMethodCall): Notification | null {
  const result = NotifyBodySchema.safeParse(call.body);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(body)"}: ${issue.message}`)
      .join("; ");
    logger.warn(`Skipping undecodable notification from ${call.sender}: ${issues}`);
    return null;
  }
  return result.data;
}

/**
 * Decode each call and attach the sender's pid
 */
export async function* enrichNotifications(
  calls: AsyncIterable<BusMethodCall>,
  peers: PeerResolver,
): AsyncGenerator<EnrichedNotification> {
  for await (const call of calls) {
    const notification = decodeNotification(call);
    if (!notification) {
      continue;
    }

    const pid = await peers.get(call.sender);
    logger.verbose(`Notification "${notification.summary}" from ${call.sender} (pid ${pid ?? "unknown"})`);
    yield { notification, pid };
  }
}
