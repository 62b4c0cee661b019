/**
 * Notification correlator
 *
 * Finds the window(s) a notification most likely came from. Rules run in priority order and
 * the first rule that marks at least one window wins:
 *
 *   1. ancestry: walk up from the sender pid, marking every unfocused window owned by a
 *      process on the way
 *   2. desktop-entry: windows whose app id equals the (remapped) desktop entry hint
 *   3. fuzzy-desktop-entry: case-insensitive or last-segment matches on the same hint
 *
 * The algorithm is a heuristic and may under- or over-match.
 */

import type { EnrichedNotification, Snapshot, SnapshotWindow } from "../models.ts";
import { ProcessLookupError } from "../utils/errors.ts";
import * as logger from "../utils/logger.ts";
import type { ProcessAncestry } from "./process.ts";

export type CorrelationRule = "ancestry" | "desktop-entry" | "fuzzy-desktop-entry";

export interface Correlation {
  rule: CorrelationRule;
  windowIds: number[];
}

/** The configuration the desktop-entry rules read */
export interface CorrelatorSettings {
  useDesktopEntry: boolean;
  useFuzzyMatching: boolean;
  mapAppId(desktopEntry: string): string;
}

type Windows = readonly Readonly<SnapshotWindow>[];

/**
 * Walk the process tree upward from `pid`, collecting the ids of unfocused windows owned by
 * any process on the chain (the sender itself included).
 *
 * A failed lookup ends the walk as if the process had no parent.
 */
export async function matchByAncestry(
  pid: number,
  windows: Windows,
  ancestry: ProcessAncestry,
): Promise<number[]> {
  const byPid = new Map<number, Readonly<SnapshotWindow>>();
  for (const window of windows) {
    if (window.pid !== null) {
      byPid.set(window.pid, window);
    }
  }

  const marked: number[] = [];
  let current: number | null = pid;

  while (current !== null) {
    const window = byPid.get(current);
    if (window && !window.is_focused && !marked.includes(window.id)) {
      marked.push(window.id);
    }

    try {
      current = await ancestry.parentOf(current);
    } catch (err) {
      if (!(err instanceof ProcessLookupError)) {
        throw err;
      }
      logger.debug(`Stopped walking up from process ${current}: ${err.message}`);
      current = null;
    }
  }

  return marked;
}

function lastSegment(id: string): string {
  return id.slice(id.lastIndexOf(".") + 1).toLowerCase();
}

/**
 * Loose app id comparison: equal ignoring case, or a dotted app id whose last segment equals
 * the entry's last segment ignoring case ("org.example.Foo" ~ "foo").
 */
export function fuzzyAppIdMatch(appId: string, entry: string): boolean {
  if (appId.toLowerCase() === entry.toLowerCase()) {
    return true;
  }

  if (!appId.includes(".")) {
    return false;
  }

  const segment = lastSegment(appId);
  return segment.length > 0 && segment === lastSegment(entry);
}

/**
 * Match windows on the desktop entry hint. Exact matches win over fuzzy ones; fuzzy matches
 * only count when `fuzzy` is set and nothing matched exactly. Every qualifying window is
 * returned, focused or not.
 */
export function matchByDesktopEntry(
  appId: string,
  windows: Windows,
  fuzzy: boolean,
): Correlation | null {
  const exact: number[] = [];
  const loose: number[] = [];

  for (const window of windows) {
    if (window.app_id === null) {
      continue;
    }
    if (window.app_id === appId) {
      exact.push(window.id);
    } else if (fuzzy && fuzzyAppIdMatch(window.app_id, appId)) {
      loose.push(window.id);
    }
  }

  if (exact.length > 0) {
    return { rule: "desktop-entry", windowIds: exact };
  }
  if (loose.length > 0) {
    return { rule: "fuzzy-desktop-entry", windowIds: loose };
  }
  return null;
}

/**
 * Run the correlation rules for one notification against the latest snapshot.
 *
 * Never throws; any failure is logged and reported as no match.
 */
export async function correlate(
  enriched: EnrichedNotification,
  snapshot: Snapshot,
  settings: CorrelatorSettings,
  ancestry: ProcessAncestry,
): Promise<Correlation | null> {
  try {
    if (enriched.pid !== null) {
      const windowIds = await matchByAncestry(enriched.pid, snapshot.windows, ancestry);
      if (windowIds.length > 0) {
        return { rule: "ancestry", windowIds };
      }
    }

    const entry = enriched.notification.hints.desktopEntry;
    if (!settings.useDesktopEntry || !entry) {
      return null;
    }

    return matchByDesktopEntry(settings.mapAppId(entry), snapshot.windows, settings.useFuzzyMatching);
  } catch (err) {
    logger.warn(`Notification correlation failed: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}
