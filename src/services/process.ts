/**
 * Process ancestry lookup
 *
 * Reads the parent pid of a process from /proc/<pid>/stat (see proc_pid_stat(5)).
 */

import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { ProcessLookupError } from "../utils/errors.ts";

/** Index of the ppid field among the fields that follow the command name */
const PPID_FIELD = 1;

/**
 * Resolves a process to its parent
 */
export interface ProcessAncestry {
  /**
   * @returns the parent pid, or null when the process is a root or orphan
   * @throws ProcessLookupError when the descriptor is missing or malformed
   */
  parentOf(pid: number): Promise<number | null>;
}

/**
 * Parse the parent pid out of the contents of a stat record
 */
export function parseParentPid(stat: string, pid: number, source: string): number | null {
  // The command name is parenthesised and may itself contain spaces or ")".
  const commEnd = stat.lastIndexOf(")");
  if (commEnd === -1) {
    throw new ProcessLookupError("Malformed", pid, source, "missing command name");
  }

  const fields = stat.slice(commEnd + 1).trim().split(/\s+/);
  if (fields.length <= PPID_FIELD) {
    throw new ProcessLookupError("Malformed", pid, source, "insufficient fields");
  }

  const raw = fields[PPID_FIELD];
  if (!/^-?\d+$/.test(raw)) {
    throw new ProcessLookupError("InvalidNumber", pid, source, `parent pid is not a number: ${raw}`);
  }

  // ppid 0 means the process is pid 1 or has been orphaned.
  const ppid = Number.parseInt(raw, 10);
  return ppid === 0 ? null : ppid;
}

/**
 * `ProcessAncestry` backed by the procfs mount
 */
export class ProcStatAncestry implements ProcessAncestry {
  constructor(private readonly procRoot = "/proc") {}

  statPath(pid: number): string {
    return path.join(this.procRoot, String(pid), "stat");
  }

  async parentOf(pid: number): Promise<number | null> {
    const statPath = this.statPath(pid);

    let content: string;
    try {
      content = await readFile(statPath, "utf8");
    } catch (err) {
      const cause = err instanceof Error ? err : undefined;
      if (cause && "code" in cause && cause.code === "ENOENT") {
        throw new ProcessLookupError("NotFound", pid, statPath, "no such process", cause);
      }
      throw new ProcessLookupError(
        "Unreadable",
        pid,
        statPath,
        `cannot read: ${cause?.message ?? String(err)}`,
        cause,
      );
    }

    return parseParentPid(content, pid, statPath);
  }
}
