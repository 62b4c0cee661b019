/**
 * Activate Command
 */

import minimist from "minimist";
import type { GlobalOptions } from "../models.ts";
import { NiriClient } from "../services/niri-client.ts";
import { green } from "../ui/ansi.ts";

interface ActivateArgs {
  help: boolean;
}

function showHelp(): never {
  console.log(`
taskbar-core activate - Focus a window

USAGE:
  taskbar-core activate <window-id>

Window ids are shown by 'taskbar-core windows'.
`);
  process.exit(0);
}

/**
 * Parse a window id argument
 *
 * @throws Error when the argument is not a non-negative integer
 */
export function parseWindowId(value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new Error(`window id must be a non-negative integer, got '${value ?? ""}'`);
  }
  return Number(value);
}

export async function activateCommand(args: string[], _options: GlobalOptions): Promise<void> {
  const parsed = minimist<ActivateArgs>(args, {
    boolean: ["help"],
    string: ["_"],
    alias: { h: "help" },
  });

  if (parsed.help) {
    showHelp();
  }

  const id = parseWindowId(parsed._[0]);
  await new NiriClient().activateWindow(id);
  console.log(green(`Focused window ${id}`));
}
