/**
 * Windows Command
 *
 * Prints the first complete window snapshot and exits.
 */

import minimist from "minimist";
import type { GlobalOptions } from "../models.ts";
import { NiriClient } from "../services/niri-client.ts";
import { filterSnapshot, parseOutputFilter } from "../services/output-filter.ts";
import { WindowStream } from "../services/window-stream.ts";
import { dim } from "../ui/ansi.ts";
import { formatSnapshot } from "../ui/format.ts";
import { TransportError } from "../utils/errors.ts";
import * as logger from "../utils/logger.ts";

interface WindowsArgs {
  help: boolean;
  json: boolean;
  output?: string;
}

function showHelp(): never {
  console.log(`
taskbar-core windows - Show the current windows and workspaces

USAGE:
  taskbar-core windows [OPTIONS]

OPTIONS:
  -o, --output <name>   Only show windows on this output
  --json                JSON output
  -h, --help            Show this help

EXAMPLES:
  taskbar-core windows                ${dim("# Grouped by workspace")}
  taskbar-core windows --json         ${dim("# JSON output for scripting")}
`);
  process.exit(0);
}

export async function windowsCommand(args: string[], _options: GlobalOptions): Promise<void> {
  const parsed = minimist<WindowsArgs>(args, {
    boolean: ["help", "json"],
    string: ["output"],
    alias: { h: "help", o: "output" },
  });

  if (parsed.help) {
    showHelp();
  }

  const stream = new WindowStream(new NiriClient());
  try {
    const snapshot = await stream.next();
    if (!snapshot) {
      throw new TransportError("compositor ended the event stream before sending a window list");
    }

    const filtered = filterSnapshot(snapshot, parseOutputFilter(parsed.output));
    logger.verbose(`Showing ${filtered.windows.length} of ${snapshot.windows.length} windows`);
    console.log(parsed.json ? JSON.stringify(filtered, null, 2) : formatSnapshot(filtered));
  } finally {
    stream.close();
  }
}
