/**
 * Watch Command
 *
 * Runs the taskbar core and prints every event it emits.
 */

import minimist from "minimist";
import type { GlobalOptions, TaskbarEvent } from "../models.ts";
import { loadConfig } from "../services/config.ts";
import { parseOutputFilter } from "../services/output-filter.ts";
import { createTaskbar } from "../services/taskbar.ts";
import { bold, cyan, dim } from "../ui/ansi.ts";
import { formatTaskbarEvent } from "../ui/format.ts";
import * as logger from "../utils/logger.ts";
import { setupSignalHandlers } from "../utils/signals.ts";

interface WatchArgs {
  help: boolean;
  json: boolean;
  output?: string;
}

function showHelp(): never {
  console.log(`
taskbar-core watch - Stream taskbar events

USAGE:
  taskbar-core watch [OPTIONS]

OPTIONS:
  -o, --output <name>   Only show windows on this output
  --json                Print events as JSON Lines
  -h, --help            Show this help

${bold("Events")}
  ${cyan("snapshot")}   Complete window and workspace list after every change
  ${cyan("urgency")}    A window was marked urgent by a notification, or cleared

EXAMPLES:
  taskbar-core watch                  ${dim("# Human-readable events")}
  taskbar-core watch --json | jq .    ${dim("# Scripting")}
  taskbar-core watch --output DP-1    ${dim("# One monitor only")}
`);
  process.exit(0);
}

export function renderEvent(event: TaskbarEvent, json: boolean): string {
  return json ? JSON.stringify(event) : formatTaskbarEvent(event);
}

export async function watchCommand(args: string[], options: GlobalOptions): Promise<void> {
  const parsed = minimist<WatchArgs>(args, {
    boolean: ["help", "json"],
    string: ["output"],
    alias: { h: "help", o: "output" },
  });

  if (parsed.help) {
    showHelp();
  }

  const config = await loadConfig(options.config);
  const taskbar = createTaskbar(config, parseOutputFilter(parsed.output));

  taskbar.subscribe((event) => {
    console.log(renderEvent(event, parsed.json));
  });

  const removeSignalHandlers = setupSignalHandlers({
    onSigInt: () => taskbar.close(),
    onSigTerm: () => taskbar.close(),
  });

  taskbar.start();
  logger.info(`Watching taskbar events${parsed.output ? ` on ${parsed.output}` : ""} (Ctrl+C to stop)`);
  await taskbar.finished;
  removeSignalHandlers();

  if (taskbar.error) {
    throw taskbar.error;
  }
}
