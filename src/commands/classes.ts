/**
 * Classes Command
 *
 * Shows the CSS classes the configuration assigns to an application's buttons.
 */

import minimist from "minimist";
import type { GlobalOptions } from "../models.ts";
import { loadConfig } from "../services/config.ts";
import { bold, dim, green } from "../ui/ansi.ts";

interface ClassesArgs {
  help: boolean;
  json: boolean;
}

function showHelp(): never {
  console.log(`
taskbar-core classes - Show configured classes for an application

USAGE:
  taskbar-core classes <app-id> [title] [OPTIONS]

With a title, the classes whose rule matches it are marked.

OPTIONS:
  --json        JSON output
  -h, --help    Show this help

EXAMPLES:
  taskbar-core classes firefox                      ${dim("# Every class a rule may set")}
  taskbar-core classes firefox "Inbox - Mail"       ${dim("# Which ones apply to this title")}
`);
  process.exit(0);
}

export async function classesCommand(args: string[], options: GlobalOptions): Promise<void> {
  const parsed = minimist<ClassesArgs>(args, {
    boolean: ["help", "json"],
    string: ["_"],
    alias: { h: "help" },
  });

  const [appId, title] = parsed._;
  if (parsed.help || !appId) {
    showHelp();
  }

  const config = await loadConfig(options.config);
  const classes = config.appClasses(appId);
  const matches = title === undefined ? null : config.appMatches(appId, title);

  if (parsed.json) {
    console.log(JSON.stringify({ appId, title: title ?? null, classes, matches }, null, 2));
    return;
  }

  if (classes.length === 0) {
    console.log(dim(`No rules configured for ${appId}`));
    return;
  }

  console.log(bold(appId));
  for (const cls of classes) {
    const matched = matches?.includes(cls) ?? false;
    console.log(`  ${matched ? green("✓") : " "} ${cls}`);
  }
}
