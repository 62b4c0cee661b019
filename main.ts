#!/usr/bin/env -S node --import tsx

/**
 * taskbar-core CLI - Main Entry Point
 *
 * Description: window tracking and notification correlation for niri taskbars
 */

import { readFileSync } from "node:fs";
import minimist from "minimist";
import type { GlobalOptions } from "./src/models.ts";
import { formatError } from "./src/utils/errors.ts";

// Read version from VERSION file at runtime
const VERSION = readFileSync(new URL("./VERSION", import.meta.url), "utf8").trim();

interface MainArgs {
  help: boolean;
  version: boolean;
  verbose: boolean;
  debug: boolean;
  config?: string;
}

/**
 * Show version information
 */
function showVersion(): never {
  console.log(`taskbar-core ${VERSION}`);
  process.exit(0);
}

/**
 * Show main help text
 */
function showHelp(): never {
  console.log(`
taskbar-core ${VERSION} - window tracking and notification correlation for niri taskbars

USAGE:
  taskbar-core [OPTIONS] <COMMAND>

GLOBAL OPTIONS:
  -h, --help         Show help information
  -v, --version      Show version information
  -c, --config PATH  Configuration file (default: $XDG_CONFIG_HOME/taskbar-core/config.json)
  --verbose          Enable verbose logging
  --debug            Enable debug logging

COMMANDS:
  watch              Stream snapshot and urgency events
  windows            Show the current windows and workspaces
  activate           Focus a window by id
  classes            Show configured CSS classes for an application

Run 'taskbar-core <command> --help' for more information on a specific command.

EXAMPLES:
  taskbar-core windows                   List windows grouped by workspace
  taskbar-core watch --output DP-1       Events for one monitor
  taskbar-core activate 42               Focus window 42
  taskbar-core classes firefox "Inbox"   Classes applied to a Firefox window
`);
  process.exit(0);
}

/**
 * Show command not found error
 */
function showCommandNotFound(command: string): never {
  console.error(`Error: Unknown command '${command}'`);
  console.error("");
  console.error("Run 'taskbar-core --help' to see available commands");
  process.exit(1);
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  const args = minimist<MainArgs>(process.argv.slice(2), {
    boolean: ["help", "version", "verbose", "debug"],
    string: ["config"],
    alias: {
      h: "help",
      v: "version",
      c: "config",
    },
    stopEarly: true,
  });

  // Handle global flags
  if (args.version) {
    showVersion();
  }

  if (args.help || args._.length === 0) {
    showHelp();
  }

  // Initialize logging
  const { enableVerbose, enableDebug } = await import("./src/utils/logger.ts");
  if (args.debug) {
    enableDebug();
  } else if (args.verbose) {
    enableVerbose();
  }

  const command = String(args._[0]);
  const commandArgs = args._.slice(1).map(String);
  const options: GlobalOptions = {
    verbose: args.verbose,
    debug: args.debug,
    config: args.config || undefined,
  };

  // Route to command handler
  switch (command) {
    case "watch":
      {
        const { watchCommand } = await import("./src/commands/watch.ts");
        await watchCommand(commandArgs, options);
      }
      break;

    case "windows":
      {
        const { windowsCommand } = await import("./src/commands/windows.ts");
        await windowsCommand(commandArgs, options);
      }
      break;

    case "activate":
      {
        const { activateCommand } = await import("./src/commands/activate.ts");
        await activateCommand(commandArgs, options);
      }
      break;

    case "classes":
      {
        const { classesCommand } = await import("./src/commands/classes.ts");
        await classesCommand(commandArgs, options);
      }
      break;

    default:
      showCommandNotFound(command);
  }
}

try {
  await main();
} catch (err) {
  console.error(formatError(err));
  process.exit(1);
}
