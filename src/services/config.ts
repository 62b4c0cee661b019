/**
 * Configuration service
 *
 * Loads the taskbar configuration from $XDG_CONFIG_HOME/taskbar-core/config.json and answers
 * the per-application queries the rendering layer and the notification correlator need.
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import * as path from "node:path";
import { ZodError } from "zod";
import { ConfigError } from "../utils/errors.ts";
import * as logger from "../utils/logger.ts";
import {
  type AppRule,
  ConfigSchema,
  type ConfigValidated,
  type NotificationSettings,
} from "../validation.ts";

/**
 * Default configuration file location
 */
export function getDefaultConfigPath(): string {
  const configHome = process.env.XDG_CONFIG_HOME || path.join(homedir(), ".config");
  return path.join(configHome, "taskbar-core", "config.json");
}

/**
 * Validated taskbar configuration
 */
export class Config {
  readonly notifications: NotificationSettings;
  // Keyed lookups go through Maps so app ids like "constructor" never hit Object.prototype.
  private readonly apps: Map<string, AppRule[]>;
  private readonly appIdMap: Map<string, string>;

  constructor(config: ConfigValidated = ConfigSchema.parse({})) {
    this.apps = new Map(Object.entries(config.apps));
    this.notifications = config.notifications;
    this.appIdMap = new Map(Object.entries(config.notifications.mapAppIds));
  }

  /**
   * Validate raw configuration data
   *
   * @throws ZodError when the data does not match the schema
   */
  static parse(input: unknown): Config {
    return new Config(ConfigSchema.parse(input));
  }

  /**
   * Every CSS class that a rule for this application could set
   */
  appClasses(appId: string): string[] {
    return (this.apps.get(appId) ?? []).map((rule) => rule.class);
  }

  /**
   * The CSS classes whose rule matches the given window title
   */
  appMatches(appId: string, title: string): string[] {
    return (this.apps.get(appId) ?? [])
      .filter((rule) => rule.match.test(title))
      .map((rule) => rule.class);
  }

  /**
   * Map a desktop entry name to the app id it should be matched against
   */
  mapAppId(desktopEntry: string): string {
    return this.appIdMap.get(desktopEntry) ?? desktopEntry;
  }
}

/**
 * Load configuration from disk.
 *
 * A missing file at the default location yields the defaults; a missing file that was asked
 * for explicitly is an error.
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  const resolved = configPath ?? getDefaultConfigPath();

  let content: string;
  try {
    content = await readFile(resolved, "utf8");
  } catch (err) {
    if (isNotFound(err) && configPath === undefined) {
      logger.verbose(`No configuration at ${resolved}, using defaults`);
      return new Config();
    }
    throw new ConfigError(
      `cannot read configuration: ${err instanceof Error ? err.message : String(err)}`,
      resolved,
      err instanceof Error ? err : undefined,
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new ConfigError(`invalid JSON: ${err.message}`, resolved, err);
    }
    throw err;
  }

  try {
    const config = Config.parse(data);
    logger.verbose(`Loaded configuration from ${resolved}`);
    logger.debugJson("Notification settings", config.notifications);
    return config;
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ConfigError(`schema violation: ${issues}`, resolved, err);
    }
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
