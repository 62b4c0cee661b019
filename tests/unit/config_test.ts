/**
 * Configuration Tests
 */

import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { after, before, test } from "node:test";
import { Config, getDefaultConfigPath, loadConfig } from "../../src/services/config.ts";
import { ConfigError } from "../../src/utils/errors.ts";

let dir = "";

async function writeConfig(name: string, content: string): Promise<string> {
  const file = path.join(dir, name);
  await writeFile(file, content);
  return file;
}

before(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "taskbar-core-config-"));
});

after(async () => {
  await rm(dir, { recursive: true, force: true });
});

test("Config - defaults", () => {
  const config = new Config();

  assert.deepEqual(config.notifications, {
    enabled: false,
    useDesktopEntry: true,
    useFuzzyMatching: false,
    mapAppIds: {},
    cacheExpiryMs: 300_000,
    cacheSweepMs: 60_000,
  });
  assert.deepEqual(config.appClasses("firefox"), []);
});

test("Config - notifications: true is shorthand for enabled", () => {
  const config = Config.parse({ notifications: true });

  assert.equal(config.notifications.enabled, true);
  assert.equal(config.notifications.useDesktopEntry, true);
});

test("Config - notification settings use kebab-case keys", () => {
  const config = Config.parse({
    notifications: {
      "enabled": true,
      "use-desktop-entry": false,
      "use-fuzzy-matching": true,
      "map-app-ids": { "firefox": "org.mozilla.firefox" },
      "cache-expiry-seconds": 30,
      "cache-sweep-seconds": 5,
    },
  });

  assert.deepEqual(config.notifications, {
    enabled: true,
    useDesktopEntry: false,
    useFuzzyMatching: true,
    mapAppIds: { firefox: "org.mozilla.firefox" },
    cacheExpiryMs: 30_000,
    cacheSweepMs: 5_000,
  });
  assert.equal(config.mapAppId("firefox"), "org.mozilla.firefox");
  assert.equal(config.mapAppId("foot"), "foot");
});

test("Config - app rules give classes and title matches", () => {
  const config = Config.parse({
    apps: {
      firefox: [
        { match: "^Inbox", class: "mail" },
        { match: "YouTube", class: "video" },
      ],
    },
  });

  assert.deepEqual(config.appClasses("firefox"), ["mail", "video"]);
  assert.deepEqual(config.appMatches("firefox", "Inbox - YouTube"), ["mail", "video"]);
  assert.deepEqual(config.appMatches("firefox", "YouTube - Inbox"), ["video"]);
  assert.deepEqual(config.appMatches("foot", "Inbox"), []);
});

test("Config - app ids named like object members are ordinary keys", () => {
  const config = Config.parse({
    apps: { toString: [{ match: "^Draft", class: "draft" }] },
    notifications: { "map-app-ids": { valueOf: "org.example.Values" } },
  });

  assert.deepEqual(config.appClasses("constructor"), []);
  assert.deepEqual(config.appMatches("hasOwnProperty", "Draft"), []);
  assert.deepEqual(config.appClasses("toString"), ["draft"]);
  assert.equal(config.mapAppId("toString"), "toString");
  assert.equal(config.mapAppId("constructor"), "constructor");
  assert.equal(config.mapAppId("valueOf"), "org.example.Values");
});

test("Config - invalid regular expressions are rejected", () => {
  assert.throws(() => Config.parse({ apps: { firefox: [{ match: "(", class: "broken" }] } }));
});

test("getDefaultConfigPath - follows XDG_CONFIG_HOME", () => {
  const saved = process.env.XDG_CONFIG_HOME;
  process.env.XDG_CONFIG_HOME = "/tmp/xdg-test";
  try {
    assert.equal(getDefaultConfigPath(), "/tmp/xdg-test/taskbar-core/config.json");
  } finally {
    if (saved === undefined) {
      delete process.env.XDG_CONFIG_HOME;
    } else {
      process.env.XDG_CONFIG_HOME = saved;
    }
  }
});

test("loadConfig - reads a configuration file", async () => {
  const file = await writeConfig("valid.json", JSON.stringify({ notifications: { "enabled": true } }));

  const config = await loadConfig(file);

  assert.equal(config.notifications.enabled, true);
});

test("loadConfig - missing default file yields defaults", async () => {
  const saved = process.env.XDG_CONFIG_HOME;
  process.env.XDG_CONFIG_HOME = path.join(dir, "no-such-config-home");
  try {
    const config = await loadConfig();
    assert.equal(config.notifications.enabled, false);
  } finally {
    if (saved === undefined) {
      delete process.env.XDG_CONFIG_HOME;
    } else {
      process.env.XDG_CONFIG_HOME = saved;
    }
  }
});

test("loadConfig - missing explicit file is an error", async () => {
  const file = path.join(dir, "missing.json");

  await assert.rejects(loadConfig(file), (err: unknown) =>
    err instanceof ConfigError && err.path === file && err.message.startsWith("cannot read configuration: "));
});

test("loadConfig - invalid JSON is an error", async () => {
  const file = await writeConfig("broken.json", "{ notifications: ");

  await assert.rejects(loadConfig(file), (err: unknown) =>
    err instanceof ConfigError && err.message.startsWith("invalid JSON: "));
});

test("loadConfig - schema violations name the offending path", async () => {
  const file = await writeConfig("wrong.json", JSON.stringify({ notifications: { "cache-expiry-seconds": "soon" } }));

  await assert.rejects(loadConfig(file), (err: unknown) =>
    err instanceof ConfigError && err.message.startsWith("schema violation: notifications"));
});
