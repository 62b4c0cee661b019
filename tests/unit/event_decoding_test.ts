/**
 * Compositor Event and Reply Decoding Tests
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import { ZodError } from "zod";
import { expectHandled, parseEventLine, parseReply } from "../../src/services/niri-client.ts";
import { CompositorReplyError, ProtocolError } from "../../src/utils/errors.ts";
import { decodeEvent } from "../../src/validation.ts";

test("decodeEvent - WindowsChanged fills defaults for missing optional fields", () => {
  const event = decodeEvent({
    WindowsChanged: {
      windows: [{ id: 7, title: "Terminal", app_id: "foot", pid: 1234, workspace_id: 2, is_focused: true }],
    },
  });

  assert.deepEqual(event, {
    type: "windows-changed",
    windows: [{
      id: 7,
      title: "Terminal",
      app_id: "foot",
      pid: 1234,
      workspace_id: 2,
      is_focused: true,
      is_floating: false,
      is_urgent: false,
      layout: null,
    }],
  });
});

test("decodeEvent - WorkspacesChanged", () => {
  const event = decodeEvent({
    WorkspacesChanged: {
      workspaces: [{
        id: 1,
        idx: 1,
        name: "web",
        output: "DP-1",
        is_active: true,
        is_focused: true,
        active_window_id: 7,
      }],
    },
  });

  assert.deepEqual(event, {
    type: "workspaces-changed",
    workspaces: [{
      id: 1,
      idx: 1,
      name: "web",
      output: "DP-1",
      is_urgent: false,
      is_active: true,
      is_focused: true,
      active_window_id: 7,
    }],
  });
});

test("decodeEvent - incremental window events", () => {
  assert.deepEqual(decodeEvent({ WindowClosed: { id: 3 } }), { type: "window-closed", id: 3 });
  assert.deepEqual(decodeEvent({ WindowFocusChanged: { id: null } }), { type: "window-focus-changed", id: null });
  assert.deepEqual(decodeEvent({ WindowFocusChanged: { id: 4 } }), { type: "window-focus-changed", id: 4 });
  assert.deepEqual(
    decodeEvent({ WorkspaceActivated: { id: 2, focused: false } }),
    { type: "workspace-activated", id: 2, focused: false },
  );
});

test("decodeEvent - WindowLayoutsChanged keeps id/layout pairs", () => {
  const event = decodeEvent({
    WindowLayoutsChanged: {
      changes: [[5, { pos_in_scrolling_layout: [1, 2], tile_size: [640, 480] }]],
    },
  });

  assert.deepEqual(event, {
    type: "window-layouts-changed",
    changes: [[5, { pos_in_scrolling_layout: [1, 2], tile_size: [640, 480] }]],
  });
});

test("decodeEvent - unknown event names are ignored, not rejected", () => {
  assert.deepEqual(
    decodeEvent({ KeyboardLayoutSwitched: { idx: 1 } }),
    { type: "ignored", name: "KeyboardLayoutSwitched" },
  );
  assert.deepEqual(decodeEvent("SomeUnitEvent"), { type: "ignored", name: "SomeUnitEvent" });
});

test("decodeEvent - malformed payload of a known event throws ZodError", () => {
  assert.throws(() => decodeEvent({ WindowClosed: { id: "three" } }), ZodError);
  assert.throws(() => decodeEvent({ WindowClosed: { id: 1 }, WindowFocusChanged: { id: 1 } }), ZodError);
});

test("parseEventLine - skips lines that are not valid JSON", () => {
  assert.equal(parseEventLine("{not json"), null);
  assert.equal(parseEventLine('{"WindowClosed":{}}'), null);
  assert.deepEqual(parseEventLine('{"WindowClosed":{"id":9}}'), { type: "window-closed", id: 9 });
});

test("parseReply - Ok and Err replies", () => {
  assert.deepEqual(parseReply('{"Ok":"Handled"}'), { ok: true, response: "Handled" });
  assert.deepEqual(parseReply('{"Err":"no such window"}'), { ok: false, error: "no such window" });
});

test("parseReply - anything else is a protocol error", () => {
  assert.throws(() => parseReply("garbage"), ProtocolError);
  assert.throws(() => parseReply('{"Maybe":1}'), ProtocolError);
});

test("expectHandled - accepts Handled, rejects other responses and errors", () => {
  expectHandled({ ok: true, response: "Handled" });

  assert.throws(
    () => expectHandled({ ok: true, response: { Version: "25.02" } }),
    (err: unknown) => err instanceof ProtocolError && err.expected === "Handled",
  );
  assert.throws(
    () => expectHandled({ ok: false, error: "window not found" }),
    { name: "CompositorReplyError", message: "compositor reply: window not found" },
  );
  assert.throws(() => expectHandled({ ok: false, error: "x" }), CompositorReplyError);
});
