/**
 * Zod Validation Schemas
 *
 * Runtime validation for compositor replies and events, notification method calls and the
 * configuration file.
 */

import dbus from "dbus-next";
import { z } from "zod";
import type {
  CompositorEvent,
  CompositorReply,
  Notification,
  NotificationAction,
  NotificationHints,
  NiriWindow,
  WindowLayout,
  Workspace,
} from "./models.ts";

// ============================================================================
// Compositor Schemas
// ============================================================================

const PairSchema = z.tuple([z.number(), z.number()]);

const IdSchema = z.number().int().nonnegative();

export const WindowLayoutSchema: z.ZodType<WindowLayout, z.ZodTypeDef, unknown> = z.object({
  pos_in_scrolling_layout: PairSchema.nullable().default(null),
  tile_size: PairSchema.optional(),
  window_size: PairSchema.optional(),
  tile_pos_in_workspace_view: PairSchema.nullable().optional(),
  window_offset_in_tile: PairSchema.optional(),
});

export const NiriWindowSchema: z.ZodType<NiriWindow, z.ZodTypeDef, unknown> = z.object({
  id: IdSchema,
  title: z.string().nullable().default(null),
  app_id: z.string().nullable().default(null),
  pid: z.number().int().nullable().default(null),
  workspace_id: IdSchema.nullable().default(null),
  is_focused: z.boolean(),
  is_floating: z.boolean().default(false),
  is_urgent: z.boolean().default(false),
  layout: WindowLayoutSchema.nullable().default(null),
});

export const WorkspaceSchema: z.ZodType<Workspace, z.ZodTypeDef, unknown> = z.object({
  id: IdSchema,
  idx: z.number().int(),
  name: z.string().nullable().default(null),
  output: z.string().nullable().default(null),
  is_urgent: z.boolean().default(false),
  is_active: z.boolean(),
  is_focused: z.boolean(),
  active_window_id: IdSchema.nullable().default(null),
});

type EventDecoder = z.ZodType<CompositorEvent, z.ZodTypeDef, unknown>;

const EVENT_DECODERS = new Map<string, EventDecoder>([
  [
    "WindowsChanged",
    z.object({ windows: z.array(NiriWindowSchema) })
      .transform(({ windows }) => ({ type: "windows-changed" as const, windows })),
  ],
  [
    "WorkspacesChanged",
    z.object({ workspaces: z.array(WorkspaceSchema) })
      .transform(({ workspaces }) => ({ type: "workspaces-changed" as const, workspaces })),
  ],
  [
    "WindowClosed",
    z.object({ id: IdSchema })
      .transform(({ id }) => ({ type: "window-closed" as const, id })),
  ],
  [
    "WindowOpenedOrChanged",
    z.object({ window: NiriWindowSchema })
      .transform(({ window }) => ({ type: "window-opened-or-changed" as const, window })),
  ],
  [
    "WindowFocusChanged",
    z.object({ id: IdSchema.nullable() })
      .transform(({ id }) => ({ type: "window-focus-changed" as const, id })),
  ],
  [
    "WindowLayoutsChanged",
    z.object({ changes: z.array(z.tuple([IdSchema, WindowLayoutSchema])) })
      .transform(({ changes }) => ({ type: "window-layouts-changed" as const, changes })),
  ],
  [
    "WorkspaceActivated",
    z.object({ id: IdSchema, focused: z.boolean() })
      .transform(({ id, focused }) => ({ type: "workspace-activated" as const, id, focused })),
  ],
]);

/**
 * Decode one event object from the compositor's event stream.
 *
 * Events are externally tagged: `{"WindowClosed": {"id": 3}}`. Unknown tags decode to an
 * `ignored` event; a known tag with a malformed payload throws a `ZodError`.
 */
export function decodeEvent(raw: unknown): CompositorEvent {
  if (typeof raw === "string") {
    return { type: "ignored", name: raw };
  }

  const envelope = z.record(z.unknown())
    .refine((value) => Object.keys(value).length === 1, "event must have exactly one variant")
    .parse(raw);

  const [[name, payload]] = Object.entries(envelope);
  const decoder = EVENT_DECODERS.get(name);
  if (!decoder) {
    return { type: "ignored", name };
  }

  return decoder.parse(payload);
}

export const CompositorReplySchema: z.ZodType<CompositorReply, z.ZodTypeDef, unknown> = z.union([
  z.object({ Err: z.string() })
    .transform(({ Err }) => ({ ok: false as const, error: Err })),
  z.object({ Ok: z.unknown() })
    .refine((value) => value.Ok !== undefined, "reply has no Ok value")
    .transform(({ Ok }) => ({ ok: true as const, response: Ok })),
]);

// ============================================================================
// Notification Schemas
// ============================================================================

const BusIntegerSchema = z.union([z.number().int(), z.bigint()]).transform(Number);

export const NotificationHintsSchema: z.ZodType<NotificationHints, z.ZodTypeDef, unknown> = z
  .record(z.instanceof(dbus.Variant))
  .transform((hints) => {
    // Hints of an unexpected type are dropped rather than failing the whole notification.
    const hint = <T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined => {
      const variant = hints[key];
      if (!variant) {
        return undefined;
      }
      const parsed = schema.safeParse(variant.value);
      return parsed.success ? parsed.data : undefined;
    };

    return {
      actionIcons: hint("action-icons", z.boolean()),
      category: hint("category", z.string()),
      desktopEntry: hint("desktop-entry", z.string()),
      imagePath: hint("image-path", z.string()),
      resident: hint("resident", z.boolean()),
      soundFile: hint("sound-file", z.string()),
      soundName: hint("sound-name", z.string()),
      suppressSound: hint("suppress-sound", z.boolean()),
      transient: hint("transient", z.boolean()),
      senderPid: hint("sender-pid", BusIntegerSchema),
      urgency: hint("urgency", BusIntegerSchema),
      x: hint("x", BusIntegerSchema),
      y: hint("y", BusIntegerSchema),
    };
  });

const optionalText = (value: string): string | null => (value.length > 0 ? value : null);

/**
 * Body of `org.freedesktop.Notifications.Notify`, signature `susssasa{sv}i`
 */
export const NotifyBodySchema: z.ZodType<Notification, z.ZodTypeDef, unknown> = z
  .tuple([
    z.string(),
    BusIntegerSchema,
    z.string(),
    z.string(),
    z.string(),
    z.array(z.string()),
    NotificationHintsSchema,
    BusIntegerSchema,
  ])
  .transform(([appName, replacesId, appIcon, summary, body, actions, hints, expireTimeout]) => {
    // Actions arrive flattened as [id, label, id, label, ...]; a trailing id is dropped.
    const pairs: NotificationAction[] = [];
    for (let i = 0; i + 1 < actions.length; i += 2) {
      pairs.push({ id: actions[i], label: actions[i + 1] });
    }

    return {
      appName: optionalText(appName),
      replacesId,
      appIcon: optionalText(appIcon),
      summary,
      body: optionalText(body),
      actions: pairs,
      hints,
      expireTimeout,
    };
  });

// ============================================================================
// Configuration Schemas
// ============================================================================

const RegexSchema = z.string().transform((source, ctx) => {
  try {
    return new RegExp(source);
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid regular expression "${source}": ${err instanceof Error ? err.message : String(err)}`,
    });
    return z.NEVER;
  }
});

export const AppRuleSchema = z.object({
  match: RegexSchema,
  class: z.string().min(1),
});

export const NotificationSettingsSchema = z
  .object({
    "enabled": z.boolean().default(false),
    "use-desktop-entry": z.boolean().default(true),
    "use-fuzzy-matching": z.boolean().default(false),
    "map-app-ids": z.record(z.string()).default({}),
    "cache-expiry-seconds": z.number().positive().default(300),
    "cache-sweep-seconds": z.number().positive().default(60),
  })
  .transform((settings) => ({
    enabled: settings["enabled"],
    useDesktopEntry: settings["use-desktop-entry"],
    useFuzzyMatching: settings["use-fuzzy-matching"],
    mapAppIds: settings["map-app-ids"],
    cacheExpiryMs: settings["cache-expiry-seconds"] * 1000,
    cacheSweepMs: settings["cache-sweep-seconds"] * 1000,
  }));

export type NotificationSettings = z.output<typeof NotificationSettingsSchema>;

export const ConfigSchema = z.object({
  apps: z.record(z.array(AppRuleSchema)).default({}),
  // `"notifications": true` is shorthand for `{ "enabled": true }`.
  notifications: z
    .union([
      z.boolean().transform((enabled) => NotificationSettingsSchema.parse({ enabled })),
      NotificationSettingsSchema,
    ])
    .default(false),
});

export type ConfigInput = z.input<typeof ConfigSchema>;
export type ConfigValidated = z.output<typeof ConfigSchema>;
export type AppRule = z.output<typeof AppRuleSchema>;
