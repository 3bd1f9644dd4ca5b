import { z } from "zod";
import { ROLE_ORDER, type Role } from "./roles.js";
import { nowIso } from "./pipeline/utils.js";

export type NotificationKind = "update" | "error";
export type NotificationOrigin = "push" | "watch";

export type Notification = {
  source: Role;
  kind: NotificationKind;
  payload: unknown;
  timestamp: string;
  origin?: NotificationOrigin;
};

export const NotificationSchema = z
  .object({
    source: z.enum(ROLE_ORDER),
    kind: z.enum(["update", "error"]),
    payload: z.unknown(),
    timestamp: z.string().datetime().optional(),
    origin: z.enum(["push", "watch"]).optional()
  })
  .strict();

export type DispatchFn = (notification: Notification) => void;

export function makeNotification(source: Role, kind: NotificationKind, payload: unknown): Notification {
  return { source, kind, payload, timestamp: nowIso() };
}

export type NotificationBody = z.infer<typeof NotificationSchema>;

/** A validated push body as a Notification; a missing timestamp is stamped on arrival. */
export function fromPushBody(body: NotificationBody): Notification {
  return {
    source: body.source,
    kind: body.kind,
    payload: body.payload ?? null,
    timestamp: body.timestamp ?? nowIso(),
    origin: "push"
  };
}
