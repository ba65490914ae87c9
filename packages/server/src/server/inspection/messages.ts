import { z } from "zod";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

// ============================================================================
// Traffic events
// ============================================================================

/**
 * An event as published on the bus. The relay treats it as an opaque JSON
 * object and only adds the push discriminator on the way out.
 */
export const TrafficEventSchema = z.record(z.string(), JsonValueSchema);

export type TrafficEvent = z.infer<typeof TrafficEventSchema>;

export const TRAFFIC_EVENT_NAMES = [
  "subscribe",
  "unsubscribe",
  "work_started",
  "work_finished",
  "request_complete",
  "response_headers_complete",
  "response_chunk_received",
  "response_complete",
] as const;

export type TrafficEventName = (typeof TRAFFIC_EVENT_NAMES)[number];

// ============================================================================
// Control messages (observer -> session)
// ============================================================================

export const ControlMessageIdSchema = z.union([z.string(), z.number()]);

export type ControlMessageId = z.infer<typeof ControlMessageIdSchema>;

export const ControlMessageSchema = z
  .object({
    id: ControlMessageIdSchema,
    method: z.string(),
  })
  .passthrough();

export type ControlMessage = z.infer<typeof ControlMessageSchema>;

export type ControlDecodeResult =
  | { ok: true; message: ControlMessage }
  | { ok: false; reason: "invalid_json" | "invalid_shape"; error: string };

export function decodeControlMessage(raw: string): ControlDecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return {
      ok: false,
      reason: "invalid_json",
      error: err instanceof Error ? err.message : String(err),
    };
  }

  const result = ControlMessageSchema.safeParse(parsed);
  if (!result.success) {
    return {
      ok: false,
      reason: "invalid_shape",
      error: result.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; "),
    };
  }
  return { ok: true, message: result.data };
}

// ============================================================================
// Replies and pushes (session -> observer)
// ============================================================================

export const REPLY_RESPONSES = [
  "pong",
  "not enabled",
  "inspection_enabled",
  "inspection_disabled",
  "not_implemented",
] as const;

export type ReplyResponse = (typeof REPLY_RESPONSES)[number];

export type ReplyMessage = {
  id: ControlMessageId;
  response: ReplyResponse;
};

export type PushKind = "inspect_traffic" | "inspection_stopped";

export type PushMessage = TrafficEvent & { push: PushKind };

export function encodeReply(id: ControlMessageId, response: ReplyResponse): string {
  const reply: ReplyMessage = { id, response };
  return JSON.stringify(reply);
}

/**
 * Serialize an event as a push message. The event itself is left untouched;
 * the discriminator is set on a copy and wins over any `push` field the event
 * already carried.
 */
export function encodePush(event: TrafficEvent, push: PushKind = "inspect_traffic"): string {
  const message: PushMessage = { ...event, push };
  return JSON.stringify(message);
}
