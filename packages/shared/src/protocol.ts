/**
 * Wire formats of the provisioning API and the socket frames.
 *
 * Response bodies are validated with zod; a body that parses as JSON but does
 * not match the schema is a decode failure, never a silently empty value.
 */

import { z } from "zod";

// =============================================================================
// JSON
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

// =============================================================================
// Reserved Topics
// =============================================================================

/** Metadata frame the server sends periodically; doubles as heartbeat. */
export const METADATA_TOPIC = "channel.metadata";

/** Server is about to close the socket gracefully. */
export const SOCKET_CLOSING_TOPIC = "v2.system.socket_closing";

export const SYSTEM_TOPICS: ReadonlySet<string> = new Set([METADATA_TOPIC, SOCKET_CLOSING_TOPIC]);

export function isSystemTopic(topic: string): boolean {
  return SYSTEM_TOPICS.has(topic);
}

// =============================================================================
// Timestamps
// =============================================================================

const ISO_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})\.(\d+)(Z|[+-]\d{2}:?\d{2})$/;

/**
 * Parse an ISO-8601 timestamp with fractional seconds and a UTC offset
 * (`2023-01-13T10:15:30.123Z`, `2023-01-13T12:15:30.123456+02:00`).
 *
 * Fractional digits beyond milliseconds are truncated. Returns undefined for
 * anything else, including timestamps without fractional seconds.
 */
export function parseTimestamp(value: string): Date | undefined {
  const match = ISO_TIMESTAMP.exec(value);
  if (!match) return undefined;

  const [, dateTime, fraction, offset] = match;
  const millis = fraction.slice(0, 3).padEnd(3, "0");
  const zone = offset === "Z" || offset.includes(":") ? offset : `${offset.slice(0, 3)}:${offset.slice(3)}`;

  const time = Date.parse(`${dateTime}.${millis}${zone}`);
  return Number.isNaN(time) ? undefined : new Date(time);
}

const TimestampSchema = z.string().transform((value, ctx) => {
  const date = parseTimestamp(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` });
    return z.NEVER;
  }
  return date;
});

// =============================================================================
// Provisioning API
// =============================================================================

/** `POST /channels` response body */
export const ChannelResponseSchema = z.object({
  connectUri: z.string().min(1),
  id: z.string().min(1),
  expires: TimestampSchema,
});

export type ChannelResponse = z.infer<typeof ChannelResponseSchema>;

export const SubscriptionEntitySchema = z.object({
  id: z.string(),
});

/** `PUT|POST /channels/{id}/subscriptions` response body */
export const SubscriptionResponseSchema = z.object({
  entities: z.array(SubscriptionEntitySchema),
});

export type SubscriptionResponse = z.infer<typeof SubscriptionResponseSchema>;

/** Subscription request body: one `{id}` object per topic */
export function createSubscriptionPayload(topics: Iterable<string>): Array<{ id: string }> {
  return Array.from(topics, (id) => ({ id }));
}

// =============================================================================
// Socket Frames
// =============================================================================

export const TopicFrameSchema = z
  .object({
    topicName: z.string(),
  })
  .catchall(JsonValueSchema);

export type TopicFrame = z.infer<typeof TopicFrameSchema>;

/**
 * Outcome of decoding a body or frame. `kind` tells text that is not JSON at
 * all (`syntax`) from JSON of the wrong shape (`schema`).
 */
export type DecodeResult<T> =
  | { success: true; data: T }
  | { success: false; kind: "syntax" | "schema"; error: string; cause?: Error };

/**
 * Parse JSON text and validate it against a schema.
 */
export function decodeJson<S extends z.ZodTypeAny>(text: string, schema: S): DecodeResult<z.output<S>> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return {
      success: false,
      kind: "syntax",
      error: "Body is not valid JSON",
      cause: error instanceof Error ? error : undefined,
    };
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    return { success: false, kind: "schema", error: formatIssues(result.error), cause: result.error };
  }
  return { success: true, data: result.data };
}

export function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map(formatIssue).join("; ");
}
