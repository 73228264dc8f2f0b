/**
 * Client types
 */

import type { JsonObject } from "pushline-shared";

// =============================================================================
// Channel
// =============================================================================

/**
 * A server-issued, time-limited binding between a connect endpoint and a set
 * of topic subscriptions. Replaced on renewal, never mutated.
 */
export interface Channel {
  readonly connectUri: string;
  readonly id: string;
  readonly expiresAt: Date;
}

// =============================================================================
// Connection State
// =============================================================================

export type ConnectionState =
  | "idle"
  | "provisioning"
  | "connecting"
  | "connected"
  | "reconnecting"
  | "renewing"
  | "disconnected";

/** PUT replaces the server-side topic set, POST appends to it */
export type SubscribeMode = "replace" | "append";

// =============================================================================
// Published Outputs
// =============================================================================

/**
 * One inbound topic event. `message` is the whole decoded frame, `topicName`
 * included.
 */
export interface EventPayload {
  topic: string;
  message: JsonObject;
}

export type StatusNotice =
  | { type: "connection"; connected: boolean; headers?: Record<string, string> }
  | { type: "error"; error: Error }
  | { type: "state"; state: ConnectionState; previous: ConnectionState };

export type EventHandler = (event: EventPayload) => void;

export type StatusHandler = (notice: StatusNotice) => void;
