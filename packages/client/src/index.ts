/**
 * # Pushline Client
 *
 * Subscribe to server-side topics and receive their events over a WebSocket.
 * The client provisions a time-limited channel, keeps its topic subscriptions
 * in sync, watches the socket for silence and reconnects or renews the
 * channel on its own.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createPushClient } from 'pushline-client';
 *
 * const client = createPushClient({ host: 'example.test', token: 'my-token' });
 *
 * client.onEvent((event) => console.log(event.topic, event.message));
 * await client.subscribe(['orders.created']);
 * client.connect();
 * ```
 *
 * ## Custom Transports
 *
 * Anything implementing `SocketTransport` can replace the default `ws`
 * adapter:
 *
 * ```typescript
 * const client = createPushClient({ host: 'example.test', token, transport: myTransport });
 * ```
 *
 * @see {@link PushClient} - Main client class
 * @see {@link ConnectionSupervisor} - Reconnect and renewal state machine
 *
 * @module pushline-client
 */

export { PushClient, createPushClient, type SubscribeOptions } from "./push-client";

export {
  resolveConfig,
  PushClientSettingsSchema,
  DEFAULT_USER_AGENT,
  type PushClientConfig,
  type PushClientSettings,
  type ResolvedPushClientConfig,
} from "./config";

export { ConnectionSupervisor, type ConnectionSupervisorConfig } from "./connection-supervisor";
export { ChannelProvisioner } from "./channel-provisioner";
export {
  SubscriptionManager,
  type ChannelSource,
  type SubscriptionManagerConfig,
} from "./subscription-manager";
export { HeartbeatMonitor, type HeartbeatMonitorConfig } from "./heartbeat-monitor";
export { EventDispatcher } from "./event-dispatcher";

export type {
  Channel,
  ConnectionState,
  SubscribeMode,
  EventPayload,
  StatusNotice,
  EventHandler,
  StatusHandler,
} from "./types";

export * from "./core";

// Errors callers handle
export {
  PushlineError,
  AuthError,
  MissingChannelError,
  ExpiredChannelError,
  ProvisionError,
  SubscribeError,
  TopicLimitExceededError,
  ProtocolError,
  ClientError,
  ConfigError,
  isPushlineError,
  isAuthError,
} from "pushline-shared";
