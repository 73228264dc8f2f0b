/**
 * Core primitives: socket port, its `ws` adapter, the provisioning HTTP API
 * and reconnect backoff. Usable without the supervisor for custom setups.
 */

export type {
  SocketTransport,
  TransportEvent,
  TransportEventType,
  TransportEventHandler,
} from "./transport";
export { WebSocketTransport, type WebSocketTransportConfig } from "./ws-transport";
export {
  ProvisioningApi,
  DEFAULT_ROUTES,
  type ProvisioningApiConfig,
  type ProvisioningRoutes,
  type FetchLike,
  type ApiResponse,
} from "./provisioning-api";
export { calculateReconnectDelay, hasAttemptsLeft, type BackoffPolicy } from "./backoff";
