/**
 * PushClient - subscribe to topics and receive their events over a socket
 *
 * Wires the provisioning API, the socket transport and the connection
 * supervisor together behind one object.
 *
 * @example
 * ```typescript
 * const client = createPushClient({ host: 'example.test', token: process.env.PUSH_TOKEN ?? '' });
 *
 * client.onEvent('orders.created', (event) => console.log(event.message));
 * client.onStatus((notice) => {
 *   if (notice.type === 'error') console.error(notice.error);
 * });
 *
 * await client.subscribe(['orders.created', 'orders.cancelled']);
 * client.connect();
 * ```
 */

import { resolveConfig, type PushClientConfig, type ResolvedPushClientConfig } from "./config";
import { ProvisioningApi } from "./core/provisioning-api";
import { WebSocketTransport } from "./core/ws-transport";
import { ConnectionSupervisor } from "./connection-supervisor";
import { EventDispatcher } from "./event-dispatcher";
import type { Channel, ConnectionState, EventHandler, StatusHandler } from "./types";

export interface SubscribeOptions {
  /** Add to the current topics instead of replacing them (default: false) */
  append?: boolean;
}

export class PushClient {
  private readonly config: ResolvedPushClientConfig;
  private readonly dispatcher = new EventDispatcher();
  private readonly supervisor: ConnectionSupervisor;

  constructor(config: PushClientConfig) {
    this.config = resolveConfig(config);

    const api = new ProvisioningApi({
      baseUrl: this.config.baseUrl,
      token: this.config.token,
      userAgent: this.config.userAgent,
      requestTimeout: this.config.requestTimeout,
      routes: this.config.routes,
      fetch: this.config.fetch,
    });

    const transport =
      this.config.transport ??
      new WebSocketTransport({
        handshakeTimeout: this.config.requestTimeout > 0 ? this.config.requestTimeout : undefined,
      });

    this.supervisor = new ConnectionSupervisor({
      transport,
      api,
      dispatcher: this.dispatcher,
      scheduler: this.config.scheduler,
      userAgent: this.config.userAgent,
      heartbeatTimeout: this.config.heartbeatTimeout,
      topicLimit: this.config.topicLimit,
      autoConnect: this.config.autoConnect,
      backoff: {
        reconnectDelay: this.config.reconnectDelay,
        maxReconnectDelay: this.config.maxReconnectDelay,
        maxReconnectAttempts: this.config.maxReconnectAttempts,
        reconnectJitter: this.config.reconnectJitter,
      },
    });
  }

  // ===========================================================================
  // Subscriptions
  // ===========================================================================

  /**
   * Subscribe to `topics`, provisioning a channel on first use. Replaces the
   * current topics unless `append` is set.
   *
   * @returns The topics the server confirmed
   */
  subscribe(topics: Iterable<string>, options: SubscribeOptions = {}): Promise<Set<string>> {
    return this.supervisor.subscribe(topics, options.append ? "append" : "replace");
  }

  getSubscribedTopics(): Set<string> {
    return this.supervisor.getSubscribedTopics();
  }

  // ===========================================================================
  // Connection
  // ===========================================================================

  /**
   * Open the socket on the provisioned channel.
   *
   * @throws MissingChannelError before the first successful subscribe
   * @throws ExpiredChannelError when the channel has expired
   */
  connect(): void {
    this.supervisor.connect();
  }

  disconnect(): void {
    this.supervisor.disconnect();
  }

  getState(): ConnectionState {
    return this.supervisor.getState();
  }

  getChannel(): Readonly<Channel> | undefined {
    return this.supervisor.getChannel();
  }

  isConnected(): boolean {
    return this.supervisor.isConnected();
  }

  // ===========================================================================
  // Listeners
  // ===========================================================================

  onEvent(handler: EventHandler): () => void;
  onEvent(topic: string, handler: EventHandler): () => void;
  onEvent(topicOrHandler: string | EventHandler, handler?: EventHandler): () => void {
    if (typeof topicOrHandler === "function") {
      return this.dispatcher.onEvent(topicOrHandler);
    }
    if (!handler) {
      throw new TypeError("onEvent(topic, handler) requires a handler");
    }
    return this.dispatcher.onEvent(topicOrHandler, handler);
  }

  onStatus(handler: StatusHandler): () => void {
    return this.dispatcher.onStatus(handler);
  }

  /**
   * Disconnect, stop listening to the transport and drop every listener.
   */
  dispose(): void {
    this.supervisor.dispose();
    this.dispatcher.clear();
  }
}

export function createPushClient(config: PushClientConfig): PushClient {
  return new PushClient(config);
}
