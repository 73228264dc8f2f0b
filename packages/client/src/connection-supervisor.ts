/**
 * ConnectionSupervisor - channel and socket lifecycle
 *
 * The only component allowed to reconnect or renew. It owns the connection
 * state, the current channel and the subscription set, and consumes every
 * transport event through a single handler.
 *
 * State changes happen synchronously on the event loop; the only awaits are
 * around provisioning and subscription HTTP calls, and their results are
 * committed only if no user disconnect happened meanwhile (`epoch`).
 *
 * ```
 * idle ──subscribe──▶ provisioning ──▶ idle | connecting
 * connecting ──connected──▶ connected
 * connected ──loss──▶ reconnecting        (channel still valid)
 * connected ──loss──▶ renewing            (channel expired, or handshake 401)
 * renewing ──provision + replay──▶ connected
 * idle ──subscribe 401──▶ renewing ──provision + replay──▶ idle
 * any ──disconnect()──▶ disconnected      (no recovery)
 * ```
 */

import { randomUUID } from "node:crypto";
import {
  ClientError,
  ExpiredChannelError,
  METADATA_TOPIC,
  MissingChannelError,
  ProtocolError,
  ProvisionError,
  SOCKET_CLOSING_TOPIC,
  TopicFrameSchema,
  decodeJson,
  ensureError,
  isAuthError,
} from "pushline-shared";
import { Context, Logger, type ScheduledTask, type Scheduler } from "pushline-kernel";
import { calculateReconnectDelay, hasAttemptsLeft, type BackoffPolicy } from "./core/backoff";
import type { ProvisioningApi } from "./core/provisioning-api";
import type { SocketTransport, TransportEvent } from "./core/transport";
import { ChannelProvisioner } from "./channel-provisioner";
import type { EventDispatcher } from "./event-dispatcher";
import { HeartbeatMonitor } from "./heartbeat-monitor";
import { SubscriptionManager, type ChannelSource } from "./subscription-manager";
import type { Channel, ConnectionState, SubscribeMode } from "./types";

export interface ConnectionSupervisorConfig {
  transport: SocketTransport;
  api: ProvisioningApi;
  dispatcher: EventDispatcher;
  scheduler: Scheduler;
  /** Sent on the socket handshake */
  userAgent: string;
  heartbeatTimeout: number;
  topicLimit: number;
  /** Open the socket as soon as subscribe provisions a channel */
  autoConnect: boolean;
  backoff: BackoffPolicy;
  /** Jitter source (default: Math.random) */
  random?: () => number;
}

export class ConnectionSupervisor implements ChannelSource {
  private state: ConnectionState = "idle";
  private channel?: Channel;
  /** State to return to when provisioning or renewal does not lead to a connect */
  private resumeState: ConnectionState = "idle";
  private userDisconnect = false;
  /** A socket was requested and has not been lost or dropped */
  private socketActive = false;
  /** The current socket completed its handshake */
  private socketOpen = false;
  private reconnectAttempts = 0;
  private reconnectTimer?: ScheduledTask;
  private epoch = 0;
  private renewal?: Promise<void>;
  /** The running renewal ends by opening a socket */
  private renewalReopens = false;
  private detachTransport?: () => void;

  private readonly provisioner: ChannelProvisioner;
  private readonly subscriptions: SubscriptionManager;
  private readonly heartbeat: HeartbeatMonitor;
  private log = Logger.for(this);

  constructor(private config: ConnectionSupervisorConfig) {
    this.provisioner = new ChannelProvisioner(config.api);
    this.subscriptions = new SubscriptionManager({
      api: config.api,
      channels: this,
      topicLimit: config.topicLimit,
    });
    this.heartbeat = new HeartbeatMonitor({
      timeoutMs: config.heartbeatTimeout,
      scheduler: config.scheduler,
      onTimeout: () => this.handleHeartbeatTimeout(),
    });
    this.detachTransport = config.transport.onEvent((event) => this.handleTransportEvent(event));
  }

  // ===========================================================================
  // Read Snapshots
  // ===========================================================================

  getState(): ConnectionState {
    return this.state;
  }

  getChannel(): Readonly<Channel> | undefined {
    const channel = this.channel;
    if (!channel) return undefined;
    return Object.freeze({ ...channel, expiresAt: new Date(channel.expiresAt.getTime()) });
  }

  getSubscribedTopics(): Set<string> {
    return this.subscriptions.snapshot();
  }

  isConnected(): boolean {
    return this.state === "connected";
  }

  currentChannelId(): string | undefined {
    return this.channel?.id;
  }

  // ===========================================================================
  // Caller Operations
  // ===========================================================================

  /**
   * Sync `topics` with the server, provisioning a channel first if none is
   * live. A rejected token presumes the channel stale and starts a renewal;
   * the socket is reopened afterwards only if one was in use.
   */
  async subscribe(topics: Iterable<string>, mode: SubscribeMode): Promise<Set<string>> {
    try {
      return await this.subscriptions.subscribe(topics, mode);
    } catch (error) {
      if (isAuthError(error)) {
        this.handleAuthFailure();
      }
      throw error;
    }
  }

  /**
   * Return the current channel, provisioning a new one if there is none or it
   * has expired.
   */
  async ensureChannel(): Promise<Channel> {
    if (this.renewal) {
      await this.renewal;
    }

    const current = this.channel;
    if (current && !this.isExpired(current)) {
      return current;
    }

    if (this.state !== "provisioning") {
      this.resumeState = this.state;
      this.setState("provisioning");
    }

    let channel: Channel;
    try {
      channel = await this.provisioner.provision();
    } catch (error) {
      if (current && this.channel === current) {
        this.channel = undefined;
      }
      if (this.state === "provisioning") {
        this.setState(this.resumeState);
      }
      throw error;
    }

    this.channel = channel;
    if (this.state === "provisioning") {
      // A socket still bound to the old channel moves to the new one
      if (this.config.autoConnect || this.socketActive) {
        this.startConnecting(channel);
      } else {
        this.setState(this.resumeState);
      }
    }
    return channel;
  }

  /**
   * Open the socket on the current channel.
   *
   * @throws MissingChannelError if no channel was ever provisioned
   * @throws ExpiredChannelError if the channel has expired; renewal is never
   *   part of an explicit connect
   */
  connect(): void {
    const channel = this.channel;
    if (!channel) {
      throw new MissingChannelError();
    }
    if (this.isExpired(channel)) {
      throw new ExpiredChannelError(channel.id, channel.expiresAt);
    }
    if (this.renewal) {
      this.userDisconnect = false;
      this.renewalReopens = true;
      return;
    }
    if (this.socketActive) {
      return;
    }
    this.startConnecting(channel);
  }

  /**
   * Close the socket and suppress all automatic recovery until the next
   * connect. Idempotent.
   */
  disconnect(): void {
    this.userDisconnect = true;
    this.epoch++;
    this.heartbeat.cancel();
    this.cancelReconnect();

    if (this.socketActive) {
      this.socketActive = false;
      this.config.transport.disconnect();
    }

    if (this.state !== "idle") {
      this.setState("disconnected");
    }
  }

  dispose(): void {
    this.disconnect();
    this.detachTransport?.();
    this.detachTransport = undefined;
  }

  // ===========================================================================
  // Transport Events
  // ===========================================================================

  private handleTransportEvent(event: TransportEvent): void {
    switch (event.type) {
      case "connected":
        this.handleConnected(event.headers);
        break;

      case "text":
        if (!this.socketActive) return;
        this.heartbeat.arm();
        this.handleFrame(event.data);
        break;

      case "binary":
        if (!this.socketActive) return;
        this.heartbeat.arm();
        this.log.debug({ bytes: event.data.byteLength }, "Binary frame ignored");
        break;

      case "peerClosed":
        this.log.info("Server closed the socket");
        break;

      case "disconnected":
        this.log.info({ code: event.code, reason: event.reason }, "Socket disconnected");
        this.handleConnectionLoss();
        break;

      case "cancelled":
        this.log.debug("Connection attempt cancelled");
        this.handleConnectionLoss();
        break;

      case "error":
        this.log.warn({ err: event.error, statusCode: event.statusCode }, "Socket error");
        this.config.dispatcher.emitStatus({ type: "error", error: event.error });
        this.handleConnectionLoss(event.statusCode === 401);
        break;
    }
  }

  private handleConnected(headers: Record<string, string>): void {
    if (!this.socketActive) {
      this.log.debug("Ignoring handshake of a dropped socket");
      return;
    }

    this.socketOpen = true;
    this.userDisconnect = false;
    this.reconnectAttempts = 0;
    this.cancelReconnect();
    this.setState("connected");
    this.heartbeat.arm();

    this.log.info({ channelId: this.channel?.id }, "Socket connected");
    this.config.dispatcher.emitStatus({ type: "connection", connected: true, headers });
  }

  private handleFrame(text: string): void {
    const decoded = decodeJson(text, TopicFrameSchema);
    if (!decoded.success) {
      const error =
        decoded.kind === "schema"
          ? ProtocolError.missingTopic(text)
          : new ProtocolError(`Frame is not valid JSON: "${text}"`, text, decoded.cause);
      this.log.warn({ err: error }, "Malformed frame");
      this.config.dispatcher.emitStatus({ type: "error", error });
      return;
    }

    const frame = decoded.data;
    switch (frame.topicName) {
      case SOCKET_CLOSING_TOPIC:
        this.log.info("Server is closing the socket, reconnecting");
        this.forceReconnect();
        return;

      case METADATA_TOPIC:
        this.log.debug("Channel metadata received");
        return;

      default:
        this.config.dispatcher.emitEvent({ topic: frame.topicName, message: frame });
    }
  }

  private handleConnectionLoss(authRejected: boolean = false): void {
    const wasActive = this.socketActive || this.socketOpen;
    this.markSocketClosed();

    if (this.userDisconnect) {
      this.setState("disconnected");
      return;
    }

    // Late events of a socket already given up on
    if (!wasActive || this.renewal || this.reconnectTimer) {
      return;
    }

    if (!this.channel) {
      this.setState("disconnected");
      return;
    }

    if (authRejected) {
      this.log.warn({ channelId: this.channel.id }, "Socket handshake rejected, renewing channel");
      this.startRenewal();
      return;
    }

    this.recover();
  }

  private handleHeartbeatTimeout(): void {
    if (this.userDisconnect || this.renewal || !this.socketOpen) {
      return;
    }
    this.log.warn(
      { timeoutMs: this.config.heartbeatTimeout, lastSeenAt: this.heartbeat.lastSeenAt },
      "No traffic within heartbeat window, reconnecting",
    );
    this.forceReconnect();
  }

  private handleAuthFailure(): void {
    // Nothing provisioned yet, so nothing to renew
    if (!this.channel) {
      return;
    }
    this.log.warn({ channelId: this.channel.id }, "Token rejected, renewing channel");
    this.startRenewal(this.socketActive || this.socketOpen);
  }

  // ===========================================================================
  // Recovery
  // ===========================================================================

  /** Drop a socket that still looks alive and recover as after a loss. */
  private forceReconnect(): void {
    if (this.userDisconnect || this.renewal) {
      return;
    }
    this.markSocketClosed();
    this.cancelReconnect();
    this.recover();
  }

  private recover(): void {
    const channel = this.channel;
    if (!channel) {
      this.setState("disconnected");
      return;
    }
    if (this.isExpired(channel)) {
      this.startRenewal();
      return;
    }
    this.scheduleReconnect();
  }

  /**
   * First attempt after a loss is immediate; later ones back off.
   */
  private scheduleReconnect(): void {
    this.cancelReconnect();
    const { backoff } = this.config;

    if (!hasAttemptsLeft(this.reconnectAttempts, backoff)) {
      this.log.warn({ attempts: this.reconnectAttempts }, "Reconnect attempts exhausted");
      this.setState("disconnected");
      this.config.dispatcher.emitStatus({
        type: "error",
        error: ClientError.reconnectExhausted(this.reconnectAttempts),
      });
      return;
    }

    this.reconnectAttempts++;
    this.setState("reconnecting");

    if (this.reconnectAttempts === 1) {
      this.log.info({ channelId: this.channel?.id }, "Reconnecting");
      this.config.transport.disconnect();
      this.reopen();
      return;
    }

    const delay = calculateReconnectDelay(this.reconnectAttempts - 2, backoff, this.config.random);
    this.log.info({ attempt: this.reconnectAttempts, delay }, "Reconnecting after delay");
    this.reconnectTimer = this.config.scheduler.schedule(delay, () => {
      this.reconnectTimer = undefined;
      this.reopen();
    });
  }

  private reopen(): void {
    const channel = this.channel;
    if (!channel) {
      this.setState("disconnected");
      return;
    }
    if (this.isExpired(channel)) {
      this.startRenewal();
      return;
    }
    this.openSocket(channel);
  }

  private startRenewal(reopen: boolean = true): void {
    if (this.renewal) {
      return;
    }

    this.cancelReconnect();
    this.renewalReopens = reopen;
    if (reopen) {
      this.markSocketClosed();
      this.config.transport.disconnect();
    } else {
      this.resumeState = this.state;
    }
    this.setState("renewing");

    const epoch = this.epoch;
    this.renewal = Context.fork(
      { requestId: randomUUID(), operation: "renewal", channelId: this.channel?.id },
      () => this.renew(epoch),
    ).finally(() => {
      this.renewal = undefined;
    });
  }

  /**
   * Provision a new channel, replay the subscription set onto it, reopen the
   * socket if one is wanted. Never rejects: failures end in `disconnected`
   * plus a notice.
   */
  private async renew(epoch: number): Promise<void> {
    this.log.info("Renewing channel");

    let channel: Channel;
    try {
      channel = await this.provisioner.provision(true);
      if (this.isExpired(channel)) {
        throw new ProvisionError(
          "decode",
          `Channel ${channel.id} expired at ${channel.expiresAt.toISOString()}`,
        );
      }
    } catch (error) {
      if (epoch !== this.epoch) return;
      this.channel = undefined;
      this.failRenewal(ensureError(error));
      return;
    }

    if (epoch !== this.epoch) return;
    this.channel = channel;

    const topics = this.subscriptions.snapshot();
    if (topics.size > 0) {
      try {
        await this.subscriptions.sync(channel, topics, "replace");
      } catch (error) {
        if (epoch !== this.epoch) return;
        this.failRenewal(ensureError(error));
        return;
      }
      if (epoch !== this.epoch) return;
    }

    this.log.info({ channelId: channel.id, topics: topics.size }, "Channel renewed");
    if (this.renewalReopens) {
      this.openSocket(channel);
    } else {
      this.setState(this.resumeState);
    }
  }

  private failRenewal(cause: Error): void {
    this.log.error({ err: cause }, "Channel renewal failed");
    this.setState("disconnected");
    this.config.dispatcher.emitStatus({ type: "error", error: ClientError.renewal(cause) });
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private startConnecting(channel: Channel): void {
    this.markSocketClosed();
    this.userDisconnect = false;
    this.reconnectAttempts = 0;
    this.cancelReconnect();
    this.setState("connecting");
    this.openSocket(channel);
  }

  private openSocket(channel: Channel): void {
    this.socketActive = true;
    this.socketOpen = false;
    this.log.debug({ channelId: channel.id }, "Opening socket");
    this.config.transport.connect(channel.connectUri, { "User-Agent": this.config.userAgent });
  }

  private markSocketClosed(): void {
    const wasOpen = this.socketOpen;
    this.socketActive = false;
    this.socketOpen = false;
    this.heartbeat.cancel();
    if (wasOpen) {
      this.config.dispatcher.emitStatus({ type: "connection", connected: false });
    }
  }

  private cancelReconnect(): void {
    this.reconnectTimer?.cancel();
    this.reconnectTimer = undefined;
  }

  private isExpired(channel: Channel): boolean {
    return channel.expiresAt.getTime() <= this.config.scheduler.now();
  }

  private setState(next: ConnectionState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    this.log.debug({ previous, state: next }, "State changed");
    this.config.dispatcher.emitStatus({ type: "state", state: next, previous });
  }
}
