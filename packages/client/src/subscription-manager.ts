/**
 * SubscriptionManager - the subscribed topic set and its server sync
 *
 * The local set only changes on a successful server acknowledgement, and only
 * topics the server echoes back are kept. The set belongs to the channel it
 * was last synced to: an answer for a channel that has since been replaced is
 * never committed, and appending onto a new channel first replays the set.
 */

import {
  AuthError,
  MissingChannelError,
  SubscribeError,
  SubscriptionResponseSchema,
  TopicLimitExceededError,
  decodeJson,
  ensureError,
  isAuthError,
  isMissingChannelError,
  isSubscribeError,
} from "pushline-shared";
import { Logger } from "pushline-kernel";
import type { ApiResponse, ProvisioningApi } from "./core/provisioning-api";
import type { Channel, SubscribeMode } from "./types";

/**
 * Supplies a live (provisioned, unexpired) channel.
 */
export interface ChannelSource {
  ensureChannel(): Promise<Channel>;
  /** Id of the channel currently in use, if any */
  currentChannelId(): string | undefined;
}

/** Attempts per subscribe when the channel is replaced mid-request */
const MAX_SYNC_ATTEMPTS = 2;

export interface SubscriptionManagerConfig {
  api: ProvisioningApi;
  channels: ChannelSource;
  topicLimit: number;
}

export class SubscriptionManager {
  private topics = new Set<string>();
  /** Channel the local set was last confirmed on */
  private syncedChannelId?: string;
  private log = Logger.for(this);

  constructor(private config: SubscriptionManagerConfig) {}

  /**
   * Subscribe to `topics` on the current channel, provisioning one first if
   * needed.
   *
   * @returns The subscribed topic set after the call
   * @throws TopicLimitExceededError before any network call when over the limit
   * @throws MissingChannelError when no channel could be provisioned
   * @throws SubscribeError with reason `superseded` when the channel keeps
   *   being replaced under the request
   */
  async subscribe(topics: Iterable<string>, mode: SubscribeMode): Promise<Set<string>> {
    const requested = new Set(topics);
    if (requested.size > this.config.topicLimit) {
      throw new TopicLimitExceededError(requested.size, this.config.topicLimit);
    }

    for (let attempt = 1; ; attempt++) {
      const channel = await this.resolveChannel();
      try {
        if (mode === "append" && this.topics.size > 0 && this.syncedChannelId !== channel.id) {
          this.log.debug(
            { channelId: channel.id, topics: this.topics.size },
            "Replaying subscriptions onto new channel",
          );
          await this.sync(channel, this.snapshot(), "replace");
        }
        return await this.sync(channel, requested, mode);
      } catch (error) {
        if (!(isSubscribeError(error) && error.reason === "superseded") || attempt >= MAX_SYNC_ATTEMPTS) {
          throw error;
        }
        this.log.debug({ channelId: channel.id, attempt }, "Channel replaced mid-request, retrying");
      }
    }
  }

  /**
   * Send `topics` to a given channel and reconcile the local set with the
   * server's answer. Appending only unions with a set confirmed on the same
   * channel.
   *
   * @throws SubscribeError with reason `superseded` when `channel` stopped
   *   being the current channel before the answer arrived
   */
  async sync(channel: Channel, topics: ReadonlySet<string>, mode: SubscribeMode): Promise<Set<string>> {
    let response: ApiResponse;
    try {
      response =
        mode === "replace"
          ? await this.config.api.replaceSubscriptions(channel.id, topics)
          : await this.config.api.appendSubscriptions(channel.id, topics);
    } catch (error) {
      const cause = ensureError(error);
      throw new SubscribeError("transport", `Subscription request failed: ${cause.message}`, {}, cause);
    }

    const { status, body, url } = response;

    if (this.config.channels.currentChannelId() !== channel.id) {
      throw SubscribeError.superseded(channel.id, url);
    }

    if (status === 401) {
      throw new AuthError("Invalid or expired token", { url });
    }

    if (status !== 200) {
      throw new SubscribeError("status", `Subscription request returned status ${status}`, {
        statusCode: status,
        url,
      });
    }

    const decoded = decodeJson(body, SubscriptionResponseSchema);
    if (!decoded.success) {
      throw new SubscribeError(
        "decode",
        `Invalid subscription response: ${decoded.error}`,
        { statusCode: status, url },
        decoded.cause,
      );
    }

    const confirmed = decoded.data.entities.map((entity) => entity.id);
    if (mode === "replace" || this.syncedChannelId !== channel.id) {
      this.topics = new Set(confirmed);
    } else {
      for (const topic of confirmed) {
        this.topics.add(topic);
      }
    }
    this.syncedChannelId = channel.id;

    this.log.debug(
      { channelId: channel.id, mode, requested: topics.size, subscribed: this.topics.size },
      "Subscriptions synced",
    );
    return this.snapshot();
  }

  /** Copy of the subscribed topics */
  snapshot(): Set<string> {
    return new Set(this.topics);
  }

  private async resolveChannel(): Promise<Channel> {
    try {
      return await this.config.channels.ensureChannel();
    } catch (error) {
      if (isAuthError(error) || isMissingChannelError(error)) {
        throw error;
      }
      const cause = ensureError(error);
      throw new MissingChannelError(`No channel could be provisioned: ${cause.message}`, cause);
    }
  }
}
