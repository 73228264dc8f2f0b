/**
 * ChannelProvisioner - creates channels through the provisioning API
 *
 * Stateless apart from request de-duplication: the supervisor owns the
 * current channel and decides what to do with a new one.
 */

import {
  AuthError,
  ChannelResponseSchema,
  ProvisionError,
  decodeJson,
  ensureError,
} from "pushline-shared";
import { Logger } from "pushline-kernel";
import type { ApiResponse, ProvisioningApi } from "./core/provisioning-api";
import type { Channel } from "./types";

export class ChannelProvisioner {
  private inFlight?: Promise<Channel>;
  private log = Logger.for(this);

  constructor(private api: ProvisioningApi) {}

  /**
   * Create a channel.
   *
   * Unless `force` is set, a call made while another request is in flight
   * joins that request instead of creating a second channel.
   *
   * @throws AuthError on HTTP 401
   * @throws ProvisionError on any other failure (`status`, `transport` or `decode`)
   */
  provision(force: boolean = false): Promise<Channel> {
    if (!force && this.inFlight) {
      return this.inFlight;
    }

    const request = this.request().finally(() => {
      if (this.inFlight === request) {
        this.inFlight = undefined;
      }
    });
    this.inFlight = request;
    return request;
  }

  private async request(): Promise<Channel> {
    let response: ApiResponse;
    try {
      response = await this.api.createChannel();
    } catch (error) {
      const cause = ensureError(error);
      throw new ProvisionError("transport", `Channel request failed: ${cause.message}`, {}, cause);
    }

    const { status, body, url } = response;

    if (status === 401) {
      throw new AuthError("Invalid or expired token", { url });
    }

    if (status !== 200) {
      throw new ProvisionError("status", `Channel request returned status ${status}`, {
        statusCode: status,
        url,
      });
    }

    const decoded = decodeJson(body, ChannelResponseSchema);
    if (!decoded.success) {
      throw new ProvisionError(
        "decode",
        `Invalid channel response: ${decoded.error}`,
        { statusCode: status, url },
        decoded.cause,
      );
    }

    const channel: Channel = {
      connectUri: decoded.data.connectUri,
      id: decoded.data.id,
      expiresAt: decoded.data.expires,
    };

    this.log.info(
      { channelId: channel.id, expiresAt: channel.expiresAt.toISOString() },
      "Channel provisioned",
    );
    return channel;
  }
}
