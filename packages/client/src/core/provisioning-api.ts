/**
 * ProvisioningApi - HTTP calls to the channel provisioning service
 *
 * Returns the raw status and body; interpreting them (401, decode) is up to
 * the provisioner and the subscription manager. Requests that never produce a
 * response reject with `TransportError`.
 */

import { TransportError, createSubscriptionPayload, ensureError } from "pushline-shared";

export interface ProvisioningRoutes {
  /** Channel creation endpoint: () => path */
  channels?: () => string;
  /** Subscriptions endpoint: (channelId) => path */
  subscriptions?: (channelId: string) => string;
}

export const DEFAULT_ROUTES: Required<ProvisioningRoutes> = {
  channels: () => "/api/v2/notifications/channels",
  subscriptions: (channelId) =>
    `/api/v2/notifications/channels/${encodeURIComponent(channelId)}/subscriptions`,
};

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ApiResponse {
  status: number;
  body: string;
  url: string;
}

export interface ProvisioningApiConfig {
  baseUrl: string;
  token: string;
  userAgent: string;
  /** Request timeout in ms; 0 disables */
  requestTimeout: number;
  routes: Required<ProvisioningRoutes>;
  fetch: FetchLike;
}

export class ProvisioningApi {
  constructor(private config: ProvisioningApiConfig) {}

  /** `POST /channels` */
  createChannel(): Promise<ApiResponse> {
    return this.request("POST", this.url(this.config.routes.channels()));
  }

  /** `PUT /channels/{id}/subscriptions` - replaces the channel's topics */
  replaceSubscriptions(channelId: string, topics: Iterable<string>): Promise<ApiResponse> {
    return this.request(
      "PUT",
      this.url(this.config.routes.subscriptions(channelId)),
      createSubscriptionPayload(topics),
    );
  }

  /** `POST /channels/{id}/subscriptions` - adds to the channel's topics */
  appendSubscriptions(channelId: string, topics: Iterable<string>): Promise<ApiResponse> {
    return this.request(
      "POST",
      this.url(this.config.routes.subscriptions(channelId)),
      createSubscriptionPayload(topics),
    );
  }

  private url(path: string): string {
    return `${this.config.baseUrl}${path}`;
  }

  private async request(method: string, url: string, payload?: unknown): Promise<ApiResponse> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.config.token}`,
      "User-Agent": this.config.userAgent,
    };
    if (payload !== undefined) {
      headers["Content-Type"] = "application/json";
      headers.Accept = "application/json";
    }

    return this.fetchWithTimeout(url, {
      method,
      headers,
      body: payload === undefined ? undefined : JSON.stringify(payload),
    });
  }

  private async fetchWithTimeout(url: string, options: RequestInit): Promise<ApiResponse> {
    const timeout = this.config.requestTimeout;
    const controller = timeout > 0 ? new AbortController() : undefined;
    const timeoutId = controller ? setTimeout(() => controller.abort(), timeout) : undefined;

    try {
      const response = await this.config.fetch(url, {
        ...options,
        signal: controller?.signal,
      });
      const body = await response.text();
      return { status: response.status, body, url };
    } catch (error) {
      if (isAbortError(error)) {
        throw TransportError.timeout(timeout, url);
      }
      const cause = ensureError(error);
      throw TransportError.connection(cause.message, url, cause);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function isAbortError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "name" in error && error.name === "AbortError";
}
