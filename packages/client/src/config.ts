/**
 * Client configuration
 *
 * Plain settings are validated with zod and resolved to defaults once, at
 * construction. Collaborators (transport, fetch, scheduler) are injected
 * beside them and default to the real implementations.
 */

import { z } from "zod";
import { ConfigError, formatIssue } from "pushline-shared";
import { systemScheduler, type Scheduler } from "pushline-kernel";
import { DEFAULT_ROUTES, type FetchLike, type ProvisioningRoutes } from "./core/provisioning-api";
import type { SocketTransport } from "./core/transport";

export const DEFAULT_USER_AGENT = "pushline-client/1.0";

export const PushClientSettingsSchema = z.object({
  /** Bearer token for the provisioning API */
  token: z.string().min(1, "must not be empty"),
  /** Service domain; the API lives at `https://api.<host>` */
  host: z.string().min(1).optional(),
  /** Explicit API base URL; wins over `host` */
  baseUrl: z.string().url().optional(),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  /** Bound on each provisioning/subscription call; 0 disables */
  requestTimeout: z.number().int().nonnegative().default(10_000),
  /** Silence after which the socket is considered dead */
  heartbeatTimeout: z.number().int().positive().default(35_000),
  /** Maximum topics per subscribe call */
  topicLimit: z.number().int().positive().default(1000),
  reconnectDelay: z.number().int().nonnegative().default(1000),
  maxReconnectDelay: z.number().int().nonnegative().default(30_000),
  /** 0 = retry forever */
  maxReconnectAttempts: z.number().int().nonnegative().default(0),
  reconnectJitter: z.number().min(0).max(1).default(0.25),
  /** Open the socket as soon as subscribe provisions a channel */
  autoConnect: z.boolean().default(false),
});

export type PushClientSettings = z.input<typeof PushClientSettingsSchema>;

export interface PushClientConfig extends PushClientSettings {
  /** Custom route builders */
  routes?: ProvisioningRoutes;
  /** Socket transport (default: WebSocketTransport) */
  transport?: SocketTransport;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;
  /** Clock and timers (default: system clock) */
  scheduler?: Scheduler;
}

export type ResolvedSettings = z.output<typeof PushClientSettingsSchema>;

export interface ResolvedPushClientConfig extends Omit<ResolvedSettings, "host" | "baseUrl"> {
  baseUrl: string;
  routes: Required<ProvisioningRoutes>;
  transport?: SocketTransport;
  fetch: FetchLike;
  scheduler: Scheduler;
}

/**
 * Validate settings and fill in defaults.
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(config: PushClientConfig): ResolvedPushClientConfig {
  const { routes, transport, fetch: fetchImpl, scheduler, ...settings } = config;

  const result = PushClientSettingsSchema.safeParse(settings);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(formatIssue));
  }

  const { host, baseUrl, ...rest } = result.data;
  const apiBase = baseUrl ?? (host !== undefined ? `https://api.${host}` : undefined);
  if (apiBase === undefined) {
    throw new ConfigError(["host: one of host or baseUrl is required"]);
  }

  return {
    ...rest,
    baseUrl: apiBase.replace(/\/+$/, ""),
    routes: { ...DEFAULT_ROUTES, ...routes },
    transport,
    fetch: fetchImpl ?? ((input, init) => fetch(input, init)),
    scheduler: scheduler ?? systemScheduler,
  };
}
