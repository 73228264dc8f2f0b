/**
 * Pushline Error Hierarchy
 *
 * Structured error classes shared by every pushline package.
 * All errors extend PushlineError which provides:
 * - Unique error codes for programmatic handling
 * - Details for debugging (status codes, channel ids, limits)
 * - A `cause` chain that pino's error serializer logs in full
 *
 * @example Catching specific errors
 * ```typescript
 * try {
 *   await client.subscribe(["orders.created"]);
 * } catch (error) {
 *   if (isAuthError(error)) {
 *     // Token rejected - refresh credentials
 *   } else if (error instanceof TopicLimitExceededError) {
 *     // Split the topic set
 *   } else if (isPushlineError(error)) {
 *     console.log(error.code, error.details);
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Error
// =============================================================================

/**
 * Error codes for programmatic error handling.
 * Format: CATEGORY_SPECIFIC (e.g., PROVISION_STATUS, CHANNEL_EXPIRED)
 */
export type PushlineErrorCode =
  // Authentication
  | "AUTH_INVALID_TOKEN"
  // Channel lifecycle
  | "CHANNEL_MISSING"
  | "CHANNEL_EXPIRED"
  // Provisioning API
  | "PROVISION_STATUS"
  | "PROVISION_TRANSPORT"
  | "PROVISION_DECODE"
  // Subscription API
  | "SUBSCRIBE_STATUS"
  | "SUBSCRIBE_TRANSPORT"
  | "SUBSCRIBE_DECODE"
  | "SUBSCRIBE_SUPERSEDED"
  | "TOPIC_LIMIT_EXCEEDED"
  // Inbound frames
  | "PROTOCOL_MALFORMED_FRAME"
  // Automatic recovery
  | "CLIENT_RENEWAL"
  | "CLIENT_RECONNECT_EXHAUSTED"
  // HTTP plumbing
  | "TRANSPORT_TIMEOUT"
  | "TRANSPORT_CONNECTION"
  // Configuration
  | "CONFIG_INVALID";

/**
 * Base class for all pushline errors.
 */
export class PushlineError extends Error {
  /** Unique error code for programmatic handling */
  readonly code: PushlineErrorCode;

  /** Additional error details */
  readonly details: Record<string, unknown>;

  constructor(
    code: PushlineErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = "PushlineError";
    this.code = code;
    this.details = details;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, new.target);
  }
}

// =============================================================================
// Authentication
// =============================================================================

/**
 * The bearer token was rejected (HTTP 401) by the provisioning API or the
 * socket handshake. Never retried without re-provisioning the channel.
 */
export class AuthError extends PushlineError {
  constructor(
    message: string = "Invalid or expired token",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super("AUTH_INVALID_TOKEN", message, details, cause);
    this.name = "AuthError";
  }
}

// =============================================================================
// Channel Lifecycle
// =============================================================================

/**
 * No channel has been provisioned yet. Subscribe at least once first.
 */
export class MissingChannelError extends PushlineError {
  constructor(message: string = "No channel has been provisioned", cause?: Error) {
    super("CHANNEL_MISSING", message, {}, cause);
    this.name = "MissingChannelError";
  }
}

/**
 * An explicit connect was attempted on a channel past its expiry.
 */
export class ExpiredChannelError extends PushlineError {
  readonly channelId: string;
  readonly expiresAt: Date;

  constructor(channelId: string, expiresAt: Date) {
    super(
      "CHANNEL_EXPIRED",
      `Channel ${channelId} expired at ${expiresAt.toISOString()}`,
      { channelId, expiresAt: expiresAt.toISOString() },
    );
    this.name = "ExpiredChannelError";
    this.channelId = channelId;
    this.expiresAt = expiresAt;
  }
}

// =============================================================================
// Provisioning / Subscription API
// =============================================================================

/**
 * Why an API call failed:
 * - `status` - the server answered with an unexpected status code
 * - `transport` - the request never produced a response (network, timeout)
 * - `decode` - the response body did not match the expected shape
 */
export type ApiFailureReason = "status" | "transport" | "decode";

/**
 * Channel creation failed for any reason other than a rejected token.
 *
 * @example
 * ```typescript
 * throw new ProvisionError('status', 'Unexpected status code', { statusCode: 503 });
 * throw new ProvisionError('decode', 'Invalid expiry timestamp: "tomorrow"');
 * ```
 */
export class ProvisionError extends PushlineError {
  readonly reason: ApiFailureReason;

  /** HTTP status code if the server answered */
  readonly statusCode?: number;

  constructor(
    reason: ApiFailureReason,
    message: string,
    options: { statusCode?: number; url?: string } = {},
    cause?: Error,
  ) {
    const codeMap = {
      status: "PROVISION_STATUS",
      transport: "PROVISION_TRANSPORT",
      decode: "PROVISION_DECODE",
    } as const;

    super(
      codeMap[reason],
      message,
      {
        reason,
        ...(options.statusCode !== undefined && { statusCode: options.statusCode }),
        ...(options.url && { url: options.url }),
      },
      cause,
    );
    this.name = "ProvisionError";
    this.reason = reason;
    this.statusCode = options.statusCode;
  }
}

/**
 * Subscription sync failed for any reason other than a rejected token.
 * `superseded` means the channel was replaced while the request was in
 * flight, so its answer no longer describes the current channel.
 */
export class SubscribeError extends PushlineError {
  readonly reason: ApiFailureReason | "superseded";

  /** HTTP status code if the server answered */
  readonly statusCode?: number;

  constructor(
    reason: ApiFailureReason | "superseded",
    message: string,
    options: { statusCode?: number; url?: string } = {},
    cause?: Error,
  ) {
    const codeMap = {
      status: "SUBSCRIBE_STATUS",
      transport: "SUBSCRIBE_TRANSPORT",
      decode: "SUBSCRIBE_DECODE",
      superseded: "SUBSCRIBE_SUPERSEDED",
    } as const;

    super(
      codeMap[reason],
      message,
      {
        reason,
        ...(options.statusCode !== undefined && { statusCode: options.statusCode }),
        ...(options.url && { url: options.url }),
      },
      cause,
    );
    this.name = "SubscribeError";
    this.reason = reason;
    this.statusCode = options.statusCode;
  }

  static superseded(channelId: string, url?: string): SubscribeError {
    return new SubscribeError(
      "superseded",
      `Channel ${channelId} was replaced during the subscription request`,
      { url },
    );
  }
}

export class TopicLimitExceededError extends PushlineError {
  readonly count: number;
  readonly limit: number;

  constructor(count: number, limit: number) {
    super(
      "TOPIC_LIMIT_EXCEEDED",
      `Topic count of ${count} is more than limit of ${limit}`,
      { count, limit },
    );
    this.name = "TopicLimitExceededError";
    this.count = count;
    this.limit = limit;
  }
}

// =============================================================================
// Inbound Frames
// =============================================================================

/**
 * An inbound frame could not be parsed or carries no `topicName`.
 */
export class ProtocolError extends PushlineError {
  /** Raw frame text */
  readonly frame: string;

  constructor(message: string, frame: string, cause?: Error) {
    super("PROTOCOL_MALFORMED_FRAME", message, { frame }, cause);
    this.name = "ProtocolError";
    this.frame = frame;
  }

  static missingTopic(frame: string): ProtocolError {
    return new ProtocolError(`Event has no 'topicName' field: "${frame}"`, frame);
  }
}

// =============================================================================
// Automatic Recovery
// =============================================================================

/**
 * Failure inside the autonomous recovery path. Reported on the status stream,
 * never thrown to a caller.
 */
export class ClientError extends PushlineError {
  constructor(
    message: string,
    code: "CLIENT_RENEWAL" | "CLIENT_RECONNECT_EXHAUSTED" = "CLIENT_RENEWAL",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, details, cause);
    this.name = "ClientError";
  }

  static renewal(cause: Error): ClientError {
    return new ClientError(`Channel renewal failed: ${cause.message}`, "CLIENT_RENEWAL", {}, cause);
  }

  static reconnectExhausted(attempts: number): ClientError {
    return new ClientError(
      `Gave up reconnecting after ${attempts} attempts`,
      "CLIENT_RECONNECT_EXHAUSTED",
      { attempts },
    );
  }
}

// =============================================================================
// HTTP Plumbing
// =============================================================================

/**
 * Low-level request failure (no HTTP response). Wrapped by ProvisionError or
 * SubscribeError before it reaches a caller.
 *
 * @example
 * ```typescript
 * throw TransportError.timeout(10000, url);
 * throw TransportError.connection('fetch failed', url, cause);
 * ```
 */
export class TransportError extends PushlineError {
  readonly transportCode: "timeout" | "connection";

  constructor(
    transportCode: "timeout" | "connection",
    message: string,
    options: { url?: string; method?: string } = {},
    cause?: Error,
  ) {
    const codeMap = {
      timeout: "TRANSPORT_TIMEOUT",
      connection: "TRANSPORT_CONNECTION",
    } as const;

    super(
      codeMap[transportCode],
      message,
      {
        transportCode,
        ...(options.url && { url: options.url }),
        ...(options.method && { method: options.method }),
      },
      cause,
    );
    this.name = "TransportError";
    this.transportCode = transportCode;
  }

  static timeout(timeoutMs: number, url?: string): TransportError {
    return new TransportError("timeout", `Request timeout after ${timeoutMs}ms`, { url });
  }

  static connection(message: string, url?: string, cause?: Error): TransportError {
    return new TransportError("connection", message, { url }, cause);
  }
}

// =============================================================================
// Configuration
// =============================================================================

export class ConfigError extends PushlineError {
  /** Human-readable list of invalid fields */
  readonly issues: string[];

  constructor(issues: string[]) {
    super("CONFIG_INVALID", `Invalid client configuration: ${issues.join("; ")}`, { issues });
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isPushlineError(error: unknown): error is PushlineError {
  return error instanceof PushlineError;
}

export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}

export function isMissingChannelError(error: unknown): error is MissingChannelError {
  return error instanceof MissingChannelError;
}

export function isSubscribeError(error: unknown): error is SubscribeError {
  return error instanceof SubscribeError;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Ensure a value is an Error, wrapping if necessary.
 * Useful for catch blocks that might receive non-Error values.
 */
export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(String(value));
}
