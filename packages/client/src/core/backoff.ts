/**
 * Reconnect backoff
 */

export interface BackoffPolicy {
  /** Base reconnect delay in ms */
  reconnectDelay: number;

  /** Max reconnect delay in ms */
  maxReconnectDelay: number;

  /** Max reconnect attempts (0 = infinite) */
  maxReconnectAttempts: number;

  /** Jitter factor for reconnect delay (0.25 = ±25%) */
  reconnectJitter: number;
}

/**
 * Delay before the `attempt`-th delayed retry (0-based): exponential from
 * `reconnectDelay`, capped at `maxReconnectDelay`, with symmetric jitter.
 */
export function calculateReconnectDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random,
): number {
  const exponentialDelay = policy.reconnectDelay * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, policy.maxReconnectDelay);
  const jitter = cappedDelay * policy.reconnectJitter * (random() * 2 - 1);
  return Math.max(0, Math.round(cappedDelay + jitter));
}

export function hasAttemptsLeft(attempts: number, policy: BackoffPolicy): boolean {
  return policy.maxReconnectAttempts <= 0 || attempts < policy.maxReconnectAttempts;
}
