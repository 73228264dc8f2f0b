/**
 * Scheduler - clock and one-shot timers behind an interface
 *
 * Time-dependent components (heartbeat watchdog, reconnect backoff, channel
 * expiry checks) read the clock and arm timers only through a Scheduler, so
 * tests can drive them with `createManualScheduler()` instead of wall-clock
 * time.
 */

/**
 * Handle to a scheduled callback.
 */
export interface ScheduledTask {
  /** Cancel the task. No-op if it already ran or was cancelled. */
  cancel(): void;
}

export interface Scheduler {
  /** Current time in epoch milliseconds */
  now(): number;

  /** Run `callback` once after `delayMs` */
  schedule(delayMs: number, callback: () => void): ScheduledTask;
}

/**
 * Scheduler backed by `Date.now()` and `setTimeout`.
 */
export const systemScheduler: Scheduler = {
  now: () => Date.now(),

  schedule(delayMs, callback) {
    const timer = setTimeout(callback, delayMs);
    return {
      cancel: () => clearTimeout(timer),
    };
  },
};
