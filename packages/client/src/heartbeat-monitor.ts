/**
 * HeartbeatMonitor - liveness watchdog for the socket
 *
 * One rearmed deadline, not a periodic tick: every `arm()` records the time
 * of the latest traffic and replaces the pending deadline with
 * `lastSeenAt + timeoutMs`. `onTimeout` runs when a deadline passes unarmed.
 */

import type { ScheduledTask, Scheduler } from "pushline-kernel";

export interface HeartbeatMonitorConfig {
  timeoutMs: number;
  scheduler: Scheduler;
  onTimeout: () => void;
}

export class HeartbeatMonitor {
  private task?: ScheduledTask;
  private _lastSeenAt?: number;
  private _deadline?: number;

  constructor(private config: HeartbeatMonitorConfig) {}

  /** Time of the latest traffic, epoch ms */
  get lastSeenAt(): number | undefined {
    return this._lastSeenAt;
  }

  /** Pending deadline, epoch ms */
  get deadline(): number | undefined {
    return this._deadline;
  }

  get isArmed(): boolean {
    return this.task !== undefined;
  }

  arm(): void {
    const { scheduler, timeoutMs } = this.config;
    const now = scheduler.now();

    this.task?.cancel();
    this._lastSeenAt = now;
    this._deadline = now + timeoutMs;
    this.task = scheduler.schedule(timeoutMs, () => {
      this.task = undefined;
      this._deadline = undefined;
      this.config.onTimeout();
    });
  }

  cancel(): void {
    this.task?.cancel();
    this.task = undefined;
    this._deadline = undefined;
  }
}
