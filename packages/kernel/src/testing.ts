/**
 * Test helpers for time-dependent code.
 *
 * @example
 * ```typescript
 * const scheduler = createManualScheduler(Date.parse('2024-01-01T00:00:00.000Z'));
 * const monitor = new HeartbeatMonitor({ timeoutMs: 35_000, scheduler, onTimeout });
 * monitor.arm();
 * scheduler.advance(35_000); // onTimeout fires
 * ```
 */

import type { Scheduler, ScheduledTask } from "./scheduler";

export interface ManualScheduler extends Scheduler {
  /** Move the clock forward, running every task that falls due, in order */
  advance(ms: number): void;

  /** Set the clock without running tasks */
  setTime(ms: number): void;

  /** Number of tasks waiting to run */
  pending(): number;
}

interface PendingTask {
  id: number;
  dueAt: number;
  callback: () => void;
}

export function createManualScheduler(startAt: number = 0): ManualScheduler {
  let current = startAt;
  let nextId = 0;
  const tasks = new Map<number, PendingTask>();

  const nextDue = (limit: number): PendingTask | undefined => {
    let earliest: PendingTask | undefined;
    for (const task of tasks.values()) {
      if (task.dueAt > limit) continue;
      if (!earliest || task.dueAt < earliest.dueAt || (task.dueAt === earliest.dueAt && task.id < earliest.id)) {
        earliest = task;
      }
    }
    return earliest;
  };

  return {
    now: () => current,

    schedule(delayMs: number, callback: () => void): ScheduledTask {
      const id = nextId++;
      tasks.set(id, { id, dueAt: current + Math.max(0, delayMs), callback });
      return {
        cancel: () => {
          tasks.delete(id);
        },
      };
    },

    advance(ms: number): void {
      const target = current + ms;
      // Tasks scheduled by a running task are picked up if they fall due in the window
      for (let task = nextDue(target); task; task = nextDue(target)) {
        tasks.delete(task.id);
        current = task.dueAt;
        task.callback();
      }
      current = target;
    },

    setTime(ms: number): void {
      current = ms;
    },

    pending: () => tasks.size,
  };
}
