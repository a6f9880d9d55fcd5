/**
 * Named timer registry on top of a Clock. Components keep one instance each so
 * shutdown can cancel everything they armed with a single clearAll().
 */

import logger from './logger.js';
import { systemClock, type Clock, type TimerHandle } from './clock.js';

interface ScheduledTask {
  id: string;
  handle: TimerHandle;
  interval: number;
  type: 'interval' | 'timeout';
  createdAt: number;
  nextRun: number;
  runCount: number;
}

export interface ScheduleOptions {
  /** Let the process exit while the task is pending (default true) */
  unref?: boolean;
}

export class Scheduler {
  private tasks = new Map<string, ScheduledTask>();

  constructor(private readonly clock: Clock = systemClock, private readonly name = 'scheduler') {}

  /**
   * Schedule a recurring task. Replaces any task with the same id.
   */
  scheduleInterval(
    id: string,
    callback: () => void | Promise<void>,
    intervalMs: number,
    options: ScheduleOptions = {}
  ): void {
    this.clearTask(id);

    const task: ScheduledTask = {
      id,
      handle: this.arm(id, callback, intervalMs, options, true),
      interval: intervalMs,
      type: 'interval',
      createdAt: this.clock.now(),
      nextRun: this.clock.now() + intervalMs,
      runCount: 0
    };
    this.tasks.set(id, task);

    logger.trace(`[${this.name}] Scheduled interval task '${id}' every ${intervalMs}ms`);
  }

  /**
   * Schedule a one-time delayed task. Replaces any task with the same id.
   */
  scheduleTimeout(
    id: string,
    callback: () => void | Promise<void>,
    delayMs: number,
    options: ScheduleOptions = {}
  ): void {
    this.clearTask(id);

    const task: ScheduledTask = {
      id,
      handle: this.arm(id, callback, delayMs, options, false),
      interval: delayMs,
      type: 'timeout',
      createdAt: this.clock.now(),
      nextRun: this.clock.now() + delayMs,
      runCount: 0
    };
    this.tasks.set(id, task);

    logger.trace(`[${this.name}] Scheduled timeout task '${id}' in ${delayMs}ms`);
  }

  private arm(
    id: string,
    callback: () => void | Promise<void>,
    delayMs: number,
    options: ScheduleOptions,
    repeat: boolean
  ): TimerHandle {
    const handle = this.clock.setTimeout(() => {
      const task = this.tasks.get(id);
      if (!task || task.handle !== handle) {
        return;
      }
      task.runCount++;
      if (repeat) {
        task.nextRun = this.clock.now() + delayMs;
        task.handle = this.arm(id, callback, delayMs, options, true);
      } else {
        // Removed before running so the callback may schedule the same id again
        this.tasks.delete(id);
      }
      this.run(id, callback);
    }, Math.max(0, delayMs));

    if (options.unref !== false) {
      handle.unref();
    }
    return handle;
  }

  private run(id: string, callback: () => void | Promise<void>): void {
    try {
      const result = callback();
      if (result instanceof Promise) {
        result.catch((error: unknown) => {
          logger.error(`[${this.name}] Error in task '${id}':`, error);
        });
      }
    } catch (error) {
      logger.error(`[${this.name}] Error in task '${id}':`, error);
    }
  }

  clearTask(id: string): void {
    const task = this.tasks.get(id);
    if (task) {
      task.handle.cancel();
      this.tasks.delete(id);
      logger.trace(`[${this.name}] Cleared task '${id}'`);
    }
  }

  /**
   * Clear every task whose id starts with the prefix
   */
  clearPrefix(prefix: string): void {
    for (const id of [...this.tasks.keys()]) {
      if (id.startsWith(prefix)) {
        this.clearTask(id);
      }
    }
  }

  clearAll(): void {
    for (const task of this.tasks.values()) {
      task.handle.cancel();
    }
    this.tasks.clear();
  }

  has(id: string): boolean {
    return this.tasks.has(id);
  }

  /**
   * Time at which the task fires next, if it is pending
   */
  nextRun(id: string): number | undefined {
    return this.tasks.get(id)?.nextRun;
  }

  getStatus(): { taskCount: number; tasks: string[] } {
    return {
      taskCount: this.tasks.size,
      tasks: Array.from(this.tasks.keys())
    };
  }
}
