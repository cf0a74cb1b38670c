/**
 * IntervalScheduler - runs a handler on a fixed interval through node-cron
 */

import * as cron from 'node-cron';
import { getLogger, type Logger } from '../logging/index.js';
import { serializeError } from '../logging/error-serializer.js';
import type { SchedulerStatus, SchedulerInfo, SchedulerExecutionResult } from './types.js';

export interface IntervalSchedulerOptions {
  name: string;
  serviceName: string;
  intervalMs: number;
  handler: () => void | Promise<void>;
  runOnStart?: boolean;
}

/**
 * Cron expression firing exactly every `ms`, or undefined when no cron step
 * can express that interval: whole seconds dividing a minute, whole minutes
 * dividing an hour, whole hours dividing a day, or exactly one day.
 */
export function intervalToCron(ms: number): string | undefined {
  if (!Number.isInteger(ms) || ms <= 0 || ms % 1000 !== 0) return undefined;

  const seconds = ms / 1000;
  if (seconds < 60) {
    return 60 % seconds === 0 ? `*/${seconds} * * * * *` : undefined;
  }
  if (seconds % 60 !== 0) return undefined;

  const minutes = seconds / 60;
  if (minutes < 60) {
    return 60 % minutes === 0 ? `*/${minutes} * * * *` : undefined;
  }
  if (minutes % 60 !== 0) return undefined;

  const hours = minutes / 60;
  if (hours < 24) {
    return 24 % hours === 0 ? `0 */${hours} * * *` : undefined;
  }
  return hours === 24 ? '0 0 * * *' : undefined;
}

export class IntervalScheduler {
  private static readonly SLOW_THRESHOLD_MS = 5000;

  readonly name: string;
  readonly serviceName: string;
  readonly cronExpression: string;
  private readonly handler: () => void | Promise<void>;
  private readonly runOnStart: boolean;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  private task: cron.ScheduledTask | null = null;
  private lastRunAt: Date | null = null;
  private lastRunDurationMs: number | null = null;
  private lastRunSuccess: boolean | null = null;
  private runCount = 0;
  private errorCount = 0;

  /** @throws RangeError when `intervalMs` has no exact cron equivalent */
  constructor(options: IntervalSchedulerOptions) {
    const cronExpression = intervalToCron(options.intervalMs);
    if (!cronExpression) {
      throw new RangeError(`Interval of ${options.intervalMs}ms cannot be scheduled exactly with cron`);
    }

    this.name = options.name;
    this.serviceName = options.serviceName;
    this.cronExpression = cronExpression;
    this.handler = options.handler;
    this.runOnStart = options.runOnStart ?? false;
    this.timeoutMs = Math.max(options.intervalMs * 0.9, 30000);
    this.logger = getLogger(`scheduler-${this.name}`);
  }

  start(): void {
    if (this.task) {
      this.logger.warn(`[${this.name}] Already running, skipping start`);
      return;
    }

    if (!cron.validate(this.cronExpression)) {
      this.logger.error(`[${this.name}] Invalid cron expression: ${this.cronExpression}`);
      return;
    }

    this.task = cron.schedule(this.cronExpression, () => {
      void this.run();
    });
    this.task.start();

    this.logger.debug(`[${this.name}] Scheduler started`, { cronExpression: this.cronExpression });

    if (this.runOnStart) {
      void this.run();
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.debug(`[${this.name}] Already stopped`);
      return;
    }

    this.task.stop();
    this.task = null;
    this.logger.info(`[${this.name}] Scheduler stopped`);
  }

  triggerNow(): Promise<SchedulerExecutionResult> {
    this.logger.debug(`[${this.name}] Manual trigger requested`);
    return this.run();
  }

  /** Never rejects; a failing handler is logged and reported in the result. */
  private async run(): Promise<SchedulerExecutionResult> {
    const startTime = Date.now();
    this.lastRunAt = new Date();
    this.runCount++;

    try {
      await this.executeWithTimeout();
      this.lastRunDurationMs = Date.now() - startTime;
      this.lastRunSuccess = true;

      if (this.lastRunDurationMs > IntervalScheduler.SLOW_THRESHOLD_MS) {
        this.logger.warn(`[${this.name}] Slow execution`, {
          durationMs: this.lastRunDurationMs,
          threshold: IntervalScheduler.SLOW_THRESHOLD_MS,
        });
      }
      return { success: true, message: `${this.name} completed`, durationMs: this.lastRunDurationMs };
    } catch (error) {
      this.lastRunDurationMs = Date.now() - startTime;
      this.lastRunSuccess = false;
      this.errorCount++;

      this.logger.error(`[${this.name}] Execution error`, {
        error: serializeError(error),
        durationMs: this.lastRunDurationMs,
      });
      return {
        success: false,
        message: error instanceof Error ? error.message : String(error),
        durationMs: this.lastRunDurationMs,
      };
    }
  }

  private async executeWithTimeout(): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      await Promise.race([
        this.handler(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => {
            reject(new Error(`Execution timed out after ${this.timeoutMs}ms`));
          }, this.timeoutMs);
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  getInfo(): SchedulerInfo {
    const status: SchedulerStatus = this.task ? 'running' : 'stopped';
    return {
      name: this.name,
      cronExpression: this.cronExpression,
      status,
      lastRunAt: this.lastRunAt,
      lastRunDurationMs: this.lastRunDurationMs,
      lastRunSuccess: this.lastRunSuccess,
      runCount: this.runCount,
      errorCount: this.errorCount,
      serviceName: this.serviceName,
    };
  }
}

export function createIntervalScheduler(options: IntervalSchedulerOptions): IntervalScheduler {
  return new IntervalScheduler(options);
}
