import {
  createIntervalScheduler,
  intervalToCron,
  type IntervalScheduler,
  type SchedulerExecutionResult,
  type SchedulerInfo,
} from '@metrics-relay/platform-core';
import type { MetricSource } from '../metrics/types.js';
import { ReporterConfigError } from '../errors.js';
import type { MetricsReporter } from './kafka-metrics-reporter.js';

export interface ScheduledMetricsReporterOptions {
  reporter: MetricsReporter;
  source: MetricSource;
  periodSeconds: number;
  name?: string;
  serviceName?: string;
  runOnStart?: boolean;
}

/**
 * Runs `reporter.report(source.getSnapshot())` every `periodSeconds`.
 * A failed cycle is logged by the scheduler and not retried.
 *
 * The period must be one cron fires at exactly: whole seconds dividing a
 * minute, whole minutes dividing an hour, whole hours dividing a day, or
 * one day.
 */
export class ScheduledMetricsReporter {
  private readonly scheduler: IntervalScheduler;

  constructor(options: ScheduledMetricsReporterOptions) {
    if (!Number.isFinite(options.periodSeconds) || options.periodSeconds <= 0) {
      throw new ReporterConfigError('periodSeconds must be a positive number', {
        periodSeconds: options.periodSeconds,
      });
    }
    const intervalMs = options.periodSeconds * 1000;
    if (!intervalToCron(intervalMs)) {
      throw new ReporterConfigError(`A period of ${options.periodSeconds}s cannot be scheduled at an exact interval`, {
        periodSeconds: options.periodSeconds,
      });
    }

    const { reporter, source } = options;
    this.scheduler = createIntervalScheduler({
      name: options.name ?? 'kafka-metrics-reporter',
      serviceName: options.serviceName ?? 'metrics-relay',
      intervalMs,
      runOnStart: options.runOnStart ?? false,
      handler: () => reporter.report(source.getSnapshot()),
    });
  }

  start(): void {
    this.scheduler.start();
  }

  stop(): void {
    this.scheduler.stop();
  }

  reportNow(): Promise<SchedulerExecutionResult> {
    return this.scheduler.triggerNow();
  }

  getInfo(): SchedulerInfo {
    return this.scheduler.getInfo();
  }
}
