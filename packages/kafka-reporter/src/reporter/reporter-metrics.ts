import { PrometheusMetrics } from '@metrics-relay/platform-core';

export const REPORTER_METRICS = {
  MESSAGES_DISPATCHED: 'messages_dispatched_total',
  DISPATCH_REJECTED: 'dispatch_rejected_total',
  DELIVERY_FAILED: 'delivery_failed_total',
  SERIALIZATION_FAILED: 'serialization_failed_total',
  CYCLE_DURATION: 'report_cycle_duration_seconds',
} as const;

/**
 * Self-instrumentation of the reporter. Diagnostic only.
 */
export class ReporterMetrics {
  private readonly metrics: PrometheusMetrics;

  constructor(metrics?: PrometheusMetrics) {
    this.metrics = metrics ?? new PrometheusMetrics({ serviceName: 'metrics-reporter', prefix: 'metrics_reporter' });
  }

  recordDispatched(topic: string): void {
    this.metrics.incrementCounter(REPORTER_METRICS.MESSAGES_DISPATCHED, { topic });
  }

  recordDispatchRejected(topic: string): void {
    this.metrics.incrementCounter(REPORTER_METRICS.DISPATCH_REJECTED, { topic });
  }

  recordDeliveryFailed(topic: string): void {
    this.metrics.incrementCounter(REPORTER_METRICS.DELIVERY_FAILED, { topic });
  }

  recordSerializationFailed(kind: string): void {
    this.metrics.incrementCounter(REPORTER_METRICS.SERIALIZATION_FAILED, { kind });
  }

  recordCycleDuration(durationMs: number): void {
    this.metrics.recordHistogram(REPORTER_METRICS.CYCLE_DURATION, durationMs / 1000);
  }

  /** Prometheus text exposition, for a host's scrape endpoint. */
  render(): Promise<string> {
    return this.metrics.getMetrics();
  }

  getPrometheusMetrics(): PrometheusMetrics {
    return this.metrics;
  }
}
