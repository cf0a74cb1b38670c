import { Counter, Histogram, Registry, collectDefaultMetrics, exponentialBuckets } from 'prom-client';
import { getLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';
import type { MetricsConfig } from './types.js';

const logger = getLogger('prometheus-metrics');

/**
 * Lazily-registered prom-client counters and histograms keyed by
 * short name. Label names are fixed by the first call for a given name.
 */
export class PrometheusMetrics {
  private readonly serviceName: string;
  private readonly prefix: string;
  private readonly registry: Registry;
  private counters = new Map<string, Counter>();
  private histograms = new Map<string, Histogram>();
  private knownLabelNames = new Map<string, string[]>();

  constructor(config: MetricsConfig) {
    this.serviceName = config.serviceName;
    this.prefix = config.prefix ?? this.serviceName.replace(/-/g, '_');
    this.registry = new Registry();
    this.registry.setDefaultLabels({ service: this.serviceName });

    if (config.collectDefaultMetrics ?? process.env.NODE_ENV === 'production') {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  private fullName(name: string): string {
    return `${this.prefix}_${name}`;
  }

  private resolveLabelNames(name: string, labels?: Record<string, string>): string[] {
    const fullName = this.fullName(name);
    const existing = this.knownLabelNames.get(fullName);
    if (existing) return existing;

    const labelNames = labels ? Object.keys(labels).sort() : [];
    this.knownLabelNames.set(fullName, labelNames);
    return labelNames;
  }

  private normalizeLabelValues(
    labelNames: string[],
    labels?: Record<string, string>
  ): Record<string, string> | undefined {
    if (!labels || labelNames.length === 0) return undefined;
    const normalized: Record<string, string> = {};
    for (const key of labelNames) {
      normalized[key] = labels[key] ?? '';
    }
    return normalized;
  }

  private getOrCreateCounter(name: string, labelNames: string[]): Counter {
    const fullName = this.fullName(name);
    let counter = this.counters.get(fullName);
    if (!counter) {
      counter = new Counter({
        name: fullName,
        help: `${name} counter`,
        labelNames,
        registers: [this.registry],
      });
      this.counters.set(fullName, counter);
    }
    return counter;
  }

  private getOrCreateHistogram(name: string, labelNames: string[]): Histogram {
    const fullName = this.fullName(name);
    let histogram = this.histograms.get(fullName);
    if (!histogram) {
      histogram = new Histogram({
        name: fullName,
        help: `${name} histogram`,
        labelNames,
        buckets: exponentialBuckets(0.001, 2, 12),
        registers: [this.registry],
      });
      this.histograms.set(fullName, histogram);
    }
    return histogram;
  }

  incrementCounter(name: string, labels?: Record<string, string>, value: number = 1): void {
    try {
      const labelNames = this.resolveLabelNames(name, labels);
      const counter = this.getOrCreateCounter(name, labelNames);
      const normalized = this.normalizeLabelValues(labelNames, labels);
      if (normalized) {
        counter.inc(normalized, value);
      } else {
        counter.inc(value);
      }
    } catch (error) {
      logger.warn('Failed to increment counter', { name, error: serializeError(error) });
    }
  }

  recordHistogram(name: string, value: number, labels?: Record<string, string>): void {
    if (!isFinite(value)) return;
    try {
      const labelNames = this.resolveLabelNames(name, labels);
      const histogram = this.getOrCreateHistogram(name, labelNames);
      const normalized = this.normalizeLabelValues(labelNames, labels);
      if (normalized) {
        histogram.observe(normalized, value);
      } else {
        histogram.observe(value);
      }
    } catch (error) {
      logger.warn('Failed to record histogram', { name, error: serializeError(error) });
    }
  }

  /**
   * Sum of a counter across all label sets; 0 when it was never incremented.
   */
  async getCounterValue(name: string): Promise<number> {
    const counter = this.counters.get(this.fullName(name));
    if (!counter) return 0;
    const snapshot = await counter.get();
    return snapshot.values.reduce((total, sample) => total + sample.value, 0);
  }

  async getHistogramCount(name: string): Promise<number> {
    const histogram = this.histograms.get(this.fullName(name));
    if (!histogram) return 0;
    const snapshot = await histogram.get();
    const countSample = snapshot.values.find(sample => sample.metricName === `${this.fullName(name)}_count`);
    return countSample?.value ?? 0;
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
