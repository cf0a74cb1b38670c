/**
 * Metric Model
 *
 * Read-only views of registry metrics. The registry owns the metrics;
 * the reporter only reads them once per cycle.
 */

import type { TimeUnit } from './time-unit.js';

export const MetricKind = {
  GAUGE: 'gauge',
  COUNTER: 'counter',
  HISTOGRAM: 'histogram',
  METER: 'meter',
  TIMER: 'timer',
} as const;

export type MetricKind = (typeof MetricKind)[keyof typeof MetricKind];

/** Partition order of a snapshot; also the order messages are produced in. */
export const METRIC_KIND_ORDER: readonly MetricKind[] = [
  MetricKind.GAUGE,
  MetricKind.COUNTER,
  MetricKind.HISTOGRAM,
  MetricKind.METER,
  MetricKind.TIMER,
];

export interface Gauge<T = unknown> {
  getValue(): T;
}

export interface Counting {
  getCount(): number;
}

export interface DistributionSnapshot {
  getMin(): number;
  getMax(): number;
  getMean(): number;
  getStdDev(): number;
  /** Value at the given quantile in [0, 1]. */
  getValue(quantile: number): number;
}

export interface Sampling {
  getSnapshot(): DistributionSnapshot;
}

/** Rates are in events per second. */
export interface Metered extends Counting {
  getOneMinuteRate(): number;
  getFiveMinuteRate(): number;
  getFifteenMinuteRate(): number;
  getMeanRate(): number;
}

export type Counter = Counting;

export interface Histogram extends Counting, Sampling {}

export type Meter = Metered;

/** Snapshot values are durations in nanoseconds. */
export interface Timer extends Metered, Sampling {}

export type MetricMap<T> = ReadonlyMap<string, T> | Readonly<Record<string, T>>;

export interface MetricSnapshot {
  gauges?: MetricMap<Gauge>;
  counters?: MetricMap<Counter>;
  histograms?: MetricMap<Histogram>;
  meters?: MetricMap<Meter>;
  timers?: MetricMap<Timer>;
}

export type MetricFilter = (name: string, kind: MetricKind) => boolean;

export const ALL_METRICS: MetricFilter = () => true;

export interface MetricSource {
  getSnapshot(): MetricSnapshot;
}

export interface ReportUnits {
  rateUnit: TimeUnit;
  durationUnit: TimeUnit;
}
