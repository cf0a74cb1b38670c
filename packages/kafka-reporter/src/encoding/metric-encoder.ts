/**
 * Metric Encoder
 *
 * Turns one metric into the ordered set of its native fields, then adds the
 * cycle timestamp as a final top-level field. Field sets are built in memory
 * and serialized once by the caller, so a metric with no native fields still
 * yields a valid single-field document.
 */

import { MetricKind, type DistributionSnapshot, type Metered, type ReportUnits } from '../metrics/types.js';
import type { TaggedMetric } from '../metrics/snapshot.js';
import { nanosPer, secondsPer, singularName } from '../metrics/time-unit.js';

export interface GaugeFields {
  value?: unknown;
}

export interface CounterFields {
  count: number;
}

export interface DistributionFields {
  min: number;
  max: number;
  mean: number;
  stddev: number;
  p50: number;
  p75: number;
  p95: number;
  p98: number;
  p99: number;
  p999: number;
}

export interface HistogramFields extends CounterFields, DistributionFields {}

export interface RateFields {
  rate_1m: number;
  rate_5m: number;
  rate_15m: number;
  rate_mean: number;
  unit: string;
}

export interface MeterFields extends CounterFields, RateFields {}

export interface TimerFields extends HistogramFields, RateFields {}

export type EncodedMetric = GaugeFields | CounterFields | HistogramFields | MeterFields | TimerFields;

export type TimestampedMetric = EncodedMetric & { timestamp: string };

export const TIMESTAMP_FIELD = 'timestamp';

function finite(field: string, value: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new TypeError(`${field} is not a finite number: ${String(value)}`);
  }
  return value;
}

function encodeGaugeValue(value: unknown): GaugeFields {
  if (value === undefined) return {};
  if (typeof value === 'number') {
    // JSON has no NaN or Infinity
    return { value: Number.isFinite(value) ? value : null };
  }
  if (typeof value === 'bigint' || typeof value === 'function' || typeof value === 'symbol') {
    throw new TypeError(`gauge value of type ${typeof value} cannot be encoded as JSON`);
  }
  // surfaces circular structures and nested bigints here rather than at send time
  JSON.stringify(value);
  return { value };
}

function distribution(snapshot: DistributionSnapshot, scale: number): DistributionFields {
  const scaled = (field: string, value: number) => finite(field, value) / scale;
  return {
    min: scaled('min', snapshot.getMin()),
    max: scaled('max', snapshot.getMax()),
    mean: scaled('mean', snapshot.getMean()),
    stddev: scaled('stddev', snapshot.getStdDev()),
    p50: scaled('p50', snapshot.getValue(0.5)),
    p75: scaled('p75', snapshot.getValue(0.75)),
    p95: scaled('p95', snapshot.getValue(0.95)),
    p98: scaled('p98', snapshot.getValue(0.98)),
    p99: scaled('p99', snapshot.getValue(0.99)),
    p999: scaled('p999', snapshot.getValue(0.999)),
  };
}

function rates(metered: Metered, units: ReportUnits, eventName: string): RateFields {
  const factor = secondsPer(units.rateUnit);
  return {
    rate_1m: finite('rate_1m', metered.getOneMinuteRate()) * factor,
    rate_5m: finite('rate_5m', metered.getFiveMinuteRate()) * factor,
    rate_15m: finite('rate_15m', metered.getFifteenMinuteRate()) * factor,
    rate_mean: finite('rate_mean', metered.getMeanRate()) * factor,
    unit: `${eventName}/${singularName(units.rateUnit)}`,
  };
}

/**
 * Native fields of one metric. Rates are expressed per `rateUnit`; timer
 * durations are converted from nanoseconds to `durationUnit`.
 *
 * @throws TypeError when a reading is not encodable
 */
export function encodeMetric(entry: TaggedMetric, units: ReportUnits): EncodedMetric {
  switch (entry.kind) {
    case MetricKind.GAUGE:
      return encodeGaugeValue(entry.metric.getValue());
    case MetricKind.COUNTER:
      return { count: finite('count', entry.metric.getCount()) };
    case MetricKind.HISTOGRAM:
      return {
        count: finite('count', entry.metric.getCount()),
        ...distribution(entry.metric.getSnapshot(), 1),
      };
    case MetricKind.METER:
      return {
        count: finite('count', entry.metric.getCount()),
        ...rates(entry.metric, units, 'events'),
      };
    case MetricKind.TIMER:
      return {
        count: finite('count', entry.metric.getCount()),
        ...distribution(entry.metric.getSnapshot(), nanosPer(units.durationUnit)),
        ...rates(entry.metric, units, 'calls'),
      };
  }
}

export function withTimestamp(fields: EncodedMetric, timestamp: string): TimestampedMetric {
  return { ...fields, [TIMESTAMP_FIELD]: timestamp };
}
