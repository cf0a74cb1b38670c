import {
  METRIC_KIND_ORDER,
  MetricKind,
  type Counter,
  type Gauge,
  type Histogram,
  type Meter,
  type MetricFilter,
  type MetricMap,
  type MetricSnapshot,
  type Timer,
} from './types.js';

export type TaggedMetric =
  | { kind: typeof MetricKind.GAUGE; name: string; metric: Gauge }
  | { kind: typeof MetricKind.COUNTER; name: string; metric: Counter }
  | { kind: typeof MetricKind.HISTOGRAM; name: string; metric: Histogram }
  | { kind: typeof MetricKind.METER; name: string; metric: Meter }
  | { kind: typeof MetricKind.TIMER; name: string; metric: Timer };

function isReadonlyMap<T>(map: MetricMap<T>): map is ReadonlyMap<string, T> {
  return map instanceof Map;
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Entries of one partition, ascending by metric name regardless of how the
 * underlying mapping orders them.
 */
export function sortedEntries<T>(map: MetricMap<T> | undefined): Array<[string, T]> {
  if (!map) return [];
  const entries: Array<[string, T]> = isReadonlyMap(map) ? Array.from(map.entries()) : Object.entries(map);
  return entries.sort(([a], [b]) => compareNames(a, b));
}

function taggedPartition(snapshot: MetricSnapshot, kind: MetricKind): TaggedMetric[] {
  switch (kind) {
    case MetricKind.GAUGE:
      return sortedEntries(snapshot.gauges).map(([name, metric]): TaggedMetric => ({ kind: MetricKind.GAUGE, name, metric }));
    case MetricKind.COUNTER:
      return sortedEntries(snapshot.counters).map(
        ([name, metric]): TaggedMetric => ({ kind: MetricKind.COUNTER, name, metric })
      );
    case MetricKind.HISTOGRAM:
      return sortedEntries(snapshot.histograms).map(
        ([name, metric]): TaggedMetric => ({ kind: MetricKind.HISTOGRAM, name, metric })
      );
    case MetricKind.METER:
      return sortedEntries(snapshot.meters).map(([name, metric]): TaggedMetric => ({ kind: MetricKind.METER, name, metric }));
    case MetricKind.TIMER:
      return sortedEntries(snapshot.timers).map(([name, metric]): TaggedMetric => ({ kind: MetricKind.TIMER, name, metric }));
  }
}

/**
 * Every metric of the snapshot in METRIC_KIND_ORDER, each block ascending
 * by name.
 */
export function orderedMetrics(snapshot: MetricSnapshot): TaggedMetric[] {
  return METRIC_KIND_ORDER.flatMap(kind => taggedPartition(snapshot, kind));
}

export function filterSnapshot(snapshot: MetricSnapshot, filter: MetricFilter): MetricSnapshot {
  const gauges = new Map<string, Gauge>();
  const counters = new Map<string, Counter>();
  const histograms = new Map<string, Histogram>();
  const meters = new Map<string, Meter>();
  const timers = new Map<string, Timer>();

  for (const entry of orderedMetrics(snapshot)) {
    if (!filter(entry.name, entry.kind)) continue;
    switch (entry.kind) {
      case MetricKind.GAUGE:
        gauges.set(entry.name, entry.metric);
        break;
      case MetricKind.COUNTER:
        counters.set(entry.name, entry.metric);
        break;
      case MetricKind.HISTOGRAM:
        histograms.set(entry.name, entry.metric);
        break;
      case MetricKind.METER:
        meters.set(entry.name, entry.metric);
        break;
      case MetricKind.TIMER:
        timers.set(entry.name, entry.metric);
        break;
    }
  }

  return { gauges, counters, histograms, meters, timers };
}
