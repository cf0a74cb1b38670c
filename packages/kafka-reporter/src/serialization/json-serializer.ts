/**
 * JSON serializers: one message per metric, keyed by the metric name, the
 * value being the metric's native fields plus a `timestamp` field.
 *
 *   {"value":42,"timestamp":"2015-10-22T11:50:34.762+00:00"}
 *
 * The string and byte variants share everything up to the final encoding
 * of key and value.
 */

import { encodeMetric, withTimestamp } from '../encoding/metric-encoder.js';
import { formatReportTimestamp } from '../encoding/timestamp.js';
import { orderedMetrics } from '../metrics/snapshot.js';
import type { MetricSnapshot } from '../metrics/types.js';
import type { TimeUnit } from '../metrics/time-unit.js';
import { SerializationError } from '../errors.js';
import type { MessagePayload, MetricMessage, MetricsSerializer } from './types.js';

export interface MetricDocument {
  name: string;
  body: string;
}

/**
 * JSON documents for every metric in snapshot order. Either every metric
 * encodes or a SerializationError is thrown and nothing is returned.
 */
export function buildMetricDocuments(
  snapshot: MetricSnapshot,
  timestamp: Date,
  rateUnit: TimeUnit,
  durationUnit: TimeUnit
): MetricDocument[] {
  const stamp = formatReportTimestamp(timestamp);
  const units = { rateUnit, durationUnit };

  return orderedMetrics(snapshot).map(entry => {
    try {
      if (!entry.name) {
        throw new TypeError('metric name is empty');
      }
      return { name: entry.name, body: JSON.stringify(withTimestamp(encodeMetric(entry, units), stamp)) };
    } catch (error) {
      throw new SerializationError(entry.name, entry.kind, error);
    }
  });
}

export type RecordEncoder<T extends MessagePayload> = (text: string) => T;

export function createJsonSerializer<T extends MessagePayload>(
  name: string,
  encode: RecordEncoder<T>
): MetricsSerializer<T> {
  return Object.freeze({
    name,
    serialize(snapshot: MetricSnapshot, topic: string, timestamp: Date, rateUnit: TimeUnit, durationUnit: TimeUnit) {
      return buildMetricDocuments(snapshot, timestamp, rateUnit, durationUnit).map(
        (document): MetricMessage<T> => ({
          topic,
          key: encode(document.name),
          value: encode(document.body),
        })
      );
    },
  });
}

/** Keys and values as strings; pair with a string-serializing producer. */
export const jsonStringSerializer: MetricsSerializer<string> = createJsonSerializer('json-string', text => text);

/** Keys and values as UTF-8 bytes; same content as the string variant. */
export const jsonBufferSerializer: MetricsSerializer<Buffer> = createJsonSerializer('json-bytes', text =>
  Buffer.from(text, 'utf8')
);
