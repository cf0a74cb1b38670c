import type { MetricSnapshot } from '../metrics/types.js';
import type { TimeUnit } from '../metrics/time-unit.js';

export type MessagePayload = string | Buffer;

/** One unit of output, addressed to a topic. */
export interface MetricMessage<T extends MessagePayload = MessagePayload> {
  topic: string;
  key: T;
  value: T;
}

/**
 * Maps a snapshot to the messages to publish. A strategy may emit one
 * message per metric, a single message for the whole snapshot, or anything
 * in between; `topic` is the reporter's configured destination.
 */
export interface MetricsSerializer<T extends MessagePayload = MessagePayload> {
  readonly name: string;
  serialize(
    snapshot: MetricSnapshot,
    topic: string,
    timestamp: Date,
    rateUnit: TimeUnit,
    durationUnit: TimeUnit
  ): Array<MetricMessage<T>>;
}

export function payloadToString(payload: MessagePayload): string {
  return typeof payload === 'string' ? payload : payload.toString('utf8');
}
