import { ServiceError, describeCause } from '@metrics-relay/platform-core';
import type { MetricKind } from './metrics/types.js';

/**
 * A metric could not be converted to its structured encoding. Fails the
 * whole reporting cycle.
 */
export class SerializationError extends ServiceError {
  readonly metricName: string;
  readonly metricKind: MetricKind;

  constructor(metricName: string, metricKind: MetricKind, cause: unknown) {
    super('SerializationError', `Failed to serialize ${metricKind} "${metricName}": ${describeCause(cause)}`, {
      code: 'SERIALIZATION_FAILED',
      details: { metricName, metricKind },
      cause,
    });
    this.metricName = metricName;
    this.metricKind = metricKind;
  }
}

/**
 * The broker client refused a message synchronously (not connected,
 * backpressure). Aborts the remaining submissions of the cycle.
 */
export class DispatchRejectedError extends ServiceError {
  readonly topic: string;
  readonly key: string;

  constructor(message: string, topic: string, key: string, cause?: unknown) {
    super('DispatchRejectedError', message, {
      code: 'DISPATCH_REJECTED',
      details: { topic, key },
      cause,
    });
    this.topic = topic;
    this.key = key;
  }
}

/** Asynchronous delivery failure reported through a completion callback. */
export class DeliveryFailedError extends ServiceError {
  constructor(topic: string, key: string, cause: unknown) {
    super('DeliveryFailedError', `Error sending metric "${key}" to topic "${topic}": ${describeCause(cause)}`, {
      code: 'DELIVERY_FAILED',
      details: { topic, key },
      cause,
    });
  }
}

export class ReporterConfigError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ReporterConfigError', message, { code: 'INVALID_REPORTER_CONFIG', details });
  }
}
