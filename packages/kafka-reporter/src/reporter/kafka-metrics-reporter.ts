/**
 * Kafka Metrics Reporter
 *
 * One reporting cycle: stamp the cycle, serialize the filtered snapshot,
 * hand every message to the broker client in order. Returns once all sends
 * are initiated; acknowledgments arrive later through completion callbacks
 * which only record failures.
 */

import { describeCause, getLogger, serializeError } from '@metrics-relay/platform-core';
import type { BrokerClient, CompletionCallback } from '../broker/types.js';
import { DeliveryFailedError, DispatchRejectedError, SerializationError } from '../errors.js';
import { filterSnapshot } from '../metrics/snapshot.js';
import type { MetricSnapshot } from '../metrics/types.js';
import { payloadToString, type MetricMessage } from '../serialization/types.js';
import { resolveReporterConfig, type ReporterConfig, type ReporterOptions } from './config.js';
import type { ReporterMetrics } from './reporter-metrics.js';

const logger = getLogger('kafka-metrics-reporter');

/** Last resort of a completion callback; must not throw even if logging does. */
function recordHandlerFailure(topic: string, key: string, handlerError: unknown): void {
  try {
    logger.warn('Failed to record metric delivery failure', {
      topic,
      key,
      error: serializeError(handlerError),
    });
  } catch (loggingError) {
    process.emitWarning(
      `Failed to record delivery failure of metric "${key}" on topic "${topic}": ${describeCause(loggingError)}`,
      'MetricsReporterWarning'
    );
  }
}

export interface MetricsReporter {
  report(snapshot: MetricSnapshot): void;
}

export interface KafkaMetricsReporterDeps {
  /** Source of the per-cycle timestamp. */
  clock?: () => Date;
  metrics?: ReporterMetrics;
}

export class KafkaMetricsReporter implements MetricsReporter {
  readonly config: ReporterConfig;
  private readonly client: BrokerClient;
  private readonly clock: () => Date;
  private readonly metrics?: ReporterMetrics;

  constructor(client: BrokerClient, options: ReporterOptions = {}, deps: KafkaMetricsReporterDeps = {}) {
    this.client = client;
    this.config = resolveReporterConfig(options);
    this.clock = deps.clock ?? (() => new Date());
    this.metrics = deps.metrics;
  }

  /**
   * @throws SerializationError when a metric cannot be encoded; nothing is sent
   * @throws DispatchRejectedError when the broker client refuses a message;
   *   messages already submitted in this cycle stay submitted
   */
  report(snapshot: MetricSnapshot): void {
    const startedAt = Date.now();
    const timestamp = this.clock();
    const { topic, rateUnit, durationUnit, filter, serializer } = this.config;

    let messages: MetricMessage[];
    try {
      messages = serializer.serialize(filterSnapshot(snapshot, filter), topic, timestamp, rateUnit, durationUnit);
    } catch (error) {
      if (error instanceof SerializationError) {
        this.metrics?.recordSerializationFailed(error.metricKind);
      }
      throw error;
    }

    for (const message of messages) {
      this.dispatch(message);
    }

    this.metrics?.recordCycleDuration(Date.now() - startedAt);
    logger.debug('Metric messages dispatched', {
      topic,
      serializer: serializer.name,
      messageCount: messages.length,
      timestamp: timestamp.toISOString(),
    });
  }

  private dispatch(message: MetricMessage): void {
    try {
      this.client.send(message, this.completionHandler(message));
    } catch (error) {
      this.metrics?.recordDispatchRejected(message.topic);
      if (error instanceof DispatchRejectedError) throw error;
      throw new DispatchRejectedError(
        `Broker client refused metric message: ${describeCause(error)}`,
        message.topic,
        payloadToString(message.key),
        error
      );
    }
    this.metrics?.recordDispatched(message.topic);
  }

  private completionHandler(message: MetricMessage): CompletionCallback {
    const topic = message.topic;
    const key = payloadToString(message.key);

    return error => {
      if (!error) return;
      try {
        this.metrics?.recordDeliveryFailed(topic);
        logger.error('Error sending metrics to Kafka', {
          topic,
          key,
          error: serializeError(new DeliveryFailedError(topic, key, error)),
        });
      } catch (handlerError) {
        recordHandlerFailure(topic, key, handlerError);
      }
    };
  }
}

export function createKafkaMetricsReporter(
  client: BrokerClient,
  options: ReporterOptions = {},
  deps: KafkaMetricsReporterDeps = {}
): KafkaMetricsReporter {
  return new KafkaMetricsReporter(client, options, deps);
}
