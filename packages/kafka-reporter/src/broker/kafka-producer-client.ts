/**
 * Kafka Producer Client
 *
 * BrokerClient over a kafkajs producer. Each send is issued without
 * waiting and completes through its callback; sends are refused
 * synchronously while disconnected or when too many are in flight.
 */

import { Kafka, type Producer } from 'kafkajs';
import { getLogger, serializeError } from '@metrics-relay/platform-core';
import { DispatchRejectedError } from '../errors.js';
import { payloadToString, type MetricMessage } from '../serialization/types.js';
import type { BrokerClient, CompletionCallback } from './types.js';
import { loadKafkaProducerConfig, type KafkaProducerConfig } from './kafka-config.js';

const logger = getLogger('kafka-producer-client');

export interface KafkaProducerClientOptions extends Partial<KafkaProducerConfig> {
  /** Use an existing producer instead of creating one from the config. */
  producer?: Producer;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class KafkaProducerClient implements BrokerClient {
  private readonly config: KafkaProducerConfig;
  private readonly producer: Producer;
  private connected = false;
  private inFlight = 0;

  constructor(options: KafkaProducerClientOptions = {}) {
    const { producer, ...overrides } = options;
    this.config = loadKafkaProducerConfig(process.env, overrides);

    this.producer =
      producer ??
      new Kafka({
        clientId: this.config.clientId,
        brokers: this.config.brokers,
        ssl: this.config.ssl,
        sasl: this.config.sasl,
        retry: { initialRetryTime: 300, retries: 5 },
      }).producer();

    this.producer.on('producer.disconnect', () => {
      if (!this.connected) return;
      this.connected = false;
      logger.warn('Kafka producer disconnected', { clientId: this.config.clientId });
    });
  }

  async connect(): Promise<void> {
    if (this.connected) return;
    try {
      await this.producer.connect();
      this.connected = true;
      logger.info('Kafka producer connected', {
        clientId: this.config.clientId,
        brokers: this.config.brokers,
      });
    } catch (error) {
      logger.error('Kafka producer connection failed', {
        clientId: this.config.clientId,
        error: serializeError(error),
      });
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;
    await this.producer.disconnect();
    logger.info('Kafka producer disconnected', {
      clientId: this.config.clientId,
      inFlight: this.inFlight,
    });
  }

  send(message: MetricMessage, callback: CompletionCallback): void {
    if (!this.connected) {
      throw new DispatchRejectedError('Kafka producer is not connected', message.topic, payloadToString(message.key));
    }
    if (this.inFlight >= this.config.maxInFlight) {
      throw new DispatchRejectedError(
        `Kafka producer has ${this.inFlight} sends awaiting acknowledgment`,
        message.topic,
        payloadToString(message.key)
      );
    }

    this.inFlight++;
    void this.producer
      .send({
        topic: message.topic,
        acks: this.config.acks,
        messages: [{ key: message.key, value: message.value }],
      })
      .then(
        () => this.complete(callback, null),
        (error: unknown) => this.complete(callback, toError(error))
      );
  }

  private complete(callback: CompletionCallback, error: Error | null): void {
    this.inFlight--;
    try {
      callback(error);
    } catch (callbackError) {
      logger.error('Send completion callback threw', { error: serializeError(callbackError) });
    }
  }

  isConnected(): boolean {
    return this.connected;
  }

  getInFlightCount(): number {
    return this.inFlight;
  }
}
