/**
 * Kafka Metrics Reporter
 *
 * Publishes snapshots of an in-process metrics registry to a Kafka topic,
 * one JSON message per metric by default.
 */

export * from './errors.js';
export * from './metrics/index.js';
export * from './encoding/index.js';
export * from './serialization/index.js';
export * from './broker/index.js';
export * from './reporter/index.js';
