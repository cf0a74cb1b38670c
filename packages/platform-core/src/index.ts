/**
 * Platform Core - shared plumbing for metrics-relay packages
 *
 * - Structured logging (winston) with secret redaction
 * - Error base class and error serialization
 * - Environment variable helpers
 * - Cron-backed interval scheduling
 * - prom-client self-instrumentation
 */

export * from './config/index.js';
export * from './errors/service-error.js';
export * from './logging/index.js';
export * from './metrics/index.js';
export * from './scheduling/index.js';
