export * from './config.js';
export * from './reporter-metrics.js';
export * from './kafka-metrics-reporter.js';
export * from './scheduled-metrics-reporter.js';
