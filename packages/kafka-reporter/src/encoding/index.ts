export * from './metric-encoder.js';
export * from './timestamp.js';
