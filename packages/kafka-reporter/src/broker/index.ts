export * from './types.js';
export * from './kafka-config.js';
export * from './kafka-producer-client.js';
