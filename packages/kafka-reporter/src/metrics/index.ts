export * from './time-unit.js';
export * from './types.js';
export * from './snapshot.js';
