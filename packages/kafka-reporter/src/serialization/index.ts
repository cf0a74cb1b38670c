export * from './types.js';
export * from './json-serializer.js';
