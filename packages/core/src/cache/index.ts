export * from './fingerprint.js';
export * from './memory-cache-store.js';
export * from './resilient-cache-store.js';
export * from './types.js';
