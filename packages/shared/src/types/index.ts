/**
 * Core types for Tidewater
 */

export * from './pipeline.js';
export * from './deployment.js';
export * from './credentials.js';
export * from './cache.js';
