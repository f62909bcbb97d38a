export * from './command-runner.js';
export * from './retry.js';
export * from './stage-executor.js';
export * from './types.js';
