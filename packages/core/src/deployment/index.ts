export * from './deploy-lock.js';
export * from './deployment-controller.js';
export * from './descriptor-renderer.js';
export * from './rollout-state-machine.js';
export * from './types.js';
