export * from './pipeline-orchestrator.js';
export * from './trigger-policy.js';
export * from './verdict.js';
