export * from './pipeline-spec.js';
