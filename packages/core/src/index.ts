/**
 * @tidewater/core
 * Stage caching, execution, service pipelines, run orchestration and deployment
 */

// Stage cache
export * from './cache/index.js';

// Stage execution
export * from './executor/index.js';

// Container builds
export * from './build/index.js';

// Deployment
export * from './deployment/index.js';

// Service pipelines
export * from './pipeline/index.js';

// Run orchestration
export * from './orchestrator/index.js';

// Pipeline spec loading
export * from './spec/index.js';

// Credentials
export * from './credentials/index.js';
