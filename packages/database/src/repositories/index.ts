export { RunRepository } from './run-repository.js';
export type { ListRunsOptions } from './run-repository.js';
export { DeploymentRepository } from './deployment-repository.js';
export type { DeploymentRecord } from './deployment-repository.js';
export { parseColumn, stageOutputSchema } from './records.js';
