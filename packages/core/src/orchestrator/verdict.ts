/**
 * Run verdict from the pipeline results
 */

import type { PipelineResult, RunVerdict } from '@tidewater/shared';

function completedDeploy(result: PipelineResult): boolean {
  return result.stageResults.some((stage) => stage.kind === 'deploy' && stage.status === 'passed');
}

/**
 * success: every pipeline succeeded.
 * failure: none succeeded, or none completed a deploy and one hit an execution error.
 * partial-failure: anything else.
 */
export function computeVerdict(results: PipelineResult[]): RunVerdict {
  if (results.every((result) => result.finalStatus === 'success')) {
    return 'success';
  }

  const succeeded = results.filter((result) => result.finalStatus === 'success').length;
  if (succeeded === 0) {
    return 'failure';
  }

  const executionError = results.some((result) => result.failureKind === 'execution');
  if (executionError && !results.some(completedDeploy)) {
    return 'failure';
  }

  return 'partial-failure';
}
