/**
 * Argument parsing and reporting for the tidewater-run command
 */

import minimist from 'minimist';
import { z } from 'zod';
import { ValidationError } from '@tidewater/shared';
import type { RunResult, TriggerContext } from '@tidewater/shared';

export const USAGE = 'Usage: tidewater-run <pipeline.yaml> --branch <branch> --commit <sha> [--event push|pull_request] [--run-id <id>] [--json]';

export interface CliOptions {
  pipelinePath: string;
  trigger: TriggerContext;
  runId?: string;
  json: boolean;
  help: boolean;
}

const optionsSchema = z.object({
  pipelinePath: z.string().min(1, 'pipeline file is required'),
  branch: z.string().min(1, '--branch is required'),
  commit: z.string().min(1, '--commit is required'),
  event: z.enum(['push', 'pull_request']),
  runId: z.string().min(1).optional(),
});

export function parseCliArgs(argv: string[]): CliOptions {
  const args = minimist(argv, {
    string: ['branch', 'commit', 'event', 'run-id'],
    boolean: ['json', 'help'],
    alias: { b: 'branch', c: 'commit', e: 'event', h: 'help' },
    default: { event: 'push' },
  });

  if (args.help) {
    return {
      pipelinePath: '',
      trigger: { branch: '', commit: '', event: 'push' },
      json: false,
      help: true,
    };
  }

  const parsed = optionsSchema.safeParse({
    pipelinePath: args._[0] === undefined ? '' : String(args._[0]),
    branch: args.branch ?? '',
    commit: args.commit ?? '',
    event: args.event,
    runId: args['run-id'] || undefined,
  });

  if (!parsed.success) {
    throw new ValidationError(parsed.error.errors.map((e) => e.message).join('; '));
  }

  const { pipelinePath, branch, commit, event, runId } = parsed.data;
  return {
    pipelinePath,
    trigger: { branch, commit, event },
    runId,
    json: args.json === true,
    help: false,
  };
}

/**
 * 0 on success, 2 when a fatal error stopped the run, 1 for any other failure
 */
export function exitCodeFor(result: RunResult): number {
  if (result.fatalError) {
    return 2;
  }
  return result.verdict === 'success' ? 0 : 1;
}

export function formatSummary(result: RunResult): string[] {
  const lines = [
    `run ${result.runId} ${result.trigger.branch}@${result.trigger.commit} (${result.trigger.event})`,
  ];

  for (const pipeline of result.pipelineResults) {
    const stages = pipeline.stageResults.map((stage) => `${stage.stage}:${stage.status}`).join(' ');
    lines.push(`  ${pipeline.serviceId.padEnd(16)} ${pipeline.finalStatus.padEnd(11)} ${stages}`.trimEnd());
  }

  if (!result.deployEnabled) {
    lines.push('  deploy stages skipped for this trigger');
  }
  if (result.fatalError) {
    lines.push(`  fatal: ${result.fatalError.code} ${result.fatalError.message}`);
  }
  lines.push(`verdict: ${result.verdict} in ${result.durationMs}ms`);
  return lines;
}
