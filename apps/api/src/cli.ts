#!/usr/bin/env node
/**
 * tidewater-run: run a pipeline once from the command line
 */

import { createRunSpec, loadPipelineSpec } from '@tidewater/core';
import { closeDatabase, initializeDatabase } from '@tidewater/database';
import { createChildLogger, getConfig, TidewaterError } from '@tidewater/shared';
import { exitCodeFor, formatSummary, parseCliArgs, USAGE } from './cli-args.js';
import type { CliOptions } from './cli-args.js';
import { createEngine, specDefaultsFromConfig } from './services/index.js';

const logger = createChildLogger({ component: 'CLI' });

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n${USAGE}\n`);
    return 64;
  }

  if (options.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const config = getConfig();
  initializeDatabase({ path: config.database.path });

  try {
    const definition = await loadPipelineSpec(options.pipelinePath, specDefaultsFromConfig(config));
    const { orchestrator } = createEngine(config);

    // First Ctrl-C cancels cooperatively; in-flight stages and rollouts finish
    const controller = new AbortController();
    process.once('SIGINT', () => {
      logger.warn('Cancelling run, waiting for in-flight stages');
      controller.abort();
    });

    const result = await orchestrator.run(createRunSpec(definition, options.trigger, options.runId), {
      signal: controller.signal,
    });

    const output = options.json ? JSON.stringify(result, null, 2) : formatSummary(result).join('\n');
    process.stdout.write(`${output}\n`);
    return exitCodeFor(result);
  } catch (error) {
    const message = error instanceof TidewaterError ? `${error.code} ${error.message}` : String(error);
    process.stderr.write(`${message}\n`);
    return 1;
  } finally {
    closeDatabase();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Unhandled error');
    process.exitCode = 1;
  });
