/**
 * Retry Command
 *
 * Re-attempts terminally failed (entity, stage) pairs from the failure queue.
 *
 * @module cli/commands/retry
 */

import type { Command } from 'commander';
import { STAGE_ORDER, isStageName } from '../../schemas/stage.js';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { formatRetryReport } from '../formatters/run-summary.js';
import { createRuntime, runAction, withInterrupt, withProgress, type CliDeps } from '../runtime.js';

export interface RetryCommandOptions {
  stage?: string;
  entity?: string;
}

export function registerRetryCommand(program: Command, deps: CliDeps = {}): void {
  program
    .command('retry')
    .description('Retry failed tasks from the failure queue')
    .option('-s, --stage <name>', `Only this stage (${STAGE_ORDER.join(', ')})`)
    .option('-e, --entity <id>', 'Only this entity')
    .action(async (options: RetryCommandOptions, cmd: Command) => {
      await runAction(cmd, (base) => handleRetry(options, base, deps));
    });
}

export async function handleRetry(
  options: RetryCommandOptions,
  base: BaseCommand,
  deps: CliDeps
): Promise<ExitCode> {
  const { stage } = options;
  if (stage !== undefined && !isStageName(stage)) {
    base.error(`Unknown stage "${stage}". Expected one of: ${STAGE_ORDER.join(', ')}`);
    return EXIT_CODES.USAGE_ERROR;
  }

  const runtime = await createRuntime(base, deps);
  if ((await runtime.ctx.failures.list()).length === 0) {
    base.info('No failed tasks to retry.');
    return EXIT_CODES.SUCCESS;
  }

  const report = await withInterrupt(base, (signal) =>
    withProgress(base, runtime, () =>
      runtime.orchestrator.retryFailed({ stage, entityId: options.entity, signal })
    )
  );

  base.info(formatRetryReport(report));

  if (report.cancelled) {
    return EXIT_CODES.CANCELLED;
  }
  if (report.attempted === 0 && report.orphaned === 0 && report.blocked === 0) {
    base.info('No failed tasks matched.');
  }
  return report.failed > 0 ? EXIT_CODES.PARTIAL_FAILURE : EXIT_CODES.SUCCESS;
}
