/**
 * Stage Command
 *
 * Runs a single stage for all entities that need it.
 *
 * @module cli/commands/stage
 */

import type { Command } from 'commander';
import type { VideoQuality } from '../../schemas/settings.js';
import { STAGE_ORDER, isStageName } from '../../schemas/stage.js';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import {
  createRuntime,
  finishRun,
  parsePositiveInt,
  parseVideoQuality,
  runAction,
  withInterrupt,
  withProgress,
  type CliDeps,
} from '../runtime.js';

export interface StageCommandOptions {
  force?: boolean;
  limit?: number;
  concurrency?: number;
  dryRun?: boolean;
  quality?: VideoQuality;
}

export function registerStageCommand(program: Command, deps: CliDeps = {}): void {
  program
    .command('stage <name>')
    .description(`Run one stage (${STAGE_ORDER.join(', ')})`)
    .option('-f, --force', 'Regenerate entities whose stage is already done')
    .option('-n, --limit <count>', 'Maximum entities to process', parsePositiveInt)
    .option('-c, --concurrency <count>', 'Entities processed in parallel', parsePositiveInt)
    .option('--dry-run', 'Show what would run without changing anything')
    .option('--quality <level>', 'Video encoding quality: fast, normal or high', parseVideoQuality)
    .action(async (name: string, options: StageCommandOptions, cmd: Command) => {
      await runAction(cmd, (base) => handleStage(name, options, base, deps));
    });
}

export async function handleStage(
  name: string,
  options: StageCommandOptions,
  base: BaseCommand,
  deps: CliDeps
): Promise<ExitCode> {
  if (!isStageName(name)) {
    base.error(`Unknown stage "${name}". Expected one of: ${STAGE_ORDER.join(', ')}`);
    return EXIT_CODES.USAGE_ERROR;
  }

  const runtime = await createRuntime(base, deps, { videoQuality: options.quality });

  return withInterrupt(base, (signal) =>
    withProgress(base, runtime, async () => {
      const report = await runtime.orchestrator.runStage(name, {
        force: options.force,
        limit: options.limit,
        concurrency: options.concurrency,
        dryRun: options.dryRun,
        signal,
      });

      if (report.status === 'resume_required') {
        base.warn('An interrupted run is pending.');
        base.info('Run `trackforge resume` to continue it, or `trackforge run --discard-checkpoint` to start over.');
        return EXIT_CODES.RESUME_REQUIRED;
      }
      return finishRun(base, runtime, report);
    })
  );
}
