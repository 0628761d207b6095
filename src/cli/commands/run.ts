/**
 * Run Command
 *
 * Runs every stage in order for all entities that need it.
 *
 * @module cli/commands/run
 */

import type { Command } from 'commander';
import type { VideoQuality } from '../../schemas/settings.js';
import type { RunOptions } from '../../pipeline/types.js';
import { reconcileArtifacts } from '../../reconcile/index.js';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import {
  askAboutCheckpoint,
  createRuntime,
  finishRun,
  parsePositiveInt,
  parseVideoQuality,
  runAction,
  withInterrupt,
  withProgress,
  type CliDeps,
} from '../runtime.js';

// ============================================================================
// Types
// ============================================================================

export interface RunCommandOptions {
  skipMusic?: boolean;
  skipImage?: boolean;
  skipVideo?: boolean;
  force?: boolean;
  limit?: number;
  concurrency?: number;
  dryRun?: boolean;
  quality?: VideoQuality;
  resume?: boolean;
  discardCheckpoint?: boolean;
}

// ============================================================================
// Command Registration
// ============================================================================

export function registerRunCommand(program: Command, deps: CliDeps = {}): void {
  program
    .command('run')
    .description('Run the full pipeline: music, cover image, video')
    .option('--skip-music', 'Leave out the music stage')
    .option('--skip-image', 'Leave out the cover image stage')
    .option('--skip-video', 'Leave out the video stage')
    .option('-f, --force', 'Regenerate stages that are already done')
    .option('-n, --limit <count>', 'Maximum entities per stage', parsePositiveInt)
    .option('-c, --concurrency <count>', 'Entities processed in parallel per stage', parsePositiveInt)
    .option('--dry-run', 'Show what would run without changing anything')
    .option('--quality <level>', 'Video encoding quality: fast, normal or high', parseVideoQuality)
    .option('--resume', 'Continue an interrupted run without asking')
    .option('--discard-checkpoint', 'Forget an interrupted run and start over')
    .action(async (options: RunCommandOptions, cmd: Command) => {
      await runAction(cmd, (base) => handleRun(options, base, deps));
    });
}

/**
 * Handle the run command.
 */
export async function handleRun(options: RunCommandOptions, base: BaseCommand, deps: CliDeps): Promise<ExitCode> {
  if (options.resume && options.discardCheckpoint) {
    base.error('Cannot use both --resume and --discard-checkpoint');
    return EXIT_CODES.USAGE_ERROR;
  }

  const runtime = await createRuntime(base, deps, { videoQuality: options.quality });
  const { orchestrator, ctx, settings } = runtime;

  if (settings.reconcile.beforeRun && !options.dryRun) {
    const reconciled = await reconcileArtifacts(ctx, settings.reconcile.action);
    if (reconciled.missing.length > 0) {
      base.warn(`${reconciled.missing.length} recorded artifact(s) missing (action: ${reconciled.action})`);
    }
  }

  if (options.discardCheckpoint && !options.dryRun && (await ctx.checkpoints.exists())) {
    await ctx.checkpoints.clear();
    base.info('Discarded the interrupted run.');
  }

  return withInterrupt(base, async (signal) => {
    const runOptions: RunOptions = {
      skip: { music: options.skipMusic, image: options.skipImage, video: options.skipVideo },
      force: options.force,
      limit: options.limit,
      concurrency: options.concurrency,
      dryRun: options.dryRun,
      resume: options.resume,
      signal,
    };

    return withProgress(base, runtime, async () => {
      let report = await orchestrator.run(runOptions);

      if (report.status === 'resume_required') {
        const choice = await askAboutCheckpoint(base, deps, report.checkpoint);
        if (choice === 'abort') {
          return EXIT_CODES.RESUME_REQUIRED;
        }
        if (choice === 'resume') {
          report = await orchestrator.resume({ concurrency: runOptions.concurrency, signal });
        } else {
          await ctx.checkpoints.clear();
          base.info('Discarded the interrupted run.');
          report = await orchestrator.run(runOptions);
        }
      }

      return finishRun(base, runtime, report);
    });
  });
}
