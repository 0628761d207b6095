/**
 * Resume Command
 *
 * Continues the run recorded in the checkpoint.
 *
 * @module cli/commands/resume
 */

import type { Command } from 'commander';
import type { BaseCommand, ExitCode } from '../base-command.js';
import {
  createRuntime,
  finishRun,
  parsePositiveInt,
  runAction,
  withInterrupt,
  withProgress,
  type CliDeps,
} from '../runtime.js';

export interface ResumeCommandOptions {
  concurrency?: number;
}

export function registerResumeCommand(program: Command, deps: CliDeps = {}): void {
  program
    .command('resume')
    .description('Continue an interrupted run from its checkpoint')
    .option('-c, --concurrency <count>', 'Entities processed in parallel per stage', parsePositiveInt)
    .action(async (options: ResumeCommandOptions, cmd: Command) => {
      await runAction(cmd, (base) => handleResume(options, base, deps));
    });
}

export async function handleResume(
  options: ResumeCommandOptions,
  base: BaseCommand,
  deps: CliDeps
): Promise<ExitCode> {
  const runtime = await createRuntime(base, deps);

  return withInterrupt(base, (signal) =>
    withProgress(base, runtime, async () => {
      const report = await runtime.orchestrator.resume({
        concurrency: options.concurrency,
        signal,
      });
      return finishRun(base, runtime, report);
    })
  );
}
