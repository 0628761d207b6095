/**
 * Status Command
 *
 * Per-stage status counts, failure queue size and any pending checkpoint.
 *
 * @module cli/commands/status
 */

import type { Command } from 'commander';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { formatStatus } from '../formatters/run-summary.js';
import { createRuntime, runAction, type CliDeps } from '../runtime.js';

export interface StatusCommandOptions {
  format?: string;
}

export function registerStatusCommand(program: Command, deps: CliDeps = {}): void {
  program
    .command('status')
    .description('Show pipeline status')
    .option('-f, --format <type>', 'Output format: text, json', 'text')
    .action(async (options: StatusCommandOptions, cmd: Command) => {
      await runAction(cmd, (base) => handleStatus(options, base, deps));
    });
}

export async function handleStatus(
  options: StatusCommandOptions,
  base: BaseCommand,
  deps: CliDeps
): Promise<ExitCode> {
  if (options.format !== 'text' && options.format !== 'json') {
    base.error(`Unknown format "${options.format}". Expected text or json`);
    return EXIT_CODES.USAGE_ERROR;
  }

  const runtime = await createRuntime(base, deps);
  const status = await runtime.orchestrator.status();

  if (options.format === 'json') {
    base.json(status);
  } else {
    base.section('Pipeline Status');
    base.info(formatStatus(status));
  }
  return EXIT_CODES.SUCCESS;
}
