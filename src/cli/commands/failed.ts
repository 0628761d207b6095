/**
 * Failed Task Commands
 *
 * Triage of the failure queue:
 * - failed list: show terminally failed tasks
 * - failed dismiss: drop an entry without retrying it
 *
 * @module cli/commands/failed
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import type { FailedTask } from '../../schemas/failure.js';
import { STAGE_ORDER, isStageName } from '../../schemas/stage.js';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { createRuntime, runAction, type CliDeps } from '../runtime.js';

export interface FailedListOptions {
  stage?: string;
  format?: string;
}

export function registerFailedCommands(program: Command, deps: CliDeps = {}): void {
  const failed = program.command('failed').description('Inspect and dismiss failed tasks');

  failed
    .command('list')
    .description('List failed tasks')
    .option('-s, --stage <name>', 'Only this stage')
    .option('-f, --format <type>', 'Output format: table, json', 'table')
    .action(async (options: FailedListOptions, cmd: Command) => {
      await runAction(cmd, (base) => handleFailedList(options, base, deps));
    });

  failed
    .command('dismiss <entityId> <stage>')
    .description('Remove a failed task from the queue without retrying it')
    .action(async (entityId: string, stage: string, _options: unknown, cmd: Command) => {
      await runAction(cmd, (base) => handleFailedDismiss(entityId, stage, base, deps));
    });
}

export async function handleFailedList(
  options: FailedListOptions,
  base: BaseCommand,
  deps: CliDeps
): Promise<ExitCode> {
  const { stage } = options;
  if (stage !== undefined && !isStageName(stage)) {
    base.error(`Unknown stage "${stage}". Expected one of: ${STAGE_ORDER.join(', ')}`);
    return EXIT_CODES.USAGE_ERROR;
  }

  const runtime = await createRuntime(base, deps);
  const tasks = (await runtime.ctx.failures.list()).filter((task) => stage === undefined || task.stage === stage);

  if (options.format === 'json') {
    base.json(tasks);
    return EXIT_CODES.SUCCESS;
  }

  if (tasks.length === 0) {
    base.info('No failed tasks.');
    return EXIT_CODES.SUCCESS;
  }

  base.section('Failed Tasks');
  console.log(chalk.bold(formatFailedRow('ENTITY', 'STAGE', 'KIND', 'ATTEMPTS', 'MESSAGE')));
  for (const task of tasks) {
    console.log(formatTask(task));
  }
  base.blank();
  base.info(`Total: ${tasks.length} failed task${tasks.length === 1 ? '' : 's'}`);
  base.info(chalk.dim('Retry with: trackforge retry [--stage <name>] [--entity <id>]'));
  return EXIT_CODES.SUCCESS;
}

export async function handleFailedDismiss(
  entityId: string,
  stage: string,
  base: BaseCommand,
  deps: CliDeps
): Promise<ExitCode> {
  if (!isStageName(stage)) {
    base.error(`Unknown stage "${stage}". Expected one of: ${STAGE_ORDER.join(', ')}`);
    return EXIT_CODES.USAGE_ERROR;
  }

  const runtime = await createRuntime(base, deps);
  if (!(await runtime.ctx.failures.remove(entityId, stage))) {
    base.error(`No failed ${stage} task for "${entityId}"`);
    return EXIT_CODES.NOT_FOUND;
  }

  base.success(`Dismissed failed ${stage} task for "${entityId}"`);
  return EXIT_CODES.SUCCESS;
}

// ============================================================================
// Table Helpers
// ============================================================================

function formatFailedRow(entity: string, stage: string, kind: string, attempts: string, message: string): string {
  return `${entity.padEnd(24)}${stage.padEnd(8)}${kind.padEnd(16)}${attempts.padEnd(10)}${message}`;
}

function formatTask(task: FailedTask): string {
  const message = task.error_message.length > 60 ? `${task.error_message.slice(0, 57)}...` : task.error_message;
  return formatFailedRow(task.entity_id, task.stage, task.error_kind, String(task.attempt_count), message);
}
