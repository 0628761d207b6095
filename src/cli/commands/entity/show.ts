/**
 * Entity Show Command
 *
 * Displays one track: every stage record and its recent errors.
 *
 * @module cli/commands/entity/show
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { STAGE_LABELS, STAGE_ORDER } from '../../../schemas/stage.js';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../../base-command.js';
import { createRuntime, runAction, type CliDeps } from '../../runtime.js';
import { colorStatus } from './list.js';

export interface ShowEntityOptions {
  format?: string;
}

export function registerShowCommand(entityCmd: Command, deps: CliDeps = {}): void {
  entityCmd
    .command('show <entityId>')
    .description('Show a track in detail')
    .option('-f, --format <type>', 'Output format: text, json', 'text')
    .action(async (entityId: string, options: ShowEntityOptions, cmd: Command) => {
      await runAction(cmd, (base) => handleShow(entityId, options, base, deps));
    });
}

export async function handleShow(
  entityId: string,
  options: ShowEntityOptions,
  base: BaseCommand,
  deps: CliDeps
): Promise<ExitCode> {
  const runtime = await createRuntime(base, deps);
  const entity = await runtime.ctx.store.get(entityId);
  if (entity === null) {
    base.error(`Entity not found: ${entityId}`);
    return EXIT_CODES.NOT_FOUND;
  }

  if (options.format === 'json') {
    base.json(entity);
    return EXIT_CODES.SUCCESS;
  }

  base.section(`Track: ${entity.id}`);
  base.keyValue('Created', entity.created_at);
  base.keyValue('Updated', entity.updated_at);

  for (const stage of STAGE_ORDER) {
    const record = entity.stages[stage];
    base.blank();
    base.info(`${chalk.bold(STAGE_LABELS[stage])}  ${colorStatus(record.status)}`);
    if (record.artifact_path !== null) {
      base.keyValue('  Artifact', record.artifact_path);
    }
    if (record.completed_at !== null) {
      base.keyValue('  Completed', record.completed_at);
    }
    if (record.attempt_count > 0) {
      base.keyValue('  Attempts', record.attempt_count);
    }
    for (const [key, value] of Object.entries(record.metadata)) {
      base.keyValue(`  ${key}`, typeof value === 'string' || typeof value === 'number' ? value : JSON.stringify(value));
    }
  }

  if (entity.error_history.length > 0) {
    base.section(`Recent Errors (${entity.error_history.length})`);
    for (const entry of entity.error_history) {
      base.info(`${chalk.dim(entry.timestamp)} ${entry.stage} [${entry.kind}] ${entry.message}`);
    }
  }

  return EXIT_CODES.SUCCESS;
}
