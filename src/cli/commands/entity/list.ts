/**
 * Entity List Command
 *
 * @module cli/commands/entity/list
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import type { Entity } from '../../../schemas/entity.js';
import {
  STAGE_ORDER,
  STAGE_STATUSES,
  StageStatusSchema,
  isStageName,
  type StageStatus,
} from '../../../schemas/stage.js';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../../base-command.js';
import { createRuntime, runAction, type CliDeps } from '../../runtime.js';

export interface ListEntitiesOptions {
  stage?: string;
  status?: string;
  format?: string;
}

export function registerListCommand(entityCmd: Command, deps: CliDeps = {}): void {
  entityCmd
    .command('list')
    .description('List tracks and their stage statuses')
    .option('-s, --stage <name>', 'Filter on this stage (requires --status)')
    .option('--status <status>', `Filter on status (${STAGE_STATUSES.join(', ')})`)
    .option('-f, --format <type>', 'Output format: table, json', 'table')
    .action(async (options: ListEntitiesOptions, cmd: Command) => {
      await runAction(cmd, (base) => handleList(options, base, deps));
    });
}

export async function handleList(
  options: ListEntitiesOptions,
  base: BaseCommand,
  deps: CliDeps
): Promise<ExitCode> {
  const { stage } = options;
  if (stage !== undefined && !isStageName(stage)) {
    base.error(`Unknown stage "${stage}". Expected one of: ${STAGE_ORDER.join(', ')}`);
    return EXIT_CODES.USAGE_ERROR;
  }
  let status: StageStatus | undefined;
  if (options.status !== undefined) {
    const parsed = StageStatusSchema.safeParse(options.status);
    if (!parsed.success) {
      base.error(`Unknown status "${options.status}". Expected one of: ${STAGE_STATUSES.join(', ')}`);
      return EXIT_CODES.USAGE_ERROR;
    }
    status = parsed.data;
  }
  if (stage !== undefined && status === undefined) {
    base.error('--stage needs --status');
    return EXIT_CODES.USAGE_ERROR;
  }

  const runtime = await createRuntime(base, deps);
  let entities: Entity[];
  if (status === undefined) {
    entities = await runtime.ctx.store.list();
  } else if (stage !== undefined) {
    entities = await runtime.ctx.store.query(stage, status);
  } else {
    const all = await runtime.ctx.store.list();
    entities = all.filter((entity) => STAGE_ORDER.some((name) => entity.stages[name].status === status));
  }

  if (options.format === 'json') {
    base.json(entities);
    return EXIT_CODES.SUCCESS;
  }

  if (entities.length === 0) {
    base.info('No tracks found.');
    base.info(chalk.dim('Add one with: trackforge entity add <id> --prompt "<text>"'));
    return EXIT_CODES.SUCCESS;
  }

  console.log(chalk.bold(`${'ID'.padEnd(24)}${STAGE_ORDER.map((name) => name.toUpperCase().padEnd(12)).join('')}`));
  for (const entity of entities) {
    const cells = STAGE_ORDER.map((name) => colorStatus(entity.stages[name].status, 12));
    console.log(`${entity.id.padEnd(24)}${cells.join('')}`);
  }
  base.blank();
  base.info(`Total: ${entities.length} track${entities.length === 1 ? '' : 's'}`);
  return EXIT_CODES.SUCCESS;
}

/**
 * Pad first so the escape codes do not count toward the column width.
 */
export function colorStatus(status: StageStatus, width = 0): string {
  const padded = status.padEnd(width);
  switch (status) {
    case 'completed':
      return chalk.green(padded);
    case 'skipped':
      return chalk.cyan(padded);
    case 'failed':
      return chalk.red(padded);
    case 'processing':
      return chalk.yellow(padded);
    case 'pending':
      return chalk.dim(padded);
  }
}
