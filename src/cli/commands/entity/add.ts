/**
 * Entity Add Command
 *
 * Registers a new track with its music prompt. Every stage starts pending.
 *
 * @module cli/commands/entity/add
 */

import type { Command } from 'commander';
import { EntityIdSchema } from '../../../schemas/common.js';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../../base-command.js';
import { createRuntime, runAction, type CliDeps } from '../../runtime.js';

export interface AddEntityOptions {
  /** Music generation prompt */
  prompt: string;
  title?: string;
  /** Genre or style tag, also used to pick the cover art template */
  style?: string;
}

export function registerAddCommand(entityCmd: Command, deps: CliDeps = {}): void {
  entityCmd
    .command('add <entityId>')
    .description('Register a new track')
    .requiredOption('-p, --prompt <text>', 'Music generation prompt')
    .option('-t, --title <title>', 'Track title')
    .option('-s, --style <style>', 'Genre or style (lofi, jazz, ambient...)')
    .action(async (entityId: string, options: AddEntityOptions, cmd: Command) => {
      await runAction(cmd, (base) => handleAdd(entityId, options, base, deps));
    });
}

export async function handleAdd(
  entityId: string,
  options: AddEntityOptions,
  base: BaseCommand,
  deps: CliDeps
): Promise<ExitCode> {
  const id = EntityIdSchema.safeParse(entityId);
  if (!id.success) {
    base.error(`Invalid entity id "${entityId}": ${id.error.issues[0]?.message ?? 'invalid'}`);
    return EXIT_CODES.USAGE_ERROR;
  }

  const music: Record<string, unknown> = { prompt: options.prompt };
  if (options.title !== undefined) {
    music['title'] = options.title;
  }
  if (options.style !== undefined) {
    music['style'] = options.style;
  }

  const runtime = await createRuntime(base, deps);
  const entity = await runtime.ctx.store.register(id.data, { music });
  if (entity === null) {
    base.error(`Entity "${id.data}" already exists`);
    return EXIT_CODES.ERROR;
  }

  base.success(`Added ${entity.id}`);
  return EXIT_CODES.SUCCESS;
}
