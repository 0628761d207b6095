/**
 * Entity Remove Command
 *
 * Deletes a track and its failure queue entries. Artifacts on disk are kept.
 *
 * @module cli/commands/entity/remove
 */

import type { Command } from 'commander';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../../base-command.js';
import { createRuntime, runAction, type CliDeps } from '../../runtime.js';

export function registerRemoveCommand(entityCmd: Command, deps: CliDeps = {}): void {
  entityCmd
    .command('remove <entityId>')
    .description('Remove a track from the store')
    .action(async (entityId: string, _options: unknown, cmd: Command) => {
      await runAction(cmd, (base) => handleRemove(entityId, base, deps));
    });
}

export async function handleRemove(entityId: string, base: BaseCommand, deps: CliDeps): Promise<ExitCode> {
  const runtime = await createRuntime(base, deps);
  if (!(await runtime.ctx.store.delete(entityId))) {
    base.error(`Entity not found: ${entityId}`);
    return EXIT_CODES.NOT_FOUND;
  }
  const dropped = await runtime.ctx.failures.removeEntity(entityId);
  base.debug(`Dropped ${dropped} failed task(s) for ${entityId}`);
  base.success(`Removed ${entityId}`);
  return EXIT_CODES.SUCCESS;
}
