/**
 * Reconcile Command
 *
 * Checks that every done stage still has its artifact on disk.
 *
 * @module cli/commands/reconcile
 */

import type { Command } from 'commander';
import { reconcileArtifacts } from '../../reconcile/index.js';
import { MissingArtifactActionSchema } from '../../schemas/settings.js';
import { STAGE_LABELS } from '../../schemas/stage.js';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { createRuntime, runAction, type CliDeps } from '../runtime.js';

export interface ReconcileCommandOptions {
  /** warn, remove or mark-missing; defaults to settings.reconcile.action */
  action?: string;
}

export function registerReconcileCommand(program: Command, deps: CliDeps = {}): void {
  program
    .command('reconcile')
    .description('Find done stages whose artifact file is gone')
    .option('-a, --action <action>', 'What to do about them: warn, remove, mark-missing')
    .action(async (options: ReconcileCommandOptions, cmd: Command) => {
      await runAction(cmd, (base) => handleReconcile(options, base, deps));
    });
}

export async function handleReconcile(
  options: ReconcileCommandOptions,
  base: BaseCommand,
  deps: CliDeps
): Promise<ExitCode> {
  let requested: string | undefined;
  if (options.action !== undefined) {
    requested = options.action.replace(/-/g, '_');
    if (!MissingArtifactActionSchema.safeParse(requested).success) {
      base.error(`Unknown action "${options.action}". Expected warn, remove or mark-missing`);
      return EXIT_CODES.USAGE_ERROR;
    }
  }

  const runtime = await createRuntime(base, deps);
  const action = MissingArtifactActionSchema.parse(requested ?? runtime.settings.reconcile.action);
  const report = await reconcileArtifacts(runtime.ctx, action);

  if (report.missing.length === 0) {
    base.success('Every recorded artifact is present.');
    return EXIT_CODES.SUCCESS;
  }

  base.section(`Missing Artifacts (${report.missing.length})`);
  for (const item of report.missing) {
    base.fail(`${item.entityId} / ${STAGE_LABELS[item.stage]}: ${item.artifactPath}`);
  }
  base.blank();

  if (action === 'remove') {
    base.info(`Removed ${report.removedEntities.length} entit${report.removedEntities.length === 1 ? 'y' : 'ies'}.`);
  } else if (action === 'mark_missing') {
    base.info(`Reset ${report.resetStages} stage${report.resetStages === 1 ? '' : 's'} to pending; the next run regenerates them.`);
  } else {
    base.info('Nothing changed. Use --action mark-missing to regenerate them or --action remove to drop the entities.');
  }
  return EXIT_CODES.SUCCESS;
}
