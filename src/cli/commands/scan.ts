/**
 * Scan Command
 *
 * Registers audio files from a folder as tracks whose music is already done.
 *
 * @module cli/commands/scan
 */

import type { Command } from 'commander';
import { registerFromFolder, type ScanReport } from '../../scan/index.js';
import { isErrnoException } from '../../storage/atomic.js';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { createRuntime, runAction, type CliDeps } from '../runtime.js';

export interface ScanCommandOptions {
  dryRun?: boolean;
}

export function registerScanCommand(program: Command, deps: CliDeps = {}): void {
  program
    .command('scan <folder>')
    .description('Register .mp3, .wav and .flac files in a folder as tracks')
    .option('--dry-run', 'Show what would be registered without changing anything')
    .action(async (folder: string, options: ScanCommandOptions, cmd: Command) => {
      await runAction(cmd, (base) => handleScan(folder, options, base, deps));
    });
}

export async function handleScan(
  folder: string,
  options: ScanCommandOptions,
  base: BaseCommand,
  deps: CliDeps
): Promise<ExitCode> {
  const runtime = await createRuntime(base, deps);

  let report: ScanReport;
  try {
    report = await registerFromFolder(runtime.ctx, folder, { dryRun: options.dryRun });
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      base.error(`Not a folder: ${folder}`);
      return EXIT_CODES.NOT_FOUND;
    }
    throw error;
  }

  const found = report.added.length + report.adopted.length + report.unchanged.length;
  if (found === 0 && report.skipped.length === 0) {
    base.info(`No audio files in ${report.folder}`);
    return EXIT_CODES.SUCCESS;
  }

  if (options.dryRun) {
    base.info('Dry run: nothing was written.');
  }
  base.section(`Scan of ${report.folder}`);
  base.keyValue('Added', String(report.added.length));
  base.keyValue('Adopted', String(report.adopted.length));
  base.keyValue('Unchanged', String(report.unchanged.length));
  base.keyValue('Skipped', String(report.skipped.length));
  base.blank();

  if (report.added.length + report.adopted.length > 0) {
    base.success(`${report.added.length + report.adopted.length} track(s) ready for the image and video stages.`);
  }
  return EXIT_CODES.SUCCESS;
}
