/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - run: Run every stage over every eligible track
 * - stage: Run a single stage
 * - resume: Continue an interrupted run
 * - retry: Retry failed tasks
 * - status: Show pipeline status
 * - entity: Manage tracks (add, list, show, remove)
 * - failed: Inspect and dismiss failed tasks
 * - reconcile: Check recorded artifacts against disk
 * - scan: Register audio files from a folder
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import type { CliDeps } from '../runtime.js';
import { registerEntityCommands } from './entity/index.js';
import { registerFailedCommands } from './failed.js';
import { registerReconcileCommand } from './reconcile.js';
import { registerResumeCommand } from './resume.js';
import { registerRetryCommand } from './retry.js';
import { registerRunCommand } from './run.js';
import { registerScanCommand } from './scan.js';
import { registerStageCommand } from './stage.js';
import { registerStatusCommand } from './status.js';

/**
 * Register all CLI commands with the program.
 *
 * @param deps - Seams passed through to every command handler
 */
export function registerCommands(program: Command, deps: CliDeps = {}): void {
  registerRunCommand(program, deps);
  registerStageCommand(program, deps);
  registerResumeCommand(program, deps);
  registerRetryCommand(program, deps);
  registerStatusCommand(program, deps);

  const entityCmd = program.command('entity').description('Manage tracks');
  registerEntityCommands(entityCmd, deps);

  registerFailedCommands(program, deps);
  registerReconcileCommand(program, deps);
  registerScanCommand(program, deps);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'run', description: 'Run music, cover image and video generation' },
    { name: 'stage <name>', description: 'Run a single stage' },
    { name: 'resume', description: 'Continue an interrupted run' },
    { name: 'retry', description: 'Retry failed tasks' },
    { name: 'status', description: 'Show pipeline status' },
    { name: 'entity add <id>', description: 'Register a new track' },
    { name: 'entity list', description: 'List tracks and their stage statuses' },
    { name: 'entity show <id>', description: 'Show a track in detail' },
    { name: 'entity remove <id>', description: 'Remove a track from the store' },
    { name: 'failed list', description: 'List failed tasks' },
    { name: 'failed dismiss <id> <stage>', description: 'Drop a failed task without retrying it' },
    { name: 'reconcile', description: 'Find done stages whose artifact file is gone' },
    { name: 'scan <folder>', description: 'Register audio files in a folder as tracks' },
  ];
}
