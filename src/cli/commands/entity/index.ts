/**
 * Entity Commands Index
 *
 * Registers the track management commands:
 * - entity add
 * - entity list
 * - entity show
 * - entity remove
 *
 * @module cli/commands/entity
 */

import type { Command } from 'commander';
import type { CliDeps } from '../../runtime.js';
import { registerAddCommand } from './add.js';
import { registerListCommand } from './list.js';
import { registerShowCommand } from './show.js';
import { registerRemoveCommand } from './remove.js';

/**
 * Register all entity commands with the parent entity command.
 */
export function registerEntityCommands(entityCmd: Command, deps: CliDeps = {}): void {
  registerAddCommand(entityCmd, deps);
  registerListCommand(entityCmd, deps);
  registerShowCommand(entityCmd, deps);
  registerRemoveCommand(entityCmd, deps);
}

export { registerAddCommand } from './add.js';
export { registerListCommand } from './list.js';
export { registerShowCommand } from './show.js';
export { registerRemoveCommand } from './remove.js';
