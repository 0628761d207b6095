/**
 * Trackforge CLI
 *
 * Main entry point for the trackforge CLI tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   trackforge --help
 *   trackforge entity add rainy-day --prompt "lofi beat with rain" --style lofi
 *   trackforge run --limit 5
 *   trackforge resume
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';
import type { CliDeps } from './runtime.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 *
 * @param deps - Seams for tests and embedding
 */
export function createProgram(deps: CliDeps = {}): Command {
  const program = new Command();

  program
    .name('trackforge')
    .description('Music, cover art and video generation pipeline')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override default data directory (~/.trackforge)');

  program.hook('preAction', (thisCommand) => {
    const opts: GlobalOptions = thisCommand.opts();
    const baseCommand = new BaseCommand(opts);

    // Subcommands find it by walking up to the program
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  // Before registration: subcommands copy it when they are created
  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.USAGE_ERROR);
  });

  registerCommands(program, deps);

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: readonly string[] = process.argv, deps: CliDeps = {}): Promise<void> {
  const program = createProgram(deps);
  await program.parseAsync([...argv]);
}
