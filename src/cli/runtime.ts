/**
 * Command Runtime
 *
 * Shared plumbing for command handlers: building the pipeline from
 * configuration, mapping results and errors to exit codes, SIGINT
 * cancellation and the resume prompt.
 *
 * @module cli/runtime
 */

import * as readline from 'node:readline/promises';
import { InvalidArgumentError, type Command } from 'commander';
import { ConfigError, loadConfig, type AppConfig } from '../config/index.js';
import { createPipelineContext, type PipelineContext } from '../pipeline/context.js';
import { EntityNotFoundError, FatalPipelineError } from '../pipeline/errors.js';
import { PipelineOrchestrator } from '../pipeline/orchestrator.js';
import type { CapabilityMap, RunReport, SleepFn } from '../pipeline/types.js';
import type { Checkpoint } from '../schemas/checkpoint.js';
import { VIDEO_QUALITIES, VideoQualitySchema, type Settings, type VideoQuality } from '../schemas/settings.js';
import { loadSettings } from '../storage/config.js';
import { StoreCorruptError, StoreLockError } from '../storage/errors.js';
import { resolveStoragePaths } from '../storage/paths.js';
import { saveReport } from '../storage/reports.js';
import { createCapabilities } from '../workers/registry.js';
import { BaseCommand, EXIT_CODES, getBaseCommand, type ExitCode } from './base-command.js';
import { PipelineProgress } from './formatters/progress.js';
import { formatDryRunPlan, formatRunStatusLine, formatRunSummary } from './formatters/run-summary.js';
import { getVersionInfo } from './version.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Seams for embedding and tests. Everything defaults to the real process.
 */
export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  /** Replaces the capabilities built from configuration */
  capabilities?: CapabilityMap;
  sleep?: SleepFn;
  /** Whether a person can answer prompts */
  isInteractive?: () => boolean;
  /** Ask a yes/no question */
  confirm?: (question: string) => Promise<boolean>;
}

/** Per-invocation settings overrides from command options */
export interface RuntimeOverrides {
  videoQuality?: VideoQuality;
}

export interface Runtime {
  config: AppConfig;
  settings: Settings;
  ctx: PipelineContext;
  orchestrator: PipelineOrchestrator;
}

// ============================================================================
// Runtime Construction
// ============================================================================

/**
 * Load configuration and settings, then build the pipeline with the command's
 * BaseCommand as its logger.
 *
 * @throws ConfigError on invalid environment variables
 * @throws ZodError on an invalid settings file
 */
export async function createRuntime(
  base: BaseCommand,
  deps: CliDeps,
  overrides: RuntimeOverrides = {}
): Promise<Runtime> {
  const config = loadConfig(deps.env ?? process.env, base.options.dataDir);
  const paths = resolveStoragePaths(config.dataDir);
  const loaded = await loadSettings(paths.settings);
  const settings: Settings = overrides.videoQuality
    ? { ...loaded, video: { ...loaded.video, quality: overrides.videoQuality } }
    : loaded;
  base.debug(`${getVersionInfo()}, data directory: ${config.dataDir}`);

  const capabilities = deps.capabilities ?? createCapabilities({ config, settings, sleep: deps.sleep });
  const ctx = createPipelineContext({
    dataDir: config.dataDir,
    capabilities,
    settings,
    logger: base,
    sleep: deps.sleep,
  });

  return { config, settings, ctx, orchestrator: new PipelineOrchestrator(ctx) };
}

// ============================================================================
// Action Wrapper
// ============================================================================

/**
 * Run a command handler and exit with its code. Errors are printed and
 * mapped to an exit code.
 */
export async function runAction(cmd: Command, handler: (base: BaseCommand) => Promise<ExitCode>): Promise<void> {
  const base: BaseCommand = getBaseCommand(cmd);

  let code: ExitCode;
  try {
    code = await handler(base);
  } catch (error) {
    base.error(error instanceof Error ? error.message : String(error), error instanceof Error ? error : undefined);
    base.exitWith(exitCodeForError(error));
  }

  if (code !== EXIT_CODES.SUCCESS) {
    base.exitWith(code);
  }
}

export function exitCodeForError(error: unknown): ExitCode {
  if (
    error instanceof FatalPipelineError ||
    error instanceof StoreCorruptError ||
    error instanceof StoreLockError
  ) {
    return EXIT_CODES.FATAL;
  }
  if (error instanceof EntityNotFoundError) {
    return EXIT_CODES.NOT_FOUND;
  }
  if (error instanceof ConfigError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  return EXIT_CODES.ERROR;
}

export function exitCodeForReport(report: RunReport): ExitCode {
  switch (report.status) {
    case 'completed':
      return report.totals.failed > 0 ? EXIT_CODES.PARTIAL_FAILURE : EXIT_CODES.SUCCESS;
    case 'cancelled':
      return EXIT_CODES.CANCELLED;
    case 'fatal':
      return EXIT_CODES.FATAL;
    case 'resume_required':
      return EXIT_CODES.RESUME_REQUIRED;
    case 'no_checkpoint':
    case 'dry_run':
      return EXIT_CODES.SUCCESS;
  }
}

// ============================================================================
// Run Helpers
// ============================================================================

/**
 * Run `fn` with an AbortSignal fired by the first Ctrl-C. A second Ctrl-C
 * gets the default behavior.
 */
export async function withInterrupt<T>(base: BaseCommand, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    base.warn('Interrupted: finishing the current entity, then stopping. Press Ctrl-C again to force quit.');
    controller.abort();
  };

  process.once('SIGINT', onInterrupt);
  try {
    return await fn(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

/**
 * Show progress for the duration of `fn` unless output is quiet.
 */
export async function withProgress<T>(base: BaseCommand, runtime: Runtime, fn: () => Promise<T>): Promise<T> {
  if (base.isQuiet()) {
    return fn();
  }
  const progress = new PipelineProgress();
  const unsubscribe = runtime.orchestrator.subscribe(progress.listener);
  try {
    return await fn();
  } finally {
    unsubscribe();
  }
}

/**
 * Print and save the outcome of a run.
 *
 * @returns The exit code for the report
 */
export async function finishRun(base: BaseCommand, runtime: Runtime, report: RunReport): Promise<ExitCode> {
  if (report.status === 'dry_run') {
    if (report.plan) {
      base.info(formatDryRunPlan(report.plan));
    }
    base.info(formatRunStatusLine(report));
    return EXIT_CODES.SUCCESS;
  }
  if (report.status === 'no_checkpoint' || report.status === 'resume_required') {
    base.info(formatRunStatusLine(report));
    return exitCodeForReport(report);
  }

  const summary = formatRunSummary(report);
  base.blank();
  base.info(summary);
  base.blank();
  base.info(formatRunStatusLine(report));

  const saved = await saveReport(runtime.ctx.paths.reportsDir, summary, runtime.ctx.now());
  base.info(`Report saved to ${saved}`);

  return exitCodeForReport(report);
}

// ============================================================================
// Interrupted Runs
// ============================================================================

export type CheckpointChoice = 'resume' | 'discard' | 'abort';

/**
 * Decide what to do about a pending checkpoint. An interactive terminal is
 * asked; otherwise the user is told how to proceed and the run aborts.
 */
export async function askAboutCheckpoint(
  base: BaseCommand,
  deps: CliDeps,
  checkpoint: Checkpoint | undefined
): Promise<CheckpointChoice> {
  const description =
    checkpoint === undefined
      ? 'An interrupted run is pending.'
      : `An interrupted run (started ${checkpoint.started_at}) stopped at ${checkpoint.current_stage} ` +
        `with ${checkpoint.pending_ids.length} entities pending.`;

  const interactive = deps.isInteractive ?? isInteractiveTerminal;
  if (!interactive()) {
    base.warn(description);
    base.info('Run `trackforge resume`, or pass --resume to continue it or --discard-checkpoint to start over.');
    return 'abort';
  }

  base.info(description);
  const confirm = deps.confirm ?? confirmOnTerminal;
  return (await confirm('Resume it? [Y/n] ')) ? 'resume' : 'discard';
}

function isInteractiveTerminal(): boolean {
  return process.stdin.isTTY === true && process.stdout.isTTY === true;
}

async function confirmOnTerminal(question: string): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return !/^n/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

// ============================================================================
// Argument Parsers
// ============================================================================

/**
 * commander argParser for --quality.
 */
export function parseVideoQuality(value: string): VideoQuality {
  const parsed = VideoQualitySchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of ${VIDEO_QUALITIES.join(', ')}, got "${value}".`);
  }
  return parsed.data;
}

/**
 * commander argParser for positive integer options.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}
