/**
 * Progress Formatters
 *
 * CLI progress display utilities including:
 * - Spinner for long-running operations
 * - Pipeline progress driven by orchestrator events
 *
 * Uses the ora library for terminal spinners. Without a TTY, progress is
 * printed as plain lines instead.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { PipelineEvent } from '../../pipeline/events.js';
import type { StageOutcome } from '../../pipeline/types.js';
import { STAGE_LABELS } from '../../schemas/stage.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Render the animation; defaults to whether stdout is a TTY */
  enabled?: boolean;
}

// ============================================================================
// Status Icons
// ============================================================================

/**
 * Plain text icons for non-TTY output.
 */
const OUTCOME_ICONS: Record<StageOutcome, string> = {
  generated: '[+]',
  skipped: '[-]',
  failed: '[X]',
  cancelled: '[ ]',
};

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Loading entities...');
 * spinner.start();
 *
 * try {
 *   await store.load();
 *   spinner.succeed('Entities loaded');
 * } catch (err) {
 *   spinner.fail('Failed to load entities');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: options.enabled ?? process.stdout.isTTY === true,
      stream: process.stdout,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  warn(text?: string): this {
    this.spinner.warn(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

// ============================================================================
// Pipeline Progress
// ============================================================================

export interface PipelineProgressOptions {
  /** Spinner per stage when true, one line per entity otherwise */
  interactive?: boolean;
  /** Line sink for non-interactive output */
  write?: (line: string) => void;
}

/**
 * Renders orchestrator progress events.
 *
 * @example
 * ```typescript
 * const progress = new PipelineProgress();
 * const unsubscribe = orchestrator.subscribe(progress.listener);
 * await orchestrator.run();
 * unsubscribe();
 * ```
 */
export class PipelineProgress {
  private readonly interactive: boolean;
  private readonly write: (line: string) => void;
  private spinner: ProgressSpinner | null = null;

  constructor(options: PipelineProgressOptions = {}) {
    this.interactive = options.interactive ?? process.stdout.isTTY === true;
    this.write = options.write ?? ((line) => console.log(line));
  }

  readonly listener = (event: PipelineEvent): void => {
    this.handle(event);
  };

  handle(event: PipelineEvent): void {
    switch (event.type) {
      case 'run:start': {
        const verb = event.resumed ? 'Resuming' : 'Running';
        this.write(chalk.bold(`${verb}: ${event.stages.map((stage) => STAGE_LABELS[stage]).join(' -> ')}`));
        break;
      }

      case 'stage:start': {
        const label = STAGE_LABELS[event.stage];
        if (this.interactive) {
          this.spinner = new ProgressSpinner(`${label}: 0/${event.total}`, { enabled: true }).start();
        } else {
          this.write(`[*] ${label}: ${event.total} to process`);
        }
        break;
      }

      case 'entity:retry': {
        const text =
          `${STAGE_LABELS[event.stage]}: ${event.entityId} hit ${event.kind}, ` +
          `retry ${event.attempt} in ${formatDuration(event.delayMs)}`;
        if (this.spinner) {
          this.spinner.update(text);
        } else {
          this.write(`[~] ${text}`);
        }
        break;
      }

      case 'entity:done': {
        const label = STAGE_LABELS[event.stage];
        if (this.spinner) {
          const eta = event.etaMs !== null && event.etaMs > 0 ? ` (about ${formatDuration(event.etaMs)} left)` : '';
          this.spinner.update(`${label}: ${event.current}/${event.total}${eta}`);
        } else {
          this.write(
            `${OUTCOME_ICONS[event.outcome]} ${label}: ${event.entityId} ${event.outcome} (${event.current}/${event.total})`
          );
        }
        break;
      }

      case 'stage:done': {
        const { report } = event;
        const summary =
          `${STAGE_LABELS[report.stage]}: ${report.generated} generated, ${report.skipped} skipped, ` +
          `${report.failed} failed, ${report.blocked} blocked`;
        if (this.spinner) {
          if (report.failed > 0 || report.cancelled) {
            this.spinner.warn(summary);
          } else {
            this.spinner.succeed(summary);
          }
          this.spinner = null;
        } else {
          this.write(`${report.failed > 0 || report.cancelled ? '[!]' : '[+]'} ${summary}`);
        }
        break;
      }

      case 'run:done':
        this.spinner?.stop();
        this.spinner = null;
        break;
    }
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}
