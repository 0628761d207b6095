/**
 * Run Summary Formatters
 *
 * Plain-text renderings of run, retry, dry-run and status results. The run
 * summary is both printed and saved under `<dataDir>/reports/`, so it
 * carries no color; only the one-line status is colored.
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import type { PipelineStatus } from '../../pipeline/orchestrator.js';
import type {
  DryRunPlan,
  RetryReport,
  RunReport,
  StageFailure,
  StageReport,
} from '../../pipeline/types.js';
import { STAGE_LABELS, STAGE_ORDER, STAGE_STATUSES } from '../../schemas/stage.js';
import { formatDuration } from './progress.js';

/** Failures listed in a summary before the rest are elided */
export const MAX_LISTED_FAILURES = 10;

// ============================================================================
// Run Summary
// ============================================================================

/**
 * Format a complete run summary.
 *
 * @example
 * ```
 * === Pipeline Report ===
 * Status:   completed
 * Started:  2026-03-01T10:00:00.000Z
 * Finished: 2026-03-01T10:04:05.000Z
 * Duration: 4m 5s
 * Resumed:  no
 *
 * Stages:
 *   Music: 3 generated, 0 skipped, 0 failed, 0 blocked (of 3)
 *   Cover Image: 2 generated, 0 skipped, 1 failed, 0 blocked (of 3)
 *   Video: 2 generated, 0 skipped, 0 failed, 1 blocked (of 2)
 *
 * Totals: 7 generated, 0 skipped, 1 failed, 1 blocked
 *
 * Failures (1):
 *   t2 / Cover Image [server_error] Server error (502): upstream down
 * ```
 */
export function formatRunSummary(report: RunReport): string {
  const lines: string[] = [];

  lines.push('=== Pipeline Report ===');
  lines.push(`Status:   ${report.status}`);
  lines.push(`Started:  ${report.startedAt}`);
  lines.push(`Finished: ${report.finishedAt}`);
  lines.push(`Duration: ${formatDuration(report.durationMs)}`);
  lines.push(`Resumed:  ${report.resumed ? 'yes' : 'no'}`);
  if (report.fatalError !== undefined) {
    lines.push(`Fatal:    ${report.fatalError}`);
  }
  lines.push('');

  if (report.stages.length === 0) {
    lines.push('Stages: none run');
  } else {
    lines.push('Stages:');
    for (const stage of report.stages) {
      lines.push(`  ${formatStageLine(stage)}`);
    }
  }
  lines.push('');

  const { totals } = report;
  lines.push(
    `Totals: ${totals.generated} generated, ${totals.skipped} skipped, ` +
      `${totals.failed} failed, ${totals.blocked} blocked`
  );

  const failures = report.stages.flatMap((stage) => stage.failures);
  if (failures.length > 0) {
    lines.push('');
    lines.push(...formatFailureList(failures));
  }

  return lines.join('\n');
}

export function formatStageLine(stage: StageReport): string {
  const cancelled = stage.cancelled ? ' (cancelled)' : '';
  return (
    `${STAGE_LABELS[stage.stage]}: ${stage.generated} generated, ${stage.skipped} skipped, ` +
    `${stage.failed} failed, ${stage.blocked} blocked (of ${stage.total})${cancelled}`
  );
}

/**
 * The first MAX_LISTED_FAILURES failures, then a count of the rest.
 */
export function formatFailureList(failures: readonly StageFailure[]): string[] {
  const lines = [`Failures (${failures.length}):`];
  for (const failure of failures.slice(0, MAX_LISTED_FAILURES)) {
    lines.push(
      `  ${failure.entityId} / ${STAGE_LABELS[failure.stage]} [${failure.kind}] ${failure.message}`
    );
  }
  if (failures.length > MAX_LISTED_FAILURES) {
    lines.push(`  ... and ${failures.length - MAX_LISTED_FAILURES} more`);
  }
  return lines;
}

/**
 * Format a compact one-line run status.
 */
export function formatRunStatusLine(report: RunReport): string {
  const duration = chalk.dim(`(${formatDuration(report.durationMs)})`);
  switch (report.status) {
    case 'completed':
      return report.totals.failed > 0
        ? `${chalk.yellow(`⚠ Pipeline finished with ${report.totals.failed} failure(s)`)} ${duration}`
        : `${chalk.green('✔ Pipeline complete')} ${duration}`;
    case 'cancelled':
      return `${chalk.yellow('⚠ Pipeline cancelled; run `trackforge resume` to continue')} ${duration}`;
    case 'fatal':
      return chalk.red(`✘ Pipeline aborted: ${report.fatalError ?? 'unknown error'}`);
    case 'resume_required':
      return chalk.yellow('⚠ An interrupted run is pending');
    case 'no_checkpoint':
      return 'No interrupted run to resume.';
    case 'dry_run':
      return chalk.dim('Dry run: nothing was changed.');
  }
}

// ============================================================================
// Other Reports
// ============================================================================

/**
 * Format what a dry run would do.
 */
export function formatDryRunPlan(plan: DryRunPlan): string {
  const lines = ['=== Dry Run ==='];
  for (const stage of plan.stages) {
    lines.push(
      `${STAGE_LABELS[stage.stage]}: ${stage.eligible.length} to process, ` +
        `${stage.satisfied} already done, ${stage.blocked.length} blocked`
    );
    if (stage.eligible.length > 0) {
      lines.push(`  process: ${stage.eligible.join(', ')}`);
    }
    if (stage.blocked.length > 0) {
      lines.push(`  blocked: ${stage.blocked.join(', ')}`);
    }
  }
  return lines.join('\n');
}

export function formatRetryReport(report: RetryReport): string {
  const lines = [
    `Retried ${report.attempted}: ${report.succeeded} succeeded, ${report.failed} failed, ` +
      `${report.blocked} blocked, ${report.orphaned} orphaned`,
  ];
  if (report.cancelled) {
    lines.push('Retry cancelled before the queue was exhausted.');
  }
  if (report.failures.length > 0) {
    lines.push('', ...formatFailureList(report.failures));
  }
  return lines.join('\n');
}

/**
 * Format store statistics, the failure queue size and any pending checkpoint.
 */
export function formatStatus(status: PipelineStatus): string {
  const { statistics, failures, checkpoint } = status;
  const lines = [
    `Entities: ${statistics.total} (${statistics.fullyCompleted} fully completed)`,
    '',
  ];

  for (const stage of STAGE_ORDER) {
    const counts = statistics.byStage[stage];
    const parts = STAGE_STATUSES.map((st) => `${counts[st]} ${st}`);
    lines.push(`${STAGE_LABELS[stage]}: ${parts.join(', ')}`);
  }

  lines.push('');
  lines.push(
    `Failed tasks: ${failures.total}` +
      (failures.total > 0
        ? ` (${STAGE_ORDER.map((stage) => `${stage} ${failures.byStage[stage]}`).join(', ')})`
        : '')
  );

  if (checkpoint !== null) {
    lines.push(
      `Interrupted run: started ${checkpoint.started_at}, at ${checkpoint.current_stage}, ` +
        `${checkpoint.completed_ids.length} done, ${checkpoint.pending_ids.length} pending`
    );
  }

  return lines.join('\n');
}
