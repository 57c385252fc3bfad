/**
 * Run reporter - aggregates a finished run into counts and printable lines
 */

import type { DeleteReport, Organization, RunReport, Summary } from '../config/types.js';
import { formatOutcome } from '../processors/deletion-executor.js';
import { describeOrg } from '../processors/deletion-planner.js';
import type { Logger } from '../utils/logger.js';

export function summarize(report: RunReport): Summary {
  const summary: Summary = {
    succeeded: 0,
    failed: 0,
    skipped: 0,
    abandoned: report.abandoned.length,
    durationMs: report.finishedAt.getTime() - report.startedAt.getTime(),
  };

  for (const outcome of report.outcomes) {
    summary[outcome.status]++;
  }

  return summary;
}

export function formatDuration(ms: number): string {
  const seconds = Math.round(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${seconds % 60}s`;
}

function notAttempted(org: Organization): string {
  return `NOT ATTEMPTED ${describeOrg(org)}`;
}

/** One line per outcome, in execution order, followed by the abandoned candidates */
export function renderOutcomes(report: RunReport): string[] {
  return [...report.outcomes.map(formatOutcome), ...report.abandoned.map(notAttempted)];
}

export function renderSummary(summary: Summary): string {
  return [
    `succeeded=${summary.succeeded}`,
    `failed=${summary.failed}`,
    `skipped=${summary.skipped}`,
    `not_attempted=${summary.abandoned}`,
    `duration=${formatDuration(summary.durationMs)}`,
  ].join(' ');
}

/** True when nothing failed, nothing was skipped and nothing was left behind */
export function isCleanRun(summary: Summary): boolean {
  return summary.failed === 0 && summary.skipped === 0 && summary.abandoned === 0;
}

/**
 * Complete the run log (the executor already logged each outcome) with the
 * abandoned candidates and the summary, and print counts plus failing ids to
 * the console. Error messages stay in the log.
 */
export function printRunSummary(report: RunReport, logger: Logger): Summary {
  const summary = summarize(report);

  for (const org of report.abandoned) {
    logger.audit(notAttempted(org), 'warn');
  }
  logger.audit(`Summary: ${renderSummary(summary)}`);

  logger.section('Final Results');
  logger.keyValue('Deleted', summary.succeeded);
  logger.keyValue('Failed', summary.failed);
  if (summary.skipped > 0) logger.keyValue('Skipped', summary.skipped);
  if (summary.abandoned > 0) logger.keyValue('Not attempted', summary.abandoned);
  logger.keyValue('Duration', formatDuration(summary.durationMs));

  if (logger.isVerbose()) {
    console.log();
    logger.subsection('Outcomes');
    for (const line of renderOutcomes(report)) {
      logger.listItem(line);
    }
  }

  const failed = report.outcomes.filter((o) => o.status === 'failed');
  if (failed.length > 0) {
    console.log();
    logger.subsection(`Failed Deletions (${failed.length})`);
    for (const outcome of failed) {
      logger.listItem(describeOrg(outcome.organization));
    }
  }

  return summary;
}

export function buildDeleteReport(report: RunReport): DeleteReport {
  const summary = summarize(report);
  const pair = (org: { name: string; id: string }) => ({ name: org.name, id: org.id });

  return {
    operationType: 'delete',
    timestamp: report.finishedAt.toISOString(),
    success: report.gate.decision === 'proceed' && isCleanRun(summary),
    region: report.region,
    groupId: report.groupId,
    dryRun: report.mode === 'dry-run',
    gate: report.gate.decision,
    summary: {
      ...summary,
      protected: report.plan.protected.length,
      candidates: report.plan.candidates.length,
    },
    details: {
      protected: report.plan.protected.map(pair),
      outcomes: report.outcomes.map((o) => ({
        ...pair(o.organization),
        status: o.status,
        attempts: o.attempts,
        error: o.error,
        note: o.note,
        timestamp: o.timestamp,
      })),
      abandoned: report.abandoned.map(pair),
    },
  };
}
