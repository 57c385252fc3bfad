/**
 * Run reporter: counts, rendered lines and the JSON report
 */

import { describe, expect, it } from 'vitest';
import type { DeletionOutcome, RunReport } from '../../src/config/types.js';
import {
  buildDeleteReport,
  formatDuration,
  isCleanRun,
  printRunSummary,
  renderOutcomes,
  renderSummary,
  summarize,
} from '../../src/publishers/run-reporter.js';
import { createTestLogger, GROUP_ID, makeOrg } from '../helpers/fixtures.js';

const STARTED = new Date('2026-01-05T10:00:00.000Z');
const FINISHED = new Date('2026-01-05T10:01:05.000Z');
const STAMP = '2026-01-05T10:00:30.000Z';

const orgA = makeOrg('orgA', 'Alpha');
const orgB = makeOrg('orgB', 'Bravo');
const orgC = makeOrg('orgC', 'Charlie');
const orgD = makeOrg('orgD', 'Delta');

function outcome(org: typeof orgB, status: DeletionOutcome['status'], extra: Partial<DeletionOutcome> = {}): DeletionOutcome {
  return { organization: org, status, attempts: status === 'skipped' ? 0 : 1, timestamp: STAMP, ...extra };
}

function report(overrides: Partial<RunReport> = {}): RunReport {
  return {
    mode: 'live',
    groupId: GROUP_ID,
    region: 'SNYK-US-01',
    plan: { protected: [orgA], candidates: [orgB, orgC, orgD] },
    gate: { decision: 'proceed' },
    outcomes: [outcome(orgB, 'succeeded'), outcome(orgC, 'failed', { error: 'bad request' })],
    abandoned: [orgD],
    startedAt: STARTED,
    finishedAt: FINISHED,
    ...overrides,
  };
}

describe('summarize', () => {
  it('counts each status and the abandoned candidates', () => {
    expect(summarize(report())).toEqual({ succeeded: 1, failed: 1, skipped: 0, abandoned: 1, durationMs: 65_000 });
  });
});

describe('formatDuration', () => {
  it('formats seconds and minutes', () => {
    expect(formatDuration(4_400)).toBe('4s');
    expect(formatDuration(65_000)).toBe('1m 5s');
  });
});

describe('renderOutcomes', () => {
  it('lists outcomes in order then the candidates never attempted', () => {
    expect(renderOutcomes(report())).toEqual([
      'SUCCEEDED Bravo (orgB) attempts=1',
      'FAILED Charlie (orgC) attempts=1 error="bad request"',
      'NOT ATTEMPTED Delta (orgD)',
    ]);
  });
});

describe('renderSummary', () => {
  it('renders counts on one line', () => {
    expect(renderSummary(summarize(report()))).toBe('succeeded=1 failed=1 skipped=0 not_attempted=1 duration=1m 5s');
  });
});

describe('isCleanRun', () => {
  it('is clean only when everything succeeded', () => {
    const clean = report({ outcomes: [outcome(orgB, 'succeeded')], abandoned: [] });

    expect(isCleanRun(summarize(clean))).toBe(true);
    expect(isCleanRun(summarize(report()))).toBe(false);
    expect(isCleanRun(summarize(report({ outcomes: [outcome(orgB, 'skipped')], abandoned: [] })))).toBe(false);
  });
});

describe('printRunSummary', () => {
  it('adds only the summary to the run log when every candidate was attempted', () => {
    const logger = createTestLogger();

    printRunSummary(report({ outcomes: [outcome(orgB, 'succeeded')], abandoned: [] }), logger);

    expect(logger.audits).toEqual(['Summary: succeeded=1 failed=0 skipped=0 not_attempted=0 duration=1m 5s']);
    expect(logger.section).toHaveBeenCalledWith('Final Results');
  });

  it('logs the candidates never attempted before the summary', () => {
    const logger = createTestLogger();

    printRunSummary(report({ outcomes: [outcome(orgB, 'succeeded')], abandoned: [orgD] }), logger);

    expect(logger.audits).toEqual([
      'NOT ATTEMPTED Delta (orgD)',
      'Summary: succeeded=1 failed=0 skipped=0 not_attempted=1 duration=1m 5s',
    ]);
  });
});

describe('buildDeleteReport', () => {
  it('marks a run with failures unsuccessful', () => {
    const json = buildDeleteReport(report());

    expect(json.success).toBe(false);
    expect(json.gate).toBe('proceed');
    expect(json.summary).toEqual({
      succeeded: 1,
      failed: 1,
      skipped: 0,
      abandoned: 1,
      durationMs: 65_000,
      protected: 1,
      candidates: 3,
    });
    expect(json.details.abandoned).toEqual([{ name: 'Delta', id: 'orgD' }]);
    expect(json.details.outcomes[1]).toEqual({
      name: 'Charlie',
      id: 'orgC',
      status: 'failed',
      attempts: 1,
      error: 'bad request',
      note: undefined,
      timestamp: STAMP,
    });
  });

  it('marks any gate abort unsuccessful', () => {
    const empty = buildDeleteReport(
      report({ gate: { decision: 'abort', reason: 'no-candidates' }, outcomes: [], abandoned: [] })
    );
    const mismatch = buildDeleteReport(
      report({ gate: { decision: 'abort', reason: 'token-mismatch' }, outcomes: [], abandoned: [] })
    );

    expect(empty.success).toBe(false);
    expect(empty.gate).toBe('abort');
    expect(mismatch.success).toBe(false);
    expect(mismatch.gate).toBe('abort');
  });
});
