/**
 * Delete command handler - remove every unprotected organization in a group
 *
 * Pipeline: verify token -> list group orgs -> plan against exclusions ->
 *           dry-run preview OR (confirm -> snapshot -> delete one by one -> report)
 *
 * Safety features: exclusion list (required, never empty), exact confirmation
 * token, dry-run preview, pre-deletion snapshot, group scoping, stop on auth
 * failure, remaining-organizations list on partial failure.
 */

import * as path from 'path';

import { fetchTransport } from '../api/http.js';
import { SnykClient } from '../api/snyk-client.js';
import type { ManagementApi } from '../api/snyk-client.js';
import { REGION_ENDPOINTS } from '../config/regions.js';
import { resolveSettings } from '../config/settings.js';
import type { DeleteOptions, RunSettings } from '../config/settings.js';
import type { ExecutionResult, GateResult, Organization, Plan, RunReport, Summary } from '../config/types.js';
import { readExclusionsFile } from '../parsers/exclusion-parser.js';
import type { ExclusionSet } from '../parsers/exclusion-parser.js';
import { confirmPlan } from '../processors/confirmation-gate.js';
import type { Prompt } from '../processors/confirmation-gate.js';
import { executeDeletions } from '../processors/deletion-executor.js';
import { describeOrg, planDeletion } from '../processors/deletion-planner.js';
import { listGroupOrganizations } from '../processors/organization-lister.js';
import { saveOperationReport, saveSnapshot, writeRemainingList } from '../publishers/report.js';
import { openRunLog } from '../publishers/run-log.js';
import { buildDeleteReport, isCleanRun, printRunSummary, renderSummary, summarize } from '../publishers/run-reporter.js';
import { ExitCode, presetPrompt, readlinePrompt } from '../utils/cli-helpers.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { Random, Sleep } from '../utils/retry.js';

export interface DeletionDeps {
  api: ManagementApi;
  exclusions: ExclusionSet;
  logger: Logger;
  prompt: Prompt;
  signal?: AbortSignal;
  sleep?: Sleep;
  random?: Random;
  now?: () => Date;
}

export interface DeletionRun {
  exitCode: ExitCode;
  /** Absent when the run stopped before a plan existed */
  report?: RunReport;
  summary?: Summary;
}

function createdAt(org: Organization): string {
  const value = org.attributes.created_at ?? org.attributes.created;
  return typeof value === 'string' ? value : '-';
}

function printPlan(plan: Plan, exclusions: ExclusionSet, orgs: readonly Organization[], logger: Logger): void {
  logger.section('Plan');
  logger.keyValue('Total organizations', orgs.length);
  logger.keyValue('Protected', plan.protected.length);
  logger.keyValue('To delete', plan.candidates.length);

  if (plan.protected.length > 0) {
    console.log();
    logger.subsection(`Protected (${plan.protected.length})`);
    for (const org of plan.protected) {
      logger.listItem(describeOrg(org));
    }
  }

  const unmatched = exclusions.unmatched(orgs);
  if (unmatched.length > 0) {
    console.log();
    logger.warn(`${unmatched.length} exclusion entr${unmatched.length === 1 ? 'y matches' : 'ies match'} no organization in this group:`);
    for (const entry of unmatched) {
      logger.listItem(`${entry.raw} (${entry.kind})`);
    }
  }

  for (const org of plan.protected) {
    logger.audit(`PROTECTED ${describeOrg(org)}`);
  }
  for (const org of plan.candidates) {
    logger.audit(`CANDIDATE ${describeOrg(org)}`);
  }
}

function printDryRun(plan: Plan, logger: Logger): void {
  logger.section('Dry Run Preview');
  if (plan.candidates.length === 0) {
    logger.info('No organizations would be deleted.');
    return;
  }
  logger.info(`The following ${plan.candidates.length} organizations would be deleted:`);
  logger.table(
    ['Organization', 'ID', 'Created'],
    plan.candidates.map((org) => [org.name, org.id, createdAt(org)])
  );
}

/**
 * Run the whole pipeline against an API and return the exit code. No process
 * exit happens here, so the pipeline can be driven end to end in tests.
 */
export async function runDeletion(settings: RunSettings, deps: DeletionDeps): Promise<DeletionRun> {
  const { api, exclusions, logger, prompt } = deps;
  const now = deps.now ?? (() => new Date());
  const startedAt = now();

  logger.section('Verifying Token');
  const self = await api.getSelf(settings.apiVersion);
  if (!self.success) {
    logger.error(`Token verification failed: ${self.error.message}`);
    return { exitCode: ExitCode.Failure };
  }
  logger.success(`Token verified for ${self.value.email ?? self.value.name ?? self.value.id}`);

  logger.section('Listing Organizations');
  logger.info(`Fetching organizations for group ${settings.groupId}...`);
  const listed = await listGroupOrganizations(api, settings.groupId, {
    apiVersion: settings.apiVersion,
    policy: settings.policy,
    logger,
    sleep: deps.sleep,
    random: deps.random,
    signal: deps.signal,
  });

  if (!listed.success) {
    if ('interrupted' in listed) {
      logger.warn('Interrupted while listing. No organizations were deleted.');
      return { exitCode: ExitCode.Interrupted };
    }
    logger.error(`Listing failed (${listed.error.kind}): ${listed.error.message}`);
    logger.error('No organizations were deleted.');
    return { exitCode: ExitCode.Failure };
  }

  const orgs = listed.organizations;
  const plan = planDeletion(orgs, exclusions);
  printPlan(plan, exclusions, orgs, logger);

  const gate: GateResult = await confirmPlan(plan, settings.mode, prompt, logger);

  const finish = (execution: ExecutionResult): RunReport => ({
    mode: settings.mode,
    groupId: settings.groupId,
    region: settings.region,
    plan,
    gate,
    outcomes: execution.outcomes,
    abandoned: execution.abandoned,
    startedAt,
    finishedAt: now(),
  });

  if (settings.mode === 'dry-run') {
    printDryRun(plan, logger);
    const report = finish({ outcomes: [], abandoned: [] });
    const summary = summarize(report);
    logger.audit(`Summary: ${renderSummary(summary)}`);
    saveOperationReport(buildDeleteReport(report), settings.outputDir, logger);
    logger.section('Dry Run Complete');
    logger.info('No changes were made. Remove --dry-run to delete.');
    return { exitCode: ExitCode.Success, report, summary };
  }

  if (gate.decision === 'abort') {
    const report = finish({ outcomes: [], abandoned: [] });
    const summary = summarize(report);
    logger.audit(`Summary: ${renderSummary(summary)}`);
    saveOperationReport(buildDeleteReport(report), settings.outputDir, logger);

    if (gate.reason === 'no-candidates') {
      logger.warn('No organizations to delete. All organizations are protected.');
    } else {
      logger.error('Confirmation token did not match. Deletion cancelled; nothing was deleted.');
    }
    return { exitCode: ExitCode.Aborted, report, summary };
  }

  logger.section('Saving Pre-Deletion Snapshot');
  const snapshotPath = saveSnapshot(plan, path.join(settings.outputDir, 'snapshots'), startedAt, logger);

  logger.section('Deleting Organizations');
  const execution = await executeDeletions(plan.candidates, api, {
    apiVersion: settings.apiVersion,
    policy: settings.policy,
    logger,
    purgeContents: settings.purgeContents,
    signal: deps.signal,
    sleep: deps.sleep,
    random: deps.random,
    now,
  });

  const report = finish(execution);
  const summary = printRunSummary(report, logger);
  saveOperationReport(buildDeleteReport(report), settings.outputDir, logger);

  if (isCleanRun(summary)) {
    logger.section('Delete Complete');
    logger.success('All organizations deleted successfully!');
    return { exitCode: ExitCode.Success, report, summary };
  }

  const remaining = [
    ...execution.outcomes.filter((o) => o.status !== 'succeeded').map((o) => o.organization),
    ...execution.abandoned,
  ];
  writeRemainingList(remaining, settings.outputDir, report.finishedAt, logger);
  logger.info(`Pre-deletion snapshot available at: ${snapshotPath}`);
  logger.error(`Run finished with problems: ${renderSummary(summary)}`);

  const exitCode = summary.failed === 0 && summary.abandoned === 0 ? ExitCode.Interrupted : ExitCode.Failure;
  return { exitCode, report, summary };
}

/**
 * Delete command handler - resolves configuration, wires the real API client,
 * and exits the process with the pipeline's exit code.
 */
export async function deleteCommand(options: DeleteOptions): Promise<void> {
  const startedAt = new Date();
  let settings: RunSettings;
  let exclusions: ExclusionSet;

  try {
    settings = resolveSettings(options);
    exclusions = readExclusionsFile(settings.exclusionsPath);
  } catch (error) {
    createLogger({ verbose: options.verbose }).error(errorMessage(error));
    if (!(error instanceof ConfigurationError)) throw error;
    process.exit(ExitCode.Failure);
  }

  const runLog = openRunLog(settings.logDir, startedAt);
  const logger = createLogger({ verbose: settings.verbose, sink: runLog });

  logger.section('Snyk Organization Purge');
  logger.keyValue('Group', settings.groupId);
  logger.keyValue('Region', settings.region);
  logger.keyValue('API Version', settings.apiVersion);
  logger.keyValue('Exclusions', `${settings.exclusionsPath} (${exclusions.size} entries)`);
  logger.keyValue('Dry Run', (settings.mode === 'dry-run').toString());
  logger.keyValue('Purge Contents', settings.purgeContents.toString());
  logger.keyValue('Log File', runLog.path);
  if (exclusions.duplicates > 0) {
    logger.warn(`${exclusions.duplicates} duplicate exclusion line(s) ignored`);
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    if (controller.signal.aborted) {
      logger.error('Second interrupt received; exiting now.');
      process.exit(ExitCode.Interrupted);
    }
    controller.abort();
    logger.warn('Interrupt received: the run stops before the next request or organization. Press Ctrl+C again to exit now.');
  };
  process.on('SIGINT', onInterrupt);

  try {
    const api = new SnykClient({
      token: settings.token,
      baseUrl: REGION_ENDPOINTS[settings.region],
      transport: fetchTransport(),
    });
    const prompt = settings.confirm !== undefined ? presetPrompt(settings.confirm) : readlinePrompt;

    const { exitCode } = await runDeletion(settings, {
      api,
      exclusions,
      logger,
      prompt,
      signal: controller.signal,
    });

    logger.info(`Run log: ${runLog.path}`);
    process.exit(exitCode);
  } catch (error) {
    logger.error(`Delete failed: ${errorMessage(error)}`);

    if (settings.verbose && error instanceof Error && error.stack) {
      console.error(error.stack);
    }

    process.exit(ExitCode.Failure);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}
