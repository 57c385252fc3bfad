/**
 * Deletion executor
 *
 * Deletes candidates strictly one after another, in plan order. Each
 * organization's result is captured as a DeletionOutcome; a failure on one
 * organization never stops the next, with one exception: an authentication
 * failure ends the run, because every later call would fail the same way.
 *
 * Retry rules per organization:
 * - rateLimited / network / serverError: retried with backoff up to policy.maxAttempts
 * - notFound: already gone, recorded as succeeded
 * - authFailure: recorded as failed; remaining candidates are abandoned
 * - rejected because projects remain: projects are purged, then the delete is retried
 * - anything else: recorded as failed
 *
 * An abort signal (operator interrupt) is honoured between organizations only;
 * a delete already in flight is always allowed to finish.
 */

import type { ManagementApi } from '../api/snyk-client.js';
import { isOrgNotEmpty } from '../api/snyk-client.js';
import type { RetryPolicy } from '../config/settings.js';
import type { DeletionOutcome, ExecutionResult, Organization } from '../config/types.js';
import type { ApiResult } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { realSleep, withRetry } from '../utils/retry.js';
import type { Random, RetryOptions, Sleep } from '../utils/retry.js';
import { purgeProjects, purgeTargets } from './contents-cleaner.js';
import type { PurgeOptions } from './contents-cleaner.js';
import { describeOrg } from './deletion-planner.js';

export interface ExecuteOptions {
  apiVersion: string;
  policy: RetryPolicy;
  logger: Logger;
  /** Delete targets before each organization, and projects when the delete is refused */
  purgeContents: boolean;
  signal?: AbortSignal;
  sleep?: Sleep;
  random?: Random;
  now?: () => Date;
}

export function formatOutcome(outcome: DeletionOutcome): string {
  const parts = [
    `${outcome.status.toUpperCase()} ${describeOrg(outcome.organization)}`,
    `attempts=${outcome.attempts}`,
  ];
  if (outcome.note) parts.push(`note="${outcome.note}"`);
  if (outcome.error) parts.push(`error="${outcome.error}"`);
  return parts.join(' ');
}

export async function executeDeletions(
  candidates: readonly Organization[],
  api: ManagementApi,
  options: ExecuteOptions
): Promise<ExecutionResult> {
  const { apiVersion, policy, logger, purgeContents, signal } = options;
  const sleep = options.sleep ?? realSleep;
  const random = options.random ?? Math.random;
  const now = options.now ?? (() => new Date());

  const purgeOptions: PurgeOptions = { apiVersion, policy, logger, sleep, random };
  const outcomes: DeletionOutcome[] = [];
  let abandoned: Organization[] = [];

  const record = (outcome: DeletionOutcome): void => {
    outcomes.push(outcome);
    logger.audit(formatOutcome(outcome), outcome.status === 'failed' ? 'error' : 'info');
  };

  for (let i = 0; i < candidates.length; i++) {
    const org = candidates[i];

    if (signal?.aborted) {
      logger.warn(`Interrupted: ${candidates.length - i} organization(s) left untouched`);
      for (const remaining of candidates.slice(i)) {
        record({
          organization: remaining,
          status: 'skipped',
          attempts: 0,
          note: 'interrupted by operator',
          timestamp: now().toISOString(),
        });
      }
      break;
    }

    logger.info(`[${i + 1}/${candidates.length}] Deleting ${describeOrg(org)}`);

    if (purgeContents) {
      await purgeTargets(api, org.id, purgeOptions);
      await sleep(policy.settleDelayMs);
    }

    const retryOptions: RetryOptions = {
      policy,
      sleep,
      random,
      onRetry: (error, attempt, delay) =>
        logger.warn(`${error.message}; retrying ${org.id} in ${(delay / 1000).toFixed(1)}s (attempt ${attempt}/${policy.maxAttempts})`),
    };

    const first = await withRetry(() => api.deleteOrganization(org.id), retryOptions);
    let result: ApiResult<void> = first.result;
    let attempts = first.attempts;
    let note: string | undefined;

    if (!result.success && purgeContents && isOrgNotEmpty(result.error)) {
      logger.warn(`${describeOrg(org)} still has projects; deleting them first`);
      const projects = await purgeProjects(api, org.id, purgeOptions);

      if (projects.listError === undefined && projects.failed.length === 0) {
        await sleep(policy.settleDelayMs);
        const second = await withRetry(() => api.deleteOrganization(org.id), retryOptions);
        result = second.result;
        attempts += second.attempts;
        note = `deleted ${projects.deleted.length} project(s) first`;
      } else {
        note = projects.listError
          ? 'projects could not be listed'
          : `${projects.failed.length} project(s) could not be deleted`;
      }
    }

    const timestamp = now().toISOString();

    if (result.success) {
      record({ organization: org, status: 'succeeded', attempts, note, timestamp });
      logger.success(`Deleted ${describeOrg(org)}`);
      continue;
    }

    const { error } = result;

    if (error.kind === 'notFound') {
      record({ organization: org, status: 'succeeded', attempts, note: 'already deleted', timestamp });
      logger.success(`${describeOrg(org)} was already deleted`);
      continue;
    }

    record({ organization: org, status: 'failed', attempts, error: error.message, note, timestamp });
    logger.error(`Failed to delete ${describeOrg(org)}`);

    if (error.kind === 'authFailure') {
      abandoned = candidates.slice(i + 1);
      logger.error(
        `Authentication failed; stopping with ${abandoned.length} organization(s) not attempted. Check the token's permissions.`
      );
      break;
    }
  }

  return { outcomes, abandoned };
}
