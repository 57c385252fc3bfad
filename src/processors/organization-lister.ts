/**
 * Organization lister
 *
 * Walks every page of a group's organizations, following `links.next` until it
 * runs out. Results keep server order. Organizations whose group id differs
 * from the requested group are dropped here, so later stages never see them.
 *
 * Rate limits wait for the server's Retry-After hint (or backoff) and retry the
 * same page, within a total wait budget. Network and 5xx failures are retried
 * up to policy.maxAttempts per page. Anything else ends the listing.
 */

import type { ManagementApi } from '../api/snyk-client.js';
import type { RetryPolicy } from '../config/settings.js';
import type { Organization } from '../config/types.js';
import { ApiError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { backoffDelay, realSleep, retryDelay } from '../utils/retry.js';
import type { Random, Sleep } from '../utils/retry.js';

export interface ListOptions {
  apiVersion: string;
  policy: RetryPolicy;
  logger: Logger;
  sleep?: Sleep;
  random?: Random;
  /** Operator interrupt, checked before every request */
  signal?: AbortSignal;
}

export type ListResult =
  | {
      success: true;
      organizations: Organization[];
      pages: number;
      /** Organizations returned by the API but belonging to another group */
      outOfGroup: number;
      /** Organizations repeated across pages and dropped */
      duplicates: number;
    }
  | { success: false; error: ApiError }
  | { success: false; interrupted: true };

export async function listGroupOrganizations(
  api: ManagementApi,
  groupId: string,
  options: ListOptions
): Promise<ListResult> {
  const { apiVersion, policy, logger, signal } = options;
  const sleep = options.sleep ?? realSleep;
  const random = options.random ?? Math.random;

  const organizations: Organization[] = [];
  const seen = new Set<string>();
  let outOfGroup = 0;
  let duplicates = 0;
  let waitedMs = 0;
  let pages = 0;
  let cursor: string | undefined;

  do {
    pages++;
    logger.debug(`Fetching organizations page ${pages}`, cursor ? { cursor } : undefined);

    let attempt = 0;
    let transientFailures = 0;
    let nextCursor: string | undefined;

    for (;;) {
      if (signal?.aborted) {
        logger.warn(`Listing interrupted on page ${pages}`);
        return { success: false, interrupted: true };
      }

      attempt++;
      const result = await api.listOrganizations(groupId, apiVersion, cursor);

      if (result.success) {
        for (const org of result.value.items) {
          if (org.groupId !== groupId) {
            outOfGroup++;
            logger.debug(`Ignoring organization outside group ${groupId}`, { id: org.id, groupId: org.groupId });
            continue;
          }
          if (seen.has(org.id)) {
            duplicates++;
            continue;
          }
          seen.add(org.id);
          organizations.push(org);
        }
        nextCursor = result.value.nextCursor;
        break;
      }

      const { error } = result;

      if (error.kind === 'rateLimited') {
        const delay = retryDelay(error, attempt, policy, random);
        if (waitedMs + delay > policy.listingWaitBudgetMs) {
          return {
            success: false,
            error: new ApiError(
              'rateLimited',
              `${error.message} (gave up after waiting ${Math.round(waitedMs / 1000)}s for rate limits)`,
              { status: error.status, retryAfterMs: error.retryAfterMs }
            ),
          };
        }
        waitedMs += delay;
        logger.warn(`Rate limited while listing organizations, waiting ${(delay / 1000).toFixed(1)}s`, { page: pages });
        await sleep(delay);
        continue;
      }

      if (error.kind === 'network' || error.kind === 'serverError') {
        transientFailures++;
        if (transientFailures < policy.maxAttempts) {
          const delay = backoffDelay(transientFailures, policy, random);
          logger.warn(`${error.message}; retrying page ${pages} in ${(delay / 1000).toFixed(1)}s`);
          await sleep(delay);
          continue;
        }
      }

      return { success: false, error };
    }

    if (nextCursor !== undefined && nextCursor === cursor) {
      return {
        success: false,
        error: new ApiError('serverError', `Pagination did not advance past page ${pages}`),
      };
    }
    cursor = nextCursor;
  } while (cursor);

  logger.info(`Found ${organizations.length} organizations in group ${groupId} across ${pages} page(s)`);
  if (outOfGroup > 0) {
    logger.warn(`${outOfGroup} organization(s) outside group ${groupId} were ignored`);
  }

  return { success: true, organizations, pages, outOfGroup, duplicates };
}
