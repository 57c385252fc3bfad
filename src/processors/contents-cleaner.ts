/**
 * Contents cleaner
 *
 * Snyk refuses to delete an organization that still owns projects, and targets
 * keep projects alive. Before an organization is deleted, its targets are
 * removed; if the delete is still refused, its projects are removed and the
 * delete is tried again.
 *
 * Items are deleted one at a time with the shared retry rules. A 404 on an
 * item counts as deleted.
 */

import type { ManagementApi, Page } from '../api/snyk-client.js';
import type { RetryPolicy } from '../config/settings.js';
import type { OrgContent } from '../config/types.js';
import type { ApiError, ApiResult } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import type { Random, Sleep } from '../utils/retry.js';

export interface PurgeOptions {
  apiVersion: string;
  policy: RetryPolicy;
  logger: Logger;
  sleep: Sleep;
  random: Random;
}

export interface PurgeResult {
  deleted: string[];
  failed: Array<{ id: string; error: string }>;
  /** Set when the items could not be listed; nothing was deleted in that case */
  listError?: ApiError;
}

type ContentKind = 'target' | 'project';

async function listAll(
  fetchPage: (cursor?: string) => Promise<ApiResult<Page<OrgContent>>>,
  options: PurgeOptions
): Promise<ApiResult<OrgContent[]>> {
  const items: OrgContent[] = [];
  let cursor: string | undefined;

  do {
    const page = cursor;
    const { result } = await withRetry(() => fetchPage(page), options);
    if (!result.success) return result;
    items.push(...result.value.items);
    cursor = result.value.nextCursor === page ? undefined : result.value.nextCursor;
  } while (cursor);

  return { success: true, value: items };
}

async function purge(
  kind: ContentKind,
  orgId: string,
  fetchPage: (cursor?: string) => Promise<ApiResult<Page<OrgContent>>>,
  remove: (id: string) => Promise<ApiResult<void>>,
  options: PurgeOptions
): Promise<PurgeResult> {
  const { logger } = options;
  const listed = await listAll(fetchPage, options);

  if (!listed.success) {
    logger.warn(`Could not list ${kind}s for organization ${orgId}: ${listed.error.message}`);
    return { deleted: [], failed: [], listError: listed.error };
  }

  const items = listed.value;
  if (items.length === 0) {
    logger.debug(`No ${kind}s found for organization ${orgId}`);
    return { deleted: [], failed: [] };
  }

  logger.info(`Deleting ${items.length} ${kind}(s) from organization ${orgId}`);
  const result: PurgeResult = { deleted: [], failed: [] };

  for (const item of items) {
    const { result: removed } = await withRetry(() => remove(item.id), {
      ...options,
      onRetry: (error, attempt, delay) =>
        logger.debug(`Retrying ${kind} ${item.id} after ${error.kind}`, { attempt, delayMs: delay }),
    });

    if (removed.success || removed.error.kind === 'notFound') {
      result.deleted.push(item.id);
      logger.audit(`Deleted ${kind} ${item.name} (${item.id}) from organization ${orgId}`);
    } else {
      result.failed.push({ id: item.id, error: removed.error.message });
      logger.audit(`Failed to delete ${kind} ${item.name} (${item.id}): ${removed.error.message}`, 'error');
    }
  }

  if (result.failed.length > 0) {
    logger.warn(`${result.failed.length} ${kind}(s) could not be deleted from organization ${orgId}`);
  }

  return result;
}

export function purgeTargets(api: ManagementApi, orgId: string, options: PurgeOptions): Promise<PurgeResult> {
  return purge(
    'target',
    orgId,
    (cursor) => api.listTargets(orgId, options.apiVersion, cursor),
    (id) => api.deleteTarget(orgId, id, options.apiVersion),
    options
  );
}

export function purgeProjects(api: ManagementApi, orgId: string, options: PurgeOptions): Promise<PurgeResult> {
  return purge(
    'project',
    orgId,
    (cursor) => api.listProjects(orgId, options.apiVersion, cursor),
    (id) => api.deleteProject(orgId, id, options.apiVersion),
    options
  );
}
