/**
 * Organization lister: pagination, group scoping and rate-limit handling
 */

import { describe, expect, it, vi } from 'vitest';
import type { RetryPolicy } from '../../src/config/settings.js';
import { listGroupOrganizations } from '../../src/processors/organization-lister.js';
import type { ListOptions } from '../../src/processors/organization-lister.js';
import { ok } from '../../src/utils/errors.js';
import {
  apiFailure,
  createMockApi,
  createSleep,
  createTestLogger,
  GROUP_ID,
  makeOrg,
  TEST_POLICY,
} from '../helpers/fixtures.js';

function options(overrides: Partial<ListOptions> = {}): ListOptions {
  return {
    apiVersion: '2024-10-15',
    policy: TEST_POLICY,
    logger: createTestLogger(),
    sleep: createSleep(),
    random: () => 0,
    ...overrides,
  };
}

describe('listGroupOrganizations', () => {
  it('follows continuation cursors and keeps server order', async () => {
    const listOrganizations = vi
      .fn()
      .mockResolvedValueOnce(ok({ items: [makeOrg('o1'), makeOrg('o2')], nextCursor: '/rest/groups/group-1/orgs?starting_after=o2' }))
      .mockResolvedValueOnce(ok({ items: [makeOrg('o3')], nextCursor: '/rest/groups/group-1/orgs?starting_after=o3' }))
      .mockResolvedValueOnce(ok({ items: [makeOrg('o4')] }));
    const api = createMockApi({ listOrganizations });

    const result = await listGroupOrganizations(api, GROUP_ID, options());

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.organizations.map((o) => o.id)).toEqual(['o1', 'o2', 'o3', 'o4']);
    expect(result.pages).toBe(3);
    expect(listOrganizations.mock.calls).toEqual([
      [GROUP_ID, '2024-10-15', undefined],
      [GROUP_ID, '2024-10-15', '/rest/groups/group-1/orgs?starting_after=o2'],
      [GROUP_ID, '2024-10-15', '/rest/groups/group-1/orgs?starting_after=o3'],
    ]);
  });

  it('drops organizations that belong to another group', async () => {
    const api = createMockApi({
      listOrganizations: vi.fn().mockResolvedValue(
        ok({ items: [makeOrg('o1'), makeOrg('foreign', 'Foreign', 'group-2'), makeOrg('o2')] })
      ),
    });

    const result = await listGroupOrganizations(api, GROUP_ID, options());

    expect(result).toMatchObject({ success: true, outOfGroup: 1 });
    if (!result.success) return;
    expect(result.organizations.map((o) => o.id)).toEqual(['o1', 'o2']);
  });

  it('drops organizations repeated across pages', async () => {
    const listOrganizations = vi
      .fn()
      .mockResolvedValueOnce(ok({ items: [makeOrg('o1'), makeOrg('o2')], nextCursor: 'next' }))
      .mockResolvedValueOnce(ok({ items: [makeOrg('o2'), makeOrg('o3')] }));

    const result = await listGroupOrganizations(createMockApi({ listOrganizations }), GROUP_ID, options());

    expect(result).toMatchObject({ success: true, duplicates: 1 });
    if (!result.success) return;
    expect(result.organizations.map((o) => o.id)).toEqual(['o1', 'o2', 'o3']);
  });

  it('waits for Retry-After and retries the same page when rate limited', async () => {
    const listOrganizations = vi
      .fn()
      .mockResolvedValueOnce(ok({ items: [makeOrg('o1')], nextCursor: 'page-2' }))
      .mockResolvedValueOnce(apiFailure('rateLimited', 'too many requests', 800))
      .mockResolvedValueOnce(ok({ items: [makeOrg('o2')] }));
    const sleep = createSleep();

    const result = await listGroupOrganizations(createMockApi({ listOrganizations }), GROUP_ID, options({ sleep }));

    expect(result.success).toBe(true);
    expect(sleep.mock.calls).toEqual([[800]]);
    expect(listOrganizations.mock.calls[1][2]).toBe('page-2');
    expect(listOrganizations.mock.calls[2][2]).toBe('page-2');
  });

  it('gives up with rateLimited once the wait budget is spent', async () => {
    const policy: RetryPolicy = { ...TEST_POLICY, maxDelayMs: 10_000, listingWaitBudgetMs: 5_000 };
    const listOrganizations = vi.fn().mockResolvedValue(apiFailure('rateLimited', 'too many requests', 2_000));
    const sleep = createSleep();

    const result = await listGroupOrganizations(createMockApi({ listOrganizations }), GROUP_ID, options({ policy, sleep }));

    expect(result.success).toBe(false);
    if (result.success || !('error' in result)) return;
    expect(result.error.kind).toBe('rateLimited');
    expect(result.error.message).toBe('too many requests (gave up after waiting 4s for rate limits)');
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(listOrganizations).toHaveBeenCalledTimes(3);
  });

  it('stops retrying a page that keeps answering 429 with Retry-After 0', async () => {
    const listOrganizations = vi.fn().mockResolvedValue(apiFailure('rateLimited', 'too many requests', 0));
    const sleep = createSleep();

    const result = await listGroupOrganizations(createMockApi({ listOrganizations }), GROUP_ID, options({ sleep }));

    expect(result.success).toBe(false);
    if (result.success || !('error' in result)) return;
    expect(result.error.kind).toBe('rateLimited');
    // Waits of 50, 100, 200, 400, then 500 each until the 10s budget would be exceeded
    expect(sleep.mock.calls.slice(0, 6)).toEqual([[50], [100], [200], [400], [500], [500]]);
    expect(sleep).toHaveBeenCalledTimes(22);
    expect(listOrganizations).toHaveBeenCalledTimes(23);
    expect(result.error.message).toBe('too many requests (gave up after waiting 10s for rate limits)');
  });

  it('returns interrupted without a request when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const listOrganizations = vi.fn();

    const result = await listGroupOrganizations(
      createMockApi({ listOrganizations }),
      GROUP_ID,
      options({ signal: controller.signal })
    );

    expect(result).toEqual({ success: false, interrupted: true });
    expect(listOrganizations).not.toHaveBeenCalled();
  });

  it('stops after a rate-limit wait when interrupted during it', async () => {
    const controller = new AbortController();
    const listOrganizations = vi.fn().mockResolvedValue(apiFailure('rateLimited', 'too many requests', 500));
    const sleep = vi.fn(async (_ms: number) => {
      controller.abort();
    });

    const result = await listGroupOrganizations(
      createMockApi({ listOrganizations }),
      GROUP_ID,
      options({ sleep, signal: controller.signal })
    );

    expect(result).toEqual({ success: false, interrupted: true });
    expect(listOrganizations).toHaveBeenCalledTimes(1);
  });

  it('retries server errors up to the attempt limit', async () => {
    const listOrganizations = vi
      .fn()
      .mockResolvedValueOnce(apiFailure('serverError', 'bad gateway'))
      .mockResolvedValueOnce(apiFailure('network', 'socket hang up'))
      .mockResolvedValueOnce(ok({ items: [makeOrg('o1')] }));
    const sleep = createSleep();

    const result = await listGroupOrganizations(createMockApi({ listOrganizations }), GROUP_ID, options({ sleep }));

    expect(result.success).toBe(true);
    // random() = 0 leaves only the fixed half: 100/2 then 200/2
    expect(sleep.mock.calls).toEqual([[50], [100]]);
  });

  it('fails after exhausting attempts on server errors', async () => {
    const listOrganizations = vi.fn().mockResolvedValue(apiFailure('serverError', 'bad gateway'));

    const result = await listGroupOrganizations(createMockApi({ listOrganizations }), GROUP_ID, options());

    expect(result.success).toBe(false);
    if (result.success || !('error' in result)) return;
    expect(result.error.kind).toBe('serverError');
    expect(result.error.message).toBe('bad gateway');
    expect(listOrganizations).toHaveBeenCalledTimes(TEST_POLICY.maxAttempts);
  });

  it('fails immediately on an auth failure', async () => {
    const listOrganizations = vi.fn().mockResolvedValue(apiFailure('authFailure', 'unauthorized'));

    const result = await listGroupOrganizations(createMockApi({ listOrganizations }), GROUP_ID, options());

    expect(result.success).toBe(false);
    if (result.success || !('error' in result)) return;
    expect(result.error.kind).toBe('authFailure');
    expect(listOrganizations).toHaveBeenCalledTimes(1);
  });

  it('fails when the cursor does not advance', async () => {
    const listOrganizations = vi.fn().mockResolvedValue(ok({ items: [makeOrg('o1')], nextCursor: 'same' }));

    const result = await listGroupOrganizations(createMockApi({ listOrganizations }), GROUP_ID, options());

    expect(result.success).toBe(false);
    if (result.success || !('error' in result)) return;
    expect(result.error.kind).toBe('serverError');
    expect(listOrganizations).toHaveBeenCalledTimes(2);
  });
});
