/**
 * Shared test fixtures: organizations, a mock ManagementApi and a quiet logger.
 */

import { vi } from 'vitest';
import type { ManagementApi } from '../../src/api/snyk-client.js';
import type { RetryPolicy } from '../../src/config/settings.js';
import type { Organization } from '../../src/config/types.js';
import { ApiError, fail, ok } from '../../src/utils/errors.js';
import type { ApiErrorKind, ApiResult } from '../../src/utils/errors.js';
import type { Logger } from '../../src/utils/logger.js';

export const GROUP_ID = 'group-1';

export const TEST_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 100,
  maxDelayMs: 1_000,
  listingWaitBudgetMs: 10_000,
  settleDelayMs: 0,
};

export function makeOrg(id: string, name: string = id, groupId: string = GROUP_ID): Organization {
  return { id, name, groupId, attributes: { slug: name.toLowerCase() } };
}

export function apiFailure<T = void>(kind: ApiErrorKind, message = `${kind} error`, retryAfterMs?: number): ApiResult<T> {
  return fail(new ApiError(kind, message, { retryAfterMs }));
}

export function createMockApi(overrides?: Partial<ManagementApi>): ManagementApi {
  return {
    getSelf: vi.fn().mockResolvedValue(ok({ id: 'user-1', name: 'Test User', email: 'test@example.com' })),
    listOrganizations: vi.fn().mockResolvedValue(ok({ items: [] })),
    deleteOrganization: vi.fn().mockResolvedValue(ok(undefined)),
    listTargets: vi.fn().mockResolvedValue(ok({ items: [] })),
    deleteTarget: vi.fn().mockResolvedValue(ok(undefined)),
    listProjects: vi.fn().mockResolvedValue(ok({ items: [] })),
    deleteProject: vi.fn().mockResolvedValue(ok(undefined)),
    ...overrides,
  };
}

export interface TestLogger extends Logger {
  audits: string[];
}

/** Logger that records audit lines and prints nothing */
export function createTestLogger(): TestLogger {
  const audits: string[] = [];
  return {
    audits,
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    success: vi.fn(),
    audit: vi.fn((message: string) => {
      audits.push(message);
    }),
    section: vi.fn(),
    subsection: vi.fn(),
    listItem: vi.fn(),
    keyValue: vi.fn(),
    table: vi.fn(),
    isVerbose: () => false,
  };
}

/** Sleep stub that resolves immediately and records requested delays */
export function createSleep() {
  return vi.fn(async (_ms: number) => {});
}
