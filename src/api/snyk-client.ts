/**
 * Snyk management API client
 *
 * Lists organizations of a group (REST API, cursor paginated), deletes
 * organizations (v1 API), and lists/deletes the targets and projects that can
 * block an organization delete.
 *
 * Every method resolves to an ApiResult -- HTTP and transport failures are
 * classified into ApiError kinds here and never thrown.
 */

import { z } from 'zod';
import type { HttpMethod, HttpResponse, HttpTransport } from './http.js';
import type { OrgContent, Organization, TokenOwner } from '../config/types.js';
import { ApiError, errorMessage, fail, ok } from '../utils/errors.js';
import type { ApiResult } from '../utils/errors.js';

const PAGE_LIMIT = 100;

/** Message returned by the v1 delete endpoint when projects still exist */
const PROJECTS_REMAIN_PATTERN = /delete all projects/i;

export interface Page<T> {
  items: T[];
  /** Continuation link from `links.next`; absent on the last page */
  nextCursor?: string;
}

/**
 * The remote operations the pipeline needs. SnykClient is the real
 * implementation; tests provide in-memory fakes.
 */
export interface ManagementApi {
  getSelf(apiVersion: string): Promise<ApiResult<TokenOwner>>;
  listOrganizations(groupId: string, apiVersion: string, cursor?: string): Promise<ApiResult<Page<Organization>>>;
  deleteOrganization(orgId: string): Promise<ApiResult<void>>;
  listTargets(orgId: string, apiVersion: string, cursor?: string): Promise<ApiResult<Page<OrgContent>>>;
  deleteTarget(orgId: string, targetId: string, apiVersion: string): Promise<ApiResult<void>>;
  listProjects(orgId: string, apiVersion: string, cursor?: string): Promise<ApiResult<Page<OrgContent>>>;
  deleteProject(orgId: string, projectId: string, apiVersion: string): Promise<ApiResult<void>>;
}

export interface SnykClientOptions {
  token: string;
  baseUrl: string;
  transport: HttpTransport;
  now?: () => number;
}

// ============================================================================
// Response schemas
// ============================================================================

const linksSchema = z
  .object({ next: z.string().nullish() })
  .passthrough()
  .optional();

const orgPageSchema = z.object({
  data: z.array(
    z.object({
      id: z.string().min(1),
      attributes: z
        .object({
          name: z.string(),
          group_id: z.string(),
        })
        .passthrough(),
    })
  ),
  links: linksSchema,
});

const targetPageSchema = z.object({
  data: z.array(
    z.object({
      id: z.string().min(1),
      attributes: z.object({ display_name: z.string().nullish() }).passthrough().optional(),
    })
  ),
  links: linksSchema,
});

const projectPageSchema = z.object({
  data: z.array(
    z.object({
      id: z.string().min(1),
      attributes: z.object({ name: z.string().nullish() }).passthrough().optional(),
    })
  ),
  links: linksSchema,
});

const selfSchema = z.object({
  data: z.object({
    id: z.string(),
    attributes: z
      .object({
        name: z.string().nullish(),
        username: z.string().nullish(),
        email: z.string().nullish(),
      })
      .passthrough()
      .optional(),
  }),
});

const errorBodySchema = z.union([
  z.object({ errors: z.array(z.object({ detail: z.string().optional(), title: z.string().optional() })).min(1) }),
  z.object({ message: z.string() }),
  z.object({ error: z.string() }),
]);

// ============================================================================
// Response classification
// ============================================================================

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds.
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

function parseJson(text: string): unknown {
  if (text.trim() === '') return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function errorDetail(text: string): string | undefined {
  const parsed = errorBodySchema.safeParse(parseJson(text));
  if (!parsed.success) return text.trim() === '' ? undefined : text.trim().slice(0, 200);

  const body = parsed.data;
  if ('errors' in body) {
    const first = body.errors[0];
    return first.detail ?? first.title;
  }
  if ('message' in body) return body.message;
  return body.error;
}

/**
 * Map a non-2xx response onto an ApiError kind.
 */
export function classifyResponse(label: string, response: HttpResponse, now: number = Date.now()): ApiError {
  const { status } = response;
  const detail = errorDetail(response.text);
  const message = `${label} failed with ${status}${detail ? `: ${detail}` : ''}`;

  if (status === 401 || status === 403) {
    return new ApiError('authFailure', message, { status });
  }
  if (status === 404) {
    return new ApiError('notFound', message, { status });
  }
  if (status === 429) {
    return new ApiError('rateLimited', message, {
      status,
      retryAfterMs: parseRetryAfter(response.headers['retry-after'], now),
    });
  }
  if (status >= 500) {
    return new ApiError('serverError', message, { status });
  }
  return new ApiError('rejected', message, { status });
}

/** True when an organization delete was refused because projects remain */
export function isOrgNotEmpty(error: ApiError): boolean {
  return error.kind === 'rejected' && PROJECTS_REMAIN_PATTERN.test(error.message);
}

/**
 * Resolve a `links.next` value against the API base URL.
 * Snyk returns path-relative links; absolute links are used as-is.
 */
export function resolveLink(baseUrl: string, link: string): string {
  if (link.startsWith('http://') || link.startsWith('https://')) return link;
  const base = baseUrl.replace(/\/+$/, '');
  if (link.startsWith('/')) return base + link;
  return `${base}/${link.replace(/^\/+/, '')}`;
}

// ============================================================================
// Client
// ============================================================================

export class SnykClient implements ManagementApi {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly transport: HttpTransport;
  private readonly now: () => number;

  constructor(options: SnykClientOptions) {
    this.token = options.token;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.transport = options.transport;
    this.now = options.now ?? Date.now;
  }

  async getSelf(apiVersion: string): Promise<ApiResult<TokenOwner>> {
    const result = await this.send('GET', this.restUrl('/rest/self', { version: apiVersion }), 'GET /rest/self');
    if (!result.success) return result;

    const parsed = selfSchema.safeParse(result.value);
    if (!parsed.success) return fail(this.schemaError('GET /rest/self', parsed.error));

    const { id, attributes } = parsed.data.data;
    return ok({
      id,
      name: attributes?.name ?? attributes?.username ?? null,
      email: attributes?.email ?? null,
    });
  }

  async listOrganizations(groupId: string, apiVersion: string, cursor?: string): Promise<ApiResult<Page<Organization>>> {
    const label = `GET /rest/groups/${groupId}/orgs`;
    const url = cursor
      ? resolveLink(this.baseUrl, cursor)
      : this.restUrl(`/rest/groups/${encodeURIComponent(groupId)}/orgs`, { version: apiVersion, limit: String(PAGE_LIMIT) });

    const result = await this.send('GET', url, label);
    if (!result.success) return result;

    const parsed = orgPageSchema.safeParse(result.value);
    if (!parsed.success) return fail(this.schemaError(label, parsed.error));

    const items = parsed.data.data.map(({ id, attributes }): Organization => {
      const { name, group_id, ...rest } = attributes;
      return { id, name, groupId: group_id, attributes: rest };
    });

    return ok({ items, nextCursor: parsed.data.links?.next ?? undefined });
  }

  async deleteOrganization(orgId: string): Promise<ApiResult<void>> {
    const url = `${this.baseUrl}/v1/org/${encodeURIComponent(orgId)}`;
    const result = await this.send('DELETE', url, `DELETE /v1/org/${orgId}`, { Accept: '*/*' });
    return result.success ? ok(undefined) : result;
  }

  async listTargets(orgId: string, apiVersion: string, cursor?: string): Promise<ApiResult<Page<OrgContent>>> {
    const label = `GET /rest/orgs/${orgId}/targets`;
    const url = cursor
      ? resolveLink(this.baseUrl, cursor)
      : this.restUrl(`/rest/orgs/${encodeURIComponent(orgId)}/targets`, { version: apiVersion, limit: String(PAGE_LIMIT) });

    const result = await this.send('GET', url, label);
    if (!result.success) return result;

    const parsed = targetPageSchema.safeParse(result.value);
    if (!parsed.success) return fail(this.schemaError(label, parsed.error));

    return ok({
      items: parsed.data.data.map((t) => ({ id: t.id, name: t.attributes?.display_name ?? t.id })),
      nextCursor: parsed.data.links?.next ?? undefined,
    });
  }

  async deleteTarget(orgId: string, targetId: string, apiVersion: string): Promise<ApiResult<void>> {
    const path = `/rest/orgs/${encodeURIComponent(orgId)}/targets/${encodeURIComponent(targetId)}`;
    const result = await this.send('DELETE', this.restUrl(path, { version: apiVersion }), `DELETE ${path}`);
    return result.success ? ok(undefined) : result;
  }

  async listProjects(orgId: string, apiVersion: string, cursor?: string): Promise<ApiResult<Page<OrgContent>>> {
    const label = `GET /rest/orgs/${orgId}/projects`;
    const url = cursor
      ? resolveLink(this.baseUrl, cursor)
      : this.restUrl(`/rest/orgs/${encodeURIComponent(orgId)}/projects`, { version: apiVersion, limit: String(PAGE_LIMIT) });

    const result = await this.send('GET', url, label);
    if (!result.success) return result;

    const parsed = projectPageSchema.safeParse(result.value);
    if (!parsed.success) return fail(this.schemaError(label, parsed.error));

    return ok({
      items: parsed.data.data.map((p) => ({ id: p.id, name: p.attributes?.name ?? p.id })),
      nextCursor: parsed.data.links?.next ?? undefined,
    });
  }

  async deleteProject(orgId: string, projectId: string, apiVersion: string): Promise<ApiResult<void>> {
    const path = `/rest/orgs/${encodeURIComponent(orgId)}/projects/${encodeURIComponent(projectId)}`;
    const result = await this.send('DELETE', this.restUrl(path, { version: apiVersion }), `DELETE ${path}`);
    return result.success ? ok(undefined) : result;
  }

  private restUrl(path: string, params: Record<string, string>): string {
    const query = new URLSearchParams(params).toString();
    return `${this.baseUrl}${path}?${query}`;
  }

  private schemaError(label: string, error: z.ZodError): ApiError {
    const issue = error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return new ApiError('serverError', `${label} returned an unexpected response${where}: ${issue?.message ?? 'invalid body'}`);
  }

  /**
   * Issue one request. 2xx resolves to the parsed JSON body (undefined when
   * empty); everything else resolves to a classified ApiError.
   */
  private async send(
    method: HttpMethod,
    url: string,
    label: string,
    extraHeaders: Record<string, string> = {}
  ): Promise<ApiResult<unknown>> {
    const headers: Record<string, string> = {
      Authorization: `token ${this.token}`,
      'Content-Type': 'application/vnd.api+json',
      Accept: 'application/vnd.api+json',
      ...extraHeaders,
    };

    let response: HttpResponse;
    try {
      response = await this.transport({ method, url, headers });
    } catch (error) {
      return fail(new ApiError('network', `${label} failed: ${errorMessage(error)}`));
    }

    if (response.status < 200 || response.status >= 300) {
      return fail(classifyResponse(label, response, this.now()));
    }

    if (method === 'GET') {
      const body = parseJson(response.text);
      if (body === undefined) {
        return fail(new ApiError('serverError', `${label} returned a body that is not JSON`, { status: response.status }));
      }
      return ok(body);
    }

    return ok(undefined);
  }
}
