/**
 * Error taxonomy shared by every stage of the deletion pipeline.
 *
 * ConfigurationError is thrown and is always fatal: the run never starts.
 * ApiError is never thrown by the API client -- it travels inside ApiResult so
 * each stage decides whether a failure is retried, recorded, or fatal.
 */

export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(problems.length > 0 ? `${message}:\n${problems.map((p) => `  - ${p}`).join('\n')}` : message);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

export type ApiErrorKind =
  | 'authFailure'
  | 'notFound'
  | 'rateLimited'
  | 'network'
  | 'serverError'
  | 'rejected';

export interface ApiErrorInit {
  status?: number;
  retryAfterMs?: number;
}

export class ApiError extends Error {
  readonly kind: ApiErrorKind;
  readonly status?: number;
  /** Server-provided wait hint from Retry-After, when the response carried one */
  readonly retryAfterMs?: number;

  constructor(kind: ApiErrorKind, message: string, init: ApiErrorInit = {}) {
    super(message);
    this.name = 'ApiError';
    this.kind = kind;
    this.status = init.status;
    this.retryAfterMs = init.retryAfterMs;
  }

  /** Transient kinds are worth another attempt against the same resource */
  get isTransient(): boolean {
    return this.kind === 'rateLimited' || this.kind === 'network' || this.kind === 'serverError';
  }
}

export type ApiResult<T> =
  | { success: true; value: T }
  | { success: false; error: ApiError };

export function ok<T>(value: T): ApiResult<T> {
  return { success: true, value };
}

export function fail<T>(error: ApiError): ApiResult<T> {
  return { success: false, error };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
