/**
 * Run configuration
 *
 * Resolves every setting from CLI flag, then environment (.env is loaded by the
 * CLI entry point), then default. All problems are reported together in one
 * ConfigurationError.
 */

import { z } from 'zod';
import { DEFAULT_REGION, REGIONS } from './regions.js';
import type { RunMode } from './types.js';
import { ConfigurationError } from '../utils/errors.js';

export const DEFAULT_API_VERSION = '2024-10-15';

/** Options for the delete command (parsed from CLI flags) */
export interface DeleteOptions {
  token?: string;
  groupId?: string;
  exclusions?: string;
  region?: string;
  apiVersion?: string;
  dryRun: boolean;
  confirm?: string; // Pre-supplied confirmation token for non-interactive runs
  purgeContents: boolean;
  output: string; // Report output directory
  logDir?: string;
  verbose: boolean;
}

/** Options shared by every command that talks to the API */
export interface ConnectionOptions {
  token?: string;
  region?: string;
  apiVersion?: string;
  verbose: boolean;
}

/**
 * Backoff and retry constants.
 *
 * Delay for attempt n (1-based) is min(maxDelayMs, baseDelayMs * 2^(n-1)), of
 * which the upper half is randomized. A Retry-After hint replaces the computed
 * delay when the server sends one.
 */
export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Total time the lister may spend waiting out rate limits before giving up */
  listingWaitBudgetMs: number;
  /** Pause between clearing an organization's targets and deleting it */
  settleDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  listingWaitBudgetMs: 300_000,
  settleDelayMs: 2_000,
};

type Env = Record<string, string | undefined>;

function requiredString(message: string) {
  return z.string({ required_error: message }).trim().min(1, message);
}

const connectionSchema = z.object({
  token: requiredString('Snyk API token is required (--token or SNYK_TOKEN)'),
  region: z.enum(REGIONS, {
    errorMap: () => ({ message: `Region must be one of: ${REGIONS.join(', ')}` }),
  }),
  apiVersion: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}(~(beta|experimental))?$/, 'API version must be a date such as 2024-10-15'),
  verbose: z.boolean(),
});

const settingsSchema = connectionSchema.extend({
  groupId: requiredString('Group ID is required (--group-id or SNYK_GROUP_ID)'),
  exclusionsPath: requiredString('Exclusions file is required (--exclusions)'),
  mode: z.enum(['dry-run', 'live']),
  confirm: z.string().optional(),
  purgeContents: z.boolean(),
  outputDir: z.string().min(1, 'Output directory must not be empty'),
  logDir: z.string().min(1, 'Log directory must not be empty'),
});

export type ConnectionSettings = z.infer<typeof connectionSchema>;

export type RunSettings = z.infer<typeof settingsSchema> & {
  mode: RunMode;
  policy: RetryPolicy;
};

function rawConnection(options: ConnectionOptions, env: Env) {
  return {
    token: options.token ?? env.SNYK_TOKEN,
    region: (options.region ?? env.SNYK_REGION ?? DEFAULT_REGION).toUpperCase(),
    apiVersion: options.apiVersion ?? env.SNYK_API_VERSION ?? DEFAULT_API_VERSION,
    verbose: options.verbose,
  };
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => issue.message);
}

export function resolveConnection(options: ConnectionOptions, env: Env = process.env): ConnectionSettings {
  const parsed = connectionSchema.safeParse(rawConnection(options, env));
  if (!parsed.success) {
    throw new ConfigurationError('Invalid configuration', issuesOf(parsed.error));
  }
  return parsed.data;
}

export function resolveSettings(
  options: DeleteOptions,
  env: Env = process.env,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): RunSettings {
  const parsed = settingsSchema.safeParse({
    ...rawConnection(options, env),
    groupId: options.groupId ?? env.SNYK_GROUP_ID,
    exclusionsPath: options.exclusions,
    mode: options.dryRun ? 'dry-run' : 'live',
    confirm: options.confirm,
    purgeContents: options.purgeContents,
    outputDir: options.output,
    logDir: options.logDir ?? env.ORG_PURGE_LOG_DIR ?? 'logs',
  });

  if (!parsed.success) {
    throw new ConfigurationError('Invalid configuration', issuesOf(parsed.error));
  }

  return { ...parsed.data, policy };
}
