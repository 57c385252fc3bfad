/**
 * org-purge - bulk deletion of Snyk organizations behind an exclusion list
 *
 * Library entry point. The CLI lives in cli.ts; everything it uses is exported
 * here so the pipeline can be embedded or driven with a different transport.
 */

export { fetchTransport } from './api/http.js';
export type { HttpRequest, HttpResponse, HttpTransport } from './api/http.js';
export { SnykClient, classifyResponse, isOrgNotEmpty, parseRetryAfter, resolveLink } from './api/snyk-client.js';
export type { ManagementApi, Page } from './api/snyk-client.js';

export { DEFAULT_REGION, REGIONS, REGION_ENDPOINTS } from './config/regions.js';
export type { Region } from './config/regions.js';
export { DEFAULT_API_VERSION, DEFAULT_RETRY_POLICY, resolveConnection, resolveSettings } from './config/settings.js';
export type { DeleteOptions, RetryPolicy, RunSettings } from './config/settings.js';
export type * from './config/types.js';

export { ExclusionSet, loadExclusions, readExclusionsFile } from './parsers/exclusion-parser.js';
export { listGroupOrganizations } from './processors/organization-lister.js';
export type { ListResult } from './processors/organization-lister.js';
export { planDeletion } from './processors/deletion-planner.js';
export { confirmPlan, confirmationToken } from './processors/confirmation-gate.js';
export type { Prompt } from './processors/confirmation-gate.js';
export { executeDeletions } from './processors/deletion-executor.js';
export { purgeProjects, purgeTargets } from './processors/contents-cleaner.js';
export { buildDeleteReport, printRunSummary, renderOutcomes, summarize } from './publishers/run-reporter.js';
export { openRunLog } from './publishers/run-log.js';
export { runDeletion } from './commands/delete.js';

export { ApiError, ConfigurationError } from './utils/errors.js';
export type { ApiErrorKind, ApiResult } from './utils/errors.js';
export { createLogger } from './utils/logger.js';
export type { Logger, LogSink } from './utils/logger.js';
