/**
 * Whoami command handler - verify the API token and show who it belongs to
 */

import { fetchTransport } from '../api/http.js';
import { SnykClient } from '../api/snyk-client.js';
import type { ManagementApi } from '../api/snyk-client.js';
import { REGION_ENDPOINTS } from '../config/regions.js';
import { resolveConnection } from '../config/settings.js';
import type { ConnectionOptions } from '../config/settings.js';
import { ExitCode } from '../utils/cli-helpers.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export async function verifyToken(api: ManagementApi, apiVersion: string, logger: Logger): Promise<ExitCode> {
  const self = await api.getSelf(apiVersion);

  if (!self.success) {
    logger.error(`Token verification failed (${self.error.kind}): ${self.error.message}`);
    return ExitCode.Failure;
  }

  logger.success('Token is valid');
  logger.keyValue('User ID', self.value.id);
  logger.keyValue('Name', self.value.name ?? undefined);
  logger.keyValue('Email', self.value.email ?? undefined);
  return ExitCode.Success;
}

export async function whoamiCommand(options: ConnectionOptions): Promise<void> {
  const logger = createLogger({ verbose: options.verbose });

  try {
    const settings = resolveConnection(options);
    logger.section('Snyk Token');
    logger.keyValue('Region', settings.region);

    const api = new SnykClient({
      token: settings.token,
      baseUrl: REGION_ENDPOINTS[settings.region],
      transport: fetchTransport(),
    });

    process.exit(await verifyToken(api, settings.apiVersion, logger));
  } catch (error) {
    logger.error(errorMessage(error));
    process.exit(ExitCode.Failure);
  }
}
