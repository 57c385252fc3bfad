#!/usr/bin/env node

/**
 * CLI router - Commander.js subcommand structure for org-purge
 *
 * Registers subcommands: delete, whoami
 * Each subcommand delegates to its own handler in src/commands/
 */

import { Option, program } from 'commander';
import * as dotenv from 'dotenv';
import { DEFAULT_REGION, REGIONS } from './config/regions.js';
import { DEFAULT_API_VERSION } from './config/settings.js';

// Load environment variables
dotenv.config();

program
  .name('org-purge')
  .description('Bulk-delete Snyk organizations in a group, protecting an exclusion list')
  .version('1.0.0');

// Delete subcommand
program
  .command('delete')
  .description('Delete every organization in a group that is not on the exclusion list')
  .requiredOption('-e, --exclusions <file>', 'File of organization ids/names to protect (one per line, # comments)')
  .option('-t, --token <token>', 'Snyk API token (default: SNYK_TOKEN)')
  .option('-g, --group-id <id>', 'Snyk group ID (default: SNYK_GROUP_ID)')
  .addOption(
    new Option('-r, --region <region>', `Snyk region (default: SNYK_REGION or ${DEFAULT_REGION})`).choices(REGIONS)
  )
  .option('--api-version <version>', `REST API version (default: SNYK_API_VERSION or ${DEFAULT_API_VERSION})`)
  .option('--dry-run', 'Show what would be deleted without deleting', false)
  .option('--confirm <token>', 'Confirmation token for non-interactive runs, e.g. "DELETE 3 ORGANIZATIONS"')
  .option('--no-purge-contents', 'Do not delete targets and projects before deleting an organization')
  .option('-o, --output <dir>', 'Output directory for reports', './reports')
  .option('--log-dir <dir>', 'Directory for run logs (default: ORG_PURGE_LOG_DIR or ./logs)')
  .option('-v, --verbose', 'Enable verbose logging', false)
  .action(async (opts: {
    exclusions: string;
    token?: string;
    groupId?: string;
    region?: string;
    apiVersion?: string;
    dryRun: boolean;
    confirm?: string;
    purgeContents: boolean;
    output: string;
    logDir?: string;
    verbose: boolean;
  }) => {
    const { deleteCommand } = await import('./commands/delete.js');
    await deleteCommand(opts);
  });

// Whoami subcommand
program
  .command('whoami')
  .description('Verify the API token and show its owner')
  .option('-t, --token <token>', 'Snyk API token (default: SNYK_TOKEN)')
  .addOption(
    new Option('-r, --region <region>', `Snyk region (default: SNYK_REGION or ${DEFAULT_REGION})`).choices(REGIONS)
  )
  .option('--api-version <version>', `REST API version (default: SNYK_API_VERSION or ${DEFAULT_API_VERSION})`)
  .option('-v, --verbose', 'Enable verbose logging', false)
  .action(async (opts: { token?: string; region?: string; apiVersion?: string; verbose: boolean }) => {
    const { whoamiCommand } = await import('./commands/whoami.js');
    await whoamiCommand(opts);
  });

await program.parseAsync();
