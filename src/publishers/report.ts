/**
 * Report, snapshot and remaining-list files written next to a run.
 *
 * Naming convention: delete-{timestamp}.json or delete-dryrun-{timestamp}.json
 */

import * as fs from 'fs';
import * as path from 'path';
import type { DeleteReport, Organization, Plan } from '../config/types.js';
import type { Logger } from '../utils/logger.js';
import { fileTimestamp } from './run-log.js';

function ensureDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Save an operation report to disk.
 *
 * @returns The path to the saved report file.
 */
export function saveOperationReport(report: DeleteReport, outputDir: string, logger: Logger): string {
  ensureDir(outputDir);

  const timestamp = report.timestamp.replace(/:/g, '-').replace(/\./g, '-');
  const dryRunSuffix = report.dryRun ? '-dryrun' : '';
  const filepath = path.join(outputDir, `${report.operationType}${dryRunSuffix}-${timestamp}.json`);

  fs.writeFileSync(filepath, JSON.stringify(report, null, 2));
  logger.success(`Report saved: ${filepath}`);

  return filepath;
}

/**
 * Save the full plan, including organization attributes, before the first
 * destructive call. Returns the filepath for error messages.
 */
export function saveSnapshot(plan: Plan, snapshotsDir: string, at: Date, logger: Logger): string {
  ensureDir(snapshotsDir);

  const filepath = path.join(snapshotsDir, `delete-snapshot-${fileTimestamp(at)}.json`);
  fs.writeFileSync(
    filepath,
    JSON.stringify({ timestamp: at.toISOString(), protected: plan.protected, candidates: plan.candidates }, null, 2)
  );
  logger.success(`Pre-deletion snapshot saved: ${filepath}`);

  return filepath;
}

/**
 * Write the ids of organizations that are still present (failed, skipped or
 * never attempted), one per line, so a later run can be scoped to them.
 */
export function writeRemainingList(orgs: readonly Organization[], outputDir: string, at: Date, logger: Logger): string {
  ensureDir(outputDir);

  const filepath = path.join(outputDir, `remaining-organizations-${fileTimestamp(at)}.txt`);
  const header = `# Organizations not deleted by the run at ${at.toISOString()}`;
  const lines = orgs.map((org) => org.id);
  fs.writeFileSync(filepath, [header, ...lines].join('\n') + '\n');
  logger.info(`Remaining organizations written to: ${filepath}`);

  return filepath;
}
