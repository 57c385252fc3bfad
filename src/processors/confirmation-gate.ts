/**
 * Confirmation gate
 *
 * Blocks a live run until the operator types the exact confirmation token,
 * e.g. `DELETE 3 ORGANIZATIONS`. The comparison is byte-for-byte: a lower-case
 * answer, surrounding spaces or a bare "yes" all abort.
 */

import type { GateResult, Plan, RunMode } from '../config/types.js';
import type { Logger } from '../utils/logger.js';
import { describeOrg } from './deletion-planner.js';

/** Reads one line of operator input after showing `message` */
export type Prompt = (message: string) => Promise<string>;

export function confirmationToken(candidateCount: number): string {
  return `DELETE ${candidateCount} ORGANIZATIONS`;
}

export async function confirmPlan(plan: Plan, mode: RunMode, prompt: Prompt, logger: Logger): Promise<GateResult> {
  if (mode === 'dry-run') {
    logger.audit('Confirmation not required: dry run');
    return { decision: 'proceed' };
  }

  if (plan.candidates.length === 0) {
    logger.audit('Confirmation skipped: no candidates to delete');
    return { decision: 'abort', reason: 'no-candidates' };
  }

  const token = confirmationToken(plan.candidates.length);

  logger.section('Confirm Deletion');
  logger.keyValue('Protected', plan.protected.length);
  logger.keyValue('To delete', plan.candidates.length);
  console.log();
  for (const org of plan.candidates) {
    logger.listItem(describeOrg(org));
  }
  console.log();
  logger.warn(`You are about to delete ${plan.candidates.length} organizations. This action cannot be undone.`);

  const answer = await prompt(`Type "${token}" to confirm: `);

  if (answer !== token) {
    logger.audit('Confirmation token did not match; run aborted', 'warn');
    return { decision: 'abort', reason: 'token-mismatch' };
  }

  logger.audit(`Operator confirmed deletion of ${plan.candidates.length} organizations`);
  return { decision: 'proceed' };
}
