/**
 * Shared type definitions for the deletion pipeline
 *
 * These types are stage-agnostic: the lister produces Organizations, the planner
 * produces a Plan, the executor produces DeletionOutcomes, and the reporter reads
 * the finished RunReport.
 */

import type { Region } from './regions.js';

// ============================================================================
// Remote entities
// ============================================================================

/**
 * An organization as returned by the management API.
 * Identity is `id`; `name` is a display name and may repeat across orgs.
 */
export interface Organization {
  readonly id: string;
  readonly name: string;
  readonly groupId: string;
  readonly attributes: Readonly<Record<string, unknown>>;
}

/** A target or project inside an organization, removed before the org itself */
export interface OrgContent {
  readonly id: string;
  readonly name: string;
}

export interface TokenOwner {
  id: string;
  name: string | null;
  email: string | null;
}

// ============================================================================
// Planning
// ============================================================================

export type ExclusionKind = 'id' | 'name';

export interface ExclusionEntry {
  readonly raw: string;
  readonly kind: ExclusionKind;
}

export interface Plan {
  readonly protected: readonly Organization[];
  readonly candidates: readonly Organization[];
}

export type RunMode = 'dry-run' | 'live';

export type GateResult =
  | { decision: 'proceed' }
  | { decision: 'abort'; reason: 'no-candidates' | 'token-mismatch' };

// ============================================================================
// Execution
// ============================================================================

export type DeletionStatus = 'succeeded' | 'failed' | 'skipped';

export interface DeletionOutcome {
  organization: Organization;
  status: DeletionStatus;
  /** Delete calls issued for this organization; 0 only for skipped */
  attempts: number;
  error?: string;
  note?: string;
  timestamp: string;
}

export interface ExecutionResult {
  outcomes: DeletionOutcome[];
  /** Candidates never attempted because the run stopped on an auth failure */
  abandoned: Organization[];
}

export interface RunReport {
  mode: RunMode;
  groupId: string;
  region: Region;
  plan: Plan;
  gate: GateResult;
  outcomes: readonly DeletionOutcome[];
  abandoned: readonly Organization[];
  startedAt: Date;
  finishedAt: Date;
}

export interface Summary {
  succeeded: number;
  failed: number;
  skipped: number;
  abandoned: number;
  durationMs: number;
}

// ============================================================================
// Operation Reports
// ============================================================================

/**
 * JSON report written to the output directory at the end of every run.
 */
export interface DeleteReport {
  operationType: 'delete';
  timestamp: string;
  success: boolean;
  region: string;
  groupId: string;
  dryRun: boolean;
  gate: GateResult['decision'];
  summary: Summary & { protected: number; candidates: number };
  details: {
    protected: Array<{ name: string; id: string }>;
    outcomes: Array<{
      name: string;
      id: string;
      status: DeletionStatus;
      attempts: number;
      error?: string;
      note?: string;
      timestamp: string;
    }>;
    abandoned: Array<{ name: string; id: string }>;
  };
}
