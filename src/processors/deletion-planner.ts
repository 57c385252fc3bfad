/**
 * Deletion planner
 *
 * Splits the listed organizations into protected and candidates. Pure: no I/O,
 * and each side keeps the lister's order so dry runs and live runs preview the
 * same sequence for the same server state.
 */

import type { Organization, Plan } from '../config/types.js';
import type { ExclusionSet } from '../parsers/exclusion-parser.js';

export function planDeletion(orgs: readonly Organization[], exclusions: ExclusionSet): Plan {
  const protectedOrgs: Organization[] = [];
  const candidates: Organization[] = [];

  for (const org of orgs) {
    if (exclusions.matches(org)) {
      protectedOrgs.push(org);
    } else {
      candidates.push(org);
    }
  }

  return Object.freeze({
    protected: Object.freeze(protectedOrgs),
    candidates: Object.freeze(candidates),
  });
}

export function describeOrg(org: Organization): string {
  return `${org.name} (${org.id})`;
}
