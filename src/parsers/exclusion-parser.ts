/**
 * Exclusion list parser
 *
 * Reads the protected-organization list: one organization id or exact display
 * name per line. Blank lines and `#` comment lines are ignored; everything else
 * is kept verbatim after trimming. Matching is exact and case-sensitive.
 *
 * An empty list is rejected: it would leave every organization in the group
 * unprotected.
 */

import * as fs from 'fs';
import type { ExclusionEntry, ExclusionKind, Organization } from '../config/types.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';

const UUID_PATTERN = /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;

export function classifyEntry(raw: string): ExclusionKind {
  return UUID_PATTERN.test(raw) ? 'id' : 'name';
}

export class ExclusionSet {
  readonly entries: readonly ExclusionEntry[];
  /** Lines dropped because they repeat an earlier entry */
  readonly duplicates: number;
  private readonly tokens: ReadonlySet<string>;

  private constructor(entries: ExclusionEntry[], duplicates: number) {
    this.entries = Object.freeze(entries);
    this.duplicates = duplicates;
    this.tokens = new Set(entries.map((e) => e.raw));
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Build a set from raw lines. Throws ConfigurationError when no entry remains.
   */
  static fromLines(lines: readonly string[]): ExclusionSet {
    const entries: ExclusionEntry[] = [];
    const seen = new Set<string>();
    let duplicates = 0;

    for (const line of lines) {
      const raw = line.trim();
      if (raw === '' || raw.startsWith('#')) continue;

      if (seen.has(raw)) {
        duplicates++;
        continue;
      }
      seen.add(raw);
      entries.push({ raw, kind: classifyEntry(raw) });
    }

    if (entries.length === 0) {
      throw new ConfigurationError(
        'Exclusion list is empty. Refusing to run without at least one protected organization.'
      );
    }

    return new ExclusionSet(entries, duplicates);
  }

  /** True when the organization's id or name equals an entry exactly */
  matches(org: Organization): boolean {
    return this.tokens.has(org.id) || this.tokens.has(org.name);
  }

  /**
   * Entries that match none of the given organizations -- usually a typo or an
   * organization that lives in another group.
   */
  unmatched(orgs: readonly Organization[]): ExclusionEntry[] {
    const present = new Set<string>();
    for (const org of orgs) {
      present.add(org.id);
      present.add(org.name);
    }
    return this.entries.filter((e) => !present.has(e.raw));
  }
}

export function loadExclusions(lines: readonly string[]): ExclusionSet {
  return ExclusionSet.fromLines(lines);
}

/**
 * Read and parse the exclusions file. The file is read once per run.
 */
export function readExclusionsFile(filePath: string): ExclusionSet {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read exclusions file ${filePath}: ${errorMessage(error)}`);
  }

  return loadExclusions(content.replace(/^\uFEFF/, '').split(/\r?\n/));
}
