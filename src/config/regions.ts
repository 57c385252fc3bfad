/**
 * Snyk regions and their API base URLs
 */

export const REGIONS = ['SNYK-US-01', 'SNYK-US-02', 'SNYK-EU-01', 'SNYK-AU-01'] as const;

export type Region = (typeof REGIONS)[number];

export const DEFAULT_REGION: Region = 'SNYK-US-01';

export const REGION_ENDPOINTS: Record<Region, string> = {
  'SNYK-US-01': 'https://api.snyk.io',
  'SNYK-US-02': 'https://api.us.snyk.io',
  'SNYK-EU-01': 'https://api.eu.snyk.io',
  'SNYK-AU-01': 'https://api.au.snyk.io',
};
