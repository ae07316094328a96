// Default configuration values and known oasis deployments

import type { ResourceKind } from '../types/index.js';

export const OASIS_OPTIONS = {
  'SE Oasis': 'https://nomad-hzb-se.de/nomad-oasis/api/v1',
  'CE Oasis': 'https://nomad-hzb-ce.de/nomad-oasis/api/v1',
  'Sol-AI Oasis': 'https://nomad-sol-ai.de/nomad-oasis/api/v1',
} as const;

export type OasisName = keyof typeof OASIS_OPTIONS;

export const DEFAULT_OASIS: OasisName = 'SE Oasis';

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
export const DEFAULT_CACHE_DIR = '.cache';

// The backend rejects larger pages on entries/query
export const MAX_PAGE_SIZE = 100;
export const DEFAULT_QUERY_PAGE_SIZE = 100;
export const DEFAULT_GROUPS_PAGE_SIZE = 1000;
export const DEFAULT_MAX_RECORDS = 500;

export const DEFAULT_SAMPLE_SECTION = 'HySprint_Sample';
export const DEFAULT_BATCH_TYPE = 'HySprint_Batch';

export const CACHE_EXPIRY_HOURS: Readonly<Record<ResourceKind, number>> = {
  entries: 24,
  users: 168,
  uploads: 48,
};

export const ATTRIBUTION_FILE = 'attribution_overrides.csv';
export const LEGACY_ATTRIBUTION_FILE = 'nomad_samples_with_authors.csv';

export function isOasisName(value: string): value is OasisName {
  return Object.prototype.hasOwnProperty.call(OASIS_OPTIONS, value);
}

export function resolveBaseUrl(url: string | undefined, oasis: string | undefined): string {
  if (url) {
    return url.replace(/\/+$/, '');
  }
  if (oasis && isOasisName(oasis)) {
    return OASIS_OPTIONS[oasis];
  }
  return OASIS_OPTIONS[DEFAULT_OASIS];
}
