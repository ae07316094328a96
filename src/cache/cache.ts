import type { ResourceKind } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

export const RESOURCE_KINDS: readonly ResourceKind[] = ['entries', 'users', 'uploads'];

export interface CacheEntry<T = unknown> {
  kind: ResourceKind;
  key: string;
  timestamp: string;
  payload: T;
}

export interface CacheKindStats {
  count: number;
  totalSize: number;
  oldest: string | null;
  newest: string | null;
}

export type CacheStats = Record<ResourceKind, CacheKindStats>;

export interface CacheConfig {
  baseDir: string;
  enabled?: boolean;
  expiryHours?: Partial<Record<ResourceKind, number>>;
  now?: () => number;
  logger?: Logger | undefined;
}

/**
 * Time-bounded key/value store for the three remote resource kinds.
 * Reads never fail: anything unreadable or past its kind's expiry is a miss.
 */
export interface CacheStore {
  get(kind: ResourceKind, key: string): Promise<unknown>;
  put(kind: ResourceKind, key: string, payload: unknown): Promise<void>;
  clear(kind?: ResourceKind): Promise<void>;
  stats(): Promise<CacheStats>;
}
