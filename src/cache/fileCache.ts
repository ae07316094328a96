import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { CACHE_EXPIRY_HOURS } from '../config/defaults.js';
import { CacheReadError, describeError } from '../errors.js';
import type { ResourceKind } from '../types/index.js';
import { isMissingFile } from '../utils/fs.js';
import { digestOf } from '../utils/hash.js';
import type { Logger } from '../utils/logger.js';
import { hoursToMs } from '../utils/time.js';
import {
  RESOURCE_KINDS,
  type CacheConfig,
  type CacheEntry,
  type CacheKindStats,
  type CacheStats,
  type CacheStore,
} from './cache.js';

const storedEntrySchema = z.object({
  key: z.string(),
  timestamp: z.string(),
  payload: z.unknown(),
});

type StoredEntry = z.infer<typeof storedEntrySchema>;

export class FileCache implements CacheStore {
  private readonly baseDir: string;
  private readonly enabled: boolean;
  private readonly expiryMs: Record<ResourceKind, number>;
  private readonly now: () => number;
  private readonly logger: Logger | undefined;

  constructor(config: CacheConfig) {
    this.baseDir = config.baseDir;
    this.enabled = config.enabled ?? true;
    this.now = config.now ?? Date.now;
    this.logger = config.logger;
    this.expiryMs = {
      entries: hoursToMs(config.expiryHours?.entries ?? CACHE_EXPIRY_HOURS.entries),
      users: hoursToMs(config.expiryHours?.users ?? CACHE_EXPIRY_HOURS.users),
      uploads: hoursToMs(config.expiryHours?.uploads ?? CACHE_EXPIRY_HOURS.uploads),
    };
  }

  async get(kind: ResourceKind, key: string): Promise<unknown> {
    if (!this.enabled) {
      return undefined;
    }

    let entry: CacheEntry | undefined;
    try {
      entry = await this.readEntry(kind, key);
    } catch (error) {
      if (error instanceof CacheReadError) {
        this.logger?.(`Ignoring unreadable ${kind} cache entry "${key}": ${error.message}`);
        return undefined;
      }
      throw error;
    }

    if (!entry) {
      return undefined;
    }

    const age = this.now() - Date.parse(entry.timestamp);
    if (age > this.expiryMs[kind]) {
      return undefined;
    }
    return entry.payload;
  }

  async put(kind: ResourceKind, key: string, payload: unknown): Promise<void> {
    if (!this.enabled) {
      return;
    }

    const { dir, filePath } = this.paths(kind, key);
    await fs.mkdir(dir, { recursive: true });

    const stored: StoredEntry = {
      key,
      timestamp: new Date(this.now()).toISOString(),
      payload,
    };
    await fs.writeFile(filePath, JSON.stringify(stored), 'utf8');
  }

  async clear(kind?: ResourceKind): Promise<void> {
    const kinds = kind ? [kind] : RESOURCE_KINDS;
    for (const target of kinds) {
      await fs.rm(path.join(this.baseDir, target), { recursive: true, force: true });
    }
  }

  async stats(): Promise<CacheStats> {
    return {
      entries: await this.kindStats('entries'),
      users: await this.kindStats('users'),
      uploads: await this.kindStats('uploads'),
    };
  }

  private async readEntry(kind: ResourceKind, key: string): Promise<CacheEntry | undefined> {
    const { filePath } = this.paths(kind, key);

    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw new CacheReadError(`Unable to read ${filePath}: ${describeError(error)}`, { kind, key }, { cause: error });
    }

    const stored = parseStoredEntry(raw, filePath);
    if (stored.key !== key) {
      // digest collision or a hand-edited file
      return undefined;
    }
    return { kind, key, timestamp: stored.timestamp, payload: stored.payload };
  }

  private async kindStats(kind: ResourceKind): Promise<CacheKindStats> {
    const dir = path.join(this.baseDir, kind);
    const result: CacheKindStats = { count: 0, totalSize: 0, oldest: null, newest: null };

    let files: string[];
    try {
      files = await fs.readdir(dir);
    } catch (error) {
      if (isMissingFile(error)) {
        return result;
      }
      throw error;
    }

    for (const file of files.filter((name) => name.endsWith('.json'))) {
      const filePath = path.join(dir, file);
      const [info, raw] = await Promise.all([fs.stat(filePath), fs.readFile(filePath, 'utf8')]);
      result.count += 1;
      result.totalSize += info.size;

      let timestamp: string;
      try {
        timestamp = parseStoredEntry(raw, filePath).timestamp;
      } catch (error) {
        if (error instanceof CacheReadError) {
          continue;
        }
        throw error;
      }

      if (result.oldest === null || Date.parse(timestamp) < Date.parse(result.oldest)) {
        result.oldest = timestamp;
      }
      if (result.newest === null || Date.parse(timestamp) > Date.parse(result.newest)) {
        result.newest = timestamp;
      }
    }

    return result;
  }

  private paths(kind: ResourceKind, key: string) {
    const dir = path.join(this.baseDir, kind);
    return {
      dir,
      filePath: path.join(dir, `${digestOf(key)}.json`),
    };
  }
}

function parseStoredEntry(raw: string, filePath: string): StoredEntry {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new CacheReadError(`Corrupt JSON in ${filePath}`, { filePath }, { cause: error });
  }

  const parsed = storedEntrySchema.safeParse(json);
  if (!parsed.success || Number.isNaN(Date.parse(parsed.data.timestamp))) {
    throw new CacheReadError(`Unexpected cache entry shape in ${filePath}`, { filePath });
  }
  return parsed.data;
}
