import type { CacheStore } from '../cache/cache.js';
import type { NomadClient } from '../clients/nomad.js';
import { userSchema, type UserInfo } from '../clients/schemas.js';
import { describeError } from '../errors.js';
import type { SampleRecord } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

export type AuthorSource = Pick<NomadClient, 'getUser'>;

export interface AuthorNameOptions {
  cache?: CacheStore | undefined;
  logger?: Logger | undefined;
}

/** Main authors and co-authors of the given samples, in first-seen order. */
export function collectAuthorIds(records: readonly SampleRecord[]): Set<string> {
  const ids = new Set<string>();
  for (const record of records) {
    if (record.authorId) {
      ids.add(record.authorId);
    }
    for (const coauthor of record.coauthors) {
      if (coauthor) {
        ids.add(coauthor);
      }
    }
  }
  return ids;
}

/**
 * Maps every author of the samples to `name`, then `username`, then "Unknown".
 * Authors whose profile cannot be fetched are left out of the map.
 */
export async function buildAuthorNameMap(
  client: AuthorSource,
  records: readonly SampleRecord[],
  options: AuthorNameOptions = {},
): Promise<Map<string, string>> {
  const names = new Map<string, string>();
  for (const authorId of collectAuthorIds(records)) {
    const user = await lookupUser(client, authorId, options);
    if (user) {
      names.set(authorId, user.name || user.username || 'Unknown');
    }
  }
  return names;
}

async function lookupUser(
  client: AuthorSource,
  authorId: string,
  { cache, logger }: AuthorNameOptions,
): Promise<UserInfo | undefined> {
  const cached = userSchema.safeParse(await cache?.get('users', authorId));
  if (cached.success) {
    return cached.data;
  }

  let user: UserInfo;
  try {
    user = await client.getUser(authorId);
  } catch (error) {
    logger?.(`Error getting user ${authorId}: ${describeError(error)}`);
    return undefined;
  }

  try {
    await cache?.put('users', authorId, user);
  } catch (error) {
    logger?.(`Could not write users cache entry "${authorId}": ${describeError(error)}`);
  }
  return user;
}
