import { DEFAULT_BATCH_TYPE, DEFAULT_SAMPLE_SECTION, MAX_PAGE_SIZE } from '../config/defaults.js';
import type { OwnerScope } from '../types/index.js';
import type { EntriesPage, NomadClient } from './nomad.js';
import { archiveItemSchema } from './schemas.js';

type ArchiveQuerySource = Pick<NomadClient, 'query'>;
type EntriesQuerySource = Pick<NomadClient, 'queryEntries'>;

export interface SampleQueryOptions {
  sectionType?: string | undefined;
  owner?: OwnerScope | undefined;
  pageSize?: number | undefined;
  page?: number | undefined;
}

const WIDE_PAGE_SIZE = 10_000;

export async function getBatchIds(client: ArchiveQuerySource, batchType: string = DEFAULT_BATCH_TYPE): Promise<string[]> {
  const items = await client.query({
    required: { data: '*' },
    owner: 'visible',
    query: { entry_type: batchType },
    pagination: { page_size: WIDE_PAGE_SIZE },
  });
  return collectLabIds(items);
}

/** Lab ids of every entity listed in the given batches. */
export async function getIdsInBatch(
  client: ArchiveQuerySource,
  batchIds: string[],
  batchType: string = DEFAULT_BATCH_TYPE,
): Promise<string[]> {
  if (batchIds.length === 0) {
    return [];
  }

  const items = await client.query({
    required: { data: '*' },
    owner: 'visible',
    query: { 'results.eln.lab_ids:any': batchIds, entry_type: batchType },
    pagination: { page_size: 100 },
  });

  const ids: string[] = [];
  for (const data of archiveData(items)) {
    const entities = data.entities;
    if (!Array.isArray(entities)) {
      continue;
    }
    for (const entity of entities) {
      if (entity && typeof entity === 'object' && 'lab_id' in entity && typeof entity.lab_id === 'string') {
        ids.push(entity.lab_id);
      }
    }
  }
  return ids;
}

export async function getUploadsByAuthor(client: ArchiveQuerySource, author: string): Promise<string[]> {
  if (!author) {
    return [];
  }

  const items = await client.query({
    required: { data: '*' },
    owner: 'visible',
    query: { authors: author },
    pagination: { page_size: WIDE_PAGE_SIZE },
  });
  return collectLabIds(items);
}

/**
 * One page of sample entries matching the section filter plus the caller's own
 * conditions. An `and` list is appended as is; otherwise each key becomes its
 * own condition, except `owner` and `pagination`.
 */
export async function querySampleEntries(
  client: EntriesQuerySource,
  filter: Record<string, unknown> = {},
  options: SampleQueryOptions = {},
): Promise<EntriesPage> {
  const conditions: unknown[] = [{ 'results.eln.sections:any': [options.sectionType ?? DEFAULT_SAMPLE_SECTION] }];
  if (Array.isArray(filter.and)) {
    conditions.push(...filter.and);
  } else {
    for (const [key, value] of Object.entries(filter)) {
      if (key !== 'owner' && key !== 'pagination') {
        conditions.push({ [key]: value });
      }
    }
  }

  return client.queryEntries({
    owner: options.owner ?? 'visible',
    query: { and: conditions },
    pagination: { page_size: Math.min(options.pageSize ?? MAX_PAGE_SIZE, MAX_PAGE_SIZE), page: options.page ?? 1 },
  });
}

function archiveData(items: Record<string, unknown>[]): Record<string, unknown>[] {
  const result: Record<string, unknown>[] = [];
  for (const item of items) {
    const parsed = archiveItemSchema.safeParse(item);
    if (parsed.success) {
      result.push(parsed.data.archive.data);
    }
  }
  return result;
}

function collectLabIds(items: Record<string, unknown>[]): string[] {
  return archiveData(items)
    .map((data) => data.lab_id)
    .filter((labId): labId is string => typeof labId === 'string');
}
