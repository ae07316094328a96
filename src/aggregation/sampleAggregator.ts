import { z } from 'zod';
import type { CacheStore } from '../cache/cache.js';
import type { EntriesPage, NomadClient } from '../clients/nomad.js';
import { rawEntrySchema, uploadSchema, userSchema, type RawEntry, type UploadInfo, type UserInfo } from '../clients/schemas.js';
import { DEFAULT_SAMPLE_SECTION, MAX_PAGE_SIZE } from '../config/defaults.js';
import { describeError } from '../errors.js';
import type {
  AggregationResult,
  EntriesQueryPayload,
  EntryOutcome,
  OwnerScope,
  ResourceKind,
  SampleRecord,
  SkippedEntry,
} from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { toIsoDay } from '../utils/time.js';

export type SampleSource = Pick<NomadClient, 'queryEntries' | 'getUpload' | 'getUser'>;

export interface SampleAggregatorOptions {
  sectionType?: string | undefined;
  logger?: Logger | undefined;
}

export interface FetchSamplesOptions {
  maxRecords?: number | undefined;
}

// Elevated scope first; the visible scope is the fallback every account has.
const ACCESS_SCOPES: readonly OwnerScope[] = ['admin', 'visible'];

export const sampleRecordSchema = z.object({
  uploadId: z.string(),
  uploadName: z.string(),
  sampleName: z.string(),
  labId: z.string(),
  uploadDate: z.string(),
  authorId: z.string(),
  authorDisplayName: z.string(),
  coauthors: z.array(z.string()),
  coauthorGroups: z.array(z.string()),
  published: z.boolean(),
  license: z.string(),
  cellArea: z.number(),
  efficiency: z.number(),
});

const cachedResultSchema = z.object({
  scope: z.enum(['visible', 'admin']),
  records: z.array(sampleRecordSchema),
});

/**
 * Pages through sample entries and joins each one with its upload and the
 * upload's main author. Entries that fail to enrich are reported as skipped;
 * only the page fetches themselves can fail the whole call.
 */
export class SampleAggregator {
  private readonly sectionType: string;
  private readonly logger: Logger | undefined;

  constructor(
    private readonly client: SampleSource,
    private readonly cache: CacheStore,
    options: SampleAggregatorOptions = {},
  ) {
    this.sectionType = options.sectionType ?? DEFAULT_SAMPLE_SECTION;
    this.logger = options.logger;
  }

  async fetchSamples(options: FetchSamplesOptions = {}): Promise<AggregationResult> {
    const { maxRecords } = options;
    if (maxRecords !== undefined && (!Number.isInteger(maxRecords) || maxRecords <= 0)) {
      throw new RangeError(`maxRecords must be a positive integer, got ${maxRecords}`);
    }

    const resultKey = this.resultKey(maxRecords);
    const cached = cachedResultSchema.safeParse(await this.cache.get('entries', resultKey));
    if (cached.success) {
      this.logger?.(`Loaded ${cached.data.records.length} samples from cache.`);
      return { records: cached.data.records, skipped: [], scope: cached.data.scope, fromCache: true, pagesFetched: 0 };
    }

    this.logger?.(`Retrieving ${maxRecords === undefined ? 'all' : `up to ${maxRecords}`} ${this.sectionType} samples...`);
    const { scope, page: firstPage } = await this.negotiateAccess();
    const totalPages = Math.ceil(firstPage.total / MAX_PAGE_SIZE);
    this.logger?.(`Found ${firstPage.total} samples (${totalPages} pages) with owner "${scope}".`);

    const authors = new Map<string, UserInfo>();
    const records: SampleRecord[] = [];
    const skipped: SkippedEntry[] = [];
    let page: EntriesPage = firstPage;
    let pageNumber = 1;
    let taken = 0;

    for (;;) {
      const budget = maxRecords === undefined ? page.data.length : maxRecords - taken;
      const entries = page.data.slice(0, budget);

      for (const raw of entries) {
        const outcome = await this.enrichEntry(raw, authors);
        if (outcome.status === 'ok') {
          records.push(outcome.record);
        } else {
          skipped.push(outcome);
          this.logger?.(`Skipping entry ${outcome.entryId ?? '(unknown)'}: ${outcome.reason}`);
        }
      }
      taken += entries.length;
      this.logger?.(`Processed page ${pageNumber}/${totalPages}`);

      if ((maxRecords !== undefined && taken >= maxRecords) || pageNumber >= totalPages) {
        break;
      }
      pageNumber += 1;
      page = await this.client.queryEntries(this.buildPayload(scope, pageNumber));
    }

    this.logger?.(`Retrieved ${records.length} samples (${skipped.length} skipped).`);
    await this.remember('entries', resultKey, { scope, records });
    return { records, skipped, scope, fromCache: false, pagesFetched: pageNumber };
  }

  private async negotiateAccess(): Promise<{ scope: OwnerScope; page: EntriesPage }> {
    let lastError: unknown;
    for (const scope of ACCESS_SCOPES) {
      try {
        const page = await this.client.queryEntries(this.buildPayload(scope, 1));
        return { scope, page };
      } catch (error) {
        lastError = error;
        this.logger?.(`Sample query with owner "${scope}" failed: ${describeError(error)}`);
      }
    }
    throw lastError;
  }

  private async enrichEntry(raw: unknown, authors: Map<string, UserInfo>): Promise<EntryOutcome> {
    const parsed = rawEntrySchema.safeParse(raw);
    if (!parsed.success) {
      return { status: 'skipped', entryId: undefined, uploadId: undefined, reason: 'entry is not an object' };
    }

    const entry = parsed.data;
    const entryId = entry.entry_id ?? undefined;
    const uploadId = entry.upload_id ?? undefined;
    if (!uploadId) {
      return { status: 'skipped', entryId, uploadId, reason: 'entry has no upload_id' };
    }

    try {
      const upload = await this.resolveUpload(uploadId);
      const authorId = upload.main_author ?? '';
      const author: UserInfo = authorId ? await this.resolveAuthor(authorId, authors) : {};
      return { status: 'ok', record: buildSampleRecord(uploadId, entry, upload, authorId, author) };
    } catch (error) {
      return { status: 'skipped', entryId, uploadId, reason: describeError(error) };
    }
  }

  private async resolveUpload(uploadId: string): Promise<UploadInfo> {
    const cached = uploadSchema.safeParse(await this.cache.get('uploads', uploadId));
    if (cached.success) {
      return cached.data;
    }

    const upload = await this.client.getUpload(uploadId);
    await this.remember('uploads', uploadId, upload);
    return upload;
  }

  /** Run map, then the cache, then the API. A failed lookup degrades to an empty profile. */
  private async resolveAuthor(authorId: string, authors: Map<string, UserInfo>): Promise<UserInfo> {
    const known = authors.get(authorId);
    if (known) {
      return known;
    }

    let author: UserInfo;
    const cached = userSchema.safeParse(await this.cache.get('users', authorId));
    if (cached.success) {
      author = cached.data;
    } else {
      try {
        author = await this.client.getUser(authorId);
        await this.remember('users', authorId, author);
      } catch (error) {
        this.logger?.(`Error getting user ${authorId}: ${describeError(error)}`);
        author = {};
      }
    }

    authors.set(authorId, author);
    return author;
  }

  private async remember(kind: ResourceKind, key: string, payload: unknown): Promise<void> {
    try {
      await this.cache.put(kind, key, payload);
    } catch (error) {
      this.logger?.(`Could not write ${kind} cache entry "${key}": ${describeError(error)}`);
    }
  }

  private buildPayload(scope: OwnerScope, page: number): EntriesQueryPayload {
    return {
      owner: scope,
      query: {
        and: [{ 'results.eln.sections:any': [this.sectionType] }, { 'quantities:all': ['data'] }],
      },
      pagination: { page_size: MAX_PAGE_SIZE, page },
    };
  }

  private resultKey(maxRecords: number | undefined): string {
    return `samples:${this.sectionType}:${maxRecords ?? 'all'}`;
  }
}

export function authorDisplayName(author: UserInfo, authorId: string): string {
  return author.name || author.username || authorId;
}

export function buildSampleRecord(
  uploadId: string,
  entry: RawEntry,
  upload: UploadInfo,
  authorId: string,
  author: UserInfo,
): SampleRecord {
  const solarCell = entry.results?.properties?.optoelectronic?.solar_cell;
  return {
    uploadId,
    uploadName: upload.upload_name ?? '',
    sampleName: entry.data?.name ?? '',
    labId: entry.data?.lab_id ?? '',
    uploadDate: toIsoDay(upload.upload_create_time),
    authorId,
    authorDisplayName: authorDisplayName(author, authorId),
    coauthors: upload.coauthors ?? [],
    coauthorGroups: upload.coauthor_groups ?? [],
    published: upload.published ?? false,
    license: upload.license ?? '',
    cellArea: solarCell?.cell_area ?? 0,
    efficiency: solarCell?.efficiency ?? 0,
  };
}
