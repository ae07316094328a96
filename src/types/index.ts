export type ResourceKind = 'entries' | 'users' | 'uploads';

export type OwnerScope = 'visible' | 'admin';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface SampleRecord {
  uploadId: string;
  uploadName: string;
  sampleName: string;
  labId: string;
  uploadDate: string;
  authorId: string;
  authorDisplayName: string;
  coauthors: string[];
  coauthorGroups: string[];
  published: boolean;
  license: string;
  cellArea: number;
  efficiency: number;
}

export interface AttributionOverride {
  authorId: string;
  authorDisplayName: string;
  overrideDate: string;
}

export type AttributionMap = Map<string, AttributionOverride>;

export type EntryOutcome =
  | { status: 'ok'; record: SampleRecord }
  | { status: 'skipped'; entryId: string | undefined; uploadId: string | undefined; reason: string };

export type SkippedEntry = Extract<EntryOutcome, { status: 'skipped' }>;

export interface AggregationResult {
  records: SampleRecord[];
  skipped: SkippedEntry[];
  scope: OwnerScope;
  fromCache: boolean;
  pagesFetched: number;
}

export interface EntriesQueryPayload {
  owner: OwnerScope;
  query: Record<string, unknown>;
  pagination: { page_size: number; page?: number };
  required?: Record<string, unknown>;
}
