import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { describeError } from '../errors.js';
import type { AttributionMap, AttributionOverride, SampleRecord } from '../types/index.js';
import { isMissingFile } from '../utils/fs.js';
import type { Logger } from '../utils/logger.js';
import { todayIsoDay } from '../utils/time.js';

export const ATTRIBUTION_COLUMNS = ['upload_id', 'author_id', 'author_display_name', 'override_date'] as const;

const FILE_HEADER = [
  '# Manual author attribution overrides, keyed by upload id.',
  '# These replace the author recorded in the repository wherever the upload is shown.',
];

const MIGRATION_MARKER = '# MIGRATED';

export interface AttributionFileOptions {
  legacyPath?: string | undefined;
  logger?: Logger | undefined;
  now?: () => number;
}

type CsvRow = Record<string, string | undefined>;

/** One generation back the author columns were `main_author` / `main_author_name`. */
type AttributionTable =
  | { version: 'current'; rows: CsvRow[] }
  | { version: 'legacy'; rows: CsvRow[] };

export async function loadAttributions(filePath: string, options: AttributionFileOptions = {}): Promise<AttributionMap> {
  const { logger } = options;
  try {
    const source = await pickSource(filePath, options.legacyPath);
    if (!source) {
      logger?.(`Attribution file ${filePath} not found. Starting with empty attributions.`);
      return new Map();
    }

    const table = classifyTable(parseRows(source.content));
    const overrides = normalizeTable(table, todayIsoDay(options.now?.()));
    logger?.(`Loaded ${overrides.size} attribution overrides from ${source.path} (${table.version} schema)`);
    return overrides;
  } catch (error) {
    logger?.(`Error loading attributions: ${describeError(error)}`);
    return new Map();
  }
}

export async function saveAttributions(
  filePath: string,
  overrides: AttributionMap,
  options: AttributionFileOptions = {},
): Promise<boolean> {
  const { logger, legacyPath } = options;
  const today = todayIsoDay(options.now?.());
  try {
    const rows = [...overrides].map(([uploadId, override]) => [
      uploadId,
      override.authorId,
      override.authorDisplayName || override.authorId,
      override.overrideDate || today,
    ]);
    const body = stringify(rows, { header: true, columns: [...ATTRIBUTION_COLUMNS] });
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, `${FILE_HEADER.join('\n')}\n${body}`, 'utf8');

    if (legacyPath && path.resolve(legacyPath) !== path.resolve(filePath) && (await exists(legacyPath))) {
      await fs.writeFile(legacyPath, migrationNotice(filePath), 'utf8');
      logger?.(`Replaced ${legacyPath} with a migration notice`);
    }

    logger?.(`Saved ${overrides.size} attribution overrides to ${filePath}`);
    return true;
  } catch (error) {
    logger?.(`Error saving attributions: ${describeError(error)}`);
    return false;
  }
}

export function setAttribution(
  overrides: AttributionMap,
  uploadId: string,
  authorId: string,
  authorDisplayName?: string,
  overrideDate: string = todayIsoDay(),
): AttributionMap {
  const next = new Map(overrides);
  next.set(uploadId, { authorId, authorDisplayName: authorDisplayName || authorId, overrideDate });
  return next;
}

/** Replaces the author fields of every record whose upload has an override. */
export function applyAttributions(records: SampleRecord[], overrides: AttributionMap): SampleRecord[] {
  return records.map((record) => {
    const override = overrides.get(record.uploadId);
    if (!override) {
      return record;
    }
    return { ...record, authorId: override.authorId, authorDisplayName: override.authorDisplayName };
  });
}

async function pickSource(
  filePath: string,
  legacyPath: string | undefined,
): Promise<{ path: string; content: string } | undefined> {
  const content = await readIfPresent(filePath);
  if (content !== undefined) {
    return { path: filePath, content };
  }
  if (!legacyPath) {
    return undefined;
  }

  const legacy = await readIfPresent(legacyPath);
  if (legacy === undefined || legacy.startsWith(MIGRATION_MARKER)) {
    return undefined;
  }
  return { path: legacyPath, content: legacy };
}

// Only the comment block above the header; a quoted value may itself hold a line starting with '#'.
const LEADING_COMMENTS = /^\uFEFF?(?:[ \t]*#[^\r\n]*(?:\r?\n|$))*/;

function parseRows(content: string): CsvRow[] {
  const data = content.replace(LEADING_COMMENTS, '');
  const rows: unknown = parse(data, {
    columns: (header: string[]) => header.map((name) => name.trim()),
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!Array.isArray(rows)) {
    return [];
  }
  return rows.filter(isCsvRow);
}

function classifyTable(rows: CsvRow[]): AttributionTable {
  const [first] = rows;
  if (first && !('author_id' in first) && 'main_author' in first) {
    return { version: 'legacy', rows };
  }
  return { version: 'current', rows };
}

function normalizeTable(table: AttributionTable, today: string): AttributionMap {
  const overrides: AttributionMap = new Map();
  for (const row of table.rows) {
    const uploadId = row.upload_id;
    const authorId = table.version === 'current' ? row.author_id : row.main_author;
    if (!uploadId || !authorId) {
      continue;
    }
    const displayName = table.version === 'current' ? row.author_display_name : row.main_author_name;
    const override: AttributionOverride = {
      authorId,
      authorDisplayName: displayName || authorId,
      overrideDate: row.override_date || today,
    };
    overrides.set(uploadId, override);
  }
  return overrides;
}

function migrationNotice(currentPath: string): string {
  return `${MIGRATION_MARKER}\n# Attribution overrides moved to ${path.basename(currentPath)}.\n# This file is no longer read.\n`;
}

function isCsvRow(value: unknown): value is CsvRow {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((field) => field === undefined || typeof field === 'string')
  );
}

async function readIfPresent(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw error;
  }
}

async function exists(filePath: string): Promise<boolean> {
  return (await readIfPresent(filePath)) !== undefined;
}
