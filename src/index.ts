#!/usr/bin/env node
import path from 'node:path';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { buildAuthorNameMap } from './aggregation/authors.js';
import { SampleAggregator } from './aggregation/sampleAggregator.js';
import { applyAttributions, loadAttributions, saveAttributions, setAttribution } from './attributions/store.js';
import { resolveSession } from './auth/token.js';
import { RESOURCE_KINDS } from './cache/cache.js';
import { FileCache } from './cache/fileCache.js';
import { NomadClient } from './clients/nomad.js';
import { querySampleEntries } from './clients/queries.js';
import { rawEntrySchema } from './clients/schemas.js';
import { ATTRIBUTION_FILE, DEFAULT_MAX_RECORDS, DEFAULT_SAMPLE_SECTION, LEGACY_ATTRIBUTION_FILE, resolveBaseUrl } from './config/defaults.js';
import { loadEnvConfig, type IEnvConfig } from './config/env.js';
import { CsvStreamWriter, sampleToRow } from './csv/writer.js';
import { describeError, NomadError } from './errors.js';
import type { ResourceKind } from './types/index.js';
import { createLogger } from './utils/logger.js';
import { parseJsonObject, parsePositiveInteger } from './utils/options.js';

dotenv.config();

interface ConnectionOptions {
  url?: string;
  oasis?: string;
  cacheDir?: string;
  cache: boolean;
}

interface RetrievalOptions extends ConnectionOptions {
  maxRecords: number;
  all?: boolean;
  section: string;
}

interface SamplesCommandOptions extends RetrievalOptions {
  output?: string;
  attributions: string;
}

interface QueryCommandOptions extends ConnectionOptions {
  filter: Record<string, unknown>;
  section: string;
  owner: string;
  page: number;
}

interface AttributeCommandOptions {
  name?: string;
  attributions: string;
}

const program = new Command();
program
  .name('nomad-samples')
  .description('Query a NOMAD oasis, aggregate samples with their authors, and manage attribution overrides.');

configureConnectionOptions(program.command('whoami').description('Verify credentials and print the current user.')).action(
  async (options: ConnectionOptions) => {
    const { session } = await connect(options);
    console.log(JSON.stringify(session.user, null, 2));
  },
);

configureRetrievalOptions(
  program.command('samples').description('Fetch samples with their upload and author details and export them to CSV.'),
)
  .option('--output <path>', 'CSV file to write (default output/<timestamp>_samples.csv).')
  .option('--attributions <path>', 'Attribution override file applied before export.', ATTRIBUTION_FILE)
  .action(async (options: SamplesCommandOptions) => {
    await handleSamples(options);
  });

configureRetrievalOptions(
  program.command('authors').description('List every main author and co-author of the retrieved samples.'),
).action(async (options: RetrievalOptions) => {
  const { config, client } = await connect(options);
  const cache = createCache(config, options.cacheDir, options.cache);
  const aggregator = new SampleAggregator(client, cache, { sectionType: options.section, logger: createLogger('samples') });
  const result = await aggregator.fetchSamples({ maxRecords: options.all ? undefined : options.maxRecords });
  const names = await buildAuthorNameMap(client, result.records, { cache, logger: createLogger('authors') });
  for (const [authorId, name] of names) {
    console.log(`${authorId}\t${name}`);
  }
});

configureConnectionOptions(
  program.command('query').description('Run one page of a sample query with additional filter conditions.'),
)
  .option('--filter <json>', 'Extra conditions as a JSON object, e.g. {"upload_id": "..."}.', (value) => parseJsonObject(value, 'filter'), {})
  .option('--section <name>', 'ELN section type that marks a sample entry.', DEFAULT_SAMPLE_SECTION)
  .option('--owner <scope>', 'Owner scope: visible or admin.', 'visible')
  .option('--page <number>', 'Page to fetch.', (value) => parsePositiveInteger(value, 'page'), 1)
  .action(async (options: QueryCommandOptions) => {
    if (options.owner !== 'visible' && options.owner !== 'admin') {
      throw new Error(`Unknown owner scope "${options.owner}". Expected visible or admin.`);
    }
    const { client } = await connect(options);
    const page = await querySampleEntries(client, options.filter, {
      sectionType: options.section,
      owner: options.owner,
      page: options.page,
    });
    console.log(`${page.total} matching entries`);
    for (const raw of page.data) {
      const entry = rawEntrySchema.safeParse(raw);
      if (entry.success) {
        console.log(`${entry.data.entry_id ?? ''}\t${entry.data.upload_id ?? ''}\t${entry.data.data?.lab_id ?? ''}`);
      }
    }
  });

configureConnectionOptions(program.command('groups').description('List the groups visible to the current user.')).action(
  async (options: ConnectionOptions) => {
    const { client } = await connect(options);
    const groups = await client.getGroups();
    for (const group of groups) {
      console.log(`${group.group_id}\t${group.group_name ?? ''}\t${(group.members ?? []).length} members`);
    }
  },
);

program
  .command('cache-stats')
  .description('Show entry counts, sizes and ages per cached resource kind.')
  .option('--cache-dir <path>', 'Cache directory (default NOMAD_CACHE_DIR or .cache).')
  .action(async (options: { cacheDir?: string }) => {
    const cache = createCache(loadEnvConfig(), options.cacheDir, true);
    const stats = await cache.stats();
    for (const kind of RESOURCE_KINDS) {
      const { count, totalSize, oldest, newest } = stats[kind];
      console.log(`${kind}: ${count} entries, ${totalSize} bytes, oldest ${oldest ?? '-'}, newest ${newest ?? '-'}`);
    }
  });

program
  .command('cache-clear [kind]')
  .description('Remove cached entries for one resource kind (entries, users, uploads) or all of them.')
  .option('--cache-dir <path>', 'Cache directory (default NOMAD_CACHE_DIR or .cache).')
  .action(async (kind: string | undefined, options: { cacheDir?: string }) => {
    if (kind !== undefined && !isResourceKind(kind)) {
      throw new Error(`Unknown resource kind "${kind}". Expected one of: ${RESOURCE_KINDS.join(', ')}.`);
    }
    const cache = createCache(loadEnvConfig(), options.cacheDir, true);
    await cache.clear(kind);
    console.log(`Cleared ${kind ?? 'all'} cache entries.`);
  });

program
  .command('attribute <uploadId> <authorId>')
  .description('Record a manual author attribution for an upload.')
  .option('--name <displayName>', 'Display name for the author (defaults to the author id).')
  .option('--attributions <path>', 'Attribution override file.', ATTRIBUTION_FILE)
  .action(async (uploadId: string, authorId: string, options: AttributeCommandOptions) => {
    const logger = createLogger('attributions');
    const fileOptions = { legacyPath: LEGACY_ATTRIBUTION_FILE, logger };
    const current = await loadAttributions(options.attributions, fileOptions);
    const next = setAttribution(current, uploadId, authorId, options.name);
    if (!(await saveAttributions(options.attributions, next, fileOptions))) {
      process.exitCode = 1;
    }
  });

program
  .command('attributions')
  .description('List the recorded attribution overrides.')
  .option('--attributions <path>', 'Attribution override file.', ATTRIBUTION_FILE)
  .action(async (options: { attributions: string }) => {
    const overrides = await loadAttributions(options.attributions, {
      legacyPath: LEGACY_ATTRIBUTION_FILE,
      logger: createLogger('attributions'),
    });
    for (const [uploadId, override] of overrides) {
      console.log(`${uploadId}\t${override.authorId}\t${override.authorDisplayName}\t${override.overrideDate}`);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof NomadError ? JSON.stringify(error, null, 2) : describeError(error));
  process.exitCode = 1;
});

function configureConnectionOptions(command: Command): Command {
  return command
    .option('--url <url>', 'API base URL (overrides NOMAD_URL and --oasis).')
    .option('--oasis <name>', 'Named oasis: "SE Oasis", "CE Oasis" or "Sol-AI Oasis".')
    .option('--cache-dir <path>', 'Cache directory (default NOMAD_CACHE_DIR or .cache).')
    .option('--no-cache', 'Bypass the local cache for this run.');
}

function configureRetrievalOptions(command: Command): Command {
  return configureConnectionOptions(command)
    .option(
      '--max-records <number>',
      'Maximum number of samples to retrieve.',
      (value) => parsePositiveInteger(value, 'max-records'),
      DEFAULT_MAX_RECORDS,
    )
    .option('--all', 'Retrieve every available sample.')
    .option('--section <name>', 'ELN section type that marks a sample entry.', DEFAULT_SAMPLE_SECTION);
}

async function connect(options: ConnectionOptions) {
  const env = loadEnvConfig();
  const config: IEnvConfig = {
    ...env,
    baseUrl: options.url || options.oasis ? resolveBaseUrl(options.url, options.oasis) : env.baseUrl,
  };
  const session = await resolveSession(config);
  const client = new NomadClient({
    baseUrl: session.baseUrl,
    token: session.token,
    timeoutMs: config.requestTimeoutMs,
    logger: createLogger('nomad'),
  });
  return { config, session, client };
}

async function handleSamples(options: SamplesCommandOptions) {
  const { config, session, client } = await connect(options);
  console.log(`Authenticated as ${session.user.name ?? session.user.username ?? 'unknown user'} at ${session.baseUrl}`);

  const maxRecords = options.all ? undefined : options.maxRecords;
  const cache = createCache(config, options.cacheDir, options.cache);
  const aggregator = new SampleAggregator(client, cache, {
    sectionType: options.section,
    logger: createLogger('samples'),
  });

  const result = await aggregator.fetchSamples({ maxRecords });
  const overrides = await loadAttributions(options.attributions, {
    legacyPath: LEGACY_ATTRIBUTION_FILE,
    logger: createLogger('attributions'),
  });
  const records = applyAttributions(result.records, overrides);
  if (records.length === 0) {
    console.log('No matching samples found.');
    return;
  }

  const isoStamp = new Date().toISOString().replace(/[:]/g, '-');
  const outputPath = path.resolve(options.output ?? path.join('output', `${isoStamp}_samples.csv`));
  const writer = await CsvStreamWriter.create(outputPath);
  for (const record of records) {
    await writer.writeRow(sampleToRow(record));
  }
  await writer.close();

  const source = result.fromCache ? 'cache' : `${result.pagesFetched} pages, owner "${result.scope}"`;
  console.log(`Wrote ${writer.rowCount} rows to ${writer.path} (${source}; ${result.skipped.length} skipped).`);
}

function createCache(config: IEnvConfig, cacheDir: string | undefined, enabled: boolean): FileCache {
  return new FileCache({
    baseDir: path.resolve(cacheDir ?? config.cache.dir),
    enabled: enabled && config.cache.enabled,
    logger: createLogger('cache'),
  });
}

function isResourceKind(value: string): value is ResourceKind {
  return RESOURCE_KINDS.some((kind) => kind === value);
}
