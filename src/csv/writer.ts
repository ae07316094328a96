import { createWriteStream, WriteStream } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { finished } from 'node:stream/promises';
import { stringify } from 'csv-stringify/sync';
import type { SampleRecord } from '../types/index.js';

export interface SampleCsvRow {
  upload_id: string;
  upload_name: string;
  sample_name: string;
  lab_id: string;
  upload_date: string;
  author_id: string;
  author_display_name: string;
  coauthors: string;
  published: boolean;
  license: string;
  cell_area: number;
  efficiency: number;
}

const HEADER: readonly (keyof SampleCsvRow)[] = [
  'upload_id',
  'upload_name',
  'sample_name',
  'lab_id',
  'upload_date',
  'author_id',
  'author_display_name',
  'coauthors',
  'published',
  'license',
  'cell_area',
  'efficiency',
];

export class CsvStreamWriter {
  private written = 0;

  private constructor(private readonly destination: string, private readonly stream: WriteStream) {}

  static async create(destination: string): Promise<CsvStreamWriter> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    const stream = createWriteStream(destination, { encoding: 'utf8' });
    stream.write(stringify([HEADER]));
    return new CsvStreamWriter(destination, stream);
  }

  async writeRow(row: SampleCsvRow): Promise<void> {
    const line = stringify([HEADER.map((key) => row[key])], { cast: { boolean: (value) => String(value) } });
    this.written += 1;
    if (!this.stream.write(line)) {
      await onceDrain(this.stream);
    }
  }

  async close(): Promise<void> {
    this.stream.end();
    await finished(this.stream);
  }

  get path(): string {
    return this.destination;
  }

  get rowCount(): number {
    return this.written;
  }
}

export function sampleToRow(record: SampleRecord): SampleCsvRow {
  return {
    upload_id: record.uploadId,
    upload_name: record.uploadName,
    sample_name: record.sampleName,
    lab_id: record.labId,
    upload_date: record.uploadDate,
    author_id: record.authorId,
    author_display_name: record.authorDisplayName,
    coauthors: record.coauthors.join(';'),
    published: record.published,
    license: record.license,
    cell_area: record.cellArea,
    efficiency: record.efficiency,
  } satisfies SampleCsvRow;
}

async function onceDrain(stream: WriteStream): Promise<void> {
  await new Promise<void>((resolve) => stream.once('drain', resolve));
}
