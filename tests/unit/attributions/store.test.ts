// Tests for the attribution override file

import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  applyAttributions,
  loadAttributions,
  saveAttributions,
  setAttribution,
} from '../../../src/attributions/store.js';
import type { AttributionMap, SampleRecord } from '../../../src/types/index.js';

const NOW = () => Date.parse('2024-06-01T12:00:00.000Z');

function record(uploadId: string): SampleRecord {
  return {
    uploadId,
    uploadName: 'Upload',
    sampleName: 'S1',
    labId: 'LAB_1',
    uploadDate: '2024-01-02',
    authorId: 'original-author',
    authorDisplayName: 'Original Author',
    coauthors: [],
    coauthorGroups: [],
    published: false,
    license: '',
    cellArea: 0.1,
    efficiency: 12,
  };
}

describe('attribution store', () => {
  let dir: string;
  let currentPath: string;
  let legacyPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'nomad-attr-'));
    currentPath = path.join(dir, 'attribution_overrides.csv');
    legacyPath = path.join(dir, 'legacy.csv');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('loadAttributions', () => {
    it('should return an empty map when no file exists', async () => {
      const overrides = await loadAttributions(currentPath, { legacyPath });

      expect(overrides.size).toBe(0);
    });

    it('should skip comment lines and rows without an author', async () => {
      await fs.writeFile(
        currentPath,
        [
          '# note',
          'upload_id,author_id,author_display_name,override_date',
          'up-1,author-1,Ada Lovelace,2024-02-03',
          'up-2,,Nobody,2024-02-03',
          '',
        ].join('\n'),
        'utf8',
      );

      const overrides = await loadAttributions(currentPath);

      expect([...overrides]).toEqual([
        ['up-1', { authorId: 'author-1', authorDisplayName: 'Ada Lovelace', overrideDate: '2024-02-03' }],
      ]);
    });

    it('should default the display name to the author id and the date to today', async () => {
      await fs.writeFile(currentPath, 'upload_id,author_id,author_display_name,override_date\nup-1,author-1,,\n', 'utf8');

      const overrides = await loadAttributions(currentPath, { now: NOW });

      expect(overrides.get('up-1')).toEqual({ authorId: 'author-1', authorDisplayName: 'author-1', overrideDate: '2024-06-01' });
    });

    it('should read the legacy column names when only the legacy file exists', async () => {
      await fs.writeFile(legacyPath, 'upload_id,main_author,main_author_name\nup-9,author-9,Grace Hopper\n', 'utf8');

      const overrides = await loadAttributions(currentPath, { legacyPath, now: NOW });

      expect(overrides.get('up-9')).toEqual({
        authorId: 'author-9',
        authorDisplayName: 'Grace Hopper',
        overrideDate: '2024-06-01',
      });
    });

    it('should prefer the current file over the legacy one', async () => {
      await fs.writeFile(currentPath, 'upload_id,author_id,author_display_name,override_date\nup-1,a,A,2024-01-01\n', 'utf8');
      await fs.writeFile(legacyPath, 'upload_id,main_author,main_author_name\nup-2,b,B\n', 'utf8');

      const overrides = await loadAttributions(currentPath, { legacyPath });

      expect([...overrides.keys()]).toEqual(['up-1']);
    });

    it('should log and return an empty map when the file cannot be read', async () => {
      const lines: string[] = [];
      await fs.mkdir(currentPath);

      const overrides = await loadAttributions(currentPath, { logger: (line) => lines.push(line) });

      expect(overrides.size).toBe(0);
      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatch(/^Error loading attributions: /);
    });
  });

  describe('saveAttributions', () => {
    it('should write the comment header and one row per override', async () => {
      const overrides: AttributionMap = new Map([
        ['up-1', { authorId: 'author-1', authorDisplayName: 'Doe, Jane', overrideDate: '2024-02-03' }],
      ]);

      expect(await saveAttributions(currentPath, overrides)).toBe(true);

      expect(await fs.readFile(currentPath, 'utf8')).toBe(
        [
          '# Manual author attribution overrides, keyed by upload id.',
          '# These replace the author recorded in the repository wherever the upload is shown.',
          'upload_id,author_id,author_display_name,override_date',
          'up-1,author-1,"Doe, Jane",2024-02-03',
          '',
        ].join('\n'),
      );
    });

    it('should read back what it wrote', async () => {
      const overrides: AttributionMap = new Map([
        ['up-1', { authorId: 'author-1', authorDisplayName: 'Doe, Jane', overrideDate: '2024-02-03' }],
        ['up-2', { authorId: 'author-2', authorDisplayName: 'Ada', overrideDate: '2024-02-04' }],
      ]);

      await saveAttributions(currentPath, overrides);

      expect(await loadAttributions(currentPath)).toEqual(overrides);
    });

    it('should round-trip display names holding line breaks, comment markers and padding', async () => {
      const overrides: AttributionMap = new Map([
        ['up-0', { authorId: 'author-0', authorDisplayName: 'Plain', overrideDate: '2024-02-03' }],
        ['up-1', { authorId: 'author-1', authorDisplayName: 'Team\n#2', overrideDate: '2024-02-03' }],
        ['up-2', { authorId: 'author-2', authorDisplayName: ' Ada ', overrideDate: '2024-02-03' }],
        ['up-3', { authorId: 'author-3', authorDisplayName: 'Say "hi", #3', overrideDate: '2024-02-03' }],
      ]);

      await saveAttributions(currentPath, overrides);

      expect(await loadAttributions(currentPath)).toEqual(overrides);
    });

    it('should replace the legacy file with a migration notice that is no longer read', async () => {
      await fs.writeFile(legacyPath, 'upload_id,main_author,main_author_name\nup-9,author-9,Grace Hopper\n', 'utf8');
      const migrated = await loadAttributions(currentPath, { legacyPath, now: NOW });

      await saveAttributions(currentPath, migrated, { legacyPath });
      await fs.rm(currentPath);

      expect(await fs.readFile(legacyPath, 'utf8')).toBe(
        '# MIGRATED\n# Attribution overrides moved to attribution_overrides.csv.\n# This file is no longer read.\n',
      );
      expect((await loadAttributions(currentPath, { legacyPath })).size).toBe(0);
    });

    it('should not create a legacy file that did not exist', async () => {
      const overrides: AttributionMap = new Map([
        ['up-1', { authorId: 'a', authorDisplayName: 'A', overrideDate: '2024-01-01' }],
      ]);

      await saveAttributions(currentPath, overrides, { legacyPath });

      await expect(fs.access(legacyPath)).rejects.toThrow();
    });

    it('should report failure when the file cannot be written', async () => {
      const lines: string[] = [];
      await fs.mkdir(currentPath);
      const overrides: AttributionMap = new Map([
        ['up-1', { authorId: 'a', authorDisplayName: 'A', overrideDate: '2024-01-01' }],
      ]);

      expect(await saveAttributions(currentPath, overrides, { logger: (line) => lines.push(line) })).toBe(false);
      expect(lines[0]).toMatch(/^Error saving attributions: /);
    });
  });

  describe('setAttribution', () => {
    it('should return a new map with the override added', () => {
      const original: AttributionMap = new Map();

      const next = setAttribution(original, 'up-1', 'author-1', 'Ada', '2024-03-04');

      expect(original.size).toBe(0);
      expect(next.get('up-1')).toEqual({ authorId: 'author-1', authorDisplayName: 'Ada', overrideDate: '2024-03-04' });
    });

    it('should use the author id when no display name is given', () => {
      const next = setAttribution(new Map(), 'up-1', 'author-1', undefined, '2024-03-04');

      expect(next.get('up-1')?.authorDisplayName).toBe('author-1');
    });
  });

  describe('applyAttributions', () => {
    it('should replace the author of overridden uploads only', () => {
      const overrides: AttributionMap = new Map([
        ['up-2', { authorId: 'author-x', authorDisplayName: 'Xavier', overrideDate: '2024-01-01' }],
      ]);

      const result = applyAttributions([record('up-1'), record('up-2')], overrides);

      expect(result[0]).toEqual(record('up-1'));
      expect(result[1]).toEqual({ ...record('up-2'), authorId: 'author-x', authorDisplayName: 'Xavier' });
    });
  });
});
