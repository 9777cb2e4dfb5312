/**
 * Tests for CsvRecordReader
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CsvRecordReader, normalizeHeader } from '../../lib/src/records/csv-reader.js';
import {
  RecordReadError,
  RecordReadErrorCode,
  isRecordReadError,
  previewRecords,
} from '../../lib/src/records/types.js';
import { Logger } from '../../lib/src/logging/logger.js';

const HEADER = 'source,hadith_no,chapter_no,chapter,chain_indx,text_ar,text_en';

describe('normalizeHeader', () => {
  it('should strip a leading byte-order mark', () => {
    expect(normalizeHeader('﻿source')).toBe('source');
  });

  it('should trim whitespace', () => {
    expect(normalizeHeader('  text_en ')).toBe('text_en');
  });

  it('should leave clean headers alone', () => {
    expect(normalizeHeader('hadith_no')).toBe('hadith_no');
  });
});

describe('CsvRecordReader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'csv-reader-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeCsv(name: string, content: string): Promise<string> {
    const filePath = path.join(dir, name);
    await writeFile(filePath, content, 'utf-8');
    return filePath;
  }

  it('should read one row per data line keyed by header', async () => {
    const filePath = await writeCsv(
      'hadiths.csv',
      [
        HEADER,
        'Sahih Bukhari,1,1,Revelation,30418,إنما الأعمال بالنيات,Actions are judged by intentions',
        'Sahih Muslim,2,3,Faith,20005,نص,Second text',
      ].join('\n')
    );

    const rows = await new CsvRecordReader().read(filePath);

    expect(rows).toHaveLength(2);
    expect(rows[0]).toEqual({
      source: 'Sahih Bukhari',
      hadith_no: '1',
      chapter_no: '1',
      chapter: 'Revelation',
      chain_indx: '30418',
      text_ar: 'إنما الأعمال بالنيات',
      text_en: 'Actions are judged by intentions',
    });
    expect(rows[1]?.source).toBe('Sahih Muslim');
  });

  it('should handle a BOM and padded header names', async () => {
    const filePath = await writeCsv('bom.csv', '﻿ source , hadith_no\nMuwatta,7\n');

    const rows = await new CsvRecordReader().read(filePath);

    expect(rows).toEqual([{ source: 'Muwatta', hadith_no: '7' }]);
  });

  it('should keep quoted commas and line breaks inside a cell', async () => {
    const filePath = await writeCsv(
      'quoted.csv',
      'source,text_en\n"Sunan Abu Dawud","He said, ""Pray""\nand left"\n'
    );

    const rows = await new CsvRecordReader().read(filePath);

    expect(rows).toEqual([{ source: 'Sunan Abu Dawud', text_en: 'He said, "Pray"\nand left' }]);
  });

  it('should return no rows for a header-only file', async () => {
    const filePath = await writeCsv('empty.csv', `${HEADER}\n`);

    await expect(new CsvRecordReader().read(filePath)).resolves.toEqual([]);
  });

  it('should honor a custom separator', async () => {
    const filePath = await writeCsv('semi.csv', 'source;hadith_no\nRiyad;12\n');

    const rows = await new CsvRecordReader({ separator: ';' }).read(filePath);

    expect(rows).toEqual([{ source: 'Riyad', hadith_no: '12' }]);
  });

  it('should log the number of rows loaded', async () => {
    const lines: string[] = [];
    const logger = new Logger({
      timestamps: false,
      output: (line) => {
        lines.push(line);
      },
    });
    const filePath = await writeCsv('log.csv', 'source\nA\nB\n');

    await new CsvRecordReader({ logger }).read(filePath);

    expect(lines).toEqual([`INFO  Loaded 2 rows from ${filePath}`]);
  });

  it('should raise FILE_NOT_FOUND for a missing file', async () => {
    const missing = path.join(dir, 'missing.csv');

    const error = await new CsvRecordReader().read(missing).catch((e: unknown) => e);

    expect(isRecordReadError(error)).toBe(true);
    expect(error).toBeInstanceOf(RecordReadError);
    if (error instanceof RecordReadError) {
      expect(error.code).toBe(RecordReadErrorCode.FILE_NOT_FOUND);
      expect(error.source).toBe(missing);
    }
  });
});

describe('previewRecords', () => {
  it('should return the row count, columns and first rows', () => {
    const rows = [
      { source: 'A', hadith_no: '1' },
      { source: 'B', text_en: 'x' },
      { source: 'C' },
      { source: 'D' },
    ];

    const preview = previewRecords(rows, 2);

    expect(preview.rowCount).toBe(4);
    expect(preview.columns).toEqual(['source', 'hadith_no', 'text_en']);
    expect(preview.rows).toEqual([rows[0], rows[1]]);
  });

  it('should default to three rows', () => {
    const rows = [{ source: 'A' }, { source: 'B' }, { source: 'C' }, { source: 'D' }];

    expect(previewRecords(rows).rows).toHaveLength(3);
  });
});
