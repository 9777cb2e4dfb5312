/**
 * CSV Record Reader
 *
 * Streams a UTF-8 CSV file through csv-parser and collects the rows.
 */

import { constants as fsConstants, createReadStream } from 'node:fs';
import { access } from 'node:fs/promises';

import csv from 'csv-parser';

import { type Logger, createSilentLogger } from '../logging/index.js';
import {
  type HadithRow,
  type RecordReader,
  HadithRowSchema,
  RecordReadError,
  RecordReadErrorCode,
} from './types.js';

export interface CsvRecordReaderOptions {
  /** Field separator, `,` unless the export says otherwise */
  separator?: string;
  logger?: Logger;
}

/**
 * Header names lose a leading byte-order mark and surrounding whitespace.
 */
export function normalizeHeader(header: string): string {
  return header.replace(/^\uFEFF/, '').trim();
}

export class CsvRecordReader implements RecordReader {
  private readonly separator: string;
  private readonly logger: Logger;

  constructor(options: CsvRecordReaderOptions = {}) {
    this.separator = options.separator ?? ',';
    this.logger = options.logger ?? createSilentLogger();
  }

  async read(filePath: string): Promise<HadithRow[]> {
    try {
      await access(filePath, fsConstants.R_OK);
    } catch (error) {
      throw new RecordReadError(
        `CSV file not found or not readable: ${filePath}`,
        RecordReadErrorCode.FILE_NOT_FOUND,
        filePath,
        error instanceof Error ? { cause: error } : undefined
      );
    }

    const rows = await this.parse(filePath);
    this.logger.info(`Loaded ${rows.length} rows from ${filePath}`);
    return rows;
  }

  private parse(filePath: string): Promise<HadithRow[]> {
    return new Promise((resolve, reject) => {
      const rows: HadithRow[] = [];
      let lineIndex = 0;

      const fail = (error: Error): void => {
        reject(
          new RecordReadError(
            `Error reading CSV file ${filePath}: ${error.message}`,
            RecordReadErrorCode.PARSE_ERROR,
            filePath,
            { cause: error }
          )
        );
      };

      createReadStream(filePath, { encoding: 'utf8' })
        .on('error', fail)
        .pipe(
          csv({
            separator: this.separator,
            mapHeaders: ({ header }) => normalizeHeader(header),
          })
        )
        .on('data', (row: unknown) => {
          const parsed = HadithRowSchema.safeParse(row);
          if (parsed.success) {
            rows.push(parsed.data);
          } else {
            this.logger.warn(`Skipping unreadable CSV row ${lineIndex}`, {
              issues: parsed.error.issues.map((issue) => issue.message),
            });
          }
          lineIndex++;
        })
        .on('end', () => resolve(rows))
        .on('error', fail);
    });
  }
}
