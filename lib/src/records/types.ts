/**
 * Record Types
 *
 * Raw rows as they come out of the hadith CSV export, plus the reader seam.
 */

import { z } from 'zod';

const cell = z.string().optional();

/**
 * A row keyed by column name. Every known column is optional; unknown columns
 * are kept but ignored.
 */
export const HadithRowSchema = z
  .object({
    source: cell,
    hadith_no: cell,
    chapter_no: cell,
    chapter: cell,
    chain_indx: cell,
    text_ar: cell,
    text_en: cell,
  })
  .passthrough();

export type HadithRow = z.infer<typeof HadithRowSchema>;

/**
 * Loads rows from a source (a file path for the CSV reader).
 */
export interface RecordReader {
  read(source: string): Promise<HadithRow[]>;
}

export const RecordReadErrorCode = {
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  PARSE_ERROR: 'PARSE_ERROR',
  UNKNOWN: 'UNKNOWN',
} as const;

export type RecordReadErrorCode =
  (typeof RecordReadErrorCode)[keyof typeof RecordReadErrorCode];

export class RecordReadError extends Error {
  readonly code: RecordReadErrorCode;
  readonly source: string;
  override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: RecordReadErrorCode,
    source: string,
    options?: { cause?: Error }
  ) {
    super(message);
    this.name = 'RecordReadError';
    this.code = code;
    this.source = source;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RecordReadError);
    }
  }
}

export function isRecordReadError(error: unknown): error is RecordReadError {
  return error instanceof RecordReadError;
}

/**
 * Column names and the first rows of a read, for diagnostics.
 */
export interface RecordPreview {
  rowCount: number;
  columns: string[];
  rows: HadithRow[];
}

export function previewRecords(rows: readonly HadithRow[], count = 3): RecordPreview {
  const columns = new Set<string>();
  for (const row of rows.slice(0, count)) {
    for (const key of Object.keys(row)) {
      columns.add(key);
    }
  }

  return {
    rowCount: rows.length,
    columns: [...columns],
    rows: rows.slice(0, count),
  };
}
