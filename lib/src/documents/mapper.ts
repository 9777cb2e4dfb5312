/**
 * Document Mapper
 *
 * Turns CSV rows into frozen documents. Blank or missing columns fall back to
 * METADATA_DEFAULTS; rows that are not string-keyed records are rejected.
 */

import { type Logger, createSilentLogger } from '../logging/index.js';
import { HadithRowSchema } from '../records/index.js';
import {
  type HadithDocument,
  type HadithMetadata,
  type MappingResult,
  ARABIC_CONTENT_LABEL,
  ENGLISH_CONTENT_LABEL,
  METADATA_DEFAULTS,
  DocumentMappingError,
} from './types.js';

function text(value: string | undefined, fallback: string): string {
  if (value === undefined || value.trim() === '') return fallback;
  return value;
}

function numeric(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Arabic text first, then English, each under its label.
 */
export function buildPageContent(arabic: string, english: string): string {
  return `${ARABIC_CONTENT_LABEL}\n${arabic}\n\n${ENGLISH_CONTENT_LABEL}\n${english}`;
}

/**
 * Map one row to a document.
 *
 * @throws {DocumentMappingError} If the row is not a record of string cells
 */
export function mapRowToDocument(row: unknown, rowIndex?: number): HadithDocument {
  const parsed = HadithRowSchema.safeParse(row);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new DocumentMappingError(`Malformed row: ${issues.join('; ')}`, {
      rowIndex,
      issues,
    });
  }

  const cells = parsed.data;
  const metadata: HadithMetadata = {
    source: text(cells.source, METADATA_DEFAULTS.source),
    hadith_number: numeric(cells.hadith_no, METADATA_DEFAULTS.hadith_number),
    chapter_number: numeric(cells.chapter_no, METADATA_DEFAULTS.chapter_number),
    chapter: text(cells.chapter, METADATA_DEFAULTS.chapter),
    chain_index: text(cells.chain_indx, METADATA_DEFAULTS.chain_index),
  };

  return Object.freeze({
    pageContent: buildPageContent(text(cells.text_ar, ''), text(cells.text_en, '')),
    metadata: Object.freeze(metadata),
  });
}

/**
 * Map every row, skipping (and logging) rows that cannot be mapped.
 */
export function mapRows(rows: readonly unknown[], logger: Logger = createSilentLogger()): MappingResult {
  const result: MappingResult = { documents: [], skipped: [] };

  rows.forEach((row, index) => {
    try {
      result.documents.push(mapRowToDocument(row, index));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error(`Error creating document from row ${index}`, { reason });
      result.skipped.push({ index, reason });
    }
  });

  logger.info(`Created ${result.documents.length} documents from ${rows.length} rows`, {
    skipped: result.skipped.length,
  });

  return result;
}
