/**
 * Document Types
 *
 * A document is the unit handed to the vector store: embeddable content plus
 * the metadata kept alongside the vector.
 */

import { z } from 'zod';

export const HadithMetadataSchema = z.object({
  source: z.string(),
  hadith_number: z.number(),
  chapter_number: z.number(),
  chapter: z.string(),
  chain_index: z.string(),
});

export type HadithMetadata = z.infer<typeof HadithMetadataSchema>;

export interface HadithDocument {
  readonly pageContent: string;
  readonly metadata: Readonly<HadithMetadata>;
}

/**
 * Sentinels used for columns that are absent or blank.
 */
export const METADATA_DEFAULTS: Readonly<HadithMetadata> = Object.freeze({
  source: 'Unknown',
  hadith_number: 0,
  chapter_number: 0,
  chapter: '',
  chain_index: '',
});

export const ARABIC_CONTENT_LABEL = 'الحديث باللغة العربية:';
export const ENGLISH_CONTENT_LABEL = 'hadith in english:';

export class DocumentMappingError extends Error {
  /** Position of the row in its input, when known */
  readonly rowIndex: number | undefined;
  readonly issues: string[];

  constructor(message: string, options?: { rowIndex?: number; issues?: string[] }) {
    super(message);
    this.name = 'DocumentMappingError';
    this.rowIndex = options?.rowIndex;
    this.issues = options?.issues ?? [];

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DocumentMappingError);
    }
  }
}

export function isDocumentMappingError(error: unknown): error is DocumentMappingError {
  return error instanceof DocumentMappingError;
}

export interface SkippedRow {
  index: number;
  reason: string;
}

export interface MappingResult {
  documents: HadithDocument[];
  skipped: SkippedRow[];
}
