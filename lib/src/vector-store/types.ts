/**
 * Vector Store Types
 *
 * Seams between the insertion pipeline and the datastore, plus the store
 * error taxonomy.
 */

import { z } from 'zod';

import type { HadithDocument } from '../documents/index.js';

// =============================================================================
// Store Interfaces
// =============================================================================

/**
 * Embeds and persists a batch of documents in one call. The only capability
 * the insertion pipeline needs.
 *
 * @returns Ids assigned to the stored documents, in input order
 */
export interface DocumentSink {
  addDocuments(documents: readonly HadithDocument[]): Promise<string[]>;
}

export interface ScoredDocument {
  document: HadithDocument;
  /** Cosine similarity, higher is closer */
  score: number;
}

export interface VectorStore extends DocumentSink {
  readonly collectionName: string;

  similaritySearch(query: string, k: number): Promise<ScoredDocument[]>;

  /**
   * Drop the collection and everything stored in it
   */
  deleteCollection(): Promise<void>;

  /**
   * Release connections held by the store
   */
  close(): Promise<void>;
}

export const VectorStoreBackend = {
  PGVECTOR: 'pgvector',
  QDRANT: 'qdrant',
} as const;

export type VectorStoreBackend =
  (typeof VectorStoreBackend)[keyof typeof VectorStoreBackend];

export const VectorStoreBackendSchema = z.enum(['pgvector', 'qdrant']);

// =============================================================================
// Vector Store Error Types
// =============================================================================

export const VectorStoreErrorCode = {
  /** Store unreachable or rejected the connection */
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  INSERT_FAILED: 'INSERT_FAILED',
  SEARCH_FAILED: 'SEARCH_FAILED',
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  UNKNOWN: 'UNKNOWN',
} as const;

export type VectorStoreErrorCode =
  (typeof VectorStoreErrorCode)[keyof typeof VectorStoreErrorCode];

export class VectorStoreError extends Error {
  readonly code: VectorStoreErrorCode;
  override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: VectorStoreErrorCode,
    options?: { cause?: Error }
  ) {
    super(message);
    this.name = 'VectorStoreError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, VectorStoreError);
    }
  }

  /**
   * Wrap an unknown error, keeping its message. Existing VectorStoreErrors
   * pass through unchanged.
   */
  static fromError(error: unknown, code?: VectorStoreErrorCode): VectorStoreError {
    if (error instanceof VectorStoreError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;

    return new VectorStoreError(message, code ?? VectorStoreErrorCode.UNKNOWN, cause ? { cause } : undefined);
  }
}

export function isVectorStoreError(error: unknown): error is VectorStoreError {
  return error instanceof VectorStoreError;
}

export function isConnectionError(error: unknown): boolean {
  return isVectorStoreError(error) && error.code === VectorStoreErrorCode.CONNECTION_ERROR;
}

// =============================================================================
// Stored Payload
// =============================================================================

/**
 * Shape of a document as stored next to its vector (pgvector row or Qdrant
 * payload). Parsed on the way out of the store.
 */
export const StoredDocumentSchema = z.object({
  page_content: z.string(),
  metadata: z.object({
    source: z.string().default('Unknown'),
    hadith_number: z.number().default(0),
    chapter_number: z.number().default(0),
    chapter: z.string().default(''),
    chain_index: z.string().default(''),
  }),
});

export type StoredDocument = z.infer<typeof StoredDocumentSchema>;

export function toStoredDocument(document: HadithDocument): StoredDocument {
  return {
    page_content: document.pageContent,
    metadata: { ...document.metadata },
  };
}

export function fromStoredDocument(stored: unknown): HadithDocument {
  const parsed = StoredDocumentSchema.parse(stored);
  return { pageContent: parsed.page_content, metadata: parsed.metadata };
}
