/**
 * Embedding Types and Schemas
 *
 * Provider seam and error taxonomy for turning document text into vectors.
 */

import { z } from 'zod';

// =============================================================================
// Provider Interface
// =============================================================================

/**
 * Produces fixed-dimension vectors for text. Vector stores call it for every
 * batch they persist and for every search query.
 */
export interface EmbeddingProvider {
  readonly model: string;

  /**
   * One vector per input text, in input order.
   */
  embedDocuments(texts: readonly string[]): Promise<number[][]>;

  embedQuery(text: string): Promise<number[]>;
}

// =============================================================================
// Gemini Configuration
// =============================================================================

export const DEFAULT_GEMINI_EMBEDDING_MODEL = 'gemini-embedding-001';

export const GeminiEmbeddingTaskType = {
  DOCUMENT: 'RETRIEVAL_DOCUMENT',
  QUERY: 'RETRIEVAL_QUERY',
} as const;

export type GeminiEmbeddingTaskType =
  (typeof GeminiEmbeddingTaskType)[keyof typeof GeminiEmbeddingTaskType];

export const GeminiEmbedderConfigSchema = z.object({
  apiKey: z.string().min(1, 'GOOGLE_API_KEY is required'),

  /**
   * @default 'gemini-embedding-001'
   */
  model: z.string().min(1).default(DEFAULT_GEMINI_EMBEDDING_MODEL),

  /**
   * Truncate vectors to this many dimensions (model default when unset)
   */
  outputDimensionality: z.number().int().positive().optional(),

  /**
   * Texts per embedContent request; larger inputs are split
   * @default 100
   */
  maxTextsPerRequest: z.number().int().positive().max(100).default(100),
});

export type GeminiEmbedderConfig = z.infer<typeof GeminiEmbedderConfigSchema>;
export type GeminiEmbedderOptions = z.input<typeof GeminiEmbedderConfigSchema>;

// =============================================================================
// Embedding Errors
// =============================================================================

export const EmbeddingErrorCode = {
  /** Nothing to embed */
  EMPTY_INPUT: 'EMPTY_INPUT',
  /** The provider rejected or failed the request */
  API_ERROR: 'API_ERROR',
  /** The provider answered with missing or miscounted vectors */
  INVALID_RESPONSE: 'INVALID_RESPONSE',
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  UNKNOWN: 'UNKNOWN',
} as const;

export type EmbeddingErrorCode =
  (typeof EmbeddingErrorCode)[keyof typeof EmbeddingErrorCode];

export const EmbeddingErrorCodeSchema = z.enum([
  'EMPTY_INPUT',
  'API_ERROR',
  'INVALID_RESPONSE',
  'DIMENSION_MISMATCH',
  'UNKNOWN',
]);

export class EmbeddingError extends Error {
  readonly code: EmbeddingErrorCode;
  override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: EmbeddingErrorCode,
    options?: { cause?: Error }
  ) {
    super(message);
    this.name = 'EmbeddingError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EmbeddingError);
    }
  }

  static fromError(error: unknown, code?: EmbeddingErrorCode): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;

    return new EmbeddingError(message, code ?? EmbeddingErrorCode.UNKNOWN, { cause });
  }
}

export function isEmbeddingError(error: unknown): error is EmbeddingError {
  return error instanceof EmbeddingError;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Throws DIMENSION_MISMATCH unless every vector has the same length.
 * Returns that length (0 for an empty list).
 */
export function assertUniformDimensions(vectors: readonly number[][]): number {
  const first = vectors[0];
  if (!first) return 0;

  const dimensions = first.length;
  vectors.forEach((vector, index) => {
    if (vector.length !== dimensions) {
      throw new EmbeddingError(
        `Vector ${index} has ${vector.length} dimensions, expected ${dimensions}`,
        EmbeddingErrorCode.DIMENSION_MISMATCH
      );
    }
  });

  return dimensions;
}
