/**
 * Embeddings Module
 *
 * Vector embedding generation for hadith documents.
 */

export {
  type EmbeddingProvider,
  DEFAULT_GEMINI_EMBEDDING_MODEL,
  GeminiEmbeddingTaskType,
  GeminiEmbedderConfigSchema,
  type GeminiEmbedderConfig,
  type GeminiEmbedderOptions,
  EmbeddingErrorCode,
  EmbeddingErrorCodeSchema,
  EmbeddingError,
  isEmbeddingError,
  assertUniformDimensions,
} from './types.js';

export {
  GeminiEmbeddingProvider,
  createGeminiEmbeddingProvider,
  type EmbedContentClient,
} from './gemini-embedder.js';
