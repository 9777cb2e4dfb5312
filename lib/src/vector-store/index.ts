/**
 * Vector Store Module
 *
 * Document persistence and similarity search over pgvector or Qdrant.
 */

export * from './types.js';

export {
  PgVectorStore,
  toVectorLiteral,
  COLLECTIONS_TABLE,
  EMBEDDINGS_TABLE,
  SCHEMA_STATEMENTS,
  MAX_ROWS_PER_INSERT,
  type SqlClient,
  type SqlSession,
  type PgVectorStoreOptions,
} from './pgvector-store.js';

export {
  QdrantVectorStore,
  DIMENSION_SAMPLE_TEXT,
  type QdrantPointsClient,
  type QdrantVectorStoreOptions,
} from './qdrant-store.js';

export { createVectorStore, type VectorStoreSettings } from './factory.js';
