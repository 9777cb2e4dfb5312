/**
 * Vector Store Factory
 */

import type { EmbeddingProvider } from '../embeddings/index.js';
import type { Logger } from '../logging/index.js';
import { PgVectorStore } from './pgvector-store.js';
import { QdrantVectorStore } from './qdrant-store.js';
import type { VectorStore, VectorStoreBackend } from './types.js';

/**
 * The configuration fields a store needs; IngestConfig satisfies this.
 */
export interface VectorStoreSettings {
  vectorStore: VectorStoreBackend;
  collectionName: string;
  postgresUrl?: string | undefined;
  qdrantUrl?: string | undefined;
  qdrantApiKey?: string | undefined;
}

/**
 * Connect to the configured backend.
 *
 * @throws {VectorStoreError} CONNECTION_ERROR if the store is unreachable
 */
export async function createVectorStore(
  settings: VectorStoreSettings,
  embeddings: EmbeddingProvider,
  logger: Logger
): Promise<VectorStore> {
  switch (settings.vectorStore) {
    case 'qdrant':
      return QdrantVectorStore.connect({
        url: settings.qdrantUrl,
        apiKey: settings.qdrantApiKey,
        collectionName: settings.collectionName,
        embeddings,
        logger: logger.child('qdrant'),
      });
    case 'pgvector':
      return PgVectorStore.connect({
        connectionString: settings.postgresUrl,
        collectionName: settings.collectionName,
        embeddings,
        logger: logger.child('pgvector'),
      });
  }
}
