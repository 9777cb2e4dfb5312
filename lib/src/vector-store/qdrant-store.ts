/**
 * QdrantVectorStore
 *
 * Qdrant-backed document store. Each document becomes one point whose payload
 * holds the page content and metadata.
 */

import { randomUUID } from 'node:crypto';

import { QdrantClient } from '@qdrant/js-client-rest';

import type { HadithDocument } from '../documents/index.js';
import { type EmbeddingProvider, assertUniformDimensions } from '../embeddings/index.js';
import { type Logger, createSilentLogger } from '../logging/index.js';
import {
  type ScoredDocument,
  type VectorStore,
  VectorStoreError,
  VectorStoreErrorCode,
  fromStoredDocument,
  toStoredDocument,
} from './types.js';

export type QdrantPointsClient = Pick<
  QdrantClient,
  'collectionExists' | 'createCollection' | 'upsert' | 'search' | 'deleteCollection'
>;

/** Text embedded once to learn the vector size of a new collection */
export const DIMENSION_SAMPLE_TEXT = 'dimension sample';

export interface QdrantVectorStoreOptions {
  url?: string;
  apiKey?: string;
  collectionName: string;
  embeddings: EmbeddingProvider;
  logger?: Logger;
  /** Pre-built client; when given, url and apiKey are ignored */
  client?: QdrantPointsClient;
  /** @default 30000 */
  timeoutMs?: number;
}

export class QdrantVectorStore implements VectorStore {
  readonly collectionName: string;
  private readonly client: QdrantPointsClient;
  private readonly embeddings: EmbeddingProvider;
  private readonly logger: Logger;

  private constructor(
    client: QdrantPointsClient,
    collectionName: string,
    embeddings: EmbeddingProvider,
    logger: Logger
  ) {
    this.client = client;
    this.collectionName = collectionName;
    this.embeddings = embeddings;
    this.logger = logger;
  }

  /**
   * Connect and create the collection (cosine distance) when it is missing.
   *
   * @throws {VectorStoreError} CONNECTION_ERROR
   */
  static async connect(options: QdrantVectorStoreOptions): Promise<QdrantVectorStore> {
    const logger = options.logger ?? createSilentLogger();
    const client = options.client ?? createClient(options);

    try {
      const { exists } = await client.collectionExists(options.collectionName);

      if (!exists) {
        const size = assertUniformDimensions([await options.embeddings.embedQuery(DIMENSION_SAMPLE_TEXT)]);
        await client.createCollection(options.collectionName, {
          vectors: { size, distance: 'Cosine' },
        });
        logger.info(`Created Qdrant collection '${options.collectionName}'`, { size });
      }
    } catch (error) {
      throw new VectorStoreError(
        `Failed to connect to Qdrant: ${error instanceof Error ? error.message : String(error)}`,
        VectorStoreErrorCode.CONNECTION_ERROR,
        error instanceof Error ? { cause: error } : undefined
      );
    }

    logger.info(`Connected to Qdrant; collection '${options.collectionName}' is ready`);
    return new QdrantVectorStore(client, options.collectionName, options.embeddings, logger);
  }

  async addDocuments(documents: readonly HadithDocument[]): Promise<string[]> {
    if (documents.length === 0) {
      return [];
    }

    const vectors = await this.embeddings.embedDocuments(documents.map((doc) => doc.pageContent));
    if (vectors.length !== documents.length) {
      throw new VectorStoreError(
        `Embedding provider returned ${vectors.length} vectors for ${documents.length} documents`,
        VectorStoreErrorCode.DIMENSION_MISMATCH
      );
    }

    const points = documents.map((document, index) => ({
      id: randomUUID(),
      vector: vectors[index] ?? [],
      payload: toStoredDocument(document),
    }));

    try {
      await this.client.upsert(this.collectionName, { wait: true, points });
    } catch (error) {
      throw VectorStoreError.fromError(error, VectorStoreErrorCode.INSERT_FAILED);
    }

    this.logger.debug(`Upserted ${points.length} points`, { collection: this.collectionName });
    return points.map((point) => point.id);
  }

  async similaritySearch(query: string, k: number): Promise<ScoredDocument[]> {
    const vector = await this.embeddings.embedQuery(query);

    try {
      const hits = await this.client.search(this.collectionName, {
        vector,
        limit: k,
        with_payload: true,
      });

      return hits.map((hit) => ({
        document: fromStoredDocument(hit.payload),
        score: hit.score,
      }));
    } catch (error) {
      throw VectorStoreError.fromError(error, VectorStoreErrorCode.SEARCH_FAILED);
    }
  }

  async deleteCollection(): Promise<void> {
    await this.client.deleteCollection(this.collectionName);
    this.logger.info(`Deleted collection '${this.collectionName}'`);
  }

  /** The REST client holds no connections */
  async close(): Promise<void> {
    return Promise.resolve();
  }
}

function createClient(options: QdrantVectorStoreOptions): QdrantPointsClient {
  if (!options.url) {
    throw new VectorStoreError('A Qdrant URL is required', VectorStoreErrorCode.CONNECTION_ERROR);
  }

  return new QdrantClient({
    url: options.url,
    ...(options.apiKey ? { apiKey: options.apiKey } : {}),
    timeout: options.timeoutMs ?? 30000,
  });
}
