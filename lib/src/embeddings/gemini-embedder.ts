/**
 * GeminiEmbeddingProvider
 *
 * Embeds hadith documents and queries with Google's Gemini embedding models
 * through the @google/genai SDK.
 *
 * @example
 * ```typescript
 * const embeddings = new GeminiEmbeddingProvider({ apiKey: process.env['GOOGLE_API_KEY'] ?? '' });
 * const vectors = await embeddings.embedDocuments(['first text', 'second text']);
 * ```
 */

import {
  GoogleGenAI,
  type EmbedContentParameters,
  type EmbedContentResponse,
} from '@google/genai';

import {
  type EmbeddingProvider,
  type GeminiEmbedderConfig,
  type GeminiEmbedderOptions,
  type GeminiEmbeddingTaskType,
  GeminiEmbedderConfigSchema,
  GeminiEmbeddingTaskType as TaskType,
  EmbeddingError,
  EmbeddingErrorCode,
  assertUniformDimensions,
} from './types.js';

/**
 * The slice of the SDK this provider calls. Tests pass a fake.
 */
export interface EmbedContentClient {
  embedContent(params: EmbedContentParameters): Promise<EmbedContentResponse>;
}

export class GeminiEmbeddingProvider implements EmbeddingProvider {
  private readonly config: GeminiEmbedderConfig;
  private readonly client: EmbedContentClient;

  constructor(options: GeminiEmbedderOptions, client?: EmbedContentClient) {
    this.config = GeminiEmbedderConfigSchema.parse(options);
    this.client = client ?? new GoogleGenAI({ apiKey: this.config.apiKey }).models;
  }

  get model(): string {
    return this.config.model;
  }

  async embedDocuments(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += this.config.maxTextsPerRequest) {
      const slice = texts.slice(start, start + this.config.maxTextsPerRequest);
      vectors.push(...(await this.request(slice, TaskType.DOCUMENT)));
    }

    assertUniformDimensions(vectors);
    return vectors;
  }

  async embedQuery(text: string): Promise<number[]> {
    if (text.trim() === '') {
      throw new EmbeddingError('Cannot embed an empty query', EmbeddingErrorCode.EMPTY_INPUT);
    }

    const [vector] = await this.request([text], TaskType.QUERY);
    if (!vector) {
      throw new EmbeddingError('No embedding returned for query', EmbeddingErrorCode.INVALID_RESPONSE);
    }
    return vector;
  }

  private async request(
    texts: readonly string[],
    taskType: GeminiEmbeddingTaskType
  ): Promise<number[][]> {
    let response: EmbedContentResponse;
    try {
      response = await this.client.embedContent({
        model: this.config.model,
        contents: [...texts],
        config: {
          taskType,
          ...(this.config.outputDimensionality !== undefined
            ? { outputDimensionality: this.config.outputDimensionality }
            : {}),
        },
      });
    } catch (error) {
      throw EmbeddingError.fromError(error, EmbeddingErrorCode.API_ERROR);
    }

    const embeddings = response.embeddings ?? [];
    if (embeddings.length !== texts.length) {
      throw new EmbeddingError(
        `Expected ${texts.length} embeddings, received ${embeddings.length}`,
        EmbeddingErrorCode.INVALID_RESPONSE
      );
    }

    return embeddings.map((embedding, index) => {
      if (!embedding.values || embedding.values.length === 0) {
        throw new EmbeddingError(
          `Embedding ${index} has no values`,
          EmbeddingErrorCode.INVALID_RESPONSE
        );
      }
      return embedding.values;
    });
  }
}

/**
 * Create a Gemini provider from an API key and optional model settings
 */
export function createGeminiEmbeddingProvider(
  apiKey: string,
  options?: Omit<GeminiEmbedderOptions, 'apiKey'>
): GeminiEmbeddingProvider {
  return new GeminiEmbeddingProvider({ ...options, apiKey });
}
