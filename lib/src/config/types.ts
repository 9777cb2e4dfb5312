/**
 * Ingest Configuration Types
 *
 * Environment variables read by the ingest scripts and the validated,
 * camelCase configuration object built from them.
 */

import { z } from 'zod';

import { DEFAULT_CHECKPOINT_PATH } from '../batch/index.js';
import { DEFAULT_GEMINI_EMBEDDING_MODEL } from '../embeddings/index.js';
import { LogFormatSchema } from '../logging/index.js';
import { VectorStoreBackendSchema } from '../vector-store/index.js';

// =============================================================================
// Defaults
// =============================================================================

export const INGEST_DEFAULTS = {
  collectionName: 'rag_ahadees',
  csvFilePath: 'all_hadiths_clean.csv',
  batchSize: 25,
  useBatchInsert: true,
  maxRetries: 3,
  resume: true,
  checkpointPath: DEFAULT_CHECKPOINT_PATH,
  vectorStore: 'pgvector',
  embeddingModel: DEFAULT_GEMINI_EMBEDDING_MODEL,
  logLevel: 'info',
  logFormat: 'pretty',
} as const;

// =============================================================================
// Environment Parsing
// =============================================================================

const TRUE_VALUES = new Set(['true', '1', 'yes']);
const FALSE_VALUES = new Set(['false', '0', 'no']);

const envBoolean = (fallback: boolean) =>
  z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .refine((value) => TRUE_VALUES.has(value) || FALSE_VALUES.has(value), {
      message: 'must be true/false, 1/0 or yes/no',
    })
    .transform((value) => TRUE_VALUES.has(value))
    .optional()
    .transform((value) => value ?? fallback);

const envPositiveInt = z
  .string()
  .trim()
  .regex(/^\d+$/, 'must be a positive integer')
  .transform(Number)
  .pipe(z.number().int().min(1, 'must be a positive integer'));

export const LogLevelNameSchema = z.enum(['error', 'warn', 'info', 'debug', 'trace']);

/**
 * Raw environment, keyed by variable name. Blank values count as unset.
 * Which store URL is required depends on VECTOR_STORE and is checked by
 * loadIngestConfig.
 */
export const IngestEnvSchema = z
  .object({
    POSTGRES_URL: z.string().url('must be a connection URL').optional(),
    GOOGLE_API_KEY: z.string({ required_error: 'is required' }),
    COLLECTION_NAME: z.string().default(INGEST_DEFAULTS.collectionName),
    CSV_FILE_PATH: z.string().default(INGEST_DEFAULTS.csvFilePath),
    BATCH_SIZE: envPositiveInt.default(String(INGEST_DEFAULTS.batchSize)),
    USE_BATCH_INSERT: envBoolean(INGEST_DEFAULTS.useBatchInsert),
    MAX_RETRIES: envPositiveInt.default(String(INGEST_DEFAULTS.maxRetries)),
    RESUME: envBoolean(INGEST_DEFAULTS.resume),
    CHECKPOINT_PATH: z.string().default(INGEST_DEFAULTS.checkpointPath),
    VECTOR_STORE: z
      .string()
      .transform((value) => value.trim().toLowerCase())
      .pipe(VectorStoreBackendSchema)
      .default(INGEST_DEFAULTS.vectorStore),
    QDRANT_URL: z.string().url('must be a URL').optional(),
    QDRANT_API_KEY: z.string().optional(),
    EMBEDDING_MODEL: z.string().default(INGEST_DEFAULTS.embeddingModel),
    EMBEDDING_DIMENSIONS: envPositiveInt.optional(),
    LOG_LEVEL: z
      .string()
      .transform((value) => {
        const lower = value.trim().toLowerCase();
        return lower === 'warning' ? 'warn' : lower;
      })
      .pipe(LogLevelNameSchema)
      .default(INGEST_DEFAULTS.logLevel),
    LOG_FORMAT: z
      .string()
      .transform((value) => value.trim().toLowerCase())
      .pipe(LogFormatSchema)
      .default(INGEST_DEFAULTS.logFormat),
  });

export type IngestEnv = z.infer<typeof IngestEnvSchema>;

// =============================================================================
// Ingest Configuration
// =============================================================================

export interface IngestConfig {
  readonly postgresUrl: string | undefined;
  readonly googleApiKey: string;
  readonly collectionName: string;
  readonly csvFilePath: string;
  readonly batchSize: number;
  readonly useBatchInsert: boolean;
  readonly maxRetries: number;
  readonly resume: boolean;
  readonly checkpointPath: string;
  readonly vectorStore: z.infer<typeof VectorStoreBackendSchema>;
  readonly qdrantUrl: string | undefined;
  readonly qdrantApiKey: string | undefined;
  readonly embeddingModel: string;
  readonly embeddingDimensions: number | undefined;
  readonly logLevel: z.infer<typeof LogLevelNameSchema>;
  readonly logFormat: z.infer<typeof LogFormatSchema>;
}

// =============================================================================
// Configuration Error
// =============================================================================

export class ConfigurationError extends Error {
  /** One entry per problem, e.g. `GOOGLE_API_KEY: is required` */
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
