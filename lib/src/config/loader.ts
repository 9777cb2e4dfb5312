/**
 * Ingest Configuration Loader
 *
 * Reads the environment once, validates it and reports every problem in a
 * single ConfigurationError.
 */

import { Logger, parseLogLevel, LogLevel } from '../logging/index.js';
import { type IngestConfig, ConfigurationError, IngestEnvSchema } from './types.js';

export type Environment = Readonly<Record<string, string | undefined>>;

const ENV_KEYS = Object.keys(IngestEnvSchema.shape);

function readEnv(env: Environment): Record<string, string> {
  const values: Record<string, string> = {};
  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      values[key] = value;
    }
  }
  return values;
}

/**
 * Build the ingest configuration from environment variables.
 *
 * @throws {ConfigurationError} Listing every missing or invalid variable
 */
export function loadIngestConfig(env: Environment = process.env): IngestConfig {
  const raw = readEnv(env);
  const issues: string[] = [];

  const result = IngestEnvSchema.safeParse(raw);
  if (!result.success) {
    for (const issue of result.error.issues) {
      issues.push(`${issue.path.join('.')}: ${issue.message}`);
    }
  }

  const backend = (raw['VECTOR_STORE'] ?? 'pgvector').trim().toLowerCase();
  if (backend === 'pgvector' && raw['POSTGRES_URL'] === undefined) {
    issues.push('POSTGRES_URL: is required when VECTOR_STORE=pgvector');
  }
  if (backend === 'qdrant' && raw['QDRANT_URL'] === undefined) {
    issues.push('QDRANT_URL: is required when VECTOR_STORE=qdrant');
  }

  if (!result.success || issues.length > 0) {
    throw new ConfigurationError(`Invalid configuration:\n  - ${issues.join('\n  - ')}`, issues);
  }

  const parsed = result.data;
  return Object.freeze({
    postgresUrl: parsed.POSTGRES_URL,
    googleApiKey: parsed.GOOGLE_API_KEY,
    collectionName: parsed.COLLECTION_NAME,
    csvFilePath: parsed.CSV_FILE_PATH,
    batchSize: parsed.BATCH_SIZE,
    useBatchInsert: parsed.USE_BATCH_INSERT,
    maxRetries: parsed.MAX_RETRIES,
    resume: parsed.RESUME,
    checkpointPath: parsed.CHECKPOINT_PATH,
    vectorStore: parsed.VECTOR_STORE,
    qdrantUrl: parsed.QDRANT_URL,
    qdrantApiKey: parsed.QDRANT_API_KEY,
    embeddingModel: parsed.EMBEDDING_MODEL,
    embeddingDimensions: parsed.EMBEDDING_DIMENSIONS,
    logLevel: parsed.LOG_LEVEL,
    logFormat: parsed.LOG_FORMAT,
  });
}

// =============================================================================
// Log-safe Views
// =============================================================================

/**
 * First 8 characters followed by `...`; secrets of 8 characters or fewer
 * are hidden entirely.
 */
export function maskSecret(secret: string | undefined): string | undefined {
  if (secret === undefined) return undefined;
  if (secret.length <= 8) return '***';
  return `${secret.slice(0, 8)}...`;
}

/**
 * Drop the password from a connection URL
 */
export function redactConnectionUrl(url: string | undefined): string | undefined {
  if (url === undefined) return undefined;
  try {
    const parsed = new URL(url);
    parsed.password = '';
    return parsed.toString();
  } catch {
    return '<invalid url>';
  }
}

export function describeConfig(config: IngestConfig): Record<string, unknown> {
  return {
    vectorStore: config.vectorStore,
    postgresUrl: redactConnectionUrl(config.postgresUrl),
    qdrantUrl: config.qdrantUrl,
    qdrantApiKey: maskSecret(config.qdrantApiKey),
    googleApiKey: maskSecret(config.googleApiKey),
    collectionName: config.collectionName,
    csvFilePath: config.csvFilePath,
    batchSize: config.batchSize,
    useBatchInsert: config.useBatchInsert,
    maxRetries: config.maxRetries,
    resume: config.resume,
    checkpointPath: config.checkpointPath,
    embeddingModel: config.embeddingModel,
    embeddingDimensions: config.embeddingDimensions,
  };
}

/**
 * Root logger for a script, configured from LOG_LEVEL and LOG_FORMAT
 */
export function createLoggerFromConfig(config: IngestConfig, source: string): Logger {
  return new Logger({
    level: parseLogLevel(config.logLevel) ?? LogLevel.INFO,
    format: config.logFormat,
    source,
  });
}
