#!/usr/bin/env tsx
/**
 * Hadith Ingest Script
 *
 * Loads the hadith CSV export, turns each row into a document and stores the
 * documents with their Gemini embeddings in the configured vector store.
 *
 * The processing pipeline:
 * 1. Load and validate configuration from the environment (.env is read)
 * 2. Connect to the vector store (pgvector or Qdrant)
 * 3. Read the CSV and map rows to documents
 * 4. Insert documents in batches (retry, checkpoint, resume) or one by one
 * 5. Print the summary
 *
 * Usage:
 *   npx tsx scripts/src/ingest-hadiths.ts [options]
 *   # or via npm script:
 *   npm run ingest -- [options]
 *
 * Options:
 *   --csv=PATH          CSV file to ingest (overrides CSV_FILE_PATH)
 *   --batch-size=N      Documents per batch (overrides BATCH_SIZE)
 *   --max-retries=N     Attempts per batch (overrides MAX_RETRIES)
 *   --individual        Insert documents one at a time
 *   --no-resume         Ignore saved progress and start from the first batch
 *   --checkpoint=PATH   Progress file (overrides CHECKPOINT_PATH)
 *   --verbose           Debug logging
 *   --quiet             Errors only
 *   --log-format=FMT    text, json, compact or pretty
 *
 * Environment variables:
 *   - POSTGRES_URL: PostgreSQL connection URL (required for pgvector)
 *   - GOOGLE_API_KEY: Gemini API key (required)
 *   - VECTOR_STORE: pgvector (default) or qdrant
 *   - QDRANT_URL / QDRANT_API_KEY: Qdrant endpoint (required for qdrant)
 *   - COLLECTION_NAME, CSV_FILE_PATH, BATCH_SIZE, USE_BATCH_INSERT,
 *     MAX_RETRIES, RESUME, CHECKPOINT_PATH, EMBEDDING_MODEL,
 *     EMBEDDING_DIMENSIONS, LOG_LEVEL, LOG_FORMAT
 *
 * Exit codes:
 *   0  the run completed (failed batches are reported, not fatal)
 *   1  configuration, input or connection error
 */

import 'dotenv/config';

import {
  BatchInsertionPipeline,
  CsvRecordReader,
  FileCheckpointStore,
  HadithIngestService,
  type IngestConfig,
  type VectorStore,
  createGeminiEmbeddingProvider,
  createLoggerFromConfig,
  createVectorStore,
  describeConfig,
  formatIngestSummary,
  isConfigurationError,
  isRecordReadError,
  isVectorStoreError,
  loadIngestConfig,
} from '@hadith-ingest/lib';

// ============================================================================
// Argument Parsing
// ============================================================================

/**
 * Command line flags become environment overrides so they go through the
 * same validation as the variables they replace.
 */
function parseArgs(argv: readonly string[]): Record<string, string> {
  const overrides: Record<string, string> = {};

  for (const arg of argv) {
    if (arg === '--individual') {
      overrides['USE_BATCH_INSERT'] = 'false';
    } else if (arg === '--no-resume') {
      overrides['RESUME'] = 'false';
    } else if (arg === '--verbose') {
      overrides['LOG_LEVEL'] = 'debug';
    } else if (arg === '--quiet') {
      overrides['LOG_LEVEL'] = 'error';
    } else if (arg.startsWith('--csv=')) {
      overrides['CSV_FILE_PATH'] = arg.slice(6);
    } else if (arg.startsWith('--batch-size=')) {
      overrides['BATCH_SIZE'] = arg.slice(13);
    } else if (arg.startsWith('--max-retries=')) {
      overrides['MAX_RETRIES'] = arg.slice(14);
    } else if (arg.startsWith('--checkpoint=')) {
      overrides['CHECKPOINT_PATH'] = arg.slice(13);
    } else if (arg.startsWith('--log-format=')) {
      overrides['LOG_FORMAT'] = arg.slice(13);
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    } else {
      console.error(`Unknown option: ${arg}`);
      printHelp();
      process.exit(1);
    }
  }

  return overrides;
}

function printHelp(): void {
  console.log(`
Hadith Ingest Script

Usage:
  npm run ingest -- [options]

Options:
  --csv=PATH          CSV file to ingest
  --batch-size=N      Documents per batch (default: 25)
  --max-retries=N     Attempts per batch (default: 3)
  --individual        Insert documents one at a time
  --no-resume         Start from the first batch
  --checkpoint=PATH   Progress file (default: insertion_progress.json)
  --verbose           Debug logging
  --quiet             Errors only
  --log-format=FMT    text, json, compact or pretty
  -h, --help          Show this help
`);
}

function loadConfig(): IngestConfig {
  const overrides = parseArgs(process.argv.slice(2));
  try {
    return loadIngestConfig({ ...process.env, ...overrides });
  } catch (error) {
    if (isConfigurationError(error)) {
      console.error(error.message);
      console.error('');
      console.error('Set the variables in .env or the environment and try again.');
      process.exit(1);
    }
    throw error;
  }
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLoggerFromConfig(config, 'ingest');

  logger.info('Configuration loaded', describeConfig(config));

  let store: VectorStore | null = null;
  try {
    const embeddings = createGeminiEmbeddingProvider(config.googleApiKey, {
      model: config.embeddingModel,
      outputDimensionality: config.embeddingDimensions,
    });

    store = await createVectorStore(config, embeddings, logger);

    const pipeline = new BatchInsertionPipeline(
      store,
      { maxRetries: config.maxRetries, checkpointPath: config.checkpointPath },
      {
        logger: logger.child('pipeline'),
        checkpointStore: new FileCheckpointStore(config.checkpointPath, logger.child('checkpoint')),
      }
    );

    const service = new HadithIngestService(
      new CsvRecordReader({ logger: logger.child('csv') }),
      pipeline,
      logger
    );

    const summary = await service.ingestFile(config.csvFilePath, {
      batchSize: config.batchSize,
      useBatchInsert: config.useBatchInsert,
      resume: config.resume,
    });

    console.log('');
    console.log('='.repeat(60));
    console.log('INGEST SUMMARY');
    console.log('='.repeat(60));
    console.log(formatIngestSummary(summary));
    console.log('='.repeat(60));
  } catch (error) {
    if (isVectorStoreError(error) || isRecordReadError(error)) {
      logger.error(error.message, error);
      process.exitCode = 1;
      return;
    }
    throw error;
  } finally {
    await store?.close();
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
