#!/usr/bin/env tsx
/**
 * Connection Verification Script
 *
 * Checks that the configured vector store and the Gemini embedding API work
 * end to end, and that the CSV export can be read, before a long ingest run.
 *
 * Steps:
 * 1. Validate configuration
 * 2. Connect to the vector store using a throwaway collection
 * 3. Insert a test document
 * 4. Run a similarity search
 * 5. Delete the throwaway collection
 * 6. Preview the CSV file
 *
 * Usage:
 *   npx tsx scripts/src/verify-connection.ts
 *   # or via npm script:
 *   npm run verify
 *
 * Uses the same environment variables as the ingest script.
 *
 * Exit codes:
 *   0  every step passed
 *   1  any step failed
 */

import 'dotenv/config';

import {
  CsvRecordReader,
  type IngestConfig,
  type Logger,
  type VectorStore,
  createGeminiEmbeddingProvider,
  createLoggerFromConfig,
  createVectorStore,
  describeConfig,
  isConfigurationError,
  loadIngestConfig,
  mapRowToDocument,
  previewRecords,
} from '@hadith-ingest/lib';

const TEST_COLLECTION_SUFFIX = '_connection_test';

async function verifyStore(config: IngestConfig, logger: Logger): Promise<boolean> {
  const collectionName = `${config.collectionName}${TEST_COLLECTION_SUFFIX}`;
  let store: VectorStore | null = null;

  try {
    console.log(`Step 2: Connecting to ${config.vectorStore} (collection: ${collectionName})...`);
    const embeddings = createGeminiEmbeddingProvider(config.googleApiKey, {
      model: config.embeddingModel,
      outputDimensionality: config.embeddingDimensions,
    });
    store = await createVectorStore({ ...config, collectionName }, embeddings, logger);
    console.log('  ✓ Connected.');
    console.log('');

    console.log('Step 3: Inserting a test document...');
    const document = mapRowToDocument({
      source: 'Connection Test',
      hadith_no: '1',
      chapter_no: '1',
      chapter: 'Verification',
      text_ar: 'نص تجريبي',
      text_en: 'This is a test document for the connection check.',
    });
    const ids = await store.addDocuments([document]);
    console.log(`  ✓ Inserted ${ids.length} document.`);
    console.log('');

    console.log('Step 4: Running a similarity search...');
    const results = await store.similaritySearch('test document', 1);
    console.log(`  ✓ Search returned ${results.length} result(s).`);
    const [top] = results;
    if (top) {
      console.log(`  Top result (score ${top.score.toFixed(4)}): ${top.document.metadata.source}`);
    }
    console.log('');

    console.log('Step 5: Deleting the test collection...');
    await store.deleteCollection();
    console.log('  ✓ Deleted.');
    console.log('');
    return true;
  } catch (error) {
    console.error('');
    console.error(`✗ Vector store check failed: ${error instanceof Error ? error.message : String(error)}`);
    console.error('');
    console.error('This might be due to:');
    console.error('  1. An incorrect connection string or URL');
    console.error('  2. The database server being unavailable');
    console.error('  3. The pgvector extension not being installed');
    console.error('  4. An invalid GOOGLE_API_KEY');
    console.error('');
    return false;
  } finally {
    await store?.close();
  }
}

async function verifyCsv(config: IngestConfig, logger: Logger): Promise<boolean> {
  console.log(`Step 6: Reading ${config.csvFilePath}...`);
  try {
    const rows = await new CsvRecordReader({ logger }).read(config.csvFilePath);
    const preview = previewRecords(rows);
    console.log(`  ✓ Read ${preview.rowCount} rows.`);
    console.log(`  Columns: ${preview.columns.join(', ')}`);
    for (const row of preview.rows) {
      console.log(`  ${JSON.stringify(row)}`);
    }
    console.log('');
    return true;
  } catch (error) {
    console.error(`✗ CSV check failed: ${error instanceof Error ? error.message : String(error)}`);
    console.error('');
    return false;
  }
}

async function main(): Promise<void> {
  console.log('═'.repeat(60));
  console.log('CONNECTION VERIFICATION');
  console.log('═'.repeat(60));
  console.log('');

  console.log('Step 1: Validating configuration...');
  let config: IngestConfig;
  try {
    config = loadIngestConfig();
  } catch (error) {
    if (isConfigurationError(error)) {
      console.error(`✗ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  for (const [key, value] of Object.entries(describeConfig(config))) {
    if (value !== undefined) {
      console.log(`  ${key.padEnd(20)} ${String(value)}`);
    }
  }
  console.log('  ✓ Configuration is valid.');
  console.log('');

  const logger = createLoggerFromConfig(config, 'verify');
  const storeOk = await verifyStore(config, logger);
  const csvOk = await verifyCsv(config, logger);

  console.log('═'.repeat(60));
  if (storeOk && csvOk) {
    console.log('✓ All checks passed. You can now run: npm run ingest');
  } else if (storeOk) {
    console.log('⚠ The vector store works but the CSV file could not be read.');
  } else {
    console.log('✗ The vector store check failed. Check your configuration and database setup.');
  }
  console.log('═'.repeat(60));

  process.exit(storeOk && csvOk ? 0 : 1);
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
