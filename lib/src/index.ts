/**
 * Hadith Ingest - Shared Library
 *
 * CSV reading, document mapping, embedding, vector storage and the batched
 * insertion pipeline used by the ingest scripts.
 */

// Configuration
export * from './config/index.js';

// Logging
export * from './logging/index.js';

// Progress Reporting
export * from './progress/index.js';

// Records (CSV Input)
export * from './records/index.js';

// Documents (Row to Document Mapping)
export * from './documents/index.js';

// Embeddings (Gemini)
export * from './embeddings/index.js';

// Vector Stores (pgvector, Qdrant)
export * from './vector-store/index.js';

// Batch Insertion (Retry, Checkpoints, Resume)
export * from './batch/index.js';

// Ingest Service
export * from './ingest/index.js';
