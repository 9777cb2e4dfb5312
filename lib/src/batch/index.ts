/**
 * Batch Insertion Module
 *
 * Batched, retrying, resumable delivery of documents to a vector store.
 */

export * from './types.js';

export {
  loadCheckpoint,
  saveCheckpoint,
  deleteCheckpoint,
  FileCheckpointStore,
  formatCheckpointSummary,
} from './checkpoint.js';

export { BatchInsertionPipeline } from './pipeline.js';
