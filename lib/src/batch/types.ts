/**
 * Batch Insertion Types
 *
 * Checkpoint record, pipeline configuration and run results for the batched
 * document insertion pipeline.
 */

import { z } from 'zod';

import type { Logger } from '../logging/index.js';
import type { RunStatistics } from '../progress/index.js';

// ============================================================================
// Checkpoint Types
// ============================================================================

export const CHECKPOINT_VERSION = 1;

export const DEFAULT_CHECKPOINT_PATH = 'insertion_progress.json';

/**
 * On-disk checkpoint (snake_case keys)
 */
export const CheckpointFileSchema = z.object({
  version: z.literal(CHECKPOINT_VERSION),
  current_batch: z.number().int().nonnegative(),
  successful_batches: z.number().int().nonnegative(),
  failed_batches: z.number().int().nonnegative(),
  batch_size: z.number().int().positive(),
  total_batches: z.number().int().nonnegative(),
  timestamp: z.string(), // ISO timestamp
});
export type CheckpointFile = z.infer<typeof CheckpointFileSchema>;

/**
 * Unversioned record written by earlier runs; timestamp in epoch seconds
 */
export const LegacyCheckpointFileSchema = z.object({
  current_batch: z.number().int().nonnegative(),
  successful_batches: z.number().int().nonnegative(),
  failed_batches: z.number().int().nonnegative(),
  timestamp: z.number(),
});
export type LegacyCheckpointFile = z.infer<typeof LegacyCheckpointFileSchema>;

/**
 * Batch-level progress. `currentBatch` is the first batch not yet attempted.
 * `batchSize` and `totalBatches` are null for legacy records.
 */
export interface Checkpoint {
  version: typeof CHECKPOINT_VERSION;
  currentBatch: number;
  successfulBatches: number;
  failedBatches: number;
  batchSize: number | null;
  totalBatches: number | null;
  timestamp: string;
}

/**
 * Accepts either on-disk shape and normalizes it to a version 1 Checkpoint
 */
export const CheckpointRecordSchema = z.union([
  CheckpointFileSchema.transform(
    (file): Checkpoint => ({
      version: CHECKPOINT_VERSION,
      currentBatch: file.current_batch,
      successfulBatches: file.successful_batches,
      failedBatches: file.failed_batches,
      batchSize: file.batch_size,
      totalBatches: file.total_batches,
      timestamp: file.timestamp,
    })
  ),
  LegacyCheckpointFileSchema.transform(
    (file): Checkpoint => ({
      version: CHECKPOINT_VERSION,
      currentBatch: file.current_batch,
      successfulBatches: file.successful_batches,
      failedBatches: file.failed_batches,
      batchSize: null,
      totalBatches: null,
      timestamp: new Date(file.timestamp * 1000).toISOString(),
    })
  ),
]);

/**
 * What the pipeline knows at a batch boundary; version and timestamp are
 * added when it is written.
 */
export interface CheckpointSnapshot {
  currentBatch: number;
  successfulBatches: number;
  failedBatches: number;
  batchSize: number;
  totalBatches: number;
}

export function toCheckpointFile(snapshot: CheckpointSnapshot, savedAt: Date): CheckpointFile {
  return {
    version: CHECKPOINT_VERSION,
    current_batch: snapshot.currentBatch,
    successful_batches: snapshot.successfulBatches,
    failed_batches: snapshot.failedBatches,
    batch_size: snapshot.batchSize,
    total_batches: snapshot.totalBatches,
    timestamp: savedAt.toISOString(),
  };
}

// ============================================================================
// Pipeline Configuration
// ============================================================================

export const PipelineConfigSchema = z.object({
  /** Attempts per batch, including the first */
  maxRetries: z.number().int().min(1).default(3),
  /** Wait before retry n (0-indexed attempt) is 2^n times this */
  baseRetryDelayMs: z.number().nonnegative().default(2000),
  interBatchDelayMs: z.number().nonnegative().default(500),
  /** Save a checkpoint after every N successful batches */
  checkpointEvery: z.number().int().min(1).default(10),
  checkpointPath: z.string().min(1).default(DEFAULT_CHECKPOINT_PATH),
});
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineOptions = z.input<typeof PipelineConfigSchema>;

export type SleepFn = (ms: number) => Promise<void>;

/**
 * Reported after every batch (batch mode) or document (individual mode)
 */
export interface PipelineProgressEvent {
  mode: 'batch' | 'individual';
  index: number;
  total: number;
  success: boolean;
}

// ============================================================================
// Results
// ============================================================================

export interface BatchRunResult {
  totalBatches: number;
  startBatch: number;
  attemptedBatches: number;
  /** Cumulative, including counts carried from a resumed checkpoint */
  successfulBatches: number;
  failedBatches: number;
  /** Batches that failed in this run */
  failedBatchIndices: number[];
  durationMs: number;
  /** Figures for this run only; resumed batches count as skipped */
  statistics: RunStatistics;
}

export interface IndividualRunResult {
  totalDocuments: number;
  successfulDocuments: number;
  failedDocuments: number;
  failedIndices: number[];
  durationMs: number;
  statistics: RunStatistics;
}

/**
 * Where the pipeline persists batch-level progress
 */
export interface CheckpointStore {
  /** null when there is nothing usable to resume from */
  load(): Promise<Checkpoint | null>;
  save(snapshot: CheckpointSnapshot): Promise<void>;
  clear(): Promise<void>;
}

export interface PipelineDependencies {
  logger?: Logger;
  sleep?: SleepFn;
  checkpointStore?: CheckpointStore;
  onProgress?: (event: PipelineProgressEvent) => void;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Split items into contiguous batches; only the last may be shorter.
 *
 * @throws {RangeError} If batchSize is not an integer >= 1
 */
export function partitionIntoBatches<T>(items: readonly T[], batchSize: number): T[][] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`Batch size must be an integer >= 1, got ${batchSize}`);
  }

  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += batchSize) {
    batches.push(items.slice(start, start + batchSize));
  }
  return batches;
}

export function computeBackoffDelay(attempt: number, baseDelayMs: number): number {
  return 2 ** attempt * baseDelayMs;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
