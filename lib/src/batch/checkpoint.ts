/**
 * Checkpoint Persistence
 *
 * Batch-level progress saved to a JSON file so an interrupted ingest can
 * resume at the first batch it had not attempted.
 */

import { readFile, rename, unlink, writeFile } from 'node:fs/promises';

import { type Logger, createSilentLogger } from '../logging/index.js';
import {
  type Checkpoint,
  type CheckpointSnapshot,
  type CheckpointStore,
  CheckpointRecordSchema,
  DEFAULT_CHECKPOINT_PATH,
  toCheckpointFile,
} from './types.js';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Checkpoint File Operations
// ============================================================================

/**
 * Load a checkpoint. A missing file gives null; an unreadable or invalid one
 * is logged as a warning and also gives null.
 */
export async function loadCheckpoint(
  filePath: string,
  logger: Logger = createSilentLogger()
): Promise<Checkpoint | null> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (!isNotFound(error)) {
      logger.warn(`Error loading progress: ${errorMessage(error)}`, { path: filePath });
    }
    return null;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    logger.warn(`Error loading progress: ${errorMessage(error)}`, { path: filePath });
    return null;
  }

  const result = CheckpointRecordSchema.safeParse(data);
  if (!result.success) {
    logger.warn(`Invalid checkpoint data: ${result.error.message}`, { path: filePath });
    return null;
  }
  return result.data;
}

/**
 * Write to a temp file, then rename over the target.
 */
export async function saveCheckpoint(
  filePath: string,
  snapshot: CheckpointSnapshot,
  savedAt: Date = new Date()
): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await writeFile(tempPath, JSON.stringify(toCheckpointFile(snapshot, savedAt), null, 2), 'utf-8');
  await rename(tempPath, filePath);
}

/**
 * @returns false when there was no file to delete
 */
export async function deleteCheckpoint(filePath: string): Promise<boolean> {
  try {
    await unlink(filePath);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

// ============================================================================
// File-backed Store
// ============================================================================

/**
 * CheckpointStore over a single JSON file. Save and clear failures are
 * logged and never thrown.
 */
export class FileCheckpointStore implements CheckpointStore {
  readonly filePath: string;
  private readonly logger: Logger;

  constructor(filePath: string = DEFAULT_CHECKPOINT_PATH, logger: Logger = createSilentLogger()) {
    this.filePath = filePath;
    this.logger = logger;
  }

  load(): Promise<Checkpoint | null> {
    return loadCheckpoint(this.filePath, this.logger);
  }

  async save(snapshot: CheckpointSnapshot): Promise<void> {
    try {
      await saveCheckpoint(this.filePath, snapshot);
      this.logger.debug(`Progress saved: batch ${snapshot.currentBatch}/${snapshot.totalBatches}`);
    } catch (error) {
      this.logger.warn(`Error saving progress: ${errorMessage(error)}`, { path: this.filePath });
    }
  }

  async clear(): Promise<void> {
    try {
      if (await deleteCheckpoint(this.filePath)) {
        this.logger.info('Progress file cleaned up');
      }
    } catch (error) {
      this.logger.warn(`Error deleting progress file: ${errorMessage(error)}`, { path: this.filePath });
    }
  }
}

/**
 * One-line summary for logs
 */
export function formatCheckpointSummary(checkpoint: Checkpoint): string {
  const total = checkpoint.totalBatches === null ? '?' : String(checkpoint.totalBatches);
  return (
    `batch ${checkpoint.currentBatch}/${total} ` +
    `(${checkpoint.successfulBatches} succeeded, ${checkpoint.failedBatches} failed, saved ${checkpoint.timestamp})`
  );
}
