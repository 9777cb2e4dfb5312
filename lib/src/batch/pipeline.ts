/**
 * Batch Insertion Pipeline
 *
 * Delivers documents to a DocumentSink one batch at a time, retrying failed
 * batches with exponential backoff and checkpointing progress so an
 * interrupted run can resume.
 *
 * @example
 * ```typescript
 * const pipeline = new BatchInsertionPipeline(store, { maxRetries: 3 }, { logger });
 * const result = await pipeline.run(documents, 25, true);
 * logger.info(`${result.successfulBatches}/${result.totalBatches} batches stored`);
 * ```
 */

import type { HadithDocument } from '../documents/index.js';
import { type Logger, createSilentLogger } from '../logging/index.js';
import { ProgressReporter } from '../progress/index.js';
import type { DocumentSink } from '../vector-store/index.js';
import { FileCheckpointStore } from './checkpoint.js';
import {
  type BatchRunResult,
  type CheckpointStore,
  type IndividualRunResult,
  type PipelineConfig,
  type PipelineDependencies,
  type PipelineOptions,
  type PipelineProgressEvent,
  type SleepFn,
  PipelineConfigSchema,
  computeBackoffDelay,
  partitionIntoBatches,
  sleep,
} from './types.js';

interface ResumePoint {
  startBatch: number;
  successfulBatches: number;
  failedBatches: number;
}

const FRESH_START: ResumePoint = { startBatch: 0, successfulBatches: 0, failedBatches: 0 };

export class BatchInsertionPipeline {
  private readonly sink: DocumentSink;
  private readonly config: PipelineConfig;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly checkpoints: CheckpointStore;
  private readonly onProgress: ((event: PipelineProgressEvent) => void) | undefined;

  constructor(sink: DocumentSink, options: PipelineOptions = {}, deps: PipelineDependencies = {}) {
    this.sink = sink;
    this.config = PipelineConfigSchema.parse(options);
    this.logger = deps.logger ?? createSilentLogger();
    this.sleep = deps.sleep ?? sleep;
    this.checkpoints =
      deps.checkpointStore ?? new FileCheckpointStore(this.config.checkpointPath, this.logger);
    this.onProgress = deps.onProgress;
  }

  getConfig(): Readonly<PipelineConfig> {
    return this.config;
  }

  /**
   * Insert documents in contiguous batches of `batchSize`.
   *
   * Failed batches are recorded and skipped; only invalid arguments throw.
   *
   * @throws {RangeError} If batchSize is not an integer >= 1
   */
  async run(
    documents: readonly HadithDocument[],
    batchSize: number,
    resumeRequested: boolean
  ): Promise<BatchRunResult> {
    const startTime = Date.now();
    const batches = partitionIntoBatches(documents, batchSize);
    const totalBatches = batches.length;

    const resume = resumeRequested ? await this.resolveResumePoint(batchSize) : FRESH_START;
    let successfulBatches = resume.successfulBatches;
    let failedBatches = resume.failedBatches;
    const failedBatchIndices: number[] = [];
    let attemptedBatches = 0;

    this.logger.info(
      `Starting to insert ${documents.length} documents in batches of ${batchSize} (total batches: ${totalBatches})`
    );

    const reporter = new ProgressReporter(totalBatches, {
      label: 'Batch insertion',
      unit: 'batches',
      logger: this.logger,
    });
    reporter.start();

    if (resume.startBatch > 0) {
      this.logger.info(`Resuming from batch ${resume.startBatch + 1}`);
      reporter.skip(Math.min(resume.startBatch, totalBatches));
    }

    for (let index = resume.startBatch; index < totalBatches; index++) {
      const batch = batches[index] ?? [];
      const success = await this.insertWithRetry(batch, index, totalBatches);
      attemptedBatches++;

      if (success) {
        successfulBatches++;
        reporter.success(`batch ${index + 1}`);

        if (successfulBatches % this.config.checkpointEvery === 0) {
          await this.checkpoints.save({
            currentBatch: index + 1,
            successfulBatches,
            failedBatches,
            batchSize,
            totalBatches,
          });
        }
      } else {
        failedBatches++;
        failedBatchIndices.push(index);
        reporter.fail(`batch ${index + 1}`);
      }

      this.onProgress?.({ mode: 'batch', index, total: totalBatches, success });
      await this.sleep(this.config.interBatchDelayMs);
    }

    await this.checkpoints.clear();
    reporter.complete();

    const result: BatchRunResult = {
      totalBatches,
      startBatch: resume.startBatch,
      attemptedBatches,
      successfulBatches,
      failedBatches,
      failedBatchIndices,
      durationMs: Date.now() - startTime,
      statistics: reporter.getStatistics(),
    };

    this.logger.info(
      `Batch insertion complete. Successful: ${successfulBatches}, Failed: ${failedBatches}`,
      failedBatchIndices.length > 0 ? { failedBatches: failedBatchIndices.map((i) => i + 1) } : undefined
    );
    return result;
  }

  /**
   * Insert documents one at a time. No retry and no checkpoint; a failed
   * document is logged and skipped. A saved batch checkpoint is cleared at the
   * end.
   */
  async runIndividual(documents: readonly HadithDocument[]): Promise<IndividualRunResult> {
    const startTime = Date.now();
    const failedIndices: number[] = [];
    let successfulDocuments = 0;

    this.logger.info(`Starting to insert ${documents.length} documents individually`);

    const reporter = new ProgressReporter(documents.length, {
      label: 'Individual insertion',
      unit: 'documents',
      logger: this.logger,
    });
    reporter.start();

    for (const [index, document] of documents.entries()) {
      let success = true;
      try {
        await this.sink.addDocuments([document]);
        successfulDocuments++;
        reporter.success(`document ${index}`);
      } catch (error) {
        success = false;
        failedIndices.push(index);
        this.logger.error(`Error inserting document ${index}`, error);
        reporter.fail(`document ${index}`);
      }
      this.onProgress?.({ mode: 'individual', index, total: documents.length, success });
    }

    await this.checkpoints.clear();
    reporter.complete();
    this.logger.info(
      `Insertion complete. Successful: ${successfulDocuments}, Failed: ${failedIndices.length}`
    );

    return {
      totalDocuments: documents.length,
      successfulDocuments,
      failedDocuments: failedIndices.length,
      failedIndices,
      durationMs: Date.now() - startTime,
      statistics: reporter.getStatistics(),
    };
  }

  private async resolveResumePoint(batchSize: number): Promise<ResumePoint> {
    const checkpoint = await this.checkpoints.load();
    if (!checkpoint) {
      this.logger.info('No saved progress found, starting from batch 1');
      return FRESH_START;
    }

    if (checkpoint.batchSize !== null && checkpoint.batchSize !== batchSize) {
      this.logger.warn(
        `Saved progress used batch size ${checkpoint.batchSize}, not ${batchSize}; starting from batch 1`
      );
      return FRESH_START;
    }

    this.logger.info(
      `Loaded progress: Batch ${checkpoint.currentBatch}, Successful: ${checkpoint.successfulBatches}, Failed: ${checkpoint.failedBatches}`
    );
    return {
      startBatch: checkpoint.currentBatch,
      successfulBatches: checkpoint.successfulBatches,
      failedBatches: checkpoint.failedBatches,
    };
  }

  private async insertWithRetry(
    batch: readonly HadithDocument[],
    index: number,
    totalBatches: number
  ): Promise<boolean> {
    const label = `batch ${index + 1}/${totalBatches}`;

    for (let attempt = 0; attempt < this.config.maxRetries; attempt++) {
      try {
        await this.sink.addDocuments(batch);
        this.logger.debug(`Successfully inserted ${label}`, { documents: batch.length });
        return true;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Attempt ${attempt + 1} failed for ${label}: ${message}`);

        if (attempt + 1 < this.config.maxRetries) {
          const delayMs = computeBackoffDelay(attempt, this.config.baseRetryDelayMs);
          this.logger.info(`Waiting ${delayMs}ms before retry...`);
          await this.sleep(delayMs);
        } else {
          this.logger.error(`Failed to insert ${label} after ${this.config.maxRetries} attempts`, error);
        }
      }
    }

    return false;
  }
}
