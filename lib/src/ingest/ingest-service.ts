/**
 * Hadith Ingest Service
 *
 * Reads a hadith CSV export, maps each row to a document and hands the
 * documents to the insertion pipeline in batch or individual mode.
 */

import type {
  BatchInsertionPipeline,
  BatchRunResult,
  IndividualRunResult,
} from '../batch/index.js';
import { mapRows } from '../documents/index.js';
import { type Logger, createSilentLogger } from '../logging/index.js';
import { formatRunStatistics } from '../progress/index.js';
import type { RecordReader } from '../records/index.js';

export type IngestMode = 'batch' | 'individual';

export interface IngestOptions {
  /** @default 25 */
  batchSize?: number;
  /** @default true */
  useBatchInsert?: boolean;
  /** Only applies to batch mode. @default true */
  resume?: boolean;
}

export interface IngestSummary {
  rowsRead: number;
  documentsCreated: number;
  rowsSkipped: number;
  mode: IngestMode;
  batch?: BatchRunResult;
  individual?: IndividualRunResult;
}

export class HadithIngestService {
  private readonly reader: RecordReader;
  private readonly pipeline: BatchInsertionPipeline;
  private readonly logger: Logger;

  constructor(reader: RecordReader, pipeline: BatchInsertionPipeline, logger?: Logger) {
    this.reader = reader;
    this.pipeline = pipeline;
    this.logger = logger ?? createSilentLogger();
  }

  /**
   * @throws {RecordReadError} If the file cannot be read
   */
  async ingestFile(csvPath: string, options: IngestOptions = {}): Promise<IngestSummary> {
    const batchSize = options.batchSize ?? 25;
    const useBatchInsert = options.useBatchInsert ?? true;
    const resume = options.resume ?? true;

    this.logger.info(`Processing ${csvPath}`);
    const rows = await this.reader.read(csvPath);
    const { documents, skipped } = mapRows(rows, this.logger);

    const summary: IngestSummary = {
      rowsRead: rows.length,
      documentsCreated: documents.length,
      rowsSkipped: skipped.length,
      mode: useBatchInsert ? 'batch' : 'individual',
    };

    if (useBatchInsert) {
      summary.batch = await this.pipeline.run(documents, batchSize, resume);
    } else {
      summary.individual = await this.pipeline.runIndividual(documents);
    }

    this.logger.info('Processing completed', {
      rowsRead: summary.rowsRead,
      documentsCreated: summary.documentsCreated,
      rowsSkipped: summary.rowsSkipped,
      mode: summary.mode,
    });
    return summary;
  }
}

export function formatIngestSummary(summary: IngestSummary): string {
  const lines = [
    `Rows read: ${summary.rowsRead}`,
    `Documents created: ${summary.documentsCreated}`,
    `Rows skipped: ${summary.rowsSkipped}`,
    `Mode: ${summary.mode}`,
  ];

  if (summary.batch) {
    const { batch } = summary;
    lines.push(
      `Batches: ${batch.successfulBatches} succeeded, ${batch.failedBatches} failed of ${batch.totalBatches}`
    );
    if (batch.startBatch > 0) {
      lines.push(`Resumed at batch: ${batch.startBatch + 1}`);
    }
    if (batch.failedBatchIndices.length > 0) {
      lines.push(`Failed batches: ${batch.failedBatchIndices.map((i) => i + 1).join(', ')}`);
    }
    lines.push(formatRunStatistics(batch.statistics));
  }

  if (summary.individual) {
    const { individual } = summary;
    lines.push(
      `Documents: ${individual.successfulDocuments} succeeded, ${individual.failedDocuments} failed of ${individual.totalDocuments}`
    );
    if (individual.failedIndices.length > 0) {
      lines.push(`Failed documents: ${individual.failedIndices.join(', ')}`);
    }
    lines.push(formatRunStatistics(individual.statistics));
  }

  return lines.join('\n');
}
