/**
 * Ingest Module
 */

export {
  HadithIngestService,
  formatIngestSummary,
  type IngestMode,
  type IngestOptions,
  type IngestSummary,
} from './ingest-service.js';
