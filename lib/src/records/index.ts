/**
 * Records Module
 *
 * Reading raw hadith rows from tabular input.
 */

export * from './types.js';

export {
  CsvRecordReader,
  normalizeHeader,
  type CsvRecordReaderOptions,
} from './csv-reader.js';
