/**
 * Progress Module
 */

export {
  ProgressReporterConfigSchema,
  type ProgressReporterConfig,
  type ProgressReporterOptions,
  resolveProgressConfig,
  type ProgressSnapshot,
  type RunStatistics,
  calculatePercentage,
  estimateRemainingMs,
  ratePerSecond,
  formatDuration,
  formatProgress,
  formatRunStatistics,
} from './types.js';

export { ProgressReporter } from './reporter.js';
