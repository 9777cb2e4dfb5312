/**
 * Progress Types
 *
 * Counters, statistics and formatting for an insertion run. A run is counted
 * in units (batches or documents); units resumed past count as skipped.
 */

import { z } from 'zod';

import type { Logger } from '../logging/index.js';

// =============================================================================
// Configuration
// =============================================================================

export const ProgressReporterConfigSchema = z.object({
  total: z.number().int().nonnegative(),

  /** Prefix of every log line, e.g. `Batch insertion` */
  label: z.string().min(1).default('Progress'),

  /** Plural noun for the counted units */
  unit: z.string().min(1).default('items'),

  /**
   * Minimum gap between two interval lines
   * @default 100
   */
  throttleMs: z.number().int().nonnegative().default(100),

  /**
   * Log a progress line every N percentage points
   * @default 10
   */
  logIntervalPercent: z.number().min(1).max(100).default(10),

  /** Nothing is logged without one */
  logger: z.custom<Logger>().optional(),
});

export type ProgressReporterConfig = z.infer<typeof ProgressReporterConfigSchema>;
export type ProgressReporterOptions = Partial<
  Omit<z.input<typeof ProgressReporterConfigSchema>, 'total'>
>;

export function resolveProgressConfig(
  total: number,
  options?: ProgressReporterOptions
): ProgressReporterConfig {
  return ProgressReporterConfigSchema.parse({ total, ...options });
}

// =============================================================================
// Snapshots and Statistics
// =============================================================================

export interface ProgressSnapshot {
  /** succeeded + failed + skipped */
  processed: number;
  total: number;
  percentage: number;
  elapsedMs: number;
  remainingMs: number | undefined;
  unitsPerSecond: number;
  lastItem: string | undefined;
}

/**
 * End-of-run figures. Skipped units are left out of the rate and throughput.
 */
export interface RunStatistics {
  unit: string;
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  durationMs: number;
  unitsPerSecond: number;
  /** 0-100 over attempted units, 0 when none were attempted */
  successRate: number;
}

// =============================================================================
// Utility Functions
// =============================================================================

export function calculatePercentage(current: number, total: number): number {
  if (total === 0) return 100;
  return Math.min(100, Math.max(0, (current / total) * 100));
}

export function estimateRemainingMs(
  elapsedMs: number,
  done: number,
  total: number
): number | undefined {
  if (done === 0 || done >= total) return undefined;
  return (elapsedMs / done) * (total - done);
}

export function ratePerSecond(count: number, elapsedMs: number): number {
  if (elapsedMs === 0) return 0;
  return (count / elapsedMs) * 1000;
}

/**
 * `850ms`, `4.2s`, `3m 5s`, `1h 12m`
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;

  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  if (ms < 3600000) return `${minutes}m ${seconds}s`;

  const hours = Math.floor(ms / 3600000);
  return `${hours}h ${Math.floor((ms % 3600000) / 60000)}m`;
}

export function formatProgress(snapshot: ProgressSnapshot, unit: string): string {
  const parts = [
    `${snapshot.processed}/${snapshot.total} ${unit} (${snapshot.percentage.toFixed(1)}%)`,
  ];

  if (snapshot.remainingMs !== undefined) {
    parts.push(`ETA ${formatDuration(snapshot.remainingMs)}`);
  }
  parts.push(`elapsed ${formatDuration(snapshot.elapsedMs)}`);
  if (snapshot.unitsPerSecond > 0) {
    parts.push(`${snapshot.unitsPerSecond.toFixed(1)} ${unit}/s`);
  }

  return parts.join(' - ');
}

export function formatRunStatistics(stats: RunStatistics): string {
  const attempted = stats.succeeded + stats.failed;
  const lines = [
    attempted > 0
      ? `Success rate: ${stats.successRate.toFixed(1)}% (${stats.succeeded}/${attempted} ${stats.unit})`
      : `Success rate: n/a (no ${stats.unit} attempted)`,
  ];

  if (stats.skipped > 0) {
    lines.push(`Skipped on resume: ${stats.skipped} ${stats.unit}`);
  }
  lines.push(
    `Duration: ${formatDuration(stats.durationMs)} (${stats.unitsPerSecond.toFixed(1)} ${stats.unit}/s)`
  );

  return lines.join('\n');
}
