/**
 * Progress Reporter
 *
 * Counts succeeded, failed and skipped units of a run and logs a line each
 * time another `logIntervalPercent` of the total is reached.
 */

import {
  type ProgressReporterConfig,
  type ProgressReporterOptions,
  type ProgressSnapshot,
  type RunStatistics,
  calculatePercentage,
  estimateRemainingMs,
  formatDuration,
  formatProgress,
  ratePerSecond,
  resolveProgressConfig,
} from './types.js';

export class ProgressReporter {
  private readonly config: ProgressReporterConfig;
  private succeeded = 0;
  private failed = 0;
  private skipped = 0;
  private running = false;
  private startedAt: number | null = null;
  private finishedAt: number | null = null;
  private lastLoggedPercent = 0;
  private lastLogAt = 0;
  private lastItem: string | undefined;

  constructor(total: number, options?: ProgressReporterOptions) {
    this.config = resolveProgressConfig(total, options);
  }

  start(): void {
    this.startedAt = Date.now();
    this.finishedAt = null;
    this.running = true;
    this.lastLoggedPercent = 0;

    this.log(`Starting (${this.config.total} ${this.config.unit})`);
  }

  success(item?: string): void {
    this.succeeded++;
    this.advance(item);
  }

  fail(item?: string): void {
    this.failed++;
    this.advance(item);
  }

  /** Count units that this run did not attempt */
  skip(count: number): void {
    this.skipped += count;
    this.advance(undefined);
  }

  complete(): void {
    this.finishedAt = Date.now();
    this.running = false;

    this.log(
      `Completed - ${this.succeeded} succeeded, ${this.failed} failed, ` +
        `${this.skipped} skipped in ${formatDuration(this.getElapsedMs())}`
    );
  }

  getProgress(): ProgressSnapshot {
    const elapsedMs = this.getElapsedMs();
    const processed = this.succeeded + this.failed + this.skipped;
    const attempted = this.succeeded + this.failed;

    return {
      processed,
      total: this.config.total,
      percentage: calculatePercentage(processed, this.config.total),
      elapsedMs,
      remainingMs: estimateRemainingMs(elapsedMs, attempted, this.config.total - this.skipped),
      unitsPerSecond: ratePerSecond(attempted, elapsedMs),
      lastItem: this.lastItem,
    };
  }

  getStatistics(): RunStatistics {
    const durationMs = this.getElapsedMs();
    const attempted = this.succeeded + this.failed;

    return {
      unit: this.config.unit,
      total: this.config.total,
      succeeded: this.succeeded,
      failed: this.failed,
      skipped: this.skipped,
      durationMs,
      unitsPerSecond: ratePerSecond(attempted, durationMs),
      successRate: attempted > 0 ? (this.succeeded / attempted) * 100 : 0,
    };
  }

  getElapsedMs(): number {
    if (this.startedAt === null) return 0;
    return (this.finishedAt ?? Date.now()) - this.startedAt;
  }

  toString(): string {
    return formatProgress(this.getProgress(), this.config.unit);
  }

  private advance(item: string | undefined): void {
    if (item) {
      this.lastItem = item;
    }
    if (!this.running) return;

    const now = Date.now();
    if (this.config.throttleMs > 0 && now - this.lastLogAt < this.config.throttleMs) return;

    const percentage = this.getProgress().percentage;
    const interval = this.config.logIntervalPercent;
    const reached = Math.floor(percentage);

    if (reached >= this.lastLoggedPercent + interval) {
      this.lastLoggedPercent = reached - (reached % interval);
      this.lastLogAt = now;
      this.log(this.toString());
    }
  }

  private log(message: string): void {
    this.config.logger?.info(`${this.config.label}: ${message}`);
  }
}
