/**
 * PushTracker
 * Batch counters, the live per-file progress line and the end-of-batch summary
 */

import chalk from "chalk";
import * as logger from "../../utils/logger.js";
import type { BatchCounters, PushProgressEvent } from "../../interfaces/adb.js";

const BAR_WIDTH = 30;

/**
 * Format seconds remaining, "--" when unknown
 */
export const formatEta = (seconds: number | null): string => {
  if (seconds === null || !Number.isFinite(seconds)) {
    return "--";
  }
  const total = Math.ceil(seconds);
  if (total < 60) {
    return `${total}s`;
  }
  const minutes = Math.floor(total / 60);
  const rest = String(total % 60).padStart(2, "0");
  return `${minutes}m ${rest}s`;
};

export const formatProgressLine = (event: PushProgressEvent): string => {
  const completeWidth = Math.floor((event.percent / 100) * BAR_WIDTH);
  const bar = "█".repeat(completeWidth) + "░".repeat(BAR_WIDTH - completeWidth);
  return `[${bar}] ${event.percent.toFixed(1)}% | ${event.file} | ${event.rate} | ETA ${formatEta(event.etaSeconds)}`;
};

export interface PushTrackerOptions {
  /** Draw the live progress line */
  showProgress?: boolean;
  now?: () => number;
  write?: (text: string) => void;
}

export class PushTracker {
  private readonly showProgress: boolean;
  private readonly now: () => number;
  private readonly write: (text: string) => void;

  private processed = 0;
  private succeeded = 0;
  private failed = 0;
  private skipped = 0;
  private startedAt: number;
  private lastCompletedAt: number | null = null;
  private finishedAt: number | null = null;
  private hasDrawnProgress = false;

  constructor(options: PushTrackerOptions = {}) {
    this.showProgress = options.showProgress ?? true;
    this.now = options.now ?? Date.now;
    this.write = options.write ?? ((text: string) => { process.stdout.write(text); });
    this.startedAt = this.now();
  }

  /**
   * Reset counters and start the elapsed clock
   */
  start(): void {
    this.processed = 0;
    this.succeeded = 0;
    this.failed = 0;
    this.skipped = 0;
    this.lastCompletedAt = null;
    this.finishedAt = null;
    this.startedAt = this.now();
  }

  recordSuccess(): void {
    this.succeeded++;
    this.complete();
  }

  recordFailure(): void {
    this.failed++;
    this.complete();
  }

  recordSkip(): void {
    this.skipped++;
    this.complete();
  }

  private complete(): void {
    this.processed++;
    this.lastCompletedAt = this.now();
    this.clearProgress();
  }

  /**
   * Stop the elapsed clock; counters are read-only from here on
   */
  finish(): void {
    if (this.finishedAt === null) {
      this.finishedAt = this.now();
    }
  }

  getCounters(): BatchCounters {
    return {
      processed: this.processed,
      succeeded: this.succeeded,
      failed: this.failed,
      skipped: this.skipped,
      elapsedMs: (this.finishedAt ?? this.lastCompletedAt ?? this.now()) - this.startedAt,
    };
  }

  /**
   * Redraw the progress line for the file currently streaming
   */
  displayProgress(event: PushProgressEvent): void {
    if (!this.showProgress) return;

    if (this.hasDrawnProgress) {
      this.write("\r\x1B[K");
    }
    this.write(formatProgressLine(event));
    this.hasDrawnProgress = true;
  }

  clearProgress(): void {
    if (this.hasDrawnProgress) {
      this.write("\r\x1B[K");
      this.hasDrawnProgress = false;
    }
  }

  summaryLine(): string {
    const { processed, succeeded, failed, skipped, elapsedMs } = this.getCounters();
    return `Pushed ${succeeded} of ${processed} files (${failed} failed, ${skipped} skipped) in ${(elapsedMs / 1000).toFixed(1)}s`;
  }

  /**
   * Print the one-line batch summary
   */
  displaySummary(): void {
    this.clearProgress();
    const line = this.summaryLine();
    logger.always(this.failed === 0 ? chalk.green(line) : chalk.yellow(line));
  }
}

export default PushTracker;
