/**
 * ProgressParser
 * Turns adb's trace output for a single push into throttled progress events
 */

import type { ParsedLine, PushProgressEvent } from "../../interfaces/adb.js";
import { DEFAULT_PUSH_OUTPUT_RULES, isErrorLine, type PushOutputRules } from "../adb/output-classifier.js";

export const DEFAULT_THROTTLE_MS = 250;
export const DEFAULT_RATE_WINDOW = 5;

const BYTES_PER_MB = 1024 * 1024;

export interface ProgressParserOptions {
  /** Identifier reported on every event, usually the file name */
  file: string;
  /** Local size of the file being pushed */
  totalBytes: number;
  throttleMs?: number;
  /** Number of samples the running average spans */
  window?: number;
  now?: () => number;
  rules?: PushOutputRules;
}

export const formatRate = (bytesPerSecond: number): string =>
  `${(bytesPerSecond / BYTES_PER_MB).toFixed(2)} MB/s`;

export class ProgressParser {
  readonly file: string;
  readonly totalBytes: number;
  private readonly throttleMs: number;
  private readonly window: number;
  private readonly now: () => number;
  private readonly rules: PushOutputRules;

  private cumulativeBytes = 0;
  private lastSampleBytes = 0;
  private averageRate = 0;
  private lastEmitAt: number;
  private discarded = 0;

  constructor(options: ProgressParserOptions) {
    this.file = options.file;
    this.totalBytes = options.totalBytes;
    this.throttleMs = options.throttleMs ?? DEFAULT_THROTTLE_MS;
    this.window = options.window ?? DEFAULT_RATE_WINDOW;
    this.now = options.now ?? Date.now;
    this.rules = options.rules ?? DEFAULT_PUSH_OUTPUT_RULES;
    this.lastEmitAt = this.now();
  }

  get bytesTransferred(): number {
    return this.cumulativeBytes;
  }

  /** Diagnostic lines dropped so far */
  get discardedLines(): number {
    return this.discarded;
  }

  parseLine(line: string): ParsedLine {
    if (isErrorLine(line, this.rules)) {
      return { kind: "error", message: line.trim() };
    }

    if (line.includes(this.rules.traceTag) && line.includes(this.rules.dataTag)) {
      const length = this.parseLength(line);
      if (length === null) {
        this.discarded++;
        return { kind: "none" };
      }
      return this.recordChunk(length);
    }

    if (this.rules.diagnosticPrefix.test(line)) {
      this.discarded++;
      return { kind: "none" };
    }

    return { kind: "passthrough", line };
  }

  private parseLength(line: string): number | null {
    const match = this.rules.lengthPattern.exec(line);
    if (!match || match[1] === undefined) {
      return null;
    }
    const length = Number.parseInt(match[1], 10);
    return Number.isSafeInteger(length) ? length : null;
  }

  private recordChunk(length: number): ParsedLine {
    this.cumulativeBytes += length;

    const now = this.now();
    if (now - this.lastEmitAt < this.throttleMs) {
      return { kind: "none" };
    }

    const instantRate = (this.cumulativeBytes - this.lastSampleBytes) * (1000 / this.throttleMs);
    this.averageRate = (this.averageRate * (this.window - 1) + instantRate) / this.window;
    this.lastSampleBytes = this.cumulativeBytes;
    this.lastEmitAt = now;

    return { kind: "progress", event: this.snapshot() };
  }

  private snapshot(): PushProgressEvent {
    const percent = this.totalBytes > 0
      ? Math.min(100, (this.cumulativeBytes / this.totalBytes) * 100)
      : 100;
    const remaining = Math.max(0, this.totalBytes - this.cumulativeBytes);
    const etaSeconds = this.averageRate > 0 ? remaining / this.averageRate : null;

    return {
      file: this.file,
      percent,
      bytesTransferred: this.cumulativeBytes,
      totalBytes: this.totalBytes,
      bytesPerSecond: this.averageRate,
      rate: formatRate(this.averageRate),
      etaSeconds,
    };
  }
}
