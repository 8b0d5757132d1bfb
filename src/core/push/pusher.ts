/**
 * Pusher
 * Pushes files to the device one at a time and reports a result per file
 */

import * as logger from "../../utils/logger.js";
import { AdbError, formatError, handleError } from "../../utils/error-handler.js";
import { getRegularFileSize } from "../../utils/fs-utils.js";
import { getBasename, joinRemotePath } from "../../utils/path.js";
import { targetSerial } from "../../config.js";
import { ConnectionManager } from "../adb/connection-manager.js";
import { DEFAULT_PUSH_OUTPUT_RULES, isPushSuccess, type PushOutputRules } from "../adb/output-classifier.js";
import { ProgressParser } from "./progress-parser.js";
import { PushTracker } from "./push-tracker.js";
import type { Confirmer } from "./confirm.js";
import type {
  AdbClient,
  BatchCounters,
  ConnectionTarget,
  PushProgressEvent,
  PushResult
} from "../../interfaces/adb.js";

export interface PusherOptions {
  destination: string;
  target: ConnectionTarget;
  verbosity?: number;
  throttleMs?: number;
  /** Consulted before every transfer; omit to push without asking */
  confirmer?: Confirmer;
  /** Print the one-line summary when the batch ends (default true) */
  summary?: boolean;
  onProgress?: (event: PushProgressEvent) => void;
  rules?: PushOutputRules;
  tracker?: PushTracker;
  connection?: ConnectionManager;
  now?: () => number;
}

type TransferOutcome = { ok: true } | { ok: false; error: string };

export class Pusher {
  private readonly adb: AdbClient;
  private readonly destination: string;
  private readonly target: ConnectionTarget;
  private readonly verbosity: number;
  private readonly throttleMs: number | undefined;
  private readonly confirmer: Confirmer | undefined;
  private readonly summary: boolean;
  private readonly onProgress: ((event: PushProgressEvent) => void) | undefined;
  private readonly rules: PushOutputRules;
  private readonly tracker: PushTracker;
  private readonly connection: ConnectionManager;
  private readonly now: (() => number) | undefined;

  constructor(adb: AdbClient, options: PusherOptions) {
    this.adb = adb;
    this.destination = options.destination;
    this.target = options.target;
    this.verbosity = options.verbosity ?? logger.Verbosity.Normal;
    this.throttleMs = options.throttleMs;
    this.confirmer = options.confirmer;
    this.summary = options.summary ?? true;
    this.onProgress = options.onProgress;
    this.rules = options.rules ?? DEFAULT_PUSH_OUTPUT_RULES;
    this.now = options.now;
    this.tracker = options.tracker ?? new PushTracker({ now: options.now });
    this.connection = options.connection ?? new ConnectionManager(adb, this.verbosity);
  }

  getCounters(): BatchCounters {
    return this.tracker.getCounters();
  }

  /**
   * Push every item in order, yielding each result as soon as it is final.
   * Items may arrive lazily from an async source.
   *
   * @throws AdbError before the first result when adb is missing or the
   *   device cannot be reached. Per-file problems never throw.
   */
  async *push(items: Iterable<string> | AsyncIterable<string>): AsyncGenerator<PushResult, void, undefined> {
    this.tracker.start();

    const connected = await this.connection.ensureConnected(this.target);
    if (!connected) {
      throw new AdbError("connection", `Unable to connect to ${targetSerial(this.target)}`, {
        target: this.target
      });
    }

    for await (const item of items) {
      yield await this.pushOne(item);
    }
    this.tracker.finish();

    if (this.summary) {
      this.tracker.displaySummary();
    }
  }

  private async pushOne(sourcePath: string): Promise<PushResult> {
    try {
      const size = await getRegularFileSize(sourcePath);
      if (size === null) {
        logger.warning(`Skipping ${sourcePath}: file not found`, this.verbosity);
        this.tracker.recordSkip();
        return { status: "skipped", sourcePath, reason: "missing" };
      }

      const fileName = getBasename(sourcePath);
      const remotePath = joinRemotePath(this.destination, fileName);

      if (this.confirmer && !(await this.confirmer.confirm(`Push ${sourcePath} to ${remotePath}`))) {
        logger.verbose(`Declined ${sourcePath}`, this.verbosity);
        return { status: "skipped", sourcePath, reason: "declined" };
      }

      logger.verbose(`Pushing ${sourcePath} (${size} bytes) to ${this.destination}`, this.verbosity);
      const outcome = await this.transfer(sourcePath, fileName, size);

      if (outcome.ok) {
        this.tracker.recordSuccess();
        logger.success(`Pushed ${sourcePath} -> ${remotePath}`, this.verbosity);
        return { status: "succeeded", sourcePath, remotePath };
      }

      this.tracker.recordFailure();
      logger.error(`Failed ${sourcePath}: ${outcome.error}`);
      return { status: "failed", sourcePath, error: outcome.error };
    } catch (error) {
      this.tracker.recordFailure();
      const { error: msg } = handleError(error, `Error pushing ${sourcePath}`, this.verbosity);
      return { status: "failed", sourcePath, error: msg };
    }
  }

  /**
   * Run one adb push, feeding its output through the progress parser.
   * An error line stops reading at once, which kills the push.
   */
  private async transfer(sourcePath: string, fileName: string, totalBytes: number): Promise<TransferOutcome> {
    const parser = new ProgressParser({
      file: fileName,
      totalBytes,
      throttleMs: this.throttleMs,
      now: this.now,
      rules: this.rules
    });
    const output: string[] = [];
    let streamError: string | null = null;

    try {
      await this.adb.withTrace(async () => {
        for await (const line of this.adb.pushFileWithProgress(sourcePath, this.destination, this.target)) {
          const parsed = parser.parseLine(line);
          if (parsed.kind === "error") {
            streamError = parsed.message;
            break;
          }
          if (parsed.kind === "progress") {
            this.tracker.displayProgress(parsed.event);
            this.onProgress?.(parsed.event);
          } else if (parsed.kind === "passthrough") {
            output.push(line);
            if (this.verbosity >= logger.Verbosity.Verbose) {
              this.tracker.clearProgress();
            }
            logger.verbose(line, this.verbosity);
          }
        }
      });
    } catch (error) {
      this.tracker.clearProgress();
      return { ok: false, error: formatError(error) };
    }

    if (parser.discardedLines > 0) {
      logger.verbose(`${fileName}: ignored ${parser.discardedLines} adb trace lines`, this.verbosity);
    }

    if (streamError !== null) {
      this.tracker.clearProgress();
      return { ok: false, error: streamError };
    }

    if (isPushSuccess(output, this.rules)) {
      return { ok: true };
    }

    this.tracker.clearProgress();
    const text = output.join("\n").trim();
    return { ok: false, error: text || "adb push produced no output" };
  }
}

export default Pusher;
