/**
 * adb Wi-Fi push
 *
 * Wires configuration and command-line options into the pusher
 */

import { createInterface } from "node:readline";
import * as logger from "./utils/logger.js";
import { resolveTarget, type AppConfig } from "./config.js";
import { AdbService } from "./core/adb/adb-service.js";
import { Pusher } from "./core/push/pusher.js";
import { PushTracker } from "./core/push/push-tracker.js";
import { createDryRunConfirmer, createPromptConfirmer, type Confirmer } from "./core/push/confirm.js";
import type { AdbClient, BatchCounters, PushResult } from "./interfaces/adb.js";

export interface PushOptions {
  destination?: string;
  address?: string;
  port?: number;
  summary?: boolean;
  dryRun?: boolean;
  confirm?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export interface PushDependencies {
  adb?: AdbClient;
  confirmer?: Confirmer;
  tracker?: PushTracker;
}

export interface PushOutcome {
  results: PushResult[];
  counters: BatchCounters;
  hasFailures: boolean;
}

/**
 * Read one path per line, skipping blank lines
 */
export async function* readPathLines(input: NodeJS.ReadableStream): AsyncGenerator<string, void, undefined> {
  const rl = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      const trimmed = line.trim();
      if (trimmed) {
        yield trimmed;
      }
    }
  } finally {
    rl.close();
  }
}

const selectConfirmer = (options: PushOptions, verbosity: logger.Verbosity): Confirmer | undefined => {
  if (options.dryRun) return createDryRunConfirmer(verbosity);
  if (options.confirm) return createPromptConfirmer();
  return undefined;
};

/**
 * Push every item to the device, printing results as they complete
 */
export async function pushFiles(
  items: Iterable<string> | AsyncIterable<string>,
  config: AppConfig,
  options: PushOptions,
  deps: PushDependencies = {}
): Promise<PushOutcome> {
  const verbosity = logger.verbosityFromFlags(options);

  const target = resolveTarget({ address: options.address, port: options.port }, config);
  const destination = options.destination ?? config.destination;
  const adb = deps.adb ?? new AdbService({ adbPath: config.adbPath, verbosity, trace: config.trace });
  const tracker = deps.tracker ?? new PushTracker({
    showProgress: verbosity >= logger.Verbosity.Normal && process.stdout.isTTY === true
  });

  const pusher = new Pusher(adb, {
    destination,
    target,
    verbosity,
    throttleMs: config.throttleMs,
    confirmer: deps.confirmer ?? selectConfirmer(options, verbosity),
    summary: options.summary ?? true,
    tracker
  });

  logger.info(`Pushing to ${destination} on ${target.address}:${target.port}`, verbosity);

  const results: PushResult[] = [];
  for await (const result of pusher.push(items)) {
    results.push(result);
  }

  const counters = pusher.getCounters();
  return { results, counters, hasFailures: counters.failed > 0 };
}
