/**
 * adb Service
 * Wraps the adb binary for connection and push operations
 */

import { execFile, spawn } from "node:child_process";
import { createInterface } from "node:readline";
import { PassThrough } from "node:stream";
import { promisify } from "node:util";
import * as logger from "../../utils/logger.js";
import { AdbError, formatError } from "../../utils/error-handler.js";
import { DEFAULT_TRACE, targetSerial } from "../../config.js";
import type {
  AdbClient,
  AdbCLICheckResult,
  AdbDeviceEntry,
  AdbServiceOptions,
  ConnectionTarget
} from "../../interfaces/adb.js";

const execFileAsync = promisify(execFile);

const TRACE_ENV = "ADB_TRACE";
const READ_MAX_BUFFER = 512 * 1024 * 1024;

/**
 * Parse the output of `adb devices` into serial/state pairs.
 *
 * Example lines:
 * - "List of devices attached"
 * - "192.168.1.20:5555\tdevice"
 * - "R58M123ABC\tunauthorized"
 * - "* daemon started successfully"
 */
export function parseDeviceList(output: string): AdbDeviceEntry[] {
  const devices: AdbDeviceEntry[] = [];
  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("List of devices") || line.startsWith("*")) {
      continue;
    }
    const [serial, state] = line.split(/\s+/);
    if (serial && state) {
      devices.push({ serial, state });
    }
  }
  return devices;
}

const shellQuote = (value: string): string => `'${value.replace(/'/g, `'\\''`)}'`;

export class AdbService implements AdbClient {
  private readonly adb: string;
  private readonly verbosity: number;
  private readonly trace: string;

  constructor(options: AdbServiceOptions = {}) {
    this.adb = options.adbPath ?? "adb";
    this.verbosity = options.verbosity ?? logger.Verbosity.Normal;
    this.trace = options.trace ?? DEFAULT_TRACE;
  }

  private async run(args: string[]): Promise<string> {
    logger.verbose(`${this.adb} ${args.join(" ")}`, this.verbosity);
    const { stdout } = await execFileAsync(this.adb, args);
    return stdout;
  }

  /**
   * Check that adb can be invoked
   */
  async checkCLI(): Promise<AdbCLICheckResult> {
    try {
      const output = (await this.run(["version"])).trim();
      if (!output) {
        return { installed: false, error: "adb printed no version information" };
      }
      const match = /Android Debug Bridge version (\S+)/.exec(output);
      return { installed: true, version: match?.[1] ?? output.split(/\r?\n/)[0] };
    } catch (error) {
      return {
        installed: false,
        error: `adb not found. Install the Android platform-tools or set "adbPath" in the config file. (${formatError(error)})`
      };
    }
  }

  /**
   * List devices known to the adb server
   */
  async listDevices(): Promise<AdbDeviceEntry[]> {
    try {
      return parseDeviceList(await this.run(["devices"]));
    } catch (error) {
      throw new AdbError("failed", `adb devices failed: ${formatError(error)}`, { adb: this.adb });
    }
  }

  /**
   * Restart adbd on the device listening on TCP
   */
  async tcpip(port: number): Promise<void> {
    await this.run(["tcpip", String(port)]);
  }

  async connect(target: ConnectionTarget): Promise<void> {
    const output = await this.run(["connect", targetSerial(target)]);
    logger.verbose(output.trim(), this.verbosity);
  }

  /**
   * Push a file and stream every line adb writes to stdout and stderr.
   * Returning early from the iteration kills the push.
   */
  async *pushFileWithProgress(
    localPath: string,
    destination: string,
    target: ConnectionTarget
  ): AsyncGenerator<string, void, undefined> {
    const args = ["-s", targetSerial(target), "push", localPath, destination];
    logger.verbose(`${this.adb} ${args.join(" ")}`, this.verbosity);

    const child = spawn(this.adb, args, { stdio: ["ignore", "pipe", "pipe"] });
    const merged = new PassThrough();
    let spawnError: Error | null = null;
    let openStreams = 2;

    const endMerged = (): void => {
      if (!merged.writableEnded) {
        merged.end();
      }
    };
    const onStreamEnd = (): void => {
      openStreams--;
      if (openStreams === 0) {
        endMerged();
      }
    };

    child.stdout.on("end", onStreamEnd);
    child.stderr.on("end", onStreamEnd);
    child.stdout.pipe(merged, { end: false });
    child.stderr.pipe(merged, { end: false });
    child.on("error", (error: Error) => {
      spawnError = error;
      endMerged();
    });

    const lines = createInterface({ input: merged, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        yield line;
      }
    } finally {
      lines.close();
      if (child.exitCode === null && child.signalCode === null) {
        child.kill();
      }
    }

    if (spawnError) {
      throw spawnError;
    }
  }

  /**
   * Read a file from the device
   */
  async readFile(remotePath: string, target: ConnectionTarget): Promise<Buffer> {
    const args = ["-s", targetSerial(target), "exec-out", `cat ${shellQuote(remotePath)}`];
    logger.verbose(`${this.adb} ${args.join(" ")}`, this.verbosity);
    try {
      const { stdout } = await execFileAsync(this.adb, args, {
        encoding: "buffer",
        maxBuffer: READ_MAX_BUFFER
      });
      return stdout;
    } catch (error) {
      throw new AdbError("failed", `Failed to read ${remotePath}: ${formatError(error)}`, { remotePath });
    }
  }

  /**
   * Run `fn` with adb's verbose trace switched on for every adb it spawns.
   * The previous value is restored even when `fn` throws.
   */
  async withTrace<T>(fn: () => Promise<T>): Promise<T> {
    const previous = process.env[TRACE_ENV];
    process.env[TRACE_ENV] = this.trace;
    try {
      return await fn();
    } finally {
      if (previous === undefined) {
        delete process.env[TRACE_ENV];
      } else {
        process.env[TRACE_ENV] = previous;
      }
    }
  }
}

export default AdbService;
