/**
 * Connection Manager
 * Makes sure the Wi-Fi device endpoint is attached before any push starts
 */

import * as logger from "../../utils/logger.js";
import { AdbError, formatError } from "../../utils/error-handler.js";
import { targetSerial } from "../../config.js";
import type { AdbClient, ConnectionTarget } from "../../interfaces/adb.js";

export class ConnectionManager {
  private readonly adb: AdbClient;
  private readonly verbosity: number;

  constructor(adb: AdbClient, verbosity: number = logger.Verbosity.Normal) {
    this.adb = adb;
    this.verbosity = verbosity;
  }

  /**
   * Whether `adb devices` lists the endpoint. The serial must equal
   * "address:port" exactly, so 10.0.0.1:5555 never matches 10.0.0.11:5555.
   */
  async isConnected(target: ConnectionTarget): Promise<boolean> {
    const serial = targetSerial(target);
    const devices = await this.adb.listDevices();
    const match = devices.find((device) => device.serial === serial);
    if (match && match.state !== "device") {
      logger.warning(`${serial} is listed as ${match.state}; pushes may fail until it reconnects`, this.verbosity);
    }
    return match !== undefined;
  }

  /**
   * Connect to the endpoint unless it is already attached.
   * Makes exactly one attempt; the returned flag is the state after it.
   *
   * @throws AdbError of kind "missing" when adb cannot be invoked
   */
  async ensureConnected(target: ConnectionTarget): Promise<boolean> {
    const cliStatus = await this.adb.checkCLI();
    if (!cliStatus.installed) {
      throw new AdbError("missing", cliStatus.error ?? "adb is not available", { target });
    }
    logger.verbose(`adb ${cliStatus.version ?? "(unknown version)"} ready`, this.verbosity);

    const serial = targetSerial(target);
    if (await this.isConnected(target)) {
      logger.verbose(`${serial} already connected`, this.verbosity);
      return true;
    }

    logger.info(`Connecting to ${serial}...`, this.verbosity);

    // Both steps are best-effort: the re-check below is the only verdict
    try {
      await this.adb.tcpip(target.port);
    } catch (error) {
      logger.verbose(`adb tcpip ${target.port} failed: ${formatError(error)}`, this.verbosity);
    }
    try {
      await this.adb.connect(target);
    } catch (error) {
      logger.verbose(`adb connect ${serial} failed: ${formatError(error)}`, this.verbosity);
    }

    const connected = await this.isConnected(target);
    if (connected) {
      logger.success(`Connected to ${serial}`, this.verbosity);
    }
    return connected;
  }
}

export default ConnectionManager;
