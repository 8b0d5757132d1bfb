/**
 * adb related interfaces
 */

export interface ConnectionTarget {
  readonly address: string;
  readonly port: number;
}

export interface AdbCLICheckResult {
  installed: boolean;
  version?: string;
  error?: string;
}

export interface AdbDeviceEntry {
  serial: string;
  state: string;
}

export interface AdbServiceOptions {
  adbPath?: string;
  verbosity?: number;
  /** Value given to ADB_TRACE while a push streams */
  trace?: string;
}

/**
 * The subset of adb the connection manager and pusher rely on.
 * AdbService implements it against the real binary; tests supply fakes.
 */
export interface AdbClient {
  checkCLI(): Promise<AdbCLICheckResult>;
  listDevices(): Promise<AdbDeviceEntry[]>;
  tcpip(port: number): Promise<void>;
  connect(target: ConnectionTarget): Promise<void>;
  pushFileWithProgress(localPath: string, destination: string, target: ConnectionTarget): AsyncIterable<string>;
  readFile(remotePath: string, target: ConnectionTarget): Promise<Buffer>;
  withTrace<T>(fn: () => Promise<T>): Promise<T>;
}

export type PushResult =
  | { status: "succeeded"; sourcePath: string; remotePath: string }
  | { status: "failed"; sourcePath: string; error: string }
  | { status: "skipped"; sourcePath: string; reason: "missing" | "declined" };

export interface BatchCounters {
  processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  elapsedMs: number;
}

export interface PushProgressEvent {
  file: string;
  percent: number;
  bytesTransferred: number;
  totalBytes: number;
  /** Smoothed throughput in bytes per second */
  bytesPerSecond: number;
  rate: string;
  /** null while the average rate is still zero */
  etaSeconds: number | null;
}

export type ParsedLine =
  | { kind: "error"; message: string }
  | { kind: "progress"; event: PushProgressEvent }
  | { kind: "passthrough"; line: string }
  | { kind: "none" };
