/**
 * Consolidated Test Helpers
 *
 * Fakes shared by the test suites: an in-memory adb client, a fake child
 * process for the adb service and small async-iteration utilities.
 */

import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { vi, type Mock } from 'vitest';
import type {
  AdbClient,
  AdbCLICheckResult,
  AdbDeviceEntry,
  ConnectionTarget
} from '../../src/interfaces/adb.js';

/**
 * Drain an async iterable into an array
 */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

/**
 * Async iterable over fixed lines, the shape adb push output arrives in
 */
export async function* linesOf(...lines: string[]): AsyncGenerator<string, void, undefined> {
  for (const line of lines) {
    yield line;
  }
}

/**
 * Stand-in for the ChildProcess returned by spawn
 */
export class FakeChildProcess extends EventEmitter {
  stdout = new PassThrough();
  stderr = new PassThrough();
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  kill = vi.fn(() => {
    this.signalCode = 'SIGTERM';
    return true;
  });

  /** Write the given output and finish both streams */
  finish(stdout: string, stderr = '', code = 0): void {
    this.stdout.end(stdout);
    this.stderr.end(stderr);
    this.exitCode = code;
  }
}

export interface MockAdbClient extends AdbClient {
  checkCLI: Mock<() => Promise<AdbCLICheckResult>>;
  listDevices: Mock<() => Promise<AdbDeviceEntry[]>>;
  tcpip: Mock<(port: number) => Promise<void>>;
  connect: Mock<(target: ConnectionTarget) => Promise<void>>;
  pushFileWithProgress: Mock<(localPath: string, destination: string, target: ConnectionTarget) => AsyncIterable<string>>;
  readFile: Mock<(remotePath: string, target: ConnectionTarget) => Promise<Buffer>>;
  withTrace: <T>(fn: () => Promise<T>) => Promise<T>;
  traceCalls: number;
}

/**
 * Creates a mock adb client that reports the given serials as connected
 * and answers every push with a successful summary line
 *
 * @param connectedSerials Serials `adb devices` lists
 */
export function createMockAdbClient(connectedSerials: string[] = ['192.168.1.20:5555']): MockAdbClient {
  const client: MockAdbClient = {
    traceCalls: 0,
    checkCLI: vi.fn<() => Promise<AdbCLICheckResult>>(() => Promise.resolve({ installed: true, version: '1.0.41' })),
    listDevices: vi.fn<() => Promise<AdbDeviceEntry[]>>(() =>
      Promise.resolve(connectedSerials.map((serial) => ({ serial, state: 'device' })))
    ),
    tcpip: vi.fn<(port: number) => Promise<void>>(() => Promise.resolve()),
    connect: vi.fn<(target: ConnectionTarget) => Promise<void>>(() => Promise.resolve()),
    pushFileWithProgress: vi.fn<(localPath: string, destination: string, target: ConnectionTarget) => AsyncIterable<string>>(() =>
      linesOf('1 file pushed, 0 skipped. 10.0 MB/s (1024 bytes in 0.001s)')
    ),
    readFile: vi.fn<(remotePath: string, target: ConnectionTarget) => Promise<Buffer>>(() => Promise.resolve(Buffer.alloc(0))),
    withTrace: async <T>(fn: () => Promise<T>): Promise<T> => {
      client.traceCalls++;
      return fn();
    }
  };
  return client;
}

/**
 * Silence console output produced through the logger
 */
export function silenceConsole(): void {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
}
