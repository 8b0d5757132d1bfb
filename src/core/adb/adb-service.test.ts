/**
 * Behavioral tests for AdbService
 * child_process is mocked; no adb binary is ever started
 */

import { expect, describe, beforeEach, afterEach, it, vi } from 'vitest';
import { FakeChildProcess, collect } from '../../../test-config/mocks/test-helpers.js';
import * as logger from '../../utils/logger.js';
import { AdbService, parseDeviceList } from './adb-service.js';

type ExecCallback = (error: Error | null, result?: { stdout: string | Buffer; stderr: string | Buffer }) => void;

const { execFileMock, spawnMock } = vi.hoisted(() => ({
  execFileMock: vi.fn(),
  spawnMock: vi.fn()
}));

vi.mock('node:child_process', () => ({
  execFile: execFileMock,
  spawn: spawnMock
}));

const target = { address: '192.168.1.20', port: 5555 };

// Route execFile calls by their adb sub-command
const answerExec = (handler: (args: string[]) => { stdout: string | Buffer } | Error): void => {
  execFileMock.mockImplementation((_file: string, args: string[], ...rest: unknown[]) => {
    const callback = rest[rest.length - 1] as ExecCallback;
    const outcome = handler(args);
    if (outcome instanceof Error) {
      callback(outcome);
    } else {
      callback(null, { stdout: outcome.stdout, stderr: '' });
    }
  });
};

describe('AdbService', () => {
  let service: AdbService;

  beforeEach(() => {
    execFileMock.mockReset();
    spawnMock.mockReset();
    vi.spyOn(logger, 'verbose').mockImplementation(() => {});
    service = new AdbService({ adbPath: '/opt/platform-tools/adb' });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('checkCLI', () => {
    it('should report the installed version', async () => {
      answerExec(() => ({ stdout: 'Android Debug Bridge version 1.0.41\nVersion 34.0.5-10900879\n' }));

      const result = await service.checkCLI();

      expect(result).toEqual({ installed: true, version: '1.0.41' });
      expect(execFileMock.mock.calls[0]?.[0]).toBe('/opt/platform-tools/adb');
      expect(execFileMock.mock.calls[0]?.[1]).toEqual(['version']);
    });

    it('should report not installed when adb cannot be started', async () => {
      answerExec(() => new Error('spawn adb ENOENT'));

      const result = await service.checkCLI();

      expect(result.installed).toBe(false);
      expect(result.error).toContain('adb not found');
      expect(result.error).toContain('spawn adb ENOENT');
    });

    it('should report not installed on empty output', async () => {
      answerExec(() => ({ stdout: '  \n' }));

      const result = await service.checkCLI();

      expect(result.installed).toBe(false);
    });
  });

  describe('listDevices', () => {
    it('should parse serials and states', async () => {
      answerExec(() => ({
        stdout: 'List of devices attached\n192.168.1.20:5555\tdevice\nR58M123ABC\tunauthorized\n\n'
      }));

      const devices = await service.listDevices();

      expect(devices).toEqual([
        { serial: '192.168.1.20:5555', state: 'device' },
        { serial: 'R58M123ABC', state: 'unauthorized' }
      ]);
    });

    it('should wrap failures in an AdbError', async () => {
      answerExec(() => new Error('cannot connect to daemon'));

      await expect(service.listDevices()).rejects.toMatchObject({
        name: 'AdbError',
        kind: 'failed'
      });
    });
  });

  describe('tcpip and connect', () => {
    it('should pass the port and serial to adb', async () => {
      const calls: string[][] = [];
      answerExec((args) => {
        calls.push(args);
        return { stdout: args[0] === 'connect' ? 'connected to 192.168.1.20:5555\n' : 'restarting in TCP mode port: 5555\n' };
      });

      await service.tcpip(5555);
      await service.connect(target);

      expect(calls).toEqual([
        ['tcpip', '5555'],
        ['connect', '192.168.1.20:5555']
      ]);
    });
  });

  describe('pushFileWithProgress', () => {
    it('should stream stdout and stderr lines', async () => {
      const child = new FakeChildProcess();
      spawnMock.mockReturnValue(child);

      const pending = collect(service.pushFileWithProgress('/tmp/photo.jpg', '/sdcard/Download', target));
      child.finish(
        'photo.jpg: 1 file pushed, 0 skipped. 12.0 MB/s (1048576 bytes in 0.083s)\n',
        'adb I 10-18 12:00:01.123  4242  4243 sysdeps.h:215] writex: fd=7 len=65536 DATA\n'
      );
      const lines = await pending;

      expect(lines).toHaveLength(2);
      expect(lines).toContain('photo.jpg: 1 file pushed, 0 skipped. 12.0 MB/s (1048576 bytes in 0.083s)');
      expect(lines).toContain('adb I 10-18 12:00:01.123  4242  4243 sysdeps.h:215] writex: fd=7 len=65536 DATA');
      expect(spawnMock).toHaveBeenCalledWith(
        '/opt/platform-tools/adb',
        ['-s', '192.168.1.20:5555', 'push', '/tmp/photo.jpg', '/sdcard/Download'],
        { stdio: ['ignore', 'pipe', 'pipe'] }
      );
      expect(child.kill).not.toHaveBeenCalled();
    });

    it('should kill adb when the consumer stops early', async () => {
      const child = new FakeChildProcess();
      spawnMock.mockReturnValue(child);

      child.stdout.write('adb: error: closed\n');
      for await (const line of service.pushFileWithProgress('/tmp/photo.jpg', '/sdcard', target)) {
        expect(line).toBe('adb: error: closed');
        break;
      }

      expect(child.kill).toHaveBeenCalledTimes(1);
    });

    it('should reject when adb cannot be spawned', async () => {
      const child = new FakeChildProcess();
      spawnMock.mockReturnValue(child);

      const pending = collect(service.pushFileWithProgress('/tmp/photo.jpg', '/sdcard', target));
      child.emit('error', new Error('spawn adb ENOENT'));

      await expect(pending).rejects.toThrow('spawn adb ENOENT');
    });
  });

  describe('readFile', () => {
    it('should return the raw bytes from exec-out', async () => {
      const content = Buffer.from([0x00, 0xff, 0x10, 0x41]);
      const calls: string[][] = [];
      answerExec((args) => {
        calls.push(args);
        return { stdout: content };
      });

      const result = await service.readFile("/sdcard/Download/it's here.bin", target);

      expect(result.equals(content)).toBe(true);
      expect(calls[0]).toEqual([
        '-s',
        '192.168.1.20:5555',
        'exec-out',
        "cat '/sdcard/Download/it'\\''s here.bin'"
      ]);
    });

    it('should wrap failures in an AdbError', async () => {
      answerExec(() => new Error('device offline'));

      await expect(service.readFile('/sdcard/missing.txt', target)).rejects.toThrow(
        'Failed to read /sdcard/missing.txt: device offline'
      );
    });
  });

  describe('withTrace', () => {
    const originalTrace = process.env.ADB_TRACE;

    afterEach(() => {
      if (originalTrace === undefined) {
        delete process.env.ADB_TRACE;
      } else {
        process.env.ADB_TRACE = originalTrace;
      }
    });

    it('should set ADB_TRACE only for the duration of the call', async () => {
      delete process.env.ADB_TRACE;

      const seen = await service.withTrace(async () => process.env.ADB_TRACE);

      expect(seen).toBe('all');
      expect(process.env.ADB_TRACE).toBeUndefined();
    });

    it('should restore the previous value when the call throws', async () => {
      process.env.ADB_TRACE = 'adb';
      const traced = new AdbService({ trace: 'transport' });

      await expect(
        traced.withTrace(async () => {
          expect(process.env.ADB_TRACE).toBe('transport');
          throw new Error('push blew up');
        })
      ).rejects.toThrow('push blew up');

      expect(process.env.ADB_TRACE).toBe('adb');
    });
  });
});

describe('parseDeviceList', () => {
  it('should skip the header and daemon notices', () => {
    const output = [
      '* daemon not running; starting now at tcp:5037',
      '* daemon started successfully',
      'List of devices attached',
      '192.168.1.20:5555      offline',
      ''
    ].join('\n');

    expect(parseDeviceList(output)).toEqual([{ serial: '192.168.1.20:5555', state: 'offline' }]);
  });
});
