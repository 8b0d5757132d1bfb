/**
 * Tests for configuration loading
 */

import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  DEFAULT_DESTINATION,
  DEFAULT_PORT,
  DEFAULT_THROTTLE_MS,
  DEFAULT_TRACE,
  loadConfig,
  resolveTarget,
  targetSerial
} from './config.js';

describe('loadConfig', () => {
  let workDir: string;

  const writeConfig = async (content: string, name = 'adb-push.json'): Promise<string> => {
    const filePath = path.join(workDir, name);
    await writeFile(filePath, content);
    return filePath;
  };

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(tmpdir(), 'adb-push-config-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('should apply defaults for omitted keys', async () => {
    const configPath = await writeConfig('{"address": "192.168.1.20"}');

    await expect(loadConfig(configPath, {})).resolves.toEqual({
      destination: DEFAULT_DESTINATION,
      address: '192.168.1.20',
      port: DEFAULT_PORT,
      throttleMs: DEFAULT_THROTTLE_MS,
      trace: DEFAULT_TRACE
    });
  });

  it('should read every supported key', async () => {
    const configPath = await writeConfig(JSON.stringify({
      destination: '/sdcard/Movies',
      address: '10.0.0.7',
      port: 5037,
      adbPath: '/opt/platform-tools/adb',
      throttleMs: 500,
      trace: 'transport'
    }));

    const config = await loadConfig(configPath, {});

    expect(config).toEqual({
      destination: '/sdcard/Movies',
      address: '10.0.0.7',
      port: 5037,
      adbPath: '/opt/platform-tools/adb',
      throttleMs: 500,
      trace: 'transport'
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should fall back to ADB_PUSH_CONFIG', async () => {
    const configPath = await writeConfig('{"port": 6000}', 'from-env.json');

    const config = await loadConfig(undefined, { ADB_PUSH_CONFIG: configPath });

    expect(config.port).toBe(6000);
  });

  it('should prefer the explicit path over the env var', async () => {
    const explicit = await writeConfig('{"port": 7000}', 'explicit.json');
    const fromEnv = await writeConfig('{"port": 6000}', 'from-env.json');

    const config = await loadConfig(explicit, { ADB_PUSH_CONFIG: fromEnv });

    expect(config.port).toBe(7000);
  });

  it('should throw when an explicitly named file is missing', async () => {
    const missing = path.join(workDir, 'missing.json');

    await expect(loadConfig(missing, {})).rejects.toThrow(`Config file not found: ${missing}`);
  });

  it('should reject malformed JSON', async () => {
    const configPath = await writeConfig('{ port: ');

    await expect(loadConfig(configPath, {})).rejects.toThrow(`Invalid config at ${configPath}`);
  });

  it('should reject values outside the schema', async () => {
    const configPath = await writeConfig('{"port": 70000}');

    await expect(loadConfig(configPath, {})).rejects.toThrow(`Invalid config at ${configPath}: port:`);
  });

  it('should reject unknown keys', async () => {
    const configPath = await writeConfig('{"adress": "192.168.1.20"}');

    await expect(loadConfig(configPath, {})).rejects.toThrow('Unrecognized key');
  });
});

describe('resolveTarget', () => {
  const config = {
    destination: DEFAULT_DESTINATION,
    address: '192.168.1.20',
    port: DEFAULT_PORT,
    throttleMs: DEFAULT_THROTTLE_MS,
    trace: DEFAULT_TRACE
  };

  it('should use configured defaults', () => {
    expect(resolveTarget({}, config)).toEqual({ address: '192.168.1.20', port: 5555 });
  });

  it('should let overrides win', () => {
    expect(resolveTarget({ address: '10.0.0.7', port: 5037 }, config)).toEqual({ address: '10.0.0.7', port: 5037 });
  });

  it('should require an address', () => {
    const { address: _address, ...withoutAddress } = config;

    expect(() => resolveTarget({}, withoutAddress)).toThrow('No device address given');
  });

  it('should format the serial as address:port', () => {
    expect(targetSerial({ address: '10.0.0.7', port: 5037 })).toBe('10.0.0.7:5037');
  });
});
