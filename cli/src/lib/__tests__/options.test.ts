/**
 * Tests for CLI option handling and device file loading
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { parseCount, toConfigOverrides } from '../options';
import { loadDeviceFile } from '../deviceFile';

describe('toConfigOverrides', () => {
  it('should leave unset options undefined', () => {
    expect(toConfigOverrides({})).toEqual({
      serverUrl: undefined,
      transportMode: undefined,
      authMode: undefined,
      clientCertPath: undefined,
      clientKeyPath: undefined,
      caCertPath: undefined,
      aggregatorLfdi: undefined,
      timeoutMs: undefined,
      ledgerBackend: undefined,
      ledgerPath: undefined,
    });
  });

  it('should map and validate given options', () => {
    const overrides = toConfigOverrides({
      server: 'https://server.test',
      auth: 'Local-Token',
      timeout: '2500',
      ledger: 'postgres',
    });

    expect(overrides.serverUrl).toBe('https://server.test');
    expect(overrides.authMode).toBe('local-token');
    expect(overrides.timeoutMs).toBe(2500);
    expect(overrides.ledgerBackend).toBe('postgres');
  });

  it('should switch to recording for a dry run', () => {
    expect(toConfigOverrides({ dryRun: true, transport: 'https' }).transportMode).toBe('recording');
  });

  it('should name the option in errors', () => {
    expect(() => toConfigOverrides({ transport: 'ftp' })).toThrow(
      'Invalid --transport: "ftp". Expected one of: https, recording'
    );
    expect(() => toConfigOverrides({ timeout: '-5' })).toThrow('Invalid --timeout: "-5"');
  });
});

describe('parseCount', () => {
  it('should accept integers at or above the minimum', () => {
    expect(parseCount('25', '--page-size')).toBe(25);
    expect(parseCount('0', '--start', 0)).toBe(0);
  });

  it('should reject anything else', () => {
    expect(() => parseCount('0', '--page-size')).toThrow('Invalid --page-size: "0". Expected an integer >= 1');
    expect(() => parseCount('ten', '--start', 0)).toThrow('Invalid --start: "ten"');
  });
});

describe('loadDeviceFile', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'edev-devices-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should load the example device file', () => {
    const specs = loadDeviceFile(path.resolve(__dirname, '../../../../examples/devices.example.json'));

    expect(specs.map((s) => s.lFDI)).toEqual(['3E4F45AB3', '41434D452D30303031']);
  });

  it('should reject a file that is not JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '[{', 'utf-8');

    expect(() => loadDeviceFile(file)).toThrow(`Device file ${file} is not valid JSON`);
  });
});
