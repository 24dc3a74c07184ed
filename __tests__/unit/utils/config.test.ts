import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach } from 'vitest';
import { loadEngineConfig, resetConfigCache } from '../../../src/utils/config';
import { ConfigError } from '../../../src/application/errors';

describe('utils/config', () => {
  beforeEach(() => {
    delete process.env.TA_RESYNC_INTERVAL;
    delete process.env.TA_INDICATORS_FILE;
    resetConfigCache();
  });

  it('uses defaults when nothing is set', () => {
    expect(loadEngineConfig()).toEqual({ resyncInterval: 1024, indicatorsFile: undefined });
  });

  it('reads the environment', () => {
    process.env.TA_RESYNC_INTERVAL = '64';
    process.env.TA_INDICATORS_FILE = 'conf/ind.json';
    expect(loadEngineConfig()).toEqual({ resyncInterval: 64, indicatorsFile: 'conf/ind.json' });
  });

  it('treats a blank interval as unset', () => {
    process.env.TA_RESYNC_INTERVAL = '  ';
    expect(loadEngineConfig().resyncInterval).toBe(1024);
  });

  it('caches until resetConfigCache', () => {
    process.env.TA_RESYNC_INTERVAL = '8';
    const first = loadEngineConfig();
    process.env.TA_RESYNC_INTERVAL = '16';
    expect(loadEngineConfig()).toBe(first);
    resetConfigCache();
    expect(loadEngineConfig().resyncInterval).toBe(16);
  });

  it.each(['0', '-3', '2.5', 'often'])('rejects TA_RESYNC_INTERVAL=%s', (value) => {
    process.env.TA_RESYNC_INTERVAL = value;
    try {
      loadEngineConfig();
      expect.unreachable('loadEngineConfig should throw');
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (e instanceof ConfigError) expect(e.parameter).toBe('TA_RESYNC_INTERVAL');
    }
  });

  it('seeds the environment from a dotenv file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ta-env-'));
    const envFile = path.join(dir, '.env');
    fs.writeFileSync(envFile, 'TA_RESYNC_INTERVAL=32\nTA_INDICATORS_FILE=custom.json\n');
    try {
      expect(loadEngineConfig({ envFile })).toEqual({ resyncInterval: 32, indicatorsFile: 'custom.json' });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
