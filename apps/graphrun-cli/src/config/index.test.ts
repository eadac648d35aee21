import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ValidationError } from '@graphrun/shared';
import { ConfigManager, DEFAULT_CONFIG, defaultConfigDir, isConfigKey } from './index.js';

describe('ConfigManager', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'graphrun-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should start from defaults without writing a file', () => {
    const manager = new ConfigManager(dir);

    expect(manager.get()).toEqual(DEFAULT_CONFIG);
    expect(manager.getPath()).toBe(join(dir, 'config.json'));
  });

  it('should persist values', () => {
    new ConfigManager(dir).set('serviceUrl', 'http://127.0.0.1:9000');

    const reloaded = new ConfigManager(dir);
    expect(reloaded.get().serviceUrl).toBe('http://127.0.0.1:9000');
    expect(JSON.parse(readFileSync(join(dir, 'config.json'), 'utf-8'))).toEqual({
      serviceUrl: 'http://127.0.0.1:9000',
      defaultFormat: 'table',
    });
  });

  it('should reject invalid values', () => {
    const manager = new ConfigManager(dir);

    expect(() => manager.set('defaultFormat', 'yaml')).toThrow(ValidationError);
    expect(manager.get().defaultFormat).toBe('table');
  });

  it('should fall back to defaults for a corrupt file', () => {
    writeFileSync(join(dir, 'config.json'), '{not json');

    expect(new ConfigManager(dir).get()).toEqual(DEFAULT_CONFIG);
  });

  it('should honour GRAPHRUN_CONFIG_DIR', () => {
    expect(defaultConfigDir({ GRAPHRUN_CONFIG_DIR: dir })).toBe(dir);
  });

  it('should recognise config keys', () => {
    expect(isConfigKey('serviceUrl')).toBe(true);
    expect(isConfigKey('color')).toBe(false);
  });
});
