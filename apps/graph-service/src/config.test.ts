import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@graphrun/shared';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      host: '0.0.0.0',
      logLevel: 'info',
      corsOrigin: '*',
      maxIterations: 10,
      snapshotExcludeKeys: ['code', 'max_iterations', 'threshold'],
    });
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      PORT: '9100',
      MAX_ITERATIONS: '25',
      SNAPSHOT_EXCLUDE_KEYS: 'secret, token ,',
    });

    expect(config.port).toBe(9100);
    expect(config.maxIterations).toBe(25);
    expect(config.snapshotExcludeKeys).toEqual(['secret', 'token']);
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ MAX_ITERATIONS: '0' })).toThrow('Invalid service configuration');
  });
});
