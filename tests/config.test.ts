import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ConfigError } from '../src/domain/errors.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      redisUrl: 'redis://localhost:6379',
      store: 'redis',
      variablePrefix: 'var~',
      rulesDir: './rules',
      ruleExtension: '.rule',
      clockIntervalMs: 1000,
      batchWarnThreshold: 100,
      http: { enabled: true, host: '0.0.0.0', port: 3000 },
      logLevel: 'info',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      STORE: 'memory',
      RULES_DIR: '/etc/rules',
      CLOCK_INTERVAL_MS: '250',
      HTTP_ENABLED: '0',
      PORT: '8080',
      LOG_LEVEL: 'debug',
    });

    expect(config.store).toBe('memory');
    expect(config.rulesDir).toBe('/etc/rules');
    expect(config.clockIntervalMs).toBe(250);
    expect(config.http).toEqual({ enabled: false, host: '0.0.0.0', port: 8080 });
    expect(config.logLevel).toBe('debug');
  });

  it('treats empty values as unset', () => {
    expect(loadConfig({ PORT: '', VARIABLE_PREFIX: '' })).toMatchObject({
      variablePrefix: 'var~',
      http: { port: 3000 },
    });
  });

  it('reports every invalid variable', () => {
    expect(() => loadConfig({ PORT: 'abc', STORE: 'disk' })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: 'abc', STORE: 'disk' })).toThrow(/STORE: .*PORT: /);
  });

  it('rejects a clock interval below 10ms', () => {
    expect(() => loadConfig({ CLOCK_INTERVAL_MS: '5' })).toThrow(/^invalid configuration: CLOCK_INTERVAL_MS: /);
  });
});
