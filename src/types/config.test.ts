import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'node:path';
import {
  parseConfig,
  resolveConfigPath,
  DEFAULT_CONFIG,
  CONFIG_ENV_VAR,
  CONFIG_FILE_NAME,
} from './config.js';

// ---------------------------------------------------------------------------
// resolveConfigPath()
// ---------------------------------------------------------------------------

describe('resolveConfigPath', () => {
  const originalEnv = process.env[CONFIG_ENV_VAR];

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env[CONFIG_ENV_VAR] = originalEnv;
    } else {
      delete process.env[CONFIG_ENV_VAR];
    }
  });

  it('returns $ZMQ_REACTOR_CONFIG when set', () => {
    process.env[CONFIG_ENV_VAR] = '/etc/reactor/custom.toml';
    expect(resolveConfigPath('/work')).toBe('/etc/reactor/custom.toml');
  });

  it('falls back to the working directory when the variable is unset', () => {
    delete process.env[CONFIG_ENV_VAR];
    expect(resolveConfigPath('/work')).toBe(join('/work', CONFIG_FILE_NAME));
  });

  it('falls back to the working directory when the variable is empty', () => {
    process.env[CONFIG_ENV_VAR] = '';
    expect(resolveConfigPath('/work')).toBe('/work/zmq-reactor.toml');
  });
});

// ---------------------------------------------------------------------------
// DEFAULT_CONFIG
// ---------------------------------------------------------------------------

describe('DEFAULT_CONFIG', () => {
  it('caps a drain pass at 1000 messages with a re-check every 50', () => {
    expect(DEFAULT_CONFIG.drain).toEqual({ max_batch: 1000, readiness_check_interval: 50 });
  });

  it('ticks the reaper every 10 ms and logs at info', () => {
    expect(DEFAULT_CONFIG.reaper.interval_ms).toBe(10);
    expect(DEFAULT_CONFIG.logging.level).toBe('info');
  });
});

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

describe('parseConfig', () => {
  it('returns the defaults for an empty object', () => {
    expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('applies values from every section', () => {
    const config = parseConfig({
      drain: { max_batch: 200, readiness_check_interval: 10 },
      reaper: { interval_ms: 25 },
      logging: { level: 'debug' },
    });

    expect(config.drain).toEqual({ max_batch: 200, readiness_check_interval: 10 });
    expect(config.reaper.interval_ms).toBe(25);
    expect(config.logging.level).toBe('debug');
  });

  it('fills keys missing from a present section', () => {
    const config = parseConfig({ drain: { max_batch: 64 } });
    expect(config.drain).toEqual({ max_batch: 64, readiness_check_interval: 50 });
  });

  it('preserves unknown top-level sections', () => {
    const config = parseConfig({ app: { name: 'echo' } });
    expect(config['app']).toEqual({ name: 'echo' });
  });

  it('does not share objects with DEFAULT_CONFIG', () => {
    const config = parseConfig({});
    config.drain.max_batch = 1;
    expect(DEFAULT_CONFIG.drain.max_batch).toBe(1000);
  });

  it('rejects a zero batch cap', () => {
    expect(() => parseConfig({ drain: { max_batch: 0 } })).toThrow(
      'Invalid configuration: /drain/max_batch must be >= 1',
    );
  });

  it('rejects a non-integer interval', () => {
    expect(() => parseConfig({ reaper: { interval_ms: 2.5 } })).toThrow(
      'Invalid configuration: /reaper/interval_ms must be integer',
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => parseConfig({ logging: { level: 'verbose' } })).toThrow(/\/logging\/level/);
  });

  it('rejects unknown keys inside a known section', () => {
    expect(() => parseConfig({ drain: { batch: 5 } })).toThrow(
      'must NOT have additional properties',
    );
  });

  it('lists every violation', () => {
    expect(() =>
      parseConfig({ drain: { max_batch: 0 }, reaper: { interval_ms: 0 } }),
    ).toThrow('/drain/max_batch must be >= 1; /reaper/interval_ms must be >= 1');
  });
});
