/**
 * TOML-based configuration loader.
 *
 * Reads `zmq-reactor.toml`, parses it with smol-toml, validates it against
 * the config schema and returns a fully typed `ReactorConfig`.
 * `applyConfig()` turns a loaded config into logging settings and the
 * option defaults for adapters and the reaper.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';

import { DEFAULT_CONFIG, parseConfig, resolveConfigPath } from '../types/config.js';
import type { ReactorConfig } from '../types/config.js';
import { configureLogging, createLogger } from './logger.js';
import type { AdapterOptions } from './socket-adapter.js';
import type { ReaperOptions } from './reaper.js';

const logger = createLogger('config');

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

/**
 * Load and validate a config file.
 *
 * If the file does not exist or is empty, returns the defaults. Throws on
 * invalid TOML syntax or schema violations.
 */
export function loadConfig(configPath: string = resolveConfigPath()): ReactorConfig {
  if (!existsSync(configPath)) {
    logger.debug('no config file, using defaults', { path: configPath });
    return structuredClone(DEFAULT_CONFIG);
  }

  const content = readFileSync(configPath, 'utf-8');
  if (content.trim().length === 0) {
    return structuredClone(DEFAULT_CONFIG);
  }

  return parseConfig(parseTOML(content));
}

// ---------------------------------------------------------------------------
// applyConfig()
// ---------------------------------------------------------------------------

/** Option defaults derived from a config. */
export interface AppliedConfig {
  adapter: Required<Pick<AdapterOptions, 'maxBatch' | 'readinessCheckInterval'>>;
  reaper: Required<Pick<ReaperOptions, 'intervalMs'>>;
}

/** Set the global log level and return adapter/reaper option defaults. */
export function applyConfig(config: ReactorConfig): AppliedConfig {
  configureLogging({ level: config.logging.level });
  return {
    adapter: {
      maxBatch: config.drain.max_batch,
      readinessCheckInterval: config.drain.readiness_check_interval,
    },
    reaper: { intervalMs: config.reaper.interval_ms },
  };
}
