/**
 * zmq-reactor configuration schema and config file resolution.
 *
 * Defines the TypeScript types for the `zmq-reactor.toml` sections, the
 * JSON Schema used to validate them with ajv, and the defaults applied
 * when a section or key is absent.
 */

import { join } from 'node:path';
import _Ajv from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

import type { LogLevel } from '../core/logger.js';

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** `[drain]` section. */
export interface DrainConfig {
  /** Hard cap on messages delivered per readiness callback. */
  max_batch: number;
  /** Re-check socket readiness every N delivered messages. */
  readiness_check_interval: number;
}

/** `[reaper]` section. */
export interface ReaperConfig {
  interval_ms: number;
}

/** `[logging]` section. */
export interface LoggingConfig {
  level: LogLevel;
}

/**
 * Full configuration.
 *
 * Known sections are strongly typed. Unknown top-level keys are preserved
 * as-is so embedders can keep their own sections in the same file.
 */
export interface ReactorConfig {
  drain: DrainConfig;
  reaper: ReaperConfig;
  logging: LoggingConfig;
  [section: string]: unknown;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: ReactorConfig = {
  drain: { max_batch: 1000, readiness_check_interval: 50 },
  reaper: { interval_ms: 10 },
  logging: { level: 'info' },
};

/** Environment variable that points at the config file. */
export const CONFIG_ENV_VAR = 'ZMQ_REACTOR_CONFIG';

/** File name looked up in the working directory when the env var is unset. */
export const CONFIG_FILE_NAME = 'zmq-reactor.toml';

// ---------------------------------------------------------------------------
// JSON Schema
// ---------------------------------------------------------------------------

export const CONFIG_JSON_SCHEMA = {
  type: 'object',
  properties: {
    drain: {
      type: 'object',
      properties: {
        max_batch: { type: 'integer', minimum: 1 },
        readiness_check_interval: { type: 'integer', minimum: 1 },
      },
      additionalProperties: false,
    },
    reaper: {
      type: 'object',
      properties: {
        interval_ms: { type: 'integer', minimum: 1 },
      },
      additionalProperties: false,
    },
    logging: {
      type: 'object',
      properties: {
        level: { enum: ['debug', 'info', 'warn', 'error'] },
      },
      additionalProperties: false,
    },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateConfig = ajv.compile(CONFIG_JSON_SCHEMA);

// ---------------------------------------------------------------------------
// resolveConfigPath()
// ---------------------------------------------------------------------------

/**
 * Resolve the config file path.
 *
 * Precedence:
 *  1. `$ZMQ_REACTOR_CONFIG` (if non-empty)
 *  2. `zmq-reactor.toml` in `cwd`
 */
export function resolveConfigPath(cwd: string = process.cwd()): string {
  const envValue = process.env[CONFIG_ENV_VAR];
  if (envValue && envValue.length > 0) {
    return envValue;
  }
  return join(cwd, CONFIG_FILE_NAME);
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

/**
 * Validate a raw config object (e.g. from TOML parsing) and merge it over
 * the defaults. Throws with every schema violation listed.
 */
export function parseConfig(raw: Record<string, unknown>): ReactorConfig {
  if (!validateConfig(raw)) {
    const details = (validateConfig.errors ?? [])
      .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const drain = sectionOf(raw, 'drain');
  const reaper = sectionOf(raw, 'reaper');
  const logging = sectionOf(raw, 'logging');

  return {
    ...raw,
    drain: {
      max_batch: integerOr(drain['max_batch'], DEFAULT_CONFIG.drain.max_batch),
      readiness_check_interval: integerOr(
        drain['readiness_check_interval'],
        DEFAULT_CONFIG.drain.readiness_check_interval,
      ),
    },
    reaper: {
      interval_ms: integerOr(reaper['interval_ms'], DEFAULT_CONFIG.reaper.interval_ms),
    },
    logging: {
      level: levelOr(logging['level'], DEFAULT_CONFIG.logging.level),
    },
  };
}

function sectionOf(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function integerOr(value: unknown, fallback: number): number {
  return typeof value === 'number' ? value : fallback;
}

function levelOr(value: unknown, fallback: LogLevel): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return fallback;
  }
}
