/**
 * Structured JSON logging for zmq-reactor.
 *
 * Provides component-scoped loggers with level filtering and an injectable
 * sink for testing. All log output is JSON with level, ts, component and
 * msg fields; well-known fields (fd, socket_type, error_code, duration_ms)
 * are promoted to the top level.
 *
 * @example
 * ```ts
 * const logger = createLogger('adapter');
 * logger.warn('receive failed', { fd: 7, error: err });
 * // → {"level":"warn","ts":"...","component":"adapter","msg":"receive failed","fd":7,"meta":{"error":{...}}}
 * ```
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Log severity levels in ascending order. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** A structured log entry. */
export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  fd?: number;
  socket_type?: string;
  error_code?: string;
  duration_ms?: number;
  meta?: Record<string, unknown>;
}

/** A function that consumes a log entry (output destination). */
export type LogSink = (entry: LogEntry) => void;

/** Context fields that are automatically promoted to every log entry. */
export interface LogContext {
  fd?: number;
  socket_type?: string;
}

/** A structured logger scoped to a component. */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(subComponent: string): Logger;
  withContext(ctx: LogContext): Logger;
}

// ---------------------------------------------------------------------------
// Level ordering
// ---------------------------------------------------------------------------

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Global state
// ---------------------------------------------------------------------------

let globalLevel: LogLevel = 'info';
let globalSink: LogSink = defaultSink;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Configure the global logging level and/or sink. */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level !== undefined) {
    globalLevel = options.level;
  }
  if (options.sink !== undefined) {
    globalSink = options.sink;
  }
}

/** Reset logging to defaults (level: info, sink: stderr JSON). */
export function resetLogging(): void {
  globalLevel = 'info';
  globalSink = defaultSink;
}

// ---------------------------------------------------------------------------
// Default sink (stderr JSON)
// ---------------------------------------------------------------------------

// stderr: stdout belongs to the embedding application.
function defaultSink(entry: LogEntry): void {
  process.stderr.write(JSON.stringify(entry) + '\n');
}

// ---------------------------------------------------------------------------
// Metadata sanitization
// ---------------------------------------------------------------------------

/** Maximum length for string values in metadata before truncation. */
export const META_STRING_MAX_LENGTH = 1024;

const PROMOTED_KEYS: ReadonlySet<string> = new Set([
  'fd',
  'socket_type',
  'error_code',
  'duration_ms',
]);

/**
 * Serialize Errors, truncate long strings and summarize Buffers in metadata.
 * Promoted keys are left out; they are copied to the entry itself.
 */
function sanitizeMeta(meta?: Record<string, unknown>): Record<string, unknown> | undefined {
  if (!meta) return undefined;

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (PROMOTED_KEYS.has(key)) continue;

    if (value instanceof Error) {
      result[key] = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    } else if (Buffer.isBuffer(value)) {
      result[key] = { bytes: value.length };
    } else if (typeof value === 'string' && value.length > META_STRING_MAX_LENGTH) {
      result[key] = value.slice(0, META_STRING_MAX_LENGTH) + '...[truncated]';
    } else {
      result[key] = value;
    }
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

/**
 * Create a structured logger scoped to a component.
 *
 * @param component - Component name (e.g. `'adapter'`, `'event-loop'`).
 * @param boundContext - Optional context fields promoted to every entry.
 */
export function createLogger(component: string, boundContext?: LogContext): Logger {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const entry: LogEntry = {
      level,
      ts: new Date().toISOString(),
      component,
      msg: message,
    };

    if (boundContext) {
      if (boundContext.fd !== undefined) entry.fd = boundContext.fd;
      if (boundContext.socket_type) entry.socket_type = boundContext.socket_type;
    }

    // Promote well-known fields from meta to top-level
    if (meta) {
      const { fd, socket_type, error_code, duration_ms } = meta;
      if (typeof fd === 'number') entry.fd = fd;
      if (typeof socket_type === 'string') entry.socket_type = socket_type;
      if (typeof error_code === 'string') entry.error_code = error_code;
      if (typeof duration_ms === 'number') entry.duration_ms = duration_ms;
    }

    const sanitized = sanitizeMeta(meta);
    if (sanitized !== undefined) {
      entry.meta = sanitized;
    }

    globalSink(entry);
  }

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (subComponent) => createLogger(`${component}:${subComponent}`, boundContext),
    withContext: (ctx) => {
      const merged: LogContext = { ...boundContext, ...ctx };
      return createLogger(component, merged);
    },
  };
}
