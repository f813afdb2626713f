/**
 * AdapterError and the Result type returned by every fallible adapter and
 * reaper operation.
 *
 * Nothing here is ambient: each call returns its own error value, there is
 * no "last error" slot to read afterwards.
 */

import type { ErrorCodeValue } from '../types/errors.js';
import { LIFECYCLE_CODES, describeError } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Brand symbol (module-private, not exported)
// ---------------------------------------------------------------------------

const ADAPTER_ERROR_BRAND = Symbol.for('zmq-reactor.AdapterError');

// ---------------------------------------------------------------------------
// AdapterError
// ---------------------------------------------------------------------------

export interface AdapterErrorOptions {
  code: ErrorCodeValue;
  /** Defaults to the generic description of the code. */
  message?: string;
  /** The collaborator error that caused this one, if any. */
  cause?: unknown;
}

export class AdapterError extends Error {
  readonly code: ErrorCodeValue;
  override readonly cause?: unknown;

  /** @internal Brand for safe instanceof checks across module boundaries. */
  readonly [ADAPTER_ERROR_BRAND] = true as const;

  constructor(options: AdapterErrorOptions) {
    super(options.message ?? describeError(options.code));
    this.name = 'AdapterError';
    this.code = options.code;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  /** True when the error reports a call-order mistake rather than a resource failure. */
  get isLifecycleError(): boolean {
    return LIFECYCLE_CODES.has(this.code);
  }
}

/** Type guard for AdapterError instances, including ones from another copy of this module. */
export function isAdapterError(value: unknown): value is AdapterError {
  if (value instanceof AdapterError) {
    return true;
  }
  return (
    typeof value === 'object' &&
    value !== null &&
    ADAPTER_ERROR_BRAND in value &&
    value[ADAPTER_ERROR_BRAND] === true
  );
}

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

export type Result<T> = { ok: true; value: T } | { ok: false; error: AdapterError };

export function ok(): Result<void>;
export function ok<T>(value: T): Result<T>;
export function ok<T>(value?: T): Result<T | undefined> {
  return { ok: true, value };
}

export function fail<T = never>(code: ErrorCodeValue, message?: string, cause?: unknown): Result<T> {
  return { ok: false, error: new AdapterError({ code, message, cause }) };
}
