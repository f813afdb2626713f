/**
 * Errors thrown by reactor and descriptor-table operations.
 *
 * Codes follow the errno names libuv-style reactors report, so the adapter
 * can map them onto its own taxonomy without string matching on messages.
 */

export type ReactorErrorCode =
  | 'EINVAL'
  | 'EBADF'
  | 'EEXIST'
  | 'ENOMEM'
  | 'EMFILE'
  | 'EBUSY'
  | 'ECLOSED';

export class ReactorError extends Error {
  readonly code: ReactorErrorCode;

  constructor(code: ReactorErrorCode, message: string) {
    super(`${code}: ${message}`);
    this.name = 'ReactorError';
    this.code = code;
  }
}

export function isReactorError(value: unknown): value is ReactorError {
  return value instanceof ReactorError;
}

/** True for errors that mean "out of capacity" rather than "refused". */
export function isExhaustion(value: unknown): boolean {
  return isReactorError(value) && (value.code === 'ENOMEM' || value.code === 'EMFILE');
}
