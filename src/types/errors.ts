/**
 * Error taxonomy for the socket adapter and the reaper.
 *
 * Lifecycle errors (calling an operation in the wrong order) are kept
 * distinct from resource errors so callers can tell "I used this wrong"
 * from "the system could not give me what I asked for".
 */

// ---------------------------------------------------------------------------
// ErrorCode
// ---------------------------------------------------------------------------

export const ErrorCode = {
  /** A required parameter was null/undefined, or a handle is invalid. */
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  /** The reactor or descriptor table ran out of capacity. */
  RESOURCE_EXHAUSTED: 'RESOURCE_EXHAUSTED',
  /** The reactor refused to initialize or start a poll/timer handle. */
  REGISTRATION_FAILED: 'REGISTRATION_FAILED',
  /** The socket could not report its readiness descriptor or flags. */
  INTROSPECTION_FAILED: 'INTROSPECTION_FAILED',
  /** close()/free() called in a state that forbids it. */
  INVALID_STATE: 'INVALID_STATE',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export const ERROR_MESSAGES: Readonly<Record<ErrorCodeValue, string>> = {
  INVALID_ARGUMENT: 'Invalid parameter',
  RESOURCE_EXHAUSTED: 'Out of resources',
  REGISTRATION_FAILED: 'Poll registration failed',
  INTROSPECTION_FAILED: 'Get socket option failed',
  INVALID_STATE: 'Operation not allowed in current state',
};

/** Codes that signal a call-order mistake rather than a resource problem. */
export const LIFECYCLE_CODES: ReadonlySet<ErrorCodeValue> = new Set<ErrorCodeValue>([
  ErrorCode.INVALID_ARGUMENT,
  ErrorCode.INVALID_STATE,
]);

/** Human-readable description of an error code. */
export function describeError(code: ErrorCodeValue): string {
  return ERROR_MESSAGES[code];
}
