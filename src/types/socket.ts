/**
 * Message socket abstraction interfaces.
 *
 * The adapter wraps a socket it does not own. These interfaces decouple it
 * from the concrete ZeroMQ binding so that tests can swap in in-memory fakes
 * without touching real I/O.
 *
 * A message is the list of frames of one multipart message, exactly as
 * zeromq v6 hands them out. Receiving is non-blocking: `tryReceive()` either
 * yields a message, reports would-block, or reports an error.
 */

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

/** One multipart message: its frames in order. */
export type Message = Buffer[];

/** Messaging patterns a socket may implement. */
export type SocketType = 'req' | 'rep' | 'pub' | 'sub' | 'push' | 'pull' | 'pair';

/** Readiness flags reported by {@link MessageSocket.getEvents}. */
export const SocketEvent = {
  POLLIN: 1,
  POLLOUT: 2,
} as const;

/** Outcome of one non-blocking receive attempt. */
export type ReceiveResult =
  | { status: 'message'; message: Message }
  | { status: 'would-block' }
  | { status: 'error'; error: Error };

// ---------------------------------------------------------------------------
// MessageSocket
// ---------------------------------------------------------------------------

export interface MessageSocket {
  readonly type: SocketType;

  /** Readiness descriptor; edge-triggered. Throws when unavailable. */
  getReadinessFd(): number;

  /** Current {@link SocketEvent} flags, without consuming a message. Throws when unavailable. */
  getEvents(): number;

  /** Non-blocking receive. */
  tryReceive(): ReceiveResult;

  /** Send a message. Callbacks may pass a received message straight back. */
  send(message: Message): Promise<void>;

  /** Close the socket. Owned by the embedder, never called by the adapter. */
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Maintenance
// ---------------------------------------------------------------------------

/** Bookkeeping the reaper runs on each tick. */
export interface MaintenanceTarget {
  /** Perform one round of maintenance; returns the number of items reclaimed. */
  runMaintenance(): number;
}
