/**
 * Reactor abstraction interfaces.
 *
 * The adapter never owns the loop it runs on. It only needs three things
 * from it: a poll registration for a readiness descriptor, an asynchronous
 * close of that registration, and a repeating timer for the reaper.
 *
 * All callbacks run on the loop's own thread, in the loop's own dispatch;
 * implementations must never invoke a close callback synchronously from
 * inside `close()`.
 */

// ---------------------------------------------------------------------------
// Poll events
// ---------------------------------------------------------------------------

export const PollEvent = {
  READABLE: 1,
  WRITABLE: 2,
} as const;

/** Bitmask of {@link PollEvent} flags. */
export type PollEventMask = number;

/**
 * Readiness callback.
 *
 * `status` is 0 on success and negative when the reactor reports an error
 * for the descriptor; `events` holds the triggering {@link PollEvent} flags.
 */
export type PollCallback = (status: number, events: PollEventMask) => void;

/** Invoked once the reactor has fully detached a closed handle. */
export type CloseCallback = () => void;

// ---------------------------------------------------------------------------
// Handles
// ---------------------------------------------------------------------------

/** Poll registration for a single readiness descriptor. */
export interface PollHandle {
  readonly fd: number;

  /** Start (or restart with new interest) watching the descriptor. Throws on failure. */
  start(events: PollEventMask, callback: PollCallback): void;

  /** Stop watching. The handle stays allocated until close(). */
  stop(): void;

  /** Request asynchronous close; `onClose` runs later on the loop thread. */
  close(onClose?: CloseCallback): void;

  isActive(): boolean;
  isClosing(): boolean;
}

/** Timer handle; `repeatMs > 0` makes it periodic. */
export interface TimerHandle {
  start(callback: () => void, timeoutMs: number, repeatMs: number): void;
  stop(): void;
  close(onClose?: CloseCallback): void;
  isActive(): boolean;
  isClosing(): boolean;
}

// ---------------------------------------------------------------------------
// Reactor
// ---------------------------------------------------------------------------

export interface Reactor {
  /** Register a poll handle for a readiness descriptor. Throws on failure. */
  openPoll(fd: number): PollHandle;

  /** Allocate a timer handle. Throws on failure. */
  createTimer(): TimerHandle;
}
