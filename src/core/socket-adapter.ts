/**
 * Socket adapter: delivers a message socket's traffic through a reactor.
 *
 * The adapter registers the socket's readiness descriptor with the reactor
 * and, on every readable event, drains the socket with non-blocking
 * receives until it would block, or until `maxBatch` messages; the reactor
 * reports a still-readable descriptor again on its next iteration. It never
 * owns the socket or the loop; freeing an adapter leaves the socket open
 * and usable.
 *
 * Lifecycle:
 *
 *   open ──close()──▶ closed ──free()──▶ freeing ──(poll closed)──▶ freed
 *     └──────────────free()──────────────▲
 *
 * `freeing → freed` happens only in the reactor's close callback, because
 * the poll handle is not detached until the reactor says so. Two references
 * guard the transition (the free() call itself and the pending close), so
 * the adapter is reclaimed exactly once whichever side finishes last.
 *
 * @see src/types/reactor.ts for the reactor contract
 * @see src/types/socket.ts for the socket contract
 */

import type { PollEventMask, PollHandle, Reactor } from '../types/reactor.js';
import { PollEvent } from '../types/reactor.js';
import type { Message, MessageSocket, ReceiveResult } from '../types/socket.js';
import { SocketEvent } from '../types/socket.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import { ErrorCode } from '../types/errors.js';
import { fail, ok, type Result } from './adapter-error.js';
import { createLogger, type Logger } from './logger.js';
import { isExhaustion } from './reactor-error.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type AdapterState = 'open' | 'closed' | 'freeing' | 'freed';

/**
 * Receives each drained message. The handler owns `message` from then on:
 * it may keep it, drop it, or send it straight back out.
 */
export type MessageHandler<C = unknown> = (
  adapter: SocketAdapter<C>,
  message: Message,
  context: C | null,
) => void;

export interface AdapterOptions {
  /** Hard cap on messages delivered per readiness event. */
  maxBatch?: number;
  /** Re-check the socket's readiness flags every N delivered messages. */
  readinessCheckInterval?: number;
  logger?: Logger;
}

/** Why a drain pass ended. */
export type DrainStop = 'would-block' | 'drained' | 'batch-limit' | 'error' | 'state-changed';

export interface DrainStats {
  delivered: number;
  stop: DrainStop;
}

// ---------------------------------------------------------------------------
// SocketAdapter
// ---------------------------------------------------------------------------

export class SocketAdapter<C = unknown> {
  private stateValue: AdapterState = 'open';
  private poll: PollHandle | null;
  private handler: MessageHandler<C> | null;
  private userContext: C | null;
  private pendingCloseRefs = 0;
  private delivered = 0;
  private lastDrainStats: DrainStats | null = null;
  private resolveFreed: () => void = () => {};
  private readonly freedPromise = new Promise<void>((resolve) => {
    this.resolveFreed = resolve;
  });

  private constructor(
    private readonly loop: Reactor,
    private readonly socket: MessageSocket,
    private readonly fd: number,
    poll: PollHandle,
    handler: MessageHandler<C> | null,
    userContext: C | null,
    private readonly maxBatch: number,
    private readonly readinessCheckInterval: number,
    private readonly logger: Logger,
  ) {
    this.poll = poll;
    this.handler = handler;
    this.userContext = userContext;
  }

  /**
   * Wrap `socket` and register its readiness descriptor with `loop`.
   *
   * Every failure unwinds what was already acquired; no partially
   * registered adapter is ever returned.
   */
  static create<C = unknown>(
    loop: Reactor | null | undefined,
    socket: MessageSocket | null | undefined,
    onMessage?: MessageHandler<C> | null,
    userContext?: C | null,
    options: AdapterOptions = {},
  ): Result<SocketAdapter<C>> {
    const baseLogger = options.logger ?? createLogger('adapter');

    if (!loop || !socket) {
      baseLogger.error('create called without a loop or socket', {
        error_code: ErrorCode.INVALID_ARGUMENT,
      });
      return fail(ErrorCode.INVALID_ARGUMENT, 'loop and socket are required');
    }

    const maxBatch = options.maxBatch ?? DEFAULT_CONFIG.drain.max_batch;
    const readinessCheckInterval =
      options.readinessCheckInterval ?? DEFAULT_CONFIG.drain.readiness_check_interval;
    if (!isPositiveInteger(maxBatch) || !isPositiveInteger(readinessCheckInterval)) {
      baseLogger.error('invalid drain settings', {
        max_batch: maxBatch,
        readiness_check_interval: readinessCheckInterval,
        error_code: ErrorCode.INVALID_ARGUMENT,
      });
      return fail(
        ErrorCode.INVALID_ARGUMENT,
        'maxBatch and readinessCheckInterval must be positive integers',
      );
    }

    let fd: number;
    try {
      fd = socket.getReadinessFd();
    } catch (err) {
      baseLogger.error('failed to query readiness descriptor', {
        socket_type: socket.type,
        error_code: ErrorCode.INTROSPECTION_FAILED,
        error: err,
      });
      return fail(ErrorCode.INTROSPECTION_FAILED, 'socket did not report a readiness descriptor', err);
    }
    if (!Number.isInteger(fd) || fd < 0) {
      baseLogger.error('socket reported an invalid readiness descriptor', {
        socket_type: socket.type,
        fd,
        error_code: ErrorCode.INTROSPECTION_FAILED,
      });
      return fail(ErrorCode.INTROSPECTION_FAILED, `socket reported invalid readiness descriptor ${fd}`);
    }

    const logger = baseLogger.withContext({ fd, socket_type: socket.type });

    let poll: PollHandle;
    try {
      poll = loop.openPoll(fd);
    } catch (err) {
      const code = isExhaustion(err) ? ErrorCode.RESOURCE_EXHAUSTED : ErrorCode.REGISTRATION_FAILED;
      logger.error('poll initialization failed', { error_code: code, error: err });
      return fail(code, 'reactor could not register the readiness descriptor', err);
    }

    const adapter = new SocketAdapter<C>(
      loop,
      socket,
      fd,
      poll,
      onMessage ?? null,
      userContext ?? null,
      maxBatch,
      readinessCheckInterval,
      logger,
    );

    try {
      poll.start(PollEvent.READABLE, (status, events) => adapter.handleReadiness(status, events));
    } catch (err) {
      poll.close();
      logger.error('poll start failed', { error_code: ErrorCode.REGISTRATION_FAILED, error: err });
      return fail(ErrorCode.REGISTRATION_FAILED, 'reactor could not start polling', err);
    }

    logger.debug('adapter created');
    return ok(adapter);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  get state(): AdapterState {
    return this.stateValue;
  }

  /**
   * Stop delivering messages. The socket is untouched; the poll handle stops
   * watching but stays registered until {@link free}.
   */
  close(): Result<void> {
    if (this.stateValue !== 'open') {
      return fail(ErrorCode.INVALID_STATE, `cannot close an adapter in state '${this.stateValue}'`);
    }
    this.stateValue = 'closed';
    this.stopWatching();
    this.logger.debug('adapter closed');
    return ok();
  }

  /**
   * Unregister from the reactor and release the adapter.
   *
   * Closes first when still open. Returns as soon as the reactor's close has
   * been requested; {@link whenFreed} resolves once it has completed. The
   * wrapped socket is usable as soon as this returns.
   */
  free(): Result<void> {
    if (this.stateValue === 'freeing' || this.stateValue === 'freed') {
      return fail(ErrorCode.INVALID_STATE, `cannot free an adapter in state '${this.stateValue}'`);
    }

    this.stateValue = 'freeing';
    this.pendingCloseRefs = 2;

    const poll = this.poll;
    let closeRequested = false;
    if (poll && !poll.isClosing()) {
      try {
        poll.stop();
        poll.close(() => this.release());
        closeRequested = true;
      } catch (err) {
        this.logger.warn('reactor refused to close the poll handle', { error: err });
      }
    }
    if (!closeRequested) {
      // Nothing pending on the reactor side: drop its reference now.
      this.pendingCloseRefs--;
    }

    this.release();
    return ok();
  }

  /** Resolves once the adapter has reached `freed`. */
  whenFreed(): Promise<void> {
    return this.freedPromise;
  }

  private release(): void {
    if (this.pendingCloseRefs === 0) return;
    this.pendingCloseRefs--;
    if (this.pendingCloseRefs > 0) return;

    this.stateValue = 'freed';
    this.poll = null;
    this.handler = null;
    this.userContext = null;
    this.logger.debug('adapter freed', { messages: this.delivered });
    this.resolveFreed();
  }

  // -------------------------------------------------------------------------
  // Accessors
  // -------------------------------------------------------------------------

  private get valid(): boolean {
    return this.stateValue === 'open' || this.stateValue === 'closed';
  }

  getSocket(): MessageSocket | null {
    return this.valid ? this.socket : null;
  }

  getLoop(): Reactor | null {
    return this.valid ? this.loop : null;
  }

  getUserContext(): C | null {
    return this.valid ? this.userContext : null;
  }

  /** The descriptor captured at creation, or -1 once freeing has started. */
  getReadinessFd(): number {
    return this.valid ? this.fd : -1;
  }

  /** Messages delivered to the handler over the adapter's life. */
  get totalMessages(): number {
    return this.delivered;
  }

  get lastDrain(): DrainStats | null {
    return this.lastDrainStats;
  }

  /**
   * Non-blocking query of the socket's current readiness flags, masked by
   * `events` ({@link SocketEvent} bits).
   */
  pollEvents(events: number): Result<number> {
    if (!this.valid) {
      return fail(ErrorCode.INVALID_STATE, `cannot poll an adapter in state '${this.stateValue}'`);
    }
    try {
      return ok(this.socket.getEvents() & events);
    } catch (err) {
      return fail(ErrorCode.INTROSPECTION_FAILED, 'socket did not report its readiness flags', err);
    }
  }

  // -------------------------------------------------------------------------
  // Drain loop
  // -------------------------------------------------------------------------

  private handleReadiness(status: number, events: PollEventMask): void {
    if (this.stateValue !== 'open') return;

    if (status < 0) {
      this.logger.warn('reactor reported a poll error', { status });
      return;
    }
    if ((events & PollEvent.READABLE) === 0) return;

    const handler = this.handler;
    if (!handler) {
      // Nothing will ever consume the input; stop being reported readable.
      this.stopWatching();
      return;
    }

    const started = Date.now();
    const stats = this.drain(handler);
    this.lastDrainStats = stats;
    this.logger.debug('drain finished', {
      delivered: stats.delivered,
      stop: stats.stop,
      duration_ms: Date.now() - started,
    });
  }

  private drain(handler: MessageHandler<C>): DrainStats {
    let delivered = 0;

    for (;;) {
      let result: ReceiveResult;
      try {
        result = this.socket.tryReceive();
      } catch (err) {
        result = { status: 'error', error: toError(err) };
      }

      if (result.status === 'would-block') {
        return { delivered, stop: 'would-block' };
      }
      if (result.status === 'error') {
        this.logger.warn('receive failed', { error: result.error });
        return { delivered, stop: 'error' };
      }

      this.deliver(handler, result.message);
      delivered++;

      if (this.stateValue !== 'open') {
        return { delivered, stop: 'state-changed' };
      }
      if (delivered >= this.maxBatch) {
        return { delivered, stop: 'batch-limit' };
      }
      if (delivered % this.readinessCheckInterval === 0 && !this.hasPendingInput()) {
        return { delivered, stop: 'drained' };
      }
    }
  }

  private stopWatching(): void {
    try {
      this.poll?.stop();
    } catch (err) {
      this.logger.warn('reactor refused to stop the poll handle', { error: err });
    }
  }

  private deliver(handler: MessageHandler<C>, message: Message): void {
    this.delivered++;
    try {
      handler(this, message, this.userContext);
    } catch (err) {
      this.logger.error('message handler threw', { error: err });
    }
  }

  private hasPendingInput(): boolean {
    try {
      return (this.socket.getEvents() & SocketEvent.POLLIN) !== 0;
    } catch (err) {
      // Keep draining; the batch cap still bounds this pass.
      this.logger.debug('readiness re-check failed', { error: err });
      return true;
    }
  }
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// ---------------------------------------------------------------------------
// Handle-style API
// ---------------------------------------------------------------------------

type AdapterHandle<C> = SocketAdapter<C> | null | undefined;

/** Create an adapter. See {@link SocketAdapter.create}. */
export function createAdapter<C = unknown>(
  loop: Reactor | null | undefined,
  socket: MessageSocket | null | undefined,
  onMessage?: MessageHandler<C> | null,
  userContext?: C | null,
  options?: AdapterOptions,
): Result<SocketAdapter<C>> {
  return SocketAdapter.create(loop, socket, onMessage, userContext, options);
}

export function closeAdapter<C>(adapter: AdapterHandle<C>): Result<void> {
  if (!adapter) return fail(ErrorCode.INVALID_ARGUMENT, 'adapter is required');
  return adapter.close();
}

export function freeAdapter<C>(adapter: AdapterHandle<C>): Result<void> {
  if (!adapter) return fail(ErrorCode.INVALID_ARGUMENT, 'adapter is required');
  return adapter.free();
}

export function getSocket<C>(adapter: AdapterHandle<C>): MessageSocket | null {
  return adapter ? adapter.getSocket() : null;
}

export function getLoop<C>(adapter: AdapterHandle<C>): Reactor | null {
  return adapter ? adapter.getLoop() : null;
}

export function getUserContext<C>(adapter: AdapterHandle<C>): C | null {
  return adapter ? adapter.getUserContext() : null;
}

export function getReadinessFd<C>(adapter: AdapterHandle<C>): number {
  return adapter ? adapter.getReadinessFd() : -1;
}

export function adapterState<C>(adapter: AdapterHandle<C>): AdapterState | null {
  return adapter ? adapter.state : null;
}

export function pollAdapter<C>(adapter: AdapterHandle<C>, events: number): Result<number> {
  if (!adapter) return fail(ErrorCode.INVALID_ARGUMENT, 'adapter is required');
  return adapter.pollEvents(events);
}
