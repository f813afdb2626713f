/**
 * Cooperative single-threaded reactor.
 *
 * `EventLoop` implements the {@link Reactor} contract on top of the
 * {@link DescriptorTable}: poll handles watch virtual readiness descriptors,
 * timers fire in loop time, and close callbacks are deferred to the closing
 * phase of an iteration, never run from inside `close()`.
 *
 * One iteration (`tick()`) runs three phases in order:
 *
 *   1. timers: every active timer whose due time has passed fires once
 *   2. poll: descriptors signalled since the last iteration are
 *            dispatched to their poll handle (one event per signal
 *            batch, however many messages are queued behind it); a
 *            descriptor still readable after its callback returns is
 *            dispatched again on the next iteration
 *   3. closing: close callbacks requested before this phase run
 *
 * `run()` repeats iterations until `stop()` is called or nothing is alive,
 * yielding to Node's own event loop between iterations so the sockets'
 * native I/O can make progress.
 */

import { setImmediate as yieldToHost } from 'node:timers/promises';

import type {
  CloseCallback,
  PollCallback,
  PollEventMask,
  PollHandle,
  Reactor,
  TimerHandle,
} from '../types/reactor.js';
import { PollEvent } from '../types/reactor.js';
import { DescriptorTable, defaultDescriptorTable } from './descriptor-table.js';
import { createLogger, type Logger } from './logger.js';
import { ReactorError } from './reactor-error.js';

const ALL_POLL_EVENTS = PollEvent.READABLE | PollEvent.WRITABLE;

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface EventLoopOptions {
  /** Descriptor table to watch. Defaults to the shared table. */
  descriptors?: DescriptorTable;
  /** Maximum poll + timer handles alive at once (including closing ones). */
  maxHandles?: number;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Handles
// ---------------------------------------------------------------------------

/** What a handle may ask of its loop. */
interface LoopInternals {
  now(): number;
  wake(): void;
  pollStarted(handle: LoopPollHandle): void;
  scheduleClose(handle: LoopHandle, onClose: CloseCallback | undefined): void;
}

abstract class LoopHandle {
  protected active = false;
  protected closing = false;

  constructor(protected readonly internals: LoopInternals) {}

  isActive(): boolean {
    return this.active;
  }

  isClosing(): boolean {
    return this.closing;
  }

  close(onClose?: CloseCallback): void {
    if (this.closing) {
      throw new ReactorError('ECLOSED', 'handle is already closing');
    }
    this.stop();
    this.closing = true;
    this.internals.scheduleClose(this, onClose);
  }

  abstract stop(): void;

  /** Release loop-side resources once the close has completed. */
  abstract detach(): void;

  protected assertUsable(): void {
    if (this.closing) {
      throw new ReactorError('ECLOSED', 'handle is closing');
    }
  }
}

class LoopPollHandle extends LoopHandle implements PollHandle {
  private events: PollEventMask = 0;
  private callback: PollCallback | null = null;

  constructor(
    internals: LoopInternals,
    readonly fd: number,
    private readonly unwatch: () => void,
  ) {
    super(internals);
  }

  start(events: PollEventMask, callback: PollCallback): void {
    this.assertUsable();
    if (!Number.isInteger(events) || events <= 0 || (events & ~ALL_POLL_EVENTS) !== 0) {
      throw new ReactorError('EINVAL', `invalid poll events: ${events}`);
    }
    this.events = events;
    this.callback = callback;
    this.active = true;
    this.internals.pollStarted(this);
  }

  stop(): void {
    this.active = false;
  }

  dispatch(events: PollEventMask): void {
    if (!this.active || this.closing || !this.callback) return;
    const fired = events & this.events;
    if (fired === 0) return;
    this.callback(0, fired);
  }

  wantsReadable(): boolean {
    return this.active && !this.closing && (this.events & PollEvent.READABLE) !== 0;
  }

  detach(): void {
    this.callback = null;
    this.unwatch();
  }
}

class LoopTimerHandle extends LoopHandle implements TimerHandle {
  dueAt = 0;
  private repeatMs = 0;
  private callback: (() => void) | null = null;

  start(callback: () => void, timeoutMs: number, repeatMs: number): void {
    this.assertUsable();
    if (!isDelay(timeoutMs) || !isDelay(repeatMs)) {
      throw new ReactorError('EINVAL', `invalid timer delays: ${timeoutMs}/${repeatMs}`);
    }
    this.callback = callback;
    this.repeatMs = repeatMs;
    this.dueAt = this.internals.now() + timeoutMs;
    this.active = true;
    this.internals.wake();
  }

  stop(): void {
    this.active = false;
  }

  fire(now: number): void {
    if (this.repeatMs > 0) {
      this.dueAt = now + this.repeatMs;
    } else {
      this.active = false;
    }
    this.callback?.();
  }

  detach(): void {
    this.callback = null;
  }
}

function isDelay(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

// ---------------------------------------------------------------------------
// EventLoop
// ---------------------------------------------------------------------------

export class EventLoop implements Reactor {
  readonly descriptors: DescriptorTable;
  private readonly maxHandles: number;
  private readonly logger: Logger;
  private readonly polls = new Map<number, LoopPollHandle>();
  private readonly timers = new Set<LoopTimerHandle>();
  private readonly pendingFds = new Set<number>();
  private closingQueue: Array<{ handle: LoopHandle; onClose: CloseCallback | undefined }> = [];
  private readonly internals: LoopInternals;
  private wakeup: (() => void) | null = null;
  private running = false;
  private stopRequested = false;
  private iterations = 0;

  constructor(options: EventLoopOptions = {}) {
    this.descriptors = options.descriptors ?? defaultDescriptorTable;
    this.maxHandles = options.maxHandles ?? Number.MAX_SAFE_INTEGER;
    this.logger = options.logger ?? createLogger('event-loop');
    this.internals = {
      now: () => Date.now(),
      wake: () => this.wake(),
      pollStarted: (handle) => {
        if (this.descriptors.isReady(handle.fd)) {
          this.markReady(handle.fd);
        }
      },
      scheduleClose: (handle, onClose) => {
        this.closingQueue.push({ handle, onClose });
        this.wake();
      },
    };
  }

  // -------------------------------------------------------------------------
  // Reactor
  // -------------------------------------------------------------------------

  openPoll(fd: number): PollHandle {
    if (!Number.isInteger(fd) || fd < 0) {
      throw new ReactorError('EINVAL', `invalid descriptor: ${fd}`);
    }
    this.assertCapacity();
    // A handle still closing keeps its descriptor registered.
    if (this.polls.has(fd)) {
      throw new ReactorError('EEXIST', `descriptor ${fd} already has a poll handle`);
    }
    const unwatch = this.descriptors.watch(fd, () => this.markReady(fd));
    const handle = new LoopPollHandle(this.internals, fd, unwatch);
    this.polls.set(fd, handle);
    return handle;
  }

  createTimer(): TimerHandle {
    this.assertCapacity();
    const handle = new LoopTimerHandle(this.internals);
    this.timers.add(handle);
    return handle;
  }

  // -------------------------------------------------------------------------
  // Driving the loop
  // -------------------------------------------------------------------------

  /** Run a single non-blocking iteration. Returns whether the loop is still alive. */
  tick(): boolean {
    this.iterations++;
    this.runTimers();
    this.dispatchReadiness();
    this.runClosing();
    return this.alive;
  }

  /**
   * Run iterations until `stop()` is called or no handle is alive.
   * Rejects with `EBUSY` if the loop is already running.
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new ReactorError('EBUSY', 'loop is already running');
    }
    this.running = true;
    this.stopRequested = false;
    this.logger.debug('loop started', { handles: this.handleCount });

    try {
      while (!this.stopRequested) {
        if (!this.tick() || this.stopRequested) break;
        if (this.hasImmediateWork()) {
          await yieldToHost();
        } else {
          await this.waitForWork();
        }
      }
    } finally {
      this.running = false;
      this.stopRequested = false;
      this.wakeup = null;
      this.logger.debug('loop stopped', { iterations: this.iterations });
    }
  }

  /** Ask a running loop to return after its current iteration. */
  stop(): void {
    if (!this.running) return;
    this.stopRequested = true;
    this.wake();
  }

  get alive(): boolean {
    if (this.closingQueue.length > 0) return true;
    for (const poll of this.polls.values()) {
      if (poll.isActive()) return true;
    }
    for (const timer of this.timers) {
      if (timer.isActive()) return true;
    }
    return false;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get iterationCount(): number {
    return this.iterations;
  }

  /** Poll and timer handles allocated, including ones whose close is pending. */
  get handleCount(): number {
    return this.polls.size + this.timers.size;
  }

  // -------------------------------------------------------------------------
  // Phases
  // -------------------------------------------------------------------------

  private runTimers(): void {
    if (this.timers.size === 0) return;
    const now = Date.now();
    for (const timer of [...this.timers]) {
      if (timer.isActive() && timer.dueAt <= now) {
        timer.fire(now);
      }
    }
  }

  private dispatchReadiness(): void {
    if (this.pendingFds.size === 0) return;
    const ready = [...this.pendingFds];
    this.pendingFds.clear();
    for (const fd of ready) {
      const poll = this.polls.get(fd);
      if (!poll) continue;
      poll.dispatch(PollEvent.READABLE);
      // Input left behind (a capped drain) is reported again next iteration.
      if (poll.wantsReadable() && this.descriptors.isReady(fd)) {
        this.pendingFds.add(fd);
      }
    }
  }

  private runClosing(): void {
    if (this.closingQueue.length === 0) return;
    const queue = this.closingQueue;
    this.closingQueue = [];
    for (const { handle, onClose } of queue) {
      handle.detach();
      if (handle instanceof LoopPollHandle) {
        this.polls.delete(handle.fd);
      } else if (handle instanceof LoopTimerHandle) {
        this.timers.delete(handle);
      }
      onClose?.();
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private assertCapacity(): void {
    if (this.handleCount >= this.maxHandles) {
      throw new ReactorError('ENOMEM', `handle limit of ${this.maxHandles} reached`);
    }
  }

  private markReady(fd: number): void {
    this.pendingFds.add(fd);
    this.wake();
  }

  private wake(): void {
    this.wakeup?.();
  }

  private hasImmediateWork(): boolean {
    return this.pendingFds.size > 0 || this.closingQueue.length > 0 || this.nextTimerDelay() === 0;
  }

  private nextTimerDelay(): number | null {
    const now = Date.now();
    let delay: number | null = null;
    for (const timer of this.timers) {
      if (!timer.isActive()) continue;
      const remaining = Math.max(0, timer.dueAt - now);
      delay = delay === null ? remaining : Math.min(delay, remaining);
    }
    return delay;
  }

  private waitForWork(): Promise<void> {
    return new Promise<void>((resolve) => {
      let timeout: ReturnType<typeof setTimeout> | undefined;
      const done = (): void => {
        if (timeout !== undefined) clearTimeout(timeout);
        this.wakeup = null;
        resolve();
      };
      const delay = this.nextTimerDelay();
      if (delay !== null) {
        timeout = setTimeout(done, delay);
      }
      this.wakeup = done;
    });
  }
}
