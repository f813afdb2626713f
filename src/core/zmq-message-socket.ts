/**
 * MessageSocket backed by a real ZeroMQ socket.
 *
 * Wraps the zeromq v6 class-based API (promise-returning receive/send,
 * multipart arrays) into the non-blocking {@link MessageSocket} contract the
 * adapter drains:
 *
 *   - a receive pump awaits `receive()` and queues each multipart message;
 *   - every arrival signals the socket's readiness descriptor, so the
 *     reactor sees one edge per arrival batch, as with a native ZMQ_FD;
 *   - `tryReceive()` pops the queue and never waits;
 *   - the pump pauses while `highWaterMark` messages are queued, leaving
 *     further input to ZeroMQ's own receive high-water mark;
 *   - sends run one at a time, since zeromq allows a single send in flight.
 *
 * The embedder owns the socket: bind/connect/subscribe go through `raw`,
 * and `close()` must be called by the embedder, never by the adapter.
 *
 * @see src/types/socket.ts for the interface
 * @see src/core/zmq-socket-factory.ts for construction
 * @see src/testing/fake-sockets.ts for the test double
 */

import type { Message, MessageSocket, ReceiveResult, SocketType } from '../types/socket.js';
import { SocketEvent } from '../types/socket.js';
import { DescriptorTable, defaultDescriptorTable } from './descriptor-table.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Structural view of a zeromq socket
// ---------------------------------------------------------------------------

/**
 * The parts of a zeromq v6 socket the binding uses. Readable-only sockets
 * (SUB, PULL) have no `send`; writable-only sockets (PUB, PUSH) have no
 * `receive`.
 */
export interface ZmqSocketLike {
  readonly closed: boolean;
  readonly writable?: boolean;
  close(): void;
  receive?(): Promise<Buffer[]>;
  send?(message: Buffer[]): Promise<void>;
}

export interface ZmqMessageSocketOptions {
  descriptors?: DescriptorTable;
  logger?: Logger;
  /** Queued messages at which the receive pump pauses. Defaults to 1000. */
  highWaterMark?: number;
}

export const DEFAULT_RECEIVE_HIGH_WATER_MARK = 1000;

// ---------------------------------------------------------------------------
// ZmqMessageSocket
// ---------------------------------------------------------------------------

export class ZmqMessageSocket<S extends ZmqSocketLike = ZmqSocketLike> implements MessageSocket {
  private readonly descriptors: DescriptorTable;
  private readonly logger: Logger;
  private readonly queue: Message[] = [];
  private readonly fd: number;
  private readonly highWaterMark: number;
  private failure: Error | null = null;
  private closedFlag = false;
  private resumePump: (() => void) | null = null;
  private sendChain: Promise<void> = Promise.resolve();

  constructor(
    readonly type: SocketType,
    readonly raw: S,
    options: ZmqMessageSocketOptions = {},
  ) {
    this.descriptors = options.descriptors ?? defaultDescriptorTable;
    this.highWaterMark = options.highWaterMark ?? DEFAULT_RECEIVE_HIGH_WATER_MARK;
    if (!Number.isInteger(this.highWaterMark) || this.highWaterMark < 1) {
      throw new RangeError(`highWaterMark must be a positive integer, got ${this.highWaterMark}`);
    }
    this.fd = this.descriptors.allocate(() => this.queue.length > 0);
    this.logger = (options.logger ?? createLogger('zmq-socket')).withContext({
      fd: this.fd,
      socket_type: type,
    });

    const receive = raw.receive?.bind(raw);
    if (receive) {
      void this.pump(receive);
    }
  }

  getReadinessFd(): number {
    this.assertOpen();
    return this.fd;
  }

  getEvents(): number {
    this.assertOpen();
    let events = 0;
    if (this.queue.length > 0) events |= SocketEvent.POLLIN;
    if (this.raw.send && this.raw.writable !== false && !this.raw.closed) {
      events |= SocketEvent.POLLOUT;
    }
    return events;
  }

  tryReceive(): ReceiveResult {
    if (this.closedFlag) {
      return { status: 'error', error: new Error('Socket is closed') };
    }
    const message = this.queue.shift();
    if (message) {
      if (this.queue.length < this.highWaterMark) this.wakePump();
      return { status: 'message', message };
    }
    if (this.failure) {
      return { status: 'error', error: this.failure };
    }
    return { status: 'would-block' };
  }

  /** Queue a send behind any still in flight. */
  send(message: Message): Promise<void> {
    const send = this.raw.send?.bind(this.raw);
    if (this.closedFlag) {
      return Promise.reject(new Error('Socket is closed'));
    }
    if (!send) {
      return Promise.reject(new Error(`${this.type} sockets cannot send`));
    }
    const next = this.sendChain.then(() => {
      this.assertOpen();
      return send(message);
    });
    // Callers see a failure through `next`; the chain only orders sends.
    this.sendChain = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  async close(): Promise<void> {
    if (this.closedFlag) return;
    this.closedFlag = true;
    this.queue.length = 0;
    this.wakePump();
    this.raw.close();
    this.descriptors.release(this.fd);
  }

  /** Messages received from the wire but not yet drained. */
  get pending(): number {
    return this.queue.length;
  }

  private assertOpen(): void {
    if (this.closedFlag) {
      throw new Error('Socket is closed');
    }
  }

  private wakePump(): void {
    const resume = this.resumePump;
    this.resumePump = null;
    resume?.();
  }

  private async pump(receive: () => Promise<Buffer[]>): Promise<void> {
    while (!this.closedFlag) {
      if (this.queue.length >= this.highWaterMark) {
        await new Promise<void>((resolve) => {
          this.resumePump = resolve;
        });
        continue;
      }
      let frames: Buffer[];
      try {
        frames = await receive();
      } catch (err) {
        if (this.closedFlag || this.raw.closed) return;
        this.failure = err instanceof Error ? err : new Error(String(err));
        this.logger.warn('receive pump stopped', { error: this.failure });
        this.descriptors.signal(this.fd);
        return;
      }
      if (this.closedFlag) return;
      this.queue.push(frames);
      this.descriptors.signal(this.fd);
    }
  }
}
