/**
 * Creates real ZeroMQ sockets already wrapped as {@link ZmqMessageSocket}.
 *
 * Each wrapper exposes the zeromq v6 socket as `raw` with its concrete
 * class, so bind/connect/subscribe keep their zeromq signatures.
 *
 * @see src/core/zmq-message-socket.ts for the wrapper
 * @see src/testing/fake-socket-factory.ts for the test double
 */

import * as zmq from 'zeromq';

import { ZmqMessageSocket, type ZmqMessageSocketOptions } from './zmq-message-socket.js';

/**
 * Each socket is created with `linger = 0` so close() doesn't block
 * waiting for unsent messages.
 */
export class ZmqSocketFactory {
  constructor(private readonly options: ZmqMessageSocketOptions = {}) {}

  createRequest(): ZmqMessageSocket<zmq.Request> {
    const raw = new zmq.Request();
    raw.linger = 0;
    return new ZmqMessageSocket('req', raw, this.options);
  }

  createReply(): ZmqMessageSocket<zmq.Reply> {
    const raw = new zmq.Reply();
    raw.linger = 0;
    return new ZmqMessageSocket('rep', raw, this.options);
  }

  createPublisher(): ZmqMessageSocket<zmq.Publisher> {
    const raw = new zmq.Publisher();
    raw.linger = 0;
    return new ZmqMessageSocket('pub', raw, this.options);
  }

  createSubscriber(): ZmqMessageSocket<zmq.Subscriber> {
    const raw = new zmq.Subscriber();
    raw.linger = 0;
    return new ZmqMessageSocket('sub', raw, this.options);
  }

  createPush(): ZmqMessageSocket<zmq.Push> {
    const raw = new zmq.Push();
    raw.linger = 0;
    return new ZmqMessageSocket('push', raw, this.options);
  }

  createPull(): ZmqMessageSocket<zmq.Pull> {
    const raw = new zmq.Pull();
    raw.linger = 0;
    return new ZmqMessageSocket('pull', raw, this.options);
  }

  createPair(): ZmqMessageSocket<zmq.Pair> {
    const raw = new zmq.Pair();
    raw.linger = 0;
    return new ZmqMessageSocket('pair', raw, this.options);
  }
}
