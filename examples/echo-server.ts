/**
 * Echo server: a ZeroMQ REP socket answered from the reactor.
 *
 *   ZMQ_REACTOR_CONFIG=./zmq-reactor.toml node dist/examples/echo-server.js tcp://127.0.0.1:5555
 *
 * Every request is sent straight back. Ctrl-C frees the adapter, stops the
 * reaper and lets the loop run dry.
 */

import {
  EventLoop,
  ZmqSocketFactory,
  applyConfig,
  createAdapter,
  createLogger,
  loadConfig,
  startReaper,
  stopReaper,
  type MessageHandler,
} from '../src/index.js';

const logger = createLogger('echo-server');

const echo: MessageHandler = (adapter, message) => {
  const socket = adapter.getSocket();
  if (!socket) return;
  socket.send(message).catch((err: unknown) => {
    logger.warn('reply failed', { error: err });
  });
};

async function main(): Promise<void> {
  const endpoint = process.argv[2] ?? 'tcp://127.0.0.1:5555';
  const settings = applyConfig(loadConfig());

  const loop = new EventLoop();
  const rep = new ZmqSocketFactory().createReply();
  await rep.raw.bind(endpoint);

  const created = createAdapter(loop, rep, echo, undefined, settings.adapter);
  if (!created.ok) {
    await rep.close();
    throw created.error;
  }
  const adapter = created.value;

  const reaper = startReaper(loop, settings.reaper);
  if (!reaper.ok) {
    throw reaper.error;
  }

  process.once('SIGINT', () => {
    logger.info('shutting down', { messages: adapter.totalMessages });
    stopReaper(loop);
    adapter.free();
    adapter
      .whenFreed()
      .then(() => rep.close())
      .catch((err: unknown) => {
        logger.error('shutdown failed', { error: err });
        process.exitCode = 1;
      });
  });

  logger.info('listening', { endpoint });
  await loop.run();
}

main().catch((err: unknown) => {
  logger.error('echo server failed', { error: err });
  process.exitCode = 1;
});
