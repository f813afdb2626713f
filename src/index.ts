/**
 * zmq-reactor public API.
 *
 * Bridges edge-triggered message sockets into a single-threaded reactor:
 * wrap a socket with {@link SocketAdapter.create}, drive the loop, and free
 * the adapter when done. The socket and the loop stay owned by the caller.
 */

// Contracts
export type {
  CloseCallback,
  PollCallback,
  PollEventMask,
  PollHandle,
  Reactor,
  TimerHandle,
} from './types/reactor.js';
export { PollEvent } from './types/reactor.js';
export type {
  MaintenanceTarget,
  Message,
  MessageSocket,
  ReceiveResult,
  SocketType,
} from './types/socket.js';
export { SocketEvent } from './types/socket.js';

// Errors
export {
  ErrorCode,
  ERROR_MESSAGES,
  describeError,
  type ErrorCodeValue,
} from './types/errors.js';
export {
  AdapterError,
  isAdapterError,
  ok,
  fail,
  type AdapterErrorOptions,
  type Result,
} from './core/adapter-error.js';
export {
  ReactorError,
  isReactorError,
  type ReactorErrorCode,
} from './core/reactor-error.js';

// Adapter
export {
  SocketAdapter,
  createAdapter,
  closeAdapter,
  freeAdapter,
  getSocket,
  getLoop,
  getUserContext,
  getReadinessFd,
  adapterState,
  pollAdapter,
  type AdapterOptions,
  type AdapterState,
  type DrainStats,
  type DrainStop,
  type MessageHandler,
} from './core/socket-adapter.js';

// Reaper
export { startReaper, stopReaper, isReaperRunning, type ReaperOptions } from './core/reaper.js';

// Reactor
export { EventLoop, type EventLoopOptions } from './core/event-loop.js';
export {
  DescriptorTable,
  defaultDescriptorTable,
  type DescriptorTableOptions,
  type ReadinessListener,
  type ReadinessProbe,
} from './core/descriptor-table.js';

// ZeroMQ
export {
  ZmqMessageSocket,
  DEFAULT_RECEIVE_HIGH_WATER_MARK,
  type ZmqMessageSocketOptions,
  type ZmqSocketLike,
} from './core/zmq-message-socket.js';
export { ZmqSocketFactory } from './core/zmq-socket-factory.js';

// Ambient
export {
  createLogger,
  configureLogging,
  resetLogging,
  type LogContext,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type Logger,
} from './core/logger.js';
export {
  DEFAULT_CONFIG,
  CONFIG_ENV_VAR,
  CONFIG_FILE_NAME,
  parseConfig,
  resolveConfigPath,
  type ReactorConfig,
} from './types/config.js';
export { loadConfig, applyConfig, type AppliedConfig } from './core/config-loader.js';
