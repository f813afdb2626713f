/**
 * Cooperative reaper.
 *
 * A periodic timer on the loop that performs maintenance a background
 * thread would otherwise do: by default, recycling readiness descriptors
 * retired by closed sockets. It is independent of every adapter; at most
 * one reaper runs per loop, and start/stop are idempotent.
 */

import type { Reactor, TimerHandle } from '../types/reactor.js';
import type { MaintenanceTarget } from '../types/socket.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import { ErrorCode } from '../types/errors.js';
import { fail, ok, type Result } from './adapter-error.js';
import { defaultDescriptorTable } from './descriptor-table.js';
import { EventLoop } from './event-loop.js';
import { createLogger, type Logger } from './logger.js';

export interface ReaperOptions {
  /** Tick interval. Defaults to `reaper.interval_ms` (10 ms). */
  intervalMs?: number;
  /**
   * What each tick maintains. Defaults to the loop's own descriptor table
   * for an {@link EventLoop}, else the shared table.
   */
  target?: MaintenanceTarget;
  logger?: Logger;
}

interface Reaper {
  timer: TimerHandle;
  target: MaintenanceTarget;
  logger: Logger;
  ticks: number;
  reclaimed: number;
}

const reapers = new WeakMap<Reactor, Reaper>();

/** Start the reaper for `loop`. A second start while running is a no-op. */
export function startReaper(loop: Reactor | null | undefined, options: ReaperOptions = {}): Result<void> {
  if (!loop) {
    return fail(ErrorCode.INVALID_ARGUMENT, 'loop is required');
  }
  if (reapers.has(loop)) {
    return ok();
  }

  const intervalMs = options.intervalMs ?? DEFAULT_CONFIG.reaper.interval_ms;
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    return fail(ErrorCode.INVALID_ARGUMENT, 'intervalMs must be a positive number');
  }

  const logger = options.logger ?? createLogger('reaper');

  let timer: TimerHandle;
  try {
    timer = loop.createTimer();
  } catch (err) {
    logger.error('timer allocation failed', { error_code: ErrorCode.REGISTRATION_FAILED, error: err });
    return fail(ErrorCode.REGISTRATION_FAILED, 'reactor could not allocate the reaper timer', err);
  }

  const reaper: Reaper = {
    timer,
    target: options.target ?? defaultTarget(loop),
    logger,
    ticks: 0,
    reclaimed: 0,
  };

  try {
    timer.start(() => tick(reaper), intervalMs, intervalMs);
  } catch (err) {
    timer.close();
    logger.error('timer start failed', { error_code: ErrorCode.REGISTRATION_FAILED, error: err });
    return fail(ErrorCode.REGISTRATION_FAILED, 'reactor could not start the reaper timer', err);
  }

  reapers.set(loop, reaper);
  logger.debug('reaper started', { interval_ms: intervalMs });
  return ok();
}

/** Stop the reaper for `loop`. Stopping a reaper that is not running is a no-op. */
export function stopReaper(loop: Reactor | null | undefined): Result<void> {
  if (!loop) {
    return fail(ErrorCode.INVALID_ARGUMENT, 'loop is required');
  }
  const reaper = reapers.get(loop);
  if (!reaper) {
    return ok();
  }

  reapers.delete(loop);
  reaper.timer.stop();
  if (!reaper.timer.isClosing()) {
    reaper.timer.close();
  }
  reaper.logger.debug('reaper stopped', { ticks: reaper.ticks, reclaimed: reaper.reclaimed });
  return ok();
}

export function isReaperRunning(loop: Reactor | null | undefined): boolean {
  return loop ? reapers.has(loop) : false;
}

function tick(reaper: Reaper): void {
  reaper.ticks++;
  try {
    const reclaimed = reaper.target.runMaintenance();
    if (reclaimed > 0) {
      reaper.reclaimed += reclaimed;
      reaper.logger.debug('maintenance reclaimed resources', { reclaimed });
    }
  } catch (err) {
    reaper.logger.error('maintenance tick failed', { error: err });
  }
}

function defaultTarget(loop: Reactor): MaintenanceTarget {
  return loop instanceof EventLoop ? loop.descriptors : defaultDescriptorTable;
}
