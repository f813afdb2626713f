/**
 * Readiness descriptor table.
 *
 * Node does not let JavaScript poll arbitrary OS descriptors, so sockets
 * publish their readiness through numbered virtual descriptors instead. A
 * socket allocates one, signals it on every arrival (edge-triggered, one
 * notification per signal rather than per queued message), and the reactor
 * watches it.
 *
 * Released descriptors are retired, not reused straight away: a poll handle
 * whose close is still pending may hold the number. The reaper's
 * maintenance tick moves retired descriptors back to the free list.
 */

import type { MaintenanceTarget } from '../types/socket.js';
import { ReactorError } from './reactor-error.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Reports whether the descriptor's owner currently has input pending. */
export type ReadinessProbe = () => boolean;

export type ReadinessListener = () => void;

export interface DescriptorTableOptions {
  /** First descriptor number handed out. Defaults to 3, after stdio. */
  firstDescriptor?: number;
  /** Maximum descriptors in existence (live + retired + free). */
  maxDescriptors?: number;
}

interface DescriptorEntry {
  probe: ReadinessProbe | null;
  readonly listeners: Set<ReadinessListener>;
}

// ---------------------------------------------------------------------------
// DescriptorTable
// ---------------------------------------------------------------------------

export class DescriptorTable implements MaintenanceTarget {
  private readonly entries = new Map<number, DescriptorEntry>();
  private readonly retired: number[] = [];
  private readonly free: number[] = [];
  private readonly firstDescriptor: number;
  private readonly maxDescriptors: number;
  private nextDescriptor: number;

  constructor(options: DescriptorTableOptions = {}) {
    this.firstDescriptor = options.firstDescriptor ?? 3;
    this.maxDescriptors = options.maxDescriptors ?? Number.MAX_SAFE_INTEGER;
    this.nextDescriptor = this.firstDescriptor;
  }

  /** Allocate a descriptor, reusing the lowest free number first. */
  allocate(probe?: ReadinessProbe): number {
    let fd = this.free.shift();
    if (fd === undefined) {
      if (this.nextDescriptor - this.firstDescriptor >= this.maxDescriptors) {
        throw new ReactorError('EMFILE', `descriptor limit of ${this.maxDescriptors} reached`);
      }
      fd = this.nextDescriptor++;
    }
    this.entries.set(fd, { probe: probe ?? null, listeners: new Set() });
    return fd;
  }

  /** Retire a live descriptor. Its watchers are dropped without notification. */
  release(fd: number): void {
    const entry = this.entries.get(fd);
    if (!entry) {
      throw new ReactorError('EBADF', `descriptor ${fd} is not allocated`);
    }
    entry.listeners.clear();
    this.entries.delete(fd);
    this.retired.push(fd);
  }

  has(fd: number): boolean {
    return this.entries.has(fd);
  }

  isReady(fd: number): boolean {
    const probe = this.entries.get(fd)?.probe;
    return probe ? probe() : false;
  }

  /** Notify every watcher of `fd`. Returns false for an unknown descriptor. */
  signal(fd: number): boolean {
    const entry = this.entries.get(fd);
    if (!entry) return false;
    for (const listener of [...entry.listeners]) {
      listener();
    }
    return true;
  }

  /** Watch a live descriptor; returns the unsubscribe function. */
  watch(fd: number, listener: ReadinessListener): () => void {
    const entry = this.entries.get(fd);
    if (!entry) {
      throw new ReactorError('EBADF', `descriptor ${fd} is not allocated`);
    }
    entry.listeners.add(listener);
    return () => {
      entry.listeners.delete(listener);
    };
  }

  /** Move retired descriptors back to the free list. */
  runMaintenance(): number {
    const reclaimed = this.retired.length;
    if (reclaimed === 0) return 0;
    this.free.push(...this.retired);
    this.free.sort((a, b) => a - b);
    this.retired.length = 0;
    return reclaimed;
  }

  get liveCount(): number {
    return this.entries.size;
  }

  get retiredCount(): number {
    return this.retired.length;
  }

  get freeCount(): number {
    return this.free.length;
  }
}

/** Table shared by sockets and loops that are not given their own. */
export const defaultDescriptorTable = new DescriptorTable();
