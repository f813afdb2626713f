import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventLoop } from './event-loop.js';
import { DescriptorTable } from './descriptor-table.js';
import { ReactorError } from './reactor-error.js';
import { PollEvent } from '../types/reactor.js';

describe('EventLoop', () => {
  let descriptors: DescriptorTable;
  let loop: EventLoop;

  beforeEach(() => {
    descriptors = new DescriptorTable();
    loop = new EventLoop({ descriptors });
  });

  // -------------------------------------------------------------------------
  // openPoll
  // -------------------------------------------------------------------------

  describe('openPoll', () => {
    it('rejects a negative descriptor with EINVAL', () => {
      expect(() => loop.openPoll(-1)).toThrow('EINVAL: invalid descriptor: -1');
    });

    it('rejects an unallocated descriptor with EBADF', () => {
      expect(() => loop.openPoll(99)).toThrow('EBADF');
    });

    it('allows one poll handle per descriptor', () => {
      const fd = descriptors.allocate();
      loop.openPoll(fd);
      expect(() => loop.openPoll(fd)).toThrow(`EEXIST: descriptor ${fd} already has a poll handle`);
    });

    it('keeps the descriptor registered until the close completes', () => {
      const fd = descriptors.allocate();
      loop.openPoll(fd).close();

      expect(() => loop.openPoll(fd)).toThrow('EEXIST');
      loop.tick();
      expect(() => loop.openPoll(fd)).not.toThrow();
    });

    it('throws ENOMEM once maxHandles is reached', () => {
      const small = new EventLoop({ descriptors, maxHandles: 1 });
      small.openPoll(descriptors.allocate());

      let caught: unknown;
      try {
        small.openPoll(descriptors.allocate());
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ReactorError);
      expect(caught).toMatchObject({ code: 'ENOMEM' });
    });
  });

  // -------------------------------------------------------------------------
  // Poll handles
  // -------------------------------------------------------------------------

  describe('poll handles', () => {
    it('validates the event mask', () => {
      const poll = loop.openPoll(descriptors.allocate());
      expect(() => poll.start(0, () => {})).toThrow('EINVAL: invalid poll events: 0');
      expect(() => poll.start(4, () => {})).toThrow('EINVAL');
    });

    it('dispatches one readable event per iteration however often the descriptor was signalled', () => {
      const fd = descriptors.allocate();
      const poll = loop.openPoll(fd);
      const callback = vi.fn();
      poll.start(PollEvent.READABLE, callback);

      descriptors.signal(fd);
      descriptors.signal(fd);
      descriptors.signal(fd);
      loop.tick();

      expect(callback).toHaveBeenCalledTimes(1);
      expect(callback).toHaveBeenCalledWith(0, PollEvent.READABLE);
    });

    it('does not dispatch without a signal', () => {
      const poll = loop.openPoll(descriptors.allocate());
      const callback = vi.fn();
      poll.start(PollEvent.READABLE, callback);

      loop.tick();
      expect(callback).not.toHaveBeenCalled();
    });

    it('dispatches on the first iteration when input is already pending at start', () => {
      const fd = descriptors.allocate(() => true);
      const poll = loop.openPoll(fd);
      const callback = vi.fn();
      poll.start(PollEvent.READABLE, callback);

      loop.tick();
      expect(callback).toHaveBeenCalledTimes(1);
    });

    it('does not dispatch readable events to a writable-only poll', () => {
      const fd = descriptors.allocate();
      const poll = loop.openPoll(fd);
      const callback = vi.fn();
      poll.start(PollEvent.WRITABLE, callback);

      descriptors.signal(fd);
      loop.tick();
      expect(callback).not.toHaveBeenCalled();
    });

    it('stop() suppresses dispatch', () => {
      const fd = descriptors.allocate();
      const poll = loop.openPoll(fd);
      const callback = vi.fn();
      poll.start(PollEvent.READABLE, callback);

      poll.stop();
      descriptors.signal(fd);
      loop.tick();

      expect(callback).not.toHaveBeenCalled();
      expect(poll.isActive()).toBe(false);
    });

    it('dispatches again on the next iteration while the descriptor stays readable', () => {
      let queued = 2;
      const fd = descriptors.allocate(() => queued > 0);
      const poll = loop.openPoll(fd);
      const callback = vi.fn(() => {
        queued--;
      });
      poll.start(PollEvent.READABLE, callback);

      descriptors.signal(fd);
      loop.tick();
      expect(callback).toHaveBeenCalledTimes(1);

      loop.tick();
      expect(callback).toHaveBeenCalledTimes(2);

      loop.tick();
      expect(callback).toHaveBeenCalledTimes(2);
    });

    it('does not report a readable descriptor again once its handle is stopped', () => {
      const fd = descriptors.allocate(() => true);
      const poll = loop.openPoll(fd);
      const callback = vi.fn(() => poll.stop());
      poll.start(PollEvent.READABLE, callback);

      loop.tick();
      loop.tick();

      expect(callback).toHaveBeenCalledTimes(1);
    });
  });

  // -------------------------------------------------------------------------
  // Close
  // -------------------------------------------------------------------------

  describe('close', () => {
    it('defers the close callback to the closing phase', () => {
      const poll = loop.openPoll(descriptors.allocate());
      const onClose = vi.fn();

      poll.close(onClose);
      expect(onClose).not.toHaveBeenCalled();
      expect(poll.isClosing()).toBe(true);
      expect(loop.handleCount).toBe(1);

      loop.tick();
      expect(onClose).toHaveBeenCalledTimes(1);
      expect(loop.handleCount).toBe(0);
    });

    it('does not dispatch readiness to a closing handle', () => {
      const fd = descriptors.allocate();
      const poll = loop.openPoll(fd);
      const callback = vi.fn();
      poll.start(PollEvent.READABLE, callback);

      descriptors.signal(fd);
      poll.close();
      loop.tick();

      expect(callback).not.toHaveBeenCalled();
    });

    it('rejects a second close with ECLOSED', () => {
      const poll = loop.openPoll(descriptors.allocate());
      poll.close();
      expect(() => poll.close()).toThrow('ECLOSED: handle is already closing');
    });

    it('rejects start on a closing handle', () => {
      const poll = loop.openPoll(descriptors.allocate());
      poll.close();
      expect(() => poll.start(PollEvent.READABLE, () => {})).toThrow('ECLOSED');
    });
  });

  // -------------------------------------------------------------------------
  // Timers
  // -------------------------------------------------------------------------

  describe('timers', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('fires a repeating timer once per interval', () => {
      const timer = loop.createTimer();
      const callback = vi.fn();
      timer.start(callback, 10, 10);

      loop.tick();
      expect(callback).not.toHaveBeenCalled();

      vi.advanceTimersByTime(10);
      loop.tick();
      expect(callback).toHaveBeenCalledTimes(1);

      loop.tick();
      expect(callback).toHaveBeenCalledTimes(1);

      vi.advanceTimersByTime(10);
      loop.tick();
      expect(callback).toHaveBeenCalledTimes(2);
      expect(timer.isActive()).toBe(true);
    });

    it('deactivates a one-shot timer after it fires', () => {
      const timer = loop.createTimer();
      const callback = vi.fn();
      timer.start(callback, 5, 0);

      vi.advanceTimersByTime(5);
      loop.tick();
      vi.advanceTimersByTime(5);
      loop.tick();

      expect(callback).toHaveBeenCalledTimes(1);
      expect(timer.isActive()).toBe(false);
    });

    it('rejects negative delays', () => {
      const timer = loop.createTimer();
      expect(() => timer.start(() => {}, -1, 0)).toThrow('EINVAL');
    });
  });

  // -------------------------------------------------------------------------
  // alive / run / stop
  // -------------------------------------------------------------------------

  describe('run', () => {
    it('is not alive without active handles', () => {
      expect(loop.alive).toBe(false);
      loop.openPoll(descriptors.allocate());
      expect(loop.alive).toBe(false);
    });

    it('returns once nothing is alive', async () => {
      const timer = loop.createTimer();
      const callback = vi.fn();
      timer.start(callback, 5, 0);

      await loop.run();

      expect(callback).toHaveBeenCalledTimes(1);
      expect(loop.isRunning).toBe(false);
    });

    it('rejects a nested run with EBUSY', async () => {
      const timer = loop.createTimer();
      timer.start(() => {}, 5, 0);

      const running = loop.run();
      await expect(loop.run()).rejects.toThrow('EBUSY: loop is already running');
      await running;
    });

    it('wakes for a signal that arrives while waiting and stops on request', async () => {
      const fd = descriptors.allocate();
      const poll = loop.openPoll(fd);
      const events: number[] = [];
      poll.start(PollEvent.READABLE, (_status, fired) => {
        events.push(fired);
        loop.stop();
      });

      const running = loop.run();
      setTimeout(() => descriptors.signal(fd), 5);
      await running;

      expect(events).toEqual([PollEvent.READABLE]);
      expect(poll.isActive()).toBe(true);
    });

    it('stop() is a no-op when the loop is not running', () => {
      expect(() => loop.stop()).not.toThrow();
      expect(loop.isRunning).toBe(false);
    });
  });
});
