import { describe, expect, it, vi } from 'vitest';
import { TurnScheduler, type ExchangeTask } from './scheduler.js';

const flush = () => new Promise<void>(resolve => setTimeout(resolve, 0));

function waitForAbort(signal: AbortSignal): Promise<void> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

function gate() {
  let open: () => void = () => {};
  const opened = new Promise<void>(resolve => {
    open = resolve;
  });
  return { opened, open };
}

describe('TurnScheduler', () => {
  it('returns a pending handle and completes it', async () => {
    const listener = { started: vi.fn(), completed: vi.fn() };
    const scheduler = new TurnScheduler(listener);

    const handle = scheduler.submit(async () => {});
    expect(handle.state).toBe('pending');

    expect(await handle.done).toEqual({ state: 'completed' });
    expect(listener.started).toHaveBeenCalledWith(handle);
    expect(listener.completed).toHaveBeenCalledWith(handle);
    expect(scheduler.currentHandle).toBeNull();
  });

  it('runs at most one task at a time', async () => {
    const scheduler = new TurnScheduler();
    let active = 0;
    let maxActive = 0;
    const task: ExchangeTask = async (signal) => {
      active++;
      maxActive = Math.max(maxActive, active);
      try {
        await waitForAbort(signal);
      } finally {
        active--;
      }
    };

    const first = scheduler.submit(task);
    await flush();
    expect(first.state).toBe('running');

    const second = scheduler.submit(task);
    expect(first.cancelRequested).toBe(true);
    expect(second.state).toBe('pending');

    expect(await first.done).toEqual({ state: 'cancelled' });
    await flush();
    expect(second.state).toBe('running');
    expect(maxActive).toBe(1);

    scheduler.cancel(second);
    expect(await second.done).toEqual({ state: 'cancelled' });
  });

  it('never starts a superseded pending handle', async () => {
    const scheduler = new TurnScheduler();
    const skipped = vi.fn(async () => {});

    const first = scheduler.submit(waitForAbort);
    await flush();
    const second = scheduler.submit(skipped);
    const third = scheduler.submit(async () => {});

    expect(await second.done).toEqual({ state: 'cancelled' });
    expect(await first.done).toEqual({ state: 'cancelled' });
    expect(await third.done).toEqual({ state: 'completed' });
    expect(skipped).not.toHaveBeenCalled();
  });

  it('cancels a pending handle without running it', async () => {
    const cancelled = vi.fn();
    const scheduler = new TurnScheduler({ cancelled });
    const task = vi.fn(async () => {});

    const handle = scheduler.submit(task);
    scheduler.cancel(handle);

    expect(await handle.done).toEqual({ state: 'cancelled' });
    expect(task).not.toHaveBeenCalled();
    expect(cancelled).toHaveBeenCalledTimes(1);
  });

  it('treats a task that ignores the signal as cancelled', async () => {
    const scheduler = new TurnScheduler();
    const { opened, open } = gate();

    const handle = scheduler.submit(() => opened);
    await flush();
    scheduler.cancel(handle);
    open();

    expect(await handle.done).toEqual({ state: 'cancelled' });
  });

  it('reports failures once without retrying', async () => {
    const failed = vi.fn();
    const scheduler = new TurnScheduler({ failed });
    const error = new Error('boom');
    const task = vi.fn(async () => {
      throw error;
    });

    const handle = scheduler.submit(task);

    expect(await handle.done).toEqual({ state: 'failed', error });
    expect(failed).toHaveBeenCalledWith(handle, error);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('ignores cancel on a terminal handle', async () => {
    const cancelled = vi.fn();
    const scheduler = new TurnScheduler({ cancelled });
    const handle = scheduler.submit(async () => {});
    await handle.done;

    scheduler.cancel(handle);
    await flush();

    expect(handle.state).toBe('completed');
    expect(cancelled).not.toHaveBeenCalled();
  });

  it('survives a throwing listener', async () => {
    const scheduler = new TurnScheduler({
      started: () => {
        throw new Error('listener');
      },
    });

    const handle = scheduler.submit(async () => {});

    expect(await handle.done).toEqual({ state: 'completed' });
  });

  it('whenIdle waits for running work', async () => {
    const scheduler = new TurnScheduler();
    const { opened, open } = gate();
    const handle = scheduler.submit(() => opened);

    let idle = false;
    const waiting = scheduler.whenIdle().then(() => {
      idle = true;
    });
    await flush();
    expect(idle).toBe(false);

    open();
    await waiting;
    expect(handle.state).toBe('completed');
    await expect(scheduler.whenIdle()).resolves.toBeUndefined();
  });
});
