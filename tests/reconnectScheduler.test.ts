import { ReconnectScheduler } from '@adapter/ReconnectScheduler';
import type { IScheduledTask, ITaskScheduler } from '@adapter/TaskScheduler';
import { describe, expect, it, vi } from 'vitest';
import { ManualTaskScheduler } from './helpers/fakes';

const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
};

describe('ReconnectScheduler', () => {
  it('arms one task at the recovery interval', () => {
    const scheduler = new ManualTaskScheduler();
    const reconnect = new ReconnectScheduler(scheduler, 500, async () => true);

    reconnect.schedule();

    expect(scheduler.tasks.map((t) => t.delayMs)).toEqual([500]);
    expect(reconnect.hasPending()).toBe(true);
    expect(reconnect.getState()).toBe('scheduled');
  });

  it('replaces a pending task instead of stacking another', () => {
    const scheduler = new ManualTaskScheduler();
    const reconnect = new ReconnectScheduler(scheduler, 500, async () => true);

    reconnect.schedule();
    reconnect.schedule();

    expect(scheduler.tasks[0]?.cancelled).toBe(true);
    expect(scheduler.pending()).toHaveLength(1);
  });

  it('re-arms after a failed attempt and goes idle after a successful one', async () => {
    const scheduler = new ManualTaskScheduler();
    const attempt = vi.fn<() => Promise<boolean>>().mockResolvedValueOnce(false).mockResolvedValueOnce(true);
    const reconnect = new ReconnectScheduler(scheduler, 500, attempt);
    reconnect.schedule();

    await scheduler.runNext();
    expect(scheduler.pending()).toHaveLength(1);

    await scheduler.runNext();
    expect(attempt).toHaveBeenCalledTimes(2);
    expect(scheduler.pending()).toHaveLength(0);
    expect(reconnect.getState()).toBe('idle');
  });

  it('treats a throwing attempt as a failure', async () => {
    const scheduler = new ManualTaskScheduler();
    const reconnect = new ReconnectScheduler(scheduler, 500, async () => {
      throw new Error('boom');
    });
    reconnect.schedule();

    await scheduler.runNext();

    expect(scheduler.pending()).toHaveLength(1);
  });

  it('reports firing while an attempt is running and does not re-arm once cancelled', async () => {
    const scheduler = new ManualTaskScheduler();
    const gate = deferred<boolean>();
    const reconnect = new ReconnectScheduler(scheduler, 500, () => gate.promise);
    reconnect.schedule();

    const firing = scheduler.runNext();
    expect(reconnect.getState()).toBe('firing');
    expect(reconnect.hasPending()).toBe(false);

    reconnect.cancel();
    gate.resolve(false);
    await firing;

    expect(scheduler.pending()).toHaveLength(0);
    expect(reconnect.getState()).toBe('idle');
  });

  it('ignores a stale task that fires after cancel', async () => {
    const scheduler = new ManualTaskScheduler();
    const attempt = vi.fn(async () => false);
    const reconnect = new ReconnectScheduler(scheduler, 500, attempt);
    reconnect.schedule();
    const stale = scheduler.tasks[0];

    reconnect.cancel();
    await stale?.task();

    expect(attempt).not.toHaveBeenCalled();
    expect(scheduler.tasks).toHaveLength(1);
  });

  it('survives a task scheduler that refuses work', () => {
    const refusing: ITaskScheduler = {
      schedule(): IScheduledTask {
        throw new Error('scheduler shut down');
      },
    };
    const reconnect = new ReconnectScheduler(refusing, 500, async () => true);

    expect(() => reconnect.schedule()).not.toThrow();
    expect(reconnect.hasPending()).toBe(false);
  });
});
