import type { AdapterEvent } from '@adapter/events';
import { ConnectionMonitor } from '@diagnostics/ConnectionMonitor';
import { logInfo, logWarn, logWarnDedup } from '@utils/logger';
import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('@utils/logger', () => ({
  logInfo: vi.fn(),
  logWarn: vi.fn(),
  logWarnDedup: vi.fn(),
}));

const failed = (clientId: string, message: string, at: number): AdapterEvent => ({
  type: 'connection-failed',
  clientId,
  cause: new Error(message),
  at,
});

const subscribed = (clientId: string, topics: string[], at: number): AdapterEvent => ({
  type: 'subscribed',
  clientId,
  topics,
  message: `Connected and subscribed to ${JSON.stringify(topics)}`,
  at,
});

describe('ConnectionMonitor', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('starts out unknown', () => {
    expect(new ConnectionMonitor('c1').snapshot()).toEqual({
      clientId: 'c1',
      state: 'unknown',
      consecutiveFailures: 0,
      totalFailures: 0,
      subscribedTopics: [],
    });
  });

  it('counts a failure streak and summarises it through the rate-limited logger', () => {
    const monitor = new ConnectionMonitor('c1', { summaryWindowMs: 5_000 });

    monitor.publish(failed('c1', 'refused', 100));
    monitor.publish(failed('c1', 'refused again', 200));

    expect(monitor.snapshot()).toEqual({
      clientId: 'c1',
      state: 'failing',
      consecutiveFailures: 2,
      totalFailures: 2,
      lastFailure: { at: 200, message: 'refused again' },
      subscribedTopics: [],
    });
    expect(logWarnDedup).toHaveBeenCalledTimes(2);
    expect(logWarnDedup).toHaveBeenLastCalledWith(
      'monitor:failed:c1',
      5_000,
      '[Monitor] c1 cannot reach the broker (2 consecutive failure(s)): refused again'
    );
  });

  it('resets the streak on subscribe and logs the recovery', () => {
    const monitor = new ConnectionMonitor('c1');
    monitor.publish(failed('c1', 'refused', 100));

    monitor.publish(subscribed('c1', ['a/b'], 300));

    expect(logInfo).toHaveBeenCalledWith('[Monitor] c1 recovered after 1 failure(s)');
    expect(monitor.snapshot()).toEqual({
      clientId: 'c1',
      state: 'subscribed',
      consecutiveFailures: 0,
      totalFailures: 1,
      lastFailure: { at: 100, message: 'refused' },
      lastSubscribedAt: 300,
      subscribedTopics: ['a/b'],
    });
  });

  it('warns when connected without topics', () => {
    const monitor = new ConnectionMonitor('c1');

    monitor.publish(subscribed('c1', [], 10));

    expect(logWarn).toHaveBeenCalledWith('[Monitor] c1 is connected but has no topics to receive from');
    expect(logInfo).not.toHaveBeenCalled();
  });

  it('ignores events from other clients', () => {
    const monitor = new ConnectionMonitor('c1');

    monitor.publish(failed('c2', 'refused', 100));

    expect(monitor.snapshot().state).toBe('unknown');
    expect(logWarnDedup).not.toHaveBeenCalled();
  });
});
