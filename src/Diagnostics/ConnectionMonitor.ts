import type { AdapterEvent, IEventPublisher } from '@adapter/events';
import { logInfo, logWarn, logWarnDedup } from '@utils/logger';

export type ConnectionFailure = {
  at: number;
  message: string;
};

export type ConnectionHealth = {
  clientId: string;
  state: 'unknown' | 'subscribed' | 'failing';
  consecutiveFailures: number;
  totalFailures: number;
  lastFailure?: ConnectionFailure;
  lastSubscribedAt?: number;
  subscribedTopics: string[];
};

/**
 * Event sink that keeps a running picture of connection health.
 *
 * The adapter already logs every failed attempt. This adds one summary line per failure streak
 * (rate-limited, since a broker that stays down fails on every recovery tick) and a recovery
 * line once the streak ends.
 */
export class ConnectionMonitor implements IEventPublisher {
  private consecutiveFailures = 0;
  private totalFailures = 0;
  private lastFailure?: ConnectionFailure;
  private lastSubscribedAt?: number;
  private subscribedTopics: string[] = [];
  private state: ConnectionHealth['state'] = 'unknown';

  // Repeat the streak summary at most this often.
  private readonly summaryWindowMs: number;

  constructor(
    private readonly clientId: string,
    options: { summaryWindowMs?: number } = {}
  ) {
    this.summaryWindowMs = options.summaryWindowMs ?? 60_000;
  }

  publish(event: AdapterEvent): void {
    if (event.clientId !== this.clientId) return;

    switch (event.type) {
      case 'connection-failed':
        this.consecutiveFailures += 1;
        this.totalFailures += 1;
        this.lastFailure = { at: event.at, message: event.cause.message };
        this.state = 'failing';
        logWarnDedup(
          `monitor:failed:${this.clientId}`,
          this.summaryWindowMs,
          `[Monitor] ${this.clientId} cannot reach the broker (${this.consecutiveFailures} consecutive failure(s)): ${event.cause.message}`
        );
        return;
      case 'subscribed':
        if (this.consecutiveFailures > 0) {
          logInfo(`[Monitor] ${this.clientId} recovered after ${this.consecutiveFailures} failure(s)`);
        }
        if (event.topics.length === 0) {
          logWarn(`[Monitor] ${this.clientId} is connected but has no topics to receive from`);
        }
        this.consecutiveFailures = 0;
        this.lastSubscribedAt = event.at;
        this.subscribedTopics = [...event.topics];
        this.state = 'subscribed';
        return;
    }
  }

  snapshot(): ConnectionHealth {
    return {
      clientId: this.clientId,
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      totalFailures: this.totalFailures,
      ...(this.lastFailure ? { lastFailure: { ...this.lastFailure } } : {}),
      ...(this.lastSubscribedAt !== undefined ? { lastSubscribedAt: this.lastSubscribedAt } : {}),
      subscribedTopics: [...this.subscribedTopics],
    };
  }
}
