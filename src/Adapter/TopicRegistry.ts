import { AsyncMutex } from '@utils/AsyncMutex';
import { InvalidTopicError, SubscriptionError } from '@utils/errors';
import { type QoS, type TopicSubscription, qosSchema } from '@utils/options.schema';

// '#' only as the whole last level, '+' only as a whole level.
const isValidTopicFilter = (topic: string) => {
  const levels = topic.split('/');
  return levels.every((level, i) => {
    if (level.includes('#')) return level === '#' && i === levels.length - 1;
    if (level.includes('+')) return level === '+';
    return true;
  });
};

/**
 * Topics the adapter subscribes to, in insertion order, unique by pattern.
 *
 * `lock` is separate from the adapter's connection lock; callers that mutate the registry and the
 * live subscription together hold it for the whole operation.
 */
export class TopicRegistry {
  readonly lock = new AsyncMutex();
  private readonly entries = new Map<string, QoS>();

  constructor(initial: ReadonlyArray<string | TopicSubscription> = []) {
    for (const entry of initial) {
      if (typeof entry === 'string') this.add(entry);
      else this.add(entry.topic, entry.qos);
    }
  }

  add(topic: string, qos: QoS = 1) {
    if (topic.length === 0) {
      throw new InvalidTopicError('Topic pattern must not be empty');
    }
    if (!isValidTopicFilter(topic)) {
      throw new InvalidTopicError(`Invalid wildcard placement in topic '${topic}'`);
    }
    if (!qosSchema.safeParse(qos).success) {
      throw new InvalidTopicError(`Invalid QoS ${String(qos)} for topic '${topic}'; expected 0, 1 or 2`);
    }
    if (this.entries.has(topic)) {
      throw new SubscriptionError([topic], `Topic '${topic}' is already subscribed`);
    }
    this.entries.set(topic, qos);
  }

  remove(...topics: string[]) {
    for (const topic of topics) this.entries.delete(topic);
  }

  has(topic: string): boolean {
    return this.entries.has(topic);
  }

  get size(): number {
    return this.entries.size;
  }

  topics(): string[] {
    return [...this.entries.keys()];
  }

  qos(): QoS[] {
    return [...this.entries.values()];
  }

  snapshot(): TopicSubscription[] {
    return [...this.entries].map(([topic, qos]) => ({ topic, qos }));
  }
}
