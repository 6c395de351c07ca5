import type { IMQTTClientFactory } from '@mqtt/IMQTTClientFactory';
import type { IMQTTClientHandle } from '@mqtt/IMQTTClientHandle';
import type { IMessageConsumer } from '@messaging/Message';
import { DefaultMessageConverter, type IMessageConverter } from '@messaging/MessageConverter';
import { AsyncMutex } from '@utils/AsyncMutex';
import { ConfigurationError, MqttClientError, SubscriptionError, toError } from '@utils/errors';
import { logDebug, logError, logInfo, logWarn } from '@utils/logger';
import type { ConsumerStopAction, QoS, TopicSubscription } from '@utils/options.schema';
import { CallbackRouter, type IConnectionLossHandler } from './CallbackRouter';
import type { AdapterEvent, IEventPublisher } from './events';
import { DEFAULT_RECOVERY_INTERVAL, ReconnectScheduler } from './ReconnectScheduler';
import { type ITaskScheduler, TimerTaskScheduler } from './TaskScheduler';
import { TopicRegistry } from './TopicRegistry';

export const DEFAULT_COMPLETION_TIMEOUT = 30_000;
const DEFAULT_STOP_ACTION: ConsumerStopAction = 'unsubscribe_clean';

export type MQTTInboundAdapterOptions = {
  /** Broker URL; may be omitted when the connection options list servers. */
  url?: string;
  clientId: string;
  clientFactory: IMQTTClientFactory;
  consumer: IMessageConsumer;
  /** Plain strings are subscribed with QoS 1. */
  topics?: ReadonlyArray<string | TopicSubscription>;
  converter?: IMessageConverter;
  taskScheduler?: ITaskScheduler;
  eventPublisher?: IEventPublisher;
  completionTimeout?: number;
  recoveryInterval?: number;
};

/**
 * Everything that describes the current broker connection. Only touched while holding
 * `connectionLock`, apart from the read-only peeks of the subscription API.
 */
type ConnectionSession = {
  handle: IMQTTClientHandle | null;
  connected: boolean;
  cleanSession: boolean;
  stopAction: ConsumerStopAction;
};

/**
 * Message-driven MQTT subscriber.
 *
 * Keeps one broker connection alive, subscribes it to the topic registry and hands every
 * incoming message to the consumer. A failed connect or a lost connection arms a reconnect
 * that repeats at a fixed interval until it succeeds or the adapter stops.
 *
 * `connectAndSubscribe`, `stop`, `connectionLost` and every reconnect attempt run one at a time
 * under `connectionLock`. The subscription API takes the registry lock instead, and message
 * delivery takes no lock at all.
 */
export class MQTTInboundAdapter implements IConnectionLossHandler {
  private readonly url?: string;
  private readonly clientId: string;
  private readonly clientFactory: IMQTTClientFactory;
  private readonly completionTimeout: number;
  private readonly registry: TopicRegistry;
  private readonly converter: IMessageConverter;
  private readonly consumer: IMessageConsumer;
  private readonly reconnect: ReconnectScheduler;
  private readonly connectionLock = new AsyncMutex();
  private eventPublisher?: IEventPublisher;

  private running = false;
  private readonly session: ConnectionSession = {
    handle: null,
    connected: false,
    cleanSession: true,
    stopAction: DEFAULT_STOP_ACTION,
  };

  constructor(options: MQTTInboundAdapterOptions) {
    this.url = options.url;
    this.clientId = options.clientId;
    this.clientFactory = options.clientFactory;
    this.completionTimeout = options.completionTimeout ?? DEFAULT_COMPLETION_TIMEOUT;
    this.eventPublisher = options.eventPublisher;
    this.registry = new TopicRegistry(options.topics);
    this.converter = options.converter ?? new DefaultMessageConverter();
    this.consumer = options.consumer;
    this.reconnect = new ReconnectScheduler(
      options.taskScheduler ?? new TimerTaskScheduler(),
      options.recoveryInterval ?? DEFAULT_RECOVERY_INTERVAL,
      () => this.attemptReconnect()
    );
  }

  setEventPublisher(eventPublisher: IEventPublisher | undefined) {
    this.eventPublisher = eventPublisher;
  }

  /**
   * Connect and subscribe. A failure here is logged and handed to the reconnect loop; it is not
   * re-thrown.
   */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    logInfo(`[Adapter] Starting ${this.clientId}`);
    try {
      await this.connectAndSubscribe();
    } catch (error) {
      logError(`[Adapter] Exception while connecting and subscribing ${this.clientId}, retrying`, error);
      // stop() may have been called while the first attempt was in flight.
      if (this.running) this.reconnect.schedule();
    }
  }

  /**
   * Cancel any pending reconnect and tear the connection down. Safe to call repeatedly.
   */
  async stop(): Promise<void> {
    if (this.running) logInfo(`[Adapter] Stopping ${this.clientId}`);
    this.running = false;
    // Cancel first so a retry cannot fire in the middle of the teardown.
    this.reconnect.cancel();
    await this.connectionLock.runExclusive(() => this.teardown());
  }

  isRunning(): boolean {
    return this.running;
  }

  isConnected(): boolean {
    return this.session.connected;
  }

  hasPendingReconnect(): boolean {
    return this.reconnect.hasPending();
  }

  async connectAndSubscribe(): Promise<void> {
    await this.connectionLock.runExclusive(() => this.doConnectAndSubscribe());
  }

  /**
   * Register a topic and, when connected, subscribe to it right away. If the live subscribe fails
   * the topic is removed again and a SubscriptionError is thrown.
   */
  async addTopic(topic: string, qos: QoS = 1): Promise<void> {
    await this.addTopics([{ topic, qos }]);
  }

  async addTopics(subscriptions: ReadonlyArray<TopicSubscription>): Promise<void> {
    await this.registry.lock.runExclusive(async () => {
      for (const { topic, qos } of subscriptions) {
        // Registered first so a reconnect that happens meanwhile picks the topic up.
        this.registry.add(topic, qos);
        const handle = this.session.handle;
        if (handle === null || !handle.isConnected()) continue;
        try {
          const granted = await handle.subscribe([topic], [qos]);
          this.warnOnGrantedQos([topic], [qos], granted);
        } catch (error) {
          this.registry.remove(topic);
          throw new SubscriptionError([topic], `Failed to subscribe to topic ${topic}`, { cause: error });
        }
      }
    });
  }

  /**
   * Unsubscribe (when connected) and unregister. The registry is only changed once the live
   * unsubscribe has succeeded.
   */
  async removeTopic(...topics: string[]): Promise<void> {
    if (topics.length === 0) return;
    await this.registry.lock.runExclusive(async () => {
      const handle = this.session.handle;
      if (handle !== null && handle.isConnected()) {
        try {
          await handle.unsubscribe(topics);
        } catch (error) {
          throw new SubscriptionError(topics, `Failed to unsubscribe from topic(s) ${JSON.stringify(topics)}`, {
            cause: error,
          });
        }
      }
      this.registry.remove(...topics);
    });
  }

  getTopics(): string[] {
    return this.registry.topics();
  }

  getQos(): QoS[] {
    return this.registry.qos();
  }

  getSubscriptions(): TopicSubscription[] {
    return this.registry.snapshot();
  }

  async connectionLost(cause: Error, source?: IMQTTClientHandle): Promise<void> {
    try {
      await this.connectionLock.runExclusive(async () => {
        if (!this.running) return;
        // A failed attempt has already released its handle and reported the failure.
        if (source !== undefined && source !== this.session.handle) {
          logDebug(`[Adapter] Ignoring loss reported by a released connection for ${this.clientId}`);
          return;
        }
        logError(`[Adapter] Lost connection for ${this.clientId}: ${cause.message}; retrying...`);
        this.session.connected = false;
        const handle = this.session.handle;
        this.session.handle = null;
        if (handle) {
          this.detachCallback(handle);
          try {
            await handle.close();
          } catch (error) {
            logWarn(`[Adapter] Exception while closing lost connection for ${this.clientId}`, error);
          }
        }
        this.reconnect.schedule();
        this.publishEvent({ type: 'connection-failed', clientId: this.clientId, cause, at: Date.now() });
      });
    } catch (error) {
      logError(`[Adapter] Failed handling lost connection for ${this.clientId}`, error);
    }
  }

  private async attemptReconnect(): Promise<boolean> {
    return await this.connectionLock.runExclusive(async () => {
      if (!this.running || this.session.connected) return true;
      try {
        await this.doConnectAndSubscribe();
        return true;
      } catch (error) {
        logError(`[Adapter] Exception while connecting and subscribing ${this.clientId}`, error);
        return false;
      }
    });
  }

  private async doConnectAndSubscribe(): Promise<void> {
    const connectionOptions = this.clientFactory.getConnectionOptions();
    this.session.cleanSession = connectionOptions.cleanSession;
    this.session.stopAction = this.clientFactory.getConsumerStopAction() ?? DEFAULT_STOP_ACTION;
    if (this.url === undefined && !connectionOptions.servers?.length) {
      throw new ConfigurationError("If no 'url' is provided, the connection options must list at least one server");
    }

    if (this.session.handle) {
      logWarn(`[Adapter] Replacing existing connection for ${this.clientId}`);
      await this.releaseHandle(this.session.handle);
    }

    const handle = this.clientFactory.getClientInstance(this.url, this.clientId);
    this.session.handle = handle;
    handle.setCallback(new CallbackRouter(this, this.converter, this.consumer, handle));

    const topics = await this.registry.lock.runExclusive(async () => {
      const subscriptions = this.registry.snapshot();
      const topics = subscriptions.map((s) => s.topic);
      try {
        await handle.connect(connectionOptions);
        if (subscriptions.length > 0) {
          const requested = subscriptions.map((s) => s.qos);
          const granted = await handle.subscribe(topics, requested);
          this.warnOnGrantedQos(topics, requested, granted);
        }
        if (!handle.isConnected()) {
          throw new MqttClientError('subscribe', 'Connection dropped while subscribing');
        }
      } catch (error) {
        const cause = toError(error);
        this.publishEvent({ type: 'connection-failed', clientId: this.clientId, cause, at: Date.now() });
        logError(`[Adapter] Error connecting or subscribing to ${JSON.stringify(topics)}`, cause);
        await this.releaseHandle(handle);
        throw cause;
      }
      return topics;
    });

    this.session.connected = true;
    const message = `Connected and subscribed to ${JSON.stringify(topics)}`;
    logDebug(`[Adapter] ${message}`);
    this.publishEvent({ type: 'subscribed', clientId: this.clientId, topics, message, at: Date.now() });
  }

  private async teardown(): Promise<void> {
    const handle = this.session.handle;
    if (!handle) return;
    try {
      const topics = this.registry.topics();
      if (this.shouldUnsubscribeOnStop() && topics.length > 0) {
        try {
          await handle.unsubscribe(topics);
        } catch (error) {
          logError(`[Adapter] Exception while unsubscribing ${this.clientId}`, error);
        }
      }
      try {
        await handle.disconnectForcibly(this.completionTimeout);
      } catch (error) {
        logError(`[Adapter] Exception while disconnecting ${this.clientId}`, error);
      }
      this.detachCallback(handle);
      try {
        await handle.close();
      } catch (error) {
        logError(`[Adapter] Exception while closing ${this.clientId}`, error);
      }
    } finally {
      this.session.connected = false;
      this.session.handle = null;
    }
  }

  private shouldUnsubscribeOnStop(): boolean {
    const { stopAction, cleanSession } = this.session;
    return stopAction === 'unsubscribe_always' || (stopAction === 'unsubscribe_clean' && cleanSession);
  }

  /**
   * Best-effort disconnect and close of a handle that is being abandoned.
   */
  private async releaseHandle(handle: IMQTTClientHandle): Promise<void> {
    try {
      await handle.disconnectForcibly(this.completionTimeout);
    } catch (error) {
      logDebug(`[Adapter] Ignoring disconnect failure while releasing ${this.clientId}: ${toError(error).message}`);
    }
    this.detachCallback(handle);
    try {
      await handle.close();
    } catch (error) {
      logDebug(`[Adapter] Ignoring close failure while releasing ${this.clientId}: ${toError(error).message}`);
    }
    if (this.session.handle === handle) {
      this.session.handle = null;
      this.session.connected = false;
    }
  }

  // Close still runs when this fails.
  private detachCallback(handle: IMQTTClientHandle) {
    try {
      handle.setCallback(null);
    } catch (error) {
      logWarn(`[Adapter] Exception while deregistering callback for ${this.clientId}`, error);
    }
  }

  private warnOnGrantedQos(topics: string[], requested: QoS[], granted: QoS[]) {
    if (requested.some((qos, i) => granted[i] !== qos)) {
      logWarn(
        `[Adapter] Granted QOS different to Requested QOS; topics: ${JSON.stringify(topics)} ` +
          `requested: ${JSON.stringify(requested)} granted: ${JSON.stringify(granted)}`
      );
    }
  }

  private publishEvent(event: AdapterEvent) {
    if (!this.eventPublisher) return;
    try {
      this.eventPublisher.publish(event);
    } catch (error) {
      logWarn(`[Adapter] Event publisher rejected ${event.type} event`, error);
    }
  }
}
