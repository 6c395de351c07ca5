import type { AdapterEvent, IEventPublisher } from '@adapter/events';
import type { IScheduledTask, ITaskScheduler } from '@adapter/TaskScheduler';
import type { IMessageConsumer, Message } from '@messaging/Message';
import type { IMQTTClientFactory } from '@mqtt/IMQTTClientFactory';
import type { IMQTTCallback, IMQTTClientHandle } from '@mqtt/IMQTTClientHandle';
import {
  type ConsumerStopAction,
  type MqttConnectionOptions,
  type QoS,
  connectionOptionsSchema,
} from '@utils/options.schema';

export type HandleBehaviour = {
  failConnect?: Error;
  failSubscribe?: Error;
  failUnsubscribe?: Error;
  failDisconnect?: Error;
  failClose?: Error;
  /** Throws when the callback is cleared. */
  failClearCallback?: Error;
  /** Drops the connection while SUBSCRIBE is in flight, then fails the subscribe with it. */
  dropOnSubscribe?: Error;
  /** connect / disconnectForcibly wait for these before completing. */
  connectGate?: Promise<void>;
  disconnectGate?: Promise<void>;
  /** Granted QoS per requested QoS; defaults to granting what was asked. */
  grant?: (requested: QoS[]) => QoS[];
};

export class FakeClientHandle implements IMQTTClientHandle {
  readonly calls: string[] = [];
  readonly subscribeCalls: Array<{ topics: string[]; qos: QoS[] }> = [];
  readonly unsubscribeCalls: string[][] = [];
  callback: IMQTTCallback | null = null;
  connected = false;
  closed = false;

  constructor(
    readonly url: string | undefined,
    readonly clientId: string,
    public behaviour: HandleBehaviour = {}
  ) {}

  async connect(_options: MqttConnectionOptions): Promise<void> {
    this.calls.push('connect');
    await this.behaviour.connectGate;
    if (this.behaviour.failConnect) throw this.behaviour.failConnect;
    this.connected = true;
  }

  async subscribe(topics: string[], qos: QoS[]): Promise<QoS[]> {
    this.calls.push('subscribe');
    this.subscribeCalls.push({ topics: [...topics], qos: [...qos] });
    if (this.behaviour.dropOnSubscribe) {
      this.dropConnection(this.behaviour.dropOnSubscribe);
      throw this.behaviour.dropOnSubscribe;
    }
    if (this.behaviour.failSubscribe) throw this.behaviour.failSubscribe;
    return this.behaviour.grant ? this.behaviour.grant(qos) : [...qos];
  }

  async unsubscribe(topics: string[]): Promise<void> {
    this.calls.push('unsubscribe');
    this.unsubscribeCalls.push([...topics]);
    if (this.behaviour.failUnsubscribe) throw this.behaviour.failUnsubscribe;
  }

  async disconnectForcibly(_timeoutMs: number): Promise<void> {
    this.calls.push('disconnect');
    await this.behaviour.disconnectGate;
    this.connected = false;
    if (this.behaviour.failDisconnect) throw this.behaviour.failDisconnect;
  }

  setCallback(callback: IMQTTCallback | null): void {
    if (callback === null && this.behaviour.failClearCallback) throw this.behaviour.failClearCallback;
    this.callback = callback;
  }

  async close(): Promise<void> {
    this.calls.push('close');
    this.closed = true;
    this.connected = false;
    if (this.behaviour.failClose) throw this.behaviour.failClose;
  }

  isConnected(): boolean {
    return this.connected;
  }

  count(call: string): number {
    return this.calls.filter((c) => c === call).length;
  }

  /** What the protocol layer does when the socket drops. */
  dropConnection(cause: Error) {
    this.connected = false;
    this.callback?.connectionLost(cause);
  }

  deliver(topic: string, payload: string, qos: QoS = 1) {
    if (!this.callback) throw new Error('No callback registered');
    this.callback.messageArrived(topic, { payload: Buffer.from(payload), qos, retain: false, dup: false, messageId: 7 });
  }
}

export class FakeClientFactory implements IMQTTClientFactory {
  readonly handles: FakeClientHandle[] = [];
  /** Applied to every handle created from now on. */
  behaviour: HandleBehaviour = {};
  connectionOptions: MqttConnectionOptions;
  stopAction: ConsumerStopAction | undefined;

  constructor(connectionOptions: Partial<MqttConnectionOptions> = {}, stopAction?: ConsumerStopAction) {
    this.connectionOptions = { ...connectionOptionsSchema.parse({}), ...connectionOptions };
    this.stopAction = stopAction;
  }

  getConnectionOptions(): MqttConnectionOptions {
    return this.connectionOptions;
  }

  getConsumerStopAction(): ConsumerStopAction | undefined {
    return this.stopAction;
  }

  getClientInstance(url: string | undefined, clientId: string): FakeClientHandle {
    const handle = new FakeClientHandle(url, clientId, { ...this.behaviour });
    this.handles.push(handle);
    return handle;
  }

  liveHandles(): FakeClientHandle[] {
    return this.handles.filter((h) => !h.closed);
  }

  last(): FakeClientHandle {
    const handle = this.handles[this.handles.length - 1];
    if (!handle) throw new Error('No handle created yet');
    return handle;
  }
}

export const deferred = () => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
};

/** Lets every queued promise continuation run. */
export const flushPromises = () => new Promise<void>((resolve) => setImmediate(resolve));

type ManualTask = {
  task: () => Promise<void>;
  delayMs: number;
  cancelled: boolean;
  fired: boolean;
};

/**
 * Scheduler whose clock only moves when the test fires the next task.
 */
export class ManualTaskScheduler implements ITaskScheduler {
  readonly tasks: ManualTask[] = [];

  schedule(task: () => Promise<void>, delayMs: number): IScheduledTask {
    const entry: ManualTask = { task, delayMs, cancelled: false, fired: false };
    this.tasks.push(entry);
    return {
      cancel: () => {
        entry.cancelled = true;
      },
    };
  }

  pending(): ManualTask[] {
    return this.tasks.filter((t) => !t.cancelled && !t.fired);
  }

  async runNext(): Promise<void> {
    const next = this.pending()[0];
    if (!next) throw new Error('No pending task');
    next.fired = true;
    await next.task();
  }
}

export class RecordingConsumer implements IMessageConsumer {
  readonly messages: Message[] = [];
  failWith?: Error;

  accept(message: Message): void {
    if (this.failWith) throw this.failWith;
    this.messages.push(message);
  }
}

export class RecordingPublisher implements IEventPublisher {
  readonly events: AdapterEvent[] = [];

  publish(event: AdapterEvent): void {
    this.events.push(event);
  }

  ofType(type: AdapterEvent['type']): AdapterEvent[] {
    return this.events.filter((e) => e.type === type);
  }
}
