import { MqttClientError, TimeoutError, toError } from '@utils/errors';
import { logDebug, logError, logInfo, logWarn } from '@utils/logger';
import type { MqttConnectionOptions, QoS } from '@utils/options.schema';
import { withTimeout } from '@utils/withTimeout';
import mqtt, { type IClientOptions, type ISubscriptionGrant, type ISubscriptionMap, type MqttClient } from 'mqtt';
import type { IMQTTCallback, IMQTTClientHandle, InboundMessage } from './IMQTTClientHandle';

// SUBACK return code for a refused subscription.
const SUBSCRIBE_FAILURE = 128;

/**
 * Client handle backed by mqtt.js.
 *
 * The library's own auto-reconnect is switched off (`reconnectPeriod: 0`): the adapter decides
 * when to reconnect and always does so with a fresh handle.
 */
export class MQTTClientHandle implements IMQTTClientHandle {
  private client?: MqttClient;
  private callback: IMQTTCallback | null = null;
  private established = false;
  private closing = false;
  private closed = false;
  private lostReported = false;
  private lastError?: Error;

  constructor(
    private readonly url: string | undefined,
    private readonly clientId: string,
    private readonly completionTimeout: number
  ) {}

  async connect(options: MqttConnectionOptions): Promise<void> {
    if (this.client || this.closed) {
      throw new MqttClientError('connect', `Client ${this.clientId} cannot be connected twice`);
    }

    const clientOptions: IClientOptions = {
      clientId: this.clientId,
      clean: options.cleanSession,
      keepalive: options.keepalive,
      connectTimeout: options.connectTimeout,
      protocolVersion: options.protocolVersion,
      username: options.username,
      password: options.password,
      servers: options.servers,
      will: options.will,
      reconnectPeriod: 0,
    };

    const target = this.url ?? (options.servers ?? []).map((s) => `${s.host}:${s.port}`).join(',');
    logInfo(`[MQTT] Connecting ${this.clientId} to ${target}...`);

    const client = this.url ? mqtt.connect(this.url, clientOptions) : mqtt.connect(clientOptions);
    this.client = client;

    // An EventEmitter without an 'error' listener throws, so this one stays for the client's lifetime.
    client.on('error', (error) => {
      this.lastError = error;
      logWarn(`[MQTT] Client ${this.clientId} error: ${error.message}`);
    });
    client.on('close', () => this.onClose());
    client.on('message', (topic, payload, packet) =>
      this.deliver(topic, {
        payload,
        qos: packet.qos,
        retain: packet.retain,
        dup: packet.dup,
        messageId: packet.messageId,
      })
    );
    client.on('packetreceive', (packet) => {
      if ((packet.cmd === 'puback' || packet.cmd === 'pubcomp') && packet.messageId !== undefined) {
        this.callback?.deliveryComplete(packet.messageId);
      }
    });

    await new Promise<void>((resolve, reject) => {
      let settled = false;

      const cleanup = () => {
        clearTimeout(timeout);
        client.off('connect', onConnect);
        client.off('error', onError);
        client.off('close', onEarlyClose);
      };

      const fail = (error: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(new MqttClientError('connect', `Failed connecting ${this.clientId} to ${target}: ${error.message}`, { cause: error }));
      };

      const onConnect = () => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve();
      };
      const onError = (error: Error) => fail(error);
      const onEarlyClose = () => fail(this.lastError ?? new Error('Connection closed before it was acknowledged'));

      const timeout = setTimeout(
        () => fail(new TimeoutError(`No CONNACK within ${this.completionTimeout}ms`)),
        this.completionTimeout
      );

      client.once('connect', onConnect);
      client.once('error', onError);
      client.once('close', onEarlyClose);
    });

    this.established = true;
    logInfo(`[MQTT] Connected ${this.clientId}`);
  }

  async subscribe(topics: string[], qos: QoS[]): Promise<QoS[]> {
    const client = this.requireClient('subscribe');
    const request: ISubscriptionMap = {};
    topics.forEach((topic, i) => {
      request[topic] = { qos: qos[i] };
    });

    const grants = await withTimeout(
      client.subscribeAsync(request),
      this.completionTimeout,
      `Subscribing ${this.clientId}`
    ).catch((error: unknown) => {
      throw new MqttClientError('subscribe', `Failed subscribing to ${JSON.stringify(topics)}`, { cause: error });
    });

    const grantedByTopic = new Map(grants.map((grant): [string, ISubscriptionGrant['qos']] => [grant.topic, grant.qos]));
    return topics.map((topic) => {
      const granted = grantedByTopic.get(topic);
      if (granted === undefined || granted === SUBSCRIBE_FAILURE) {
        throw new MqttClientError('subscribe', `Broker refused subscription to '${topic}'`);
      }
      return granted;
    });
  }

  async unsubscribe(topics: string[]): Promise<void> {
    const client = this.requireClient('unsubscribe');
    try {
      await withTimeout(client.unsubscribeAsync(topics), this.completionTimeout, `Unsubscribing ${this.clientId}`);
    } catch (error) {
      throw new MqttClientError('unsubscribe', `Failed unsubscribing from ${JSON.stringify(topics)}`, { cause: error });
    }
  }

  async disconnectForcibly(timeoutMs: number): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.closing = true;
    try {
      await withTimeout(client.endAsync(), timeoutMs, `Disconnecting ${this.clientId}`);
    } catch (error) {
      throw new MqttClientError('disconnect', `Failed disconnecting ${this.clientId}`, { cause: error });
    }
  }

  setCallback(callback: IMQTTCallback | null): void {
    this.callback = callback;
  }

  /**
   * Hard-stop the underlying client so nothing lingers after the handle is dropped.
   */
  async close(): Promise<void> {
    this.closing = true;
    this.closed = true;
    this.callback = null;
    const client = this.client;
    if (!client) return;
    this.client = undefined;
    try {
      client.end(true);
    } catch (error) {
      throw new MqttClientError('close', `Failed closing ${this.clientId}`, { cause: error });
    } finally {
      client.removeAllListeners();
      client.on('error', (error) => logDebug(`[MQTT] Error after close on ${this.clientId}: ${error.message}`));
    }
  }

  isConnected(): boolean {
    return this.client?.connected ?? false;
  }

  private requireClient(operation: 'subscribe' | 'unsubscribe'): MqttClient {
    if (!this.client) {
      throw new MqttClientError(operation, `Client ${this.clientId} is not connected`);
    }
    return this.client;
  }

  private onClose() {
    if (!this.established || this.closing || this.lostReported) return;
    this.lostReported = true;
    logWarn(`[MQTT] Connection closed for ${this.clientId}`);
    this.callback?.connectionLost(this.lastError ?? new Error('Connection to broker closed'));
  }

  private deliver(topic: string, message: InboundMessage) {
    const callback = this.callback;
    if (!callback) return;
    try {
      callback.messageArrived(topic, message);
    } catch (error) {
      logError(`[MQTT] Delivery failed for a message on ${topic}; dropping connection`, error);
      this.lastError = toError(error);
      this.client?.end(true);
    }
  }
}
