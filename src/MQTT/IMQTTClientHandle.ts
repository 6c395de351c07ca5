import type { MqttConnectionOptions, QoS } from '@utils/options.schema';

/**
 * A message as the protocol layer hands it over, before conversion.
 */
export type InboundMessage = {
  payload: Buffer;
  qos: QoS;
  retain: boolean;
  dup: boolean;
  messageId?: number;
};

/**
 * Event sink registered on a client handle. Only one sink is registered at a time.
 */
export interface IMQTTCallback {
  connectionLost(cause: Error): void;
  /**
   * Throwing from here tells the protocol layer that delivery failed; it drops the connection.
   */
  messageArrived(topic: string, message: InboundMessage): void;
  deliveryComplete(messageId: number): void;
}

/**
 * One broker connection. Created by a client factory, owned by the adapter, and never reused
 * once closed.
 */
export interface IMQTTClientHandle {
  connect(options: MqttConnectionOptions): Promise<void>;
  /**
   * Subscribe to all topics in one request. `qos` is aligned with `topics` by index, and so is the
   * returned list of granted QoS levels.
   */
  subscribe(topics: string[], qos: QoS[]): Promise<QoS[]>;
  unsubscribe(topics: string[]): Promise<void>;
  /**
   * Disconnect, giving in-flight work at most `timeoutMs` to finish.
   */
  disconnectForcibly(timeoutMs: number): Promise<void>;
  setCallback(callback: IMQTTCallback | null): void;
  close(): Promise<void>;
  isConnected(): boolean;
}
