import type { ConsumerStopAction, MqttConnectionOptions } from '@utils/options.schema';
import type { IMQTTClientHandle } from './IMQTTClientHandle';

export interface IMQTTClientFactory {
  /** Read on every connect attempt, so changes apply from the next reconnect. */
  getConnectionOptions(): MqttConnectionOptions;
  getConsumerStopAction(): ConsumerStopAction | undefined;
  getClientInstance(url: string | undefined, clientId: string): IMQTTClientHandle;
}
