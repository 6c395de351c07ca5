import type { ConsumerStopAction, MqttConnectionOptions } from '@utils/options.schema';
import type { IMQTTClientFactory } from './IMQTTClientFactory';
import type { IMQTTClientHandle } from './IMQTTClientHandle';
import { MQTTClientHandle } from './MQTTClientHandle';

const DEFAULT_COMPLETION_TIMEOUT = 30_000;

/**
 * Hands out mqtt.js-backed handles that all share one set of connection options.
 */
export class DefaultMQTTClientFactory implements IMQTTClientFactory {
  constructor(
    private connectionOptions: MqttConnectionOptions,
    private consumerStopAction: ConsumerStopAction = 'unsubscribe_clean',
    private readonly completionTimeout: number = DEFAULT_COMPLETION_TIMEOUT
  ) {}

  getConnectionOptions(): MqttConnectionOptions {
    return { ...this.connectionOptions };
  }

  setConnectionOptions(connectionOptions: MqttConnectionOptions) {
    this.connectionOptions = connectionOptions;
  }

  getConsumerStopAction(): ConsumerStopAction {
    return this.consumerStopAction;
  }

  setConsumerStopAction(consumerStopAction: ConsumerStopAction) {
    this.consumerStopAction = consumerStopAction;
  }

  getClientInstance(url: string | undefined, clientId: string): IMQTTClientHandle {
    return new MQTTClientHandle(url, clientId, this.completionTimeout);
  }
}
