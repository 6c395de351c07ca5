import type { IMQTTCallback, IMQTTClientHandle, InboundMessage } from '@mqtt/IMQTTClientHandle';
import type { IMessageConsumer } from '@messaging/Message';
import type { IMessageConverter } from '@messaging/MessageConverter';
import { logError } from '@utils/logger';

/**
 * The part of the adapter that reacts to a lost connection.
 */
export interface IConnectionLossHandler {
  /**
   * Must not reject. `source` is the handle that lost its connection; a loss from a handle the
   * adapter no longer owns is ignored.
   */
  connectionLost(cause: Error, source?: IMQTTClientHandle): Promise<void>;
}

/**
 * Event sink registered on one client handle. The adapter creates a router per handle so a loss
 * can be traced back to the handle that reported it.
 *
 * Message delivery runs straight through to the consumer and never waits on the adapter's
 * connection lock; loss notifications are handed to the adapter, which serialises them.
 */
export class CallbackRouter implements IMQTTCallback {
  constructor(
    private readonly lossHandler: IConnectionLossHandler,
    private readonly converter: IMessageConverter,
    private readonly consumer: IMessageConsumer,
    private readonly source: IMQTTClientHandle
  ) {}

  connectionLost(cause: Error): void {
    void this.lossHandler.connectionLost(cause, this.source);
  }

  messageArrived(topic: string, message: InboundMessage): void {
    const converted = this.converter.toMessage(topic, message);
    try {
      this.consumer.accept(converted);
    } catch (error) {
      logError(`[Adapter] Unhandled exception delivering message from ${topic} (qos=${message.qos})`, error);
      throw error;
    }
  }

  // Outbound delivery acknowledgements are of no interest to an inbound adapter.
  deliveryComplete(): void {}
}
