import type { QoS } from '@utils/options.schema';

export type MessagePayload = string | Buffer;

export type MessageHeaders = {
  topic: string;
  qos: QoS;
  retained: boolean;
  duplicate: boolean;
  messageId?: number;
  /** Epoch ms at which the adapter received the message. */
  receivedAt: number;
};

export type Message = {
  payload: MessagePayload;
  headers: MessageHeaders;
};

/**
 * Downstream consumer of converted messages. Throwing signals that delivery failed.
 */
export interface IMessageConsumer {
  accept(message: Message): void;
}
