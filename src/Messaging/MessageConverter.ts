import type { InboundMessage } from '@mqtt/IMQTTClientHandle';
import type { Message } from './Message';

export interface IMessageConverter {
  toMessage(topic: string, message: InboundMessage): Message;
}

export type MessageConverterOptions = {
  /** Keep the raw Buffer instead of decoding it. */
  payloadAsBytes?: boolean;
  encoding?: BufferEncoding;
};

export class DefaultMessageConverter implements IMessageConverter {
  private readonly payloadAsBytes: boolean;
  private readonly encoding: BufferEncoding;

  constructor(options: MessageConverterOptions = {}, private readonly now: () => number = Date.now) {
    this.payloadAsBytes = options.payloadAsBytes ?? false;
    this.encoding = options.encoding ?? 'utf8';
  }

  toMessage(topic: string, message: InboundMessage): Message {
    return {
      payload: this.payloadAsBytes ? message.payload : message.payload.toString(this.encoding),
      headers: {
        topic,
        qos: message.qos,
        retained: message.retain,
        duplicate: message.dup,
        ...(message.messageId !== undefined ? { messageId: message.messageId } : {}),
        receivedAt: this.now(),
      },
    };
  }
}
