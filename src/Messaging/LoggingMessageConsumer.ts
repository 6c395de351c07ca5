import { logDebug, logInfo } from '@utils/logger';
import type { IMessageConsumer, Message } from './Message';

const PREVIEW_LENGTH = 200;

/**
 * Consumer for running the service on its own: every message becomes one log line.
 */
export class LoggingMessageConsumer implements IMessageConsumer {
  private received = 0;

  accept(message: Message): void {
    this.received++;
    const { topic, qos, retained } = message.headers;
    const body = typeof message.payload === 'string' ? message.payload : message.payload.toString('base64');
    const preview = body.length > PREVIEW_LENGTH ? `${body.slice(0, PREVIEW_LENGTH)}...` : body;
    logInfo(`[Message] ${topic} (qos=${qos}${retained ? ', retained' : ''}) ${preview}`);
    logDebug(`[Message] ${this.received} message(s) received so far`);
  }

  count(): number {
    return this.received;
  }
}
