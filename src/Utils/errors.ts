/**
 * Error classes raised by the adapter and its MQTT client capability.
 */

export const ErrorCode = {
  CONFIGURATION: 'CONFIGURATION',
  SUBSCRIPTION_FAILED: 'SUBSCRIPTION_FAILED',
  INVALID_TOPIC: 'INVALID_TOPIC',
  MQTT_CLIENT: 'MQTT_CLIENT',
  TIMEOUT: 'TIMEOUT',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export type MqttOperation = 'connect' | 'subscribe' | 'unsubscribe' | 'disconnect' | 'close';

abstract class BaseError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON() {
    return {
      message: this.message,
      name: this.name,
      code: this.code,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when the adapter cannot work out where to connect, or the options file is unusable.
 */
export class ConfigurationError extends BaseError {
  readonly code = ErrorCode.CONFIGURATION;
}

/**
 * Thrown by the runtime subscription API. The topic registry is left matching the live
 * subscription state when this is raised.
 */
export class SubscriptionError extends BaseError {
  readonly code = ErrorCode.SUBSCRIPTION_FAILED;

  constructor(readonly topics: string[], message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

export class InvalidTopicError extends BaseError {
  readonly code = ErrorCode.INVALID_TOPIC;
}

/**
 * Failure of a single call on the MQTT client handle.
 */
export class MqttClientError extends BaseError {
  readonly code = ErrorCode.MQTT_CLIENT;

  constructor(readonly operation: MqttOperation, message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

export class TimeoutError extends BaseError {
  readonly code = ErrorCode.TIMEOUT;

  constructor(message = 'Operation timed out') {
    super(message);
  }
}

export function hasErrorCode(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

export function getErrorCode(err: unknown): string | undefined {
  return hasErrorCode(err) ? err.code : undefined;
}

export const toError = (value: unknown): Error => (value instanceof Error ? value : new Error(String(value)));
