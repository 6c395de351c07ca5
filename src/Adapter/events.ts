export type ConnectionFailedEvent = {
  type: 'connection-failed';
  clientId: string;
  cause: Error;
  at: number;
};

export type SubscribedEvent = {
  type: 'subscribed';
  clientId: string;
  topics: string[];
  message: string;
  at: number;
};

export type AdapterEvent = ConnectionFailedEvent | SubscribedEvent;

/**
 * External sink for adapter notifications. Publishing is fire-and-forget.
 */
export interface IEventPublisher {
  publish(event: AdapterEvent): void;
}
