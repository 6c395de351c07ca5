import { z } from 'zod';

export const qosSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

export const topicSubscriptionSchema = z.object({
  topic: z.string().min(1),
  qos: qosSchema.default(1),
});

/**
 * What the adapter does with its subscriptions when it stops:
 * - unsubscribe_always: always unsubscribe from every registered topic
 * - unsubscribe_clean: unsubscribe only when the session was clean (broker would drop it anyway)
 * - unsubscribe_never: leave subscriptions on the broker for a persistent session
 */
export const stopActionSchema = z.enum(['unsubscribe_always', 'unsubscribe_clean', 'unsubscribe_never']);

export const connectionOptionsSchema = z.object({
  servers: z
    .array(
      z.object({
        host: z.string().min(1),
        port: z.number().int().min(1).max(65535),
        protocol: z.enum(['mqtt', 'mqtts', 'tcp', 'ssl', 'ws', 'wss']).optional(),
      })
    )
    .min(1)
    .optional(),
  cleanSession: z.boolean().default(true),
  keepalive: z.number().int().min(0).default(60),
  connectTimeout: z.number().int().positive().default(30_000),
  protocolVersion: z.union([z.literal(3), z.literal(4), z.literal(5)]).default(4),
  username: z.string().optional(),
  password: z.string().optional(),
  will: z
    .object({
      topic: z.string().min(1),
      payload: z.string(),
      qos: qosSchema.default(1),
      retain: z.boolean().default(false),
    })
    .optional(),
});

export const optionsSchema = z.object({
  url: z.string().min(1).optional(),
  clientId: z.string().min(1),
  topics: z.array(topicSubscriptionSchema).default([]),
  stopAction: stopActionSchema.default('unsubscribe_clean'),
  completionTimeout: z.number().int().positive().default(30_000),
  recoveryInterval: z.number().int().positive().default(10_000),
  payloadAsBytes: z.boolean().default(false),
  connection: connectionOptionsSchema.default({}),
});

export type QoS = z.infer<typeof qosSchema>;
export type TopicSubscription = z.infer<typeof topicSubscriptionSchema>;
export type ConsumerStopAction = z.infer<typeof stopActionSchema>;
export type MqttConnectionOptions = z.infer<typeof connectionOptionsSchema>;
export type AdapterOptions = z.infer<typeof optionsSchema>;
