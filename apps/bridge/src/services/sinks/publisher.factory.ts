import type { BridgeConfig, Logger, TrackingPublisherPort } from '@uas-bridge/domain';
import {
  AmqpTrackingPublisher,
  MqttTrackingPublisher,
  type AmqpSessionFactory,
  type BrokerPublisherOptions,
  type MqttSessionFactory,
} from '@uas-bridge/adapters';

export interface PublisherFactoryOptions {
  signal: AbortSignal;
  logger?: Logger;
  amqpSessionFactory?: AmqpSessionFactory;
  mqttSessionFactory?: MqttSessionFactory;
  random?: () => number;
}

/** One publisher per configured sink section; absent sections get nothing. */
export function createPublishers(config: BridgeConfig, options: PublisherFactoryOptions): TrackingPublisherPort[] {
  const shared: BrokerPublisherOptions = {
    payloadFormat: config.payloadFormat,
    publishTimeoutMs: config.publishTimeoutMs,
    reconnect: config.reconnect,
    closeTimeoutMs: config.shutdownTimeoutMs,
    signal: options.signal,
    logger: options.logger,
    random: options.random,
  };

  const publishers: TrackingPublisherPort[] = [];
  if (config.amqp) {
    publishers.push(new AmqpTrackingPublisher(config.amqp, shared, options.amqpSessionFactory));
  }
  if (config.mqtt) {
    publishers.push(new MqttTrackingPublisher(config.mqtt, shared, options.mqttSessionFactory));
  }
  return publishers;
}
