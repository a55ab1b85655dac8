import {
  ConfigError,
  type BridgeConfig,
  type Logger,
  type MavlinkSourceConfig,
  type ReconnectConfig,
  type TelemetrySourcePort,
  type TrackingPublisherPort,
} from '@uas-bridge/domain';
import {
  createLogger,
  errorMessage,
  MavlinkTelemetrySource,
  type AmqpSessionFactory,
  type MqttSessionFactory,
} from '@uas-bridge/adapters';
import { SystemStateTracker } from '../tracker/system-state-tracker.js';
import { ReportedFlightStatePolicy } from '../tracker/flight-state.policy.js';
import { IdleTimeoutEviction, NeverEvict } from '../tracker/eviction.policy.js';
import { SinkManager } from '../sinks/sink-manager.js';
import { createPublishers } from '../sinks/publisher.factory.js';
import { BridgeController } from './bridge-controller.js';

export interface SourceFactoryOptions {
  reconnect: ReconnectConfig;
  signal: AbortSignal;
  logger?: Logger;
}

export type TelemetrySourceFactory = (config: MavlinkSourceConfig, options: SourceFactoryOptions) => TelemetrySourcePort;

/** Seams for tests and embedding. Defaults talk to real devices and brokers. */
export interface BridgeDependencies {
  createSource?: TelemetrySourceFactory;
  createPublishers?: (config: BridgeConfig, signal: AbortSignal) => TrackingPublisherPort[];
  amqpSessionFactory?: AmqpSessionFactory;
  mqttSessionFactory?: MqttSessionFactory;
  logger?: Logger;
  now?: () => number;
}

const defaultSourceFactory: TelemetrySourceFactory = (config, options) => new MavlinkTelemetrySource(config, options);

/**
 * Validates the configuration, connects the sinks, opens the telemetry source
 * and starts the ingest loop. Nothing touches the network before validation passes.
 */
export async function startBridge(config: BridgeConfig, deps: BridgeDependencies = {}): Promise<BridgeController> {
  if (!config.amqp && !config.mqtt) {
    throw new ConfigError('A valid AMQP or MQTT config is required');
  }

  const shutdown = new AbortController();
  const source = (deps.createSource ?? defaultSourceFactory)(config.mavlink, {
    reconnect: config.reconnect,
    signal: shutdown.signal,
    logger: deps.logger,
  });

  const publishers = deps.createPublishers
    ? deps.createPublishers(config, shutdown.signal)
    : createPublishers(config, {
        signal: shutdown.signal,
        logger: deps.logger,
        amqpSessionFactory: deps.amqpSessionFactory,
        mqttSessionFactory: deps.mqttSessionFactory,
      });
  const sinks = new SinkManager(publishers, {
    publishTimeoutMs: config.publishTimeoutMs,
    logger: deps.logger,
    now: deps.now,
  });

  const tracker = new SystemStateTracker({
    flightPolicy: new ReportedFlightStatePolicy(config.flightDetection),
    setFlyingWhenGrounded: config.setFlyingWhenGrounded,
    evictionPolicy:
      config.trackStateTtlSeconds !== undefined
        ? new IdleTimeoutEviction(config.trackStateTtlSeconds)
        : new NeverEvict(),
    now: deps.now,
  });

  await sinks.connectAll();
  await source.open();

  const controller = new BridgeController({
    config,
    source,
    tracker,
    sinks,
    shutdown,
    logger: deps.logger,
    now: deps.now,
  });
  const log = deps.logger ?? createLogger('bridge');
  controller.run().catch((err: unknown) => log.error(`Ingest loop failed: ${errorMessage(err)}`));
  return controller;
}
