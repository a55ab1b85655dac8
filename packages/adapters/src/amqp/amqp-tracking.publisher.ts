import type { Options } from 'amqplib';
import type { AmqpSinkConfig } from '@uas-bridge/domain';
import { TransientIoError } from '@uas-bridge/domain';
import { BrokerPublisher, type BrokerPublisherOptions } from '../publishers/broker-publisher.js';
import {
  openAmqpSession,
  type AmqpSession,
  type AmqpSessionFactory,
  type AmqpSocketOptions,
} from './amqp-session.js';

const AMQP_PORT = 5672;
const AMQPS_PORT = 5671;
const HEARTBEAT_SECONDS = 30;

export function amqpConnectParams(config: AmqpSinkConfig): Options.Connect {
  return {
    protocol: config.tls ? 'amqps' : 'amqp',
    hostname: config.host,
    port: config.port ?? (config.tls ? AMQPS_PORT : AMQP_PORT),
    username: config.username,
    password: config.password,
    vhost: config.vhost,
    heartbeat: HEARTBEAT_SECONDS,
  };
}

export function amqpSocketOptions(config: AmqpSinkConfig, connectTimeoutMs: number): AmqpSocketOptions {
  if (!config.tls) return { timeout: connectTimeoutMs };
  return {
    rejectUnauthorized: config.rejectUnauthorized,
    servername: config.host,
    timeout: connectTimeoutMs,
  };
}

/**
 * Publishes tracking updates to `exchange` (default: the AMQP default
 * exchange) with the configured queue as routing key, on a confirm channel.
 */
export class AmqpTrackingPublisher extends BrokerPublisher {
  private session: AmqpSession | null = null;
  private readonly connectTimeoutMs: number;

  constructor(
    private readonly config: AmqpSinkConfig,
    options: BrokerPublisherOptions,
    private readonly openSession: AmqpSessionFactory = openAmqpSession,
  ) {
    super('amqp', `amqp:${config.host}/${config.queue}`, options);
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10_000;
  }

  protected async openConnection(signal: AbortSignal): Promise<void> {
    this.log.info(`starting AMQP connection to ${this.config.host} (${this.config.tls ? 'TLS' : 'plain'})`);
    const session = await this.openSession(
      amqpConnectParams(this.config),
      amqpSocketOptions(this.config, this.connectTimeoutMs),
      {
        onClose: (error) => {
          if (this.session !== session) return;
          this.session = null;
          this.handleConnectionLost(error);
        },
        onError: (error) => this.log.warn(`${this.name} error: ${error.message}`),
        onReturned: (routingKey) =>
          this.log.warn(`${this.name} message routing failed (routing key '${routingKey}')`),
      },
    );
    if (signal.aborted) {
      await session.close();
      throw new TransientIoError(`${this.name} connect attempt abandoned`);
    }
    this.session = session;
  }

  protected async sendPayload(payload: Buffer): Promise<void> {
    const session = this.session;
    if (!session) throw new TransientIoError(`${this.name} has no open channel`);
    await session.publish(this.config.exchange, this.config.queue, payload);
  }

  protected async closeConnection(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session) await session.close();
  }
}
