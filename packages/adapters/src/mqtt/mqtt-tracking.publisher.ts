import type { IClientOptions } from 'mqtt';
import { v4 as uuidv4 } from 'uuid';
import type { MqttSinkConfig } from '@uas-bridge/domain';
import { TransientIoError } from '@uas-bridge/domain';
import { BrokerPublisher, type BrokerPublisherOptions } from '../publishers/broker-publisher.js';
import { openMqttSession, type MqttSession, type MqttSessionFactory } from './mqtt-session.js';

export function mqttBrokerUrl(config: MqttSinkConfig): string {
  return `${config.tls ? 'mqtts' : 'mqtt'}://${config.host}:${config.port}`;
}

export function mqttClientOptions(config: MqttSinkConfig, connectTimeoutMs: number): IClientOptions {
  return {
    clientId: config.clientId ?? `uas-bridge-${uuidv4().slice(0, 8)}`,
    username: config.username,
    password: config.password,
    connectTimeout: connectTimeoutMs,
    clean: true,
    queueQoSZero: false,
  };
}

export class MqttTrackingPublisher extends BrokerPublisher {
  private session: MqttSession | null = null;
  private readonly connectTimeoutMs: number;

  constructor(
    private readonly config: MqttSinkConfig,
    options: BrokerPublisherOptions,
    private readonly openSession: MqttSessionFactory = openMqttSession,
  ) {
    super('mqtt', `mqtt:${config.host}:${config.port}/${config.topic}`, options);
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10_000;
  }

  protected async openConnection(signal: AbortSignal): Promise<void> {
    const url = mqttBrokerUrl(this.config);
    this.log.info(`starting MQTT connection to ${url}`);
    const session = await this.openSession(url, mqttClientOptions(this.config, this.connectTimeoutMs), {
      onClose: (error) => {
        if (this.session !== session) return;
        this.session = null;
        this.handleConnectionLost(error);
      },
      onError: (error) => this.log.warn(`${this.name} error: ${error.message}`),
    });
    if (signal.aborted) {
      await session.close();
      throw new TransientIoError(`${this.name} connect attempt abandoned`);
    }
    this.session = session;
  }

  protected async sendPayload(payload: Buffer): Promise<void> {
    const session = this.session;
    if (!session) throw new TransientIoError(`${this.name} has no open connection`);
    await session.publish(this.config.topic, payload, { qos: this.config.qos, retain: this.config.retain });
  }

  protected async closeConnection(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session) await session.close();
  }
}
