import { connect, type IClientOptions } from 'mqtt';
import { TransientIoError } from '@uas-bridge/domain';

export interface MqttSessionEvents {
  onClose(error: Error): void;
  onError(error: Error): void;
}

export interface MqttPublishOptions {
  qos: 0 | 1 | 2;
  retain: boolean;
}

export interface MqttSession {
  publish(topic: string, payload: Buffer, options: MqttPublishOptions): Promise<void>;
  close(): Promise<void>;
}

export type MqttSessionFactory = (
  url: string,
  options: IClientOptions,
  events: MqttSessionEvents,
) => Promise<MqttSession>;

/**
 * Connects an mqtt.js client with its built-in reconnect disabled, so a lost
 * connection surfaces as `onClose` and the publisher's own backoff applies.
 */
export const openMqttSession: MqttSessionFactory = (url, options, events) =>
  new Promise<MqttSession>((resolve, reject) => {
    const client = connect(url, { ...options, reconnectPeriod: 0 });
    let closing = false;
    client.on('error', (err: Error) => events.onError(err));

    const cleanup = () => {
      client.removeListener('connect', onConnect);
      client.removeListener('error', onFailure);
      client.removeListener('close', onEarlyClose);
    };
    const onFailure = (err: Error) => {
      cleanup();
      client.end(true);
      reject(err);
    };
    const onEarlyClose = () => onFailure(new TransientIoError(`MQTT connection to ${url} closed`));
    const onConnect = () => {
      cleanup();
      client.on('close', () => {
        if (!closing) events.onClose(new TransientIoError('MQTT connection closed'));
      });
      resolve({
        async publish(topic, payload, publishOptions) {
          await client.publishAsync(topic, payload, publishOptions);
        },
        async close() {
          closing = true;
          await client.endAsync();
        },
      });
    };

    client.once('connect', onConnect);
    client.once('error', onFailure);
    client.once('close', onEarlyClose);
  });
