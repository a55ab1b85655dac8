import { connect, type Message, type Options } from 'amqplib';
import { TransientIoError } from '@uas-bridge/domain';
import { DeliveryRejectedError } from '../publishers/broker-publisher.js';

export interface AmqpSessionEvents {
  onClose(error: Error): void;
  onError(error: Error): void;
  onReturned(routingKey: string): void;
}

export interface AmqpSocketOptions {
  rejectUnauthorized?: boolean;
  servername?: string;
  timeout?: number;
}

/** One connection + confirm channel, reduced to what the publisher needs. */
export interface AmqpSession {
  publish(exchange: string, routingKey: string, payload: Buffer): Promise<void>;
  close(): Promise<void>;
}

export type AmqpSessionFactory = (
  params: Options.Connect,
  socketOptions: AmqpSocketOptions,
  events: AmqpSessionEvents,
) => Promise<AmqpSession>;

function asError(value: unknown, fallback: string): Error {
  return value instanceof Error ? value : new TransientIoError(fallback);
}

export const openAmqpSession: AmqpSessionFactory = async (params, socketOptions, events) => {
  const connection = await connect(params, socketOptions);
  let closing = false;
  let channelOpen = false;

  connection.on('error', (err: unknown) => events.onError(asError(err, 'AMQP connection error')));
  connection.on('close', (err: unknown) => {
    if (!closing) events.onClose(asError(err, 'AMQP connection closed'));
  });

  try {
    const channel = await connection.createConfirmChannel();
    channelOpen = true;
    channel.on('error', (err: unknown) => events.onError(asError(err, 'AMQP channel error')));
    channel.on('close', () => {
      channelOpen = false;
      if (!closing) events.onClose(new TransientIoError('AMQP channel closed'));
    });
    channel.on('return', (msg: Message) => events.onReturned(msg.fields.routingKey));

    return {
      async publish(exchange, routingKey, payload) {
        channel.publish(exchange, routingKey, payload, {
          contentType: 'application/json',
          contentEncoding: 'utf-8',
          mandatory: true,
        });
        try {
          await channel.waitForConfirms();
        } catch (err) {
          if (channelOpen) throw new DeliveryRejectedError('message not acknowledged by broker');
          throw err;
        }
      },
      async close() {
        closing = true;
        if (channelOpen) {
          channelOpen = false;
          await channel.close();
        }
        await connection.close();
      },
    };
  } catch (err) {
    closing = true;
    await connection.close();
    throw err;
  }
};
