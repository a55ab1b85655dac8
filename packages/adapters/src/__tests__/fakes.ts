import type { Logger } from '@uas-bridge/domain';
import type { Options } from 'amqplib';
import type { IClientOptions } from 'mqtt';
import type { AmqpSession, AmqpSessionEvents, AmqpSessionFactory } from '../amqp/amqp-session.js';
import type { MqttPublishOptions, MqttSession, MqttSessionEvents, MqttSessionFactory } from '../mqtt/mqtt-session.js';

// ─── Polling ──────────────────────────────────────────────────────────────────

export async function waitFor(condition: () => boolean, timeoutMs = 1_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error('condition not met in time');
    await new Promise((resolve) => setTimeout(resolve, 2));
  }
}

// ─── Recording logger ─────────────────────────────────────────────────────────

export interface RecordingLogger extends Logger {
  lines: string[];
}

export function recordingLogger(): RecordingLogger {
  const lines: string[] = [];
  const record = (level: string) => (message: string) => {
    lines.push(`${level} ${message}`);
  };
  return { lines, error: record('error'), warn: record('warn'), info: record('info'), debug: record('debug') };
}

// ─── Broker doubles ───────────────────────────────────────────────────────────

/** What a fake session does on its next publish. */
export type PublishBehaviour = 'ok' | 'fail' | 'hang' | Error;

export interface Published {
  target: string;
  payload: string;
}

interface FakeSessionBase {
  readonly published: Published[];
  nextPublish: PublishBehaviour;
  closed: boolean;
}

async function runPublish(session: FakeSessionBase, target: string, payload: Buffer): Promise<void> {
  const behaviour = session.nextPublish;
  session.nextPublish = 'ok';
  if (behaviour === 'hang') return new Promise<void>(() => undefined);
  if (behaviour === 'fail') throw new Error('socket hang up');
  if (behaviour instanceof Error) throw behaviour;
  session.published.push({ target, payload: payload.toString('utf8') });
}

export interface FakeMqttSession extends MqttSession, FakeSessionBase {
  readonly url: string;
  readonly options: IClientOptions;
  readonly events: MqttSessionEvents;
  readonly publishOptions: MqttPublishOptions[];
}

export interface FakeMqttBroker {
  factory: MqttSessionFactory;
  sessions: FakeMqttSession[];
  /** Number of upcoming connection attempts to refuse. */
  refuse: number;
  attempts: number;
  current(): FakeMqttSession;
}

export function fakeMqttBroker(): FakeMqttBroker {
  const broker: FakeMqttBroker = {
    sessions: [],
    refuse: 0,
    attempts: 0,
    factory: async (url, options, events) => {
      broker.attempts += 1;
      if (broker.refuse > 0) {
        broker.refuse -= 1;
        throw new Error('connect ECONNREFUSED 127.0.0.1:1883');
      }
      const session: FakeMqttSession = {
        url,
        options,
        events,
        published: [],
        publishOptions: [],
        nextPublish: 'ok',
        closed: false,
        publish: async (topic, payload, publishOptions) => {
          session.publishOptions.push(publishOptions);
          await runPublish(session, topic, payload);
        },
        close: async () => {
          session.closed = true;
        },
      };
      broker.sessions.push(session);
      return session;
    },
    current: () => {
      const session = broker.sessions[broker.sessions.length - 1];
      if (!session) throw new Error('no MQTT session opened');
      return session;
    },
  };
  return broker;
}

export interface FakeAmqpSession extends AmqpSession, FakeSessionBase {
  readonly params: Options.Connect;
  readonly events: AmqpSessionEvents;
}

export interface FakeAmqpBroker {
  factory: AmqpSessionFactory;
  sessions: FakeAmqpSession[];
  refuse: number;
  attempts: number;
  current(): FakeAmqpSession;
}

export function fakeAmqpBroker(): FakeAmqpBroker {
  const broker: FakeAmqpBroker = {
    sessions: [],
    refuse: 0,
    attempts: 0,
    factory: async (params, _socketOptions, events) => {
      broker.attempts += 1;
      if (broker.refuse > 0) {
        broker.refuse -= 1;
        throw new Error('connect ECONNREFUSED 127.0.0.1:5671');
      }
      const session: FakeAmqpSession = {
        params,
        events,
        published: [],
        nextPublish: 'ok',
        closed: false,
        publish: async (exchange, routingKey, payload) => {
          await runPublish(session, `${exchange}/${routingKey}`, payload);
        },
        close: async () => {
          session.closed = true;
        },
      };
      broker.sessions.push(session);
      return session;
    },
    current: () => {
      const session = broker.sessions[broker.sessions.length - 1];
      if (!session) throw new Error('no AMQP session opened');
      return session;
    },
  };
  return broker;
}
