import { createSocket, type RemoteInfo } from 'dgram';
import { connect as tcpConnect, type Socket } from 'net';
import { PassThrough, type Readable } from 'stream';
import { SerialPort } from 'serialport';
import { TransientIoError } from '@uas-bridge/domain';
import type { MavlinkEndpoint } from './connection-string.js';

/** Byte stream to and from a MAVLink endpoint. `stream` ends or errors when the link is lost. */
export interface MavlinkTransport {
  readonly stream: Readable;
  write(data: Buffer): Promise<void>;
  close(): Promise<void>;
}

export interface TransportOpenOptions {
  /** Abandons a pending connect. */
  signal?: AbortSignal;
  connectTimeoutMs?: number;
}

export type MavlinkTransportFactory = (
  endpoint: MavlinkEndpoint,
  options?: TransportOpenOptions,
) => Promise<MavlinkTransport>;

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

function openUdp(endpoint: Extract<MavlinkEndpoint, { kind: 'udpin' | 'udpout' }>): Promise<MavlinkTransport> {
  return new Promise((resolve, reject) => {
    const socket = createSocket('udp4');
    const stream = new PassThrough();
    // udpin answers whoever sent last; udpout always talks to the configured peer
    let peer: { address: string; port: number } | null =
      endpoint.kind === 'udpout' ? { address: endpoint.host, port: endpoint.port } : null;

    socket.on('message', (message: Buffer, remote: RemoteInfo) => {
      if (endpoint.kind === 'udpin') peer = { address: remote.address, port: remote.port };
      stream.write(message);
    });
    socket.once('close', () => stream.end());

    const transport: MavlinkTransport = {
      stream,
      write: (data) =>
        new Promise<void>((done, fail) => {
          if (!peer) {
            done();
            return;
          }
          socket.send(data, peer.port, peer.address, (err) => (err ? fail(err) : done()));
        }),
      close: () =>
        new Promise<void>((done) => {
          stream.end();
          socket.close(() => done());
        }),
    };

    const onStartupError = (err: Error) => {
      socket.close();
      reject(new TransientIoError(`UDP socket error: ${err.message}`, err));
    };
    socket.once('error', onStartupError);

    const ready = () => {
      socket.removeListener('error', onStartupError);
      socket.on('error', (err: Error) => stream.destroy(err));
      resolve(transport);
    };
    if (endpoint.kind === 'udpin') socket.bind(endpoint.port, endpoint.host, ready);
    else socket.bind(0, ready);
  });
}

function openTcp(
  endpoint: Extract<MavlinkEndpoint, { kind: 'tcp' }>,
  options: TransportOpenOptions,
): Promise<MavlinkTransport> {
  return new Promise((resolve, reject) => {
    const target = `${endpoint.host}:${endpoint.port}`;
    const { signal } = options;
    if (signal?.aborted) {
      reject(new TransientIoError(`TCP connect to ${target} aborted`));
      return;
    }

    const timeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    const socket: Socket = tcpConnect({ host: endpoint.host, port: endpoint.port });
    const settle = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      socket.removeListener('error', onStartupError);
    };
    const fail = (err: TransientIoError) => {
      settle();
      socket.destroy();
      reject(err);
    };
    const onStartupError = (err: Error) => fail(new TransientIoError(`TCP connect to ${target} failed: ${err.message}`, err));
    const onAbort = () => fail(new TransientIoError(`TCP connect to ${target} aborted`));
    const timer = setTimeout(
      () => fail(new TransientIoError(`TCP connect to ${target} timed out after ${timeoutMs} ms`)),
      timeoutMs,
    );

    socket.once('error', onStartupError);
    signal?.addEventListener('abort', onAbort, { once: true });
    socket.once('connect', () => {
      settle();
      resolve({
        stream: socket,
        write: (data) =>
          new Promise<void>((done, failWrite) => {
            socket.write(data, (err) => (err ? failWrite(err) : done()));
          }),
        close: () =>
          new Promise<void>((done) => {
            if (socket.destroyed) {
              done();
              return;
            }
            socket.once('close', () => done());
            socket.end();
            socket.destroy();
          }),
      });
    });
  });
}

function openSerial(endpoint: Extract<MavlinkEndpoint, { kind: 'serial' }>): Promise<MavlinkTransport> {
  return new Promise((resolve, reject) => {
    const port = new SerialPort({ path: endpoint.path, baudRate: endpoint.baudRate, autoOpen: false });
    port.open((err) => {
      if (err) {
        reject(new TransientIoError(`Cannot open ${endpoint.path}: ${err.message}`, err));
        return;
      }
      resolve({
        stream: port,
        write: (data) =>
          new Promise<void>((done, fail) => {
            port.write(data, (writeErr) => (writeErr ? fail(writeErr) : done()));
          }),
        close: () =>
          new Promise<void>((done) => {
            if (!port.isOpen) {
              done();
              return;
            }
            port.close(() => done());
          }),
      });
    });
  });
}

export const openMavlinkTransport: MavlinkTransportFactory = (endpoint, options = {}) => {
  switch (endpoint.kind) {
    case 'udpin':
    case 'udpout':
      return openUdp(endpoint);
    case 'tcp':
      return openTcp(endpoint, options);
    case 'serial':
      return openSerial(endpoint);
  }
};
