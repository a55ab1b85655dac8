import {
  MavLinkPacketParser,
  MavLinkPacketSplitter,
  MavLinkProtocolV2,
  minimal,
  type MavLinkPacket,
} from 'node-mavlink';
import {
  TransientIoError,
  type Logger,
  type MavlinkSourceConfig,
  type ReconnectConfig,
  type TelemetryFrame,
  type TelemetrySourcePort,
  type TelemetrySourceStats,
} from '@uas-bridge/domain';
import { createLogger, errorMessage } from '../logging/console-logger.js';
import { backoffDelay, sleep } from '../resilience/backoff.js';
import { describeEndpoint, parseConnectionString, type MavlinkEndpoint } from './connection-string.js';
import { decodePositionPacket, POSITION_MESSAGE_IDS } from './position-decoder.js';
import { openMavlinkTransport, type MavlinkTransport, type MavlinkTransportFactory } from './transports.js';

export interface MavlinkSourceOptions {
  reconnect: ReconnectConfig;
  /** Shutdown signal; aborting it ends the stream and any reconnect wait. */
  signal?: AbortSignal;
  logger?: Logger;
  maxQueuedFrames?: number;
  handshakeIntervalMs?: number;
  handshakeAttempts?: number;
  /** Bound on a single TCP connect attempt. */
  connectTimeoutMs?: number;
  now?: () => number;
  random?: () => number;
}

const DEFAULT_MAX_QUEUED_FRAMES = 1_000;
const DEFAULT_HANDSHAKE_INTERVAL_MS = 1_000;
const DEFAULT_HANDSHAKE_ATTEMPTS = 10;

/**
 * Reads MAVLink from UDP, TCP or serial and yields decoded position frames.
 * The link is re-opened with backoff whenever it drops, until `close()` or
 * the shutdown signal.
 */
export class MavlinkTelemetrySource implements TelemetrySourcePort, AsyncIterable<TelemetryFrame> {
  readonly connectionString: string;
  private readonly endpoint: MavlinkEndpoint;
  private readonly protocol: MavLinkProtocolV2;
  private readonly log: Logger;
  private readonly shutdown = new AbortController();
  private readonly queue: TelemetryFrame[] = [];
  private waiters: Array<(frame: TelemetryFrame | null) => void> = [];
  private transport: MavlinkTransport | null = null;
  private splitter: MavLinkPacketSplitter | null = null;
  private crcErrorsSeen = 0;
  private running: Promise<void> | null = null;
  private ended = false;
  private heartbeatSeen = false;
  private overflowWarned = false;
  private sequence = 0;
  private counts: TelemetrySourceStats = { frames: 0, discarded: 0, decodeErrors: 0, reconnects: 0 };

  constructor(
    config: MavlinkSourceConfig,
    private readonly options: MavlinkSourceOptions,
    private readonly openTransport: MavlinkTransportFactory = openMavlinkTransport,
  ) {
    this.endpoint = parseConnectionString(config.device, config.baudRate);
    this.connectionString = describeEndpoint(this.endpoint);
    this.protocol = new MavLinkProtocolV2(config.sourceSystem, config.sourceComponent);
    this.log = options.logger ?? createLogger('mavlink');
    const external = options.signal;
    if (external) {
      if (external.aborted) this.shutdown.abort();
      else external.addEventListener('abort', () => this.shutdown.abort(), { once: true });
    }
  }

  /** Starts reading. Connection failures are retried in the background, never thrown. */
  async open(): Promise<void> {
    if (this.running || this.ended) return;
    this.running = this.readLoop();
  }

  next(): Promise<TelemetryFrame | null> {
    const frame = this.queue.shift();
    if (frame) return Promise.resolve(frame);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  async *[Symbol.asyncIterator](): AsyncIterator<TelemetryFrame> {
    for (;;) {
      const frame = await this.next();
      if (!frame) return;
      yield frame;
    }
  }

  async close(): Promise<void> {
    this.shutdown.abort();
    await this.closeTransport();
    await this.running;
    this.finish();
  }

  stats(): TelemetrySourceStats {
    this.collectCrcErrors();
    return { ...this.counts };
  }

  private async readLoop(): Promise<void> {
    const signal = this.shutdown.signal;
    let retry = 0;
    try {
      while (!signal.aborted) {
        let reason: unknown;
        try {
          const transport = await this.openTransport(this.endpoint, {
            signal,
            connectTimeoutMs: this.options.connectTimeoutMs,
          });
          this.transport = transport;
          if (signal.aborted) break;
          this.log.info(`Listening on ${this.connectionString}`);
          retry = 0;
          reason = await this.pumpUntilLost(transport, signal);
        } catch (err) {
          reason = err;
        }
        await this.closeTransport();
        if (signal.aborted) break;

        retry += 1;
        this.counts.reconnects += 1;
        const delay = backoffDelay(retry, this.options.reconnect, this.options.random);
        this.log.warn(
          `${this.connectionString} unavailable: ${errorMessage(reason)}; reconnecting in ${delay} ms (retry ${retry})`,
        );
        if (!(await sleep(delay, signal))) break;
      }
    } finally {
      await this.closeTransport();
      this.finish();
    }
  }

  /** Resolves with the reason the link stopped producing data. */
  private async pumpUntilLost(transport: MavlinkTransport, signal: AbortSignal): Promise<unknown> {
    const linkDone = new AbortController();
    const pumping = this.pump(transport, signal).finally(() => linkDone.abort());
    if (this.endpoint.kind !== 'udpout') return pumping;
    const [reason] = await Promise.all([pumping, this.handshake(transport, linkDone.signal)]);
    return reason;
  }

  private pump(transport: MavlinkTransport, signal: AbortSignal): Promise<unknown> {
    return new Promise((resolve) => {
      const splitter = new MavLinkPacketSplitter();
      const parser = new MavLinkPacketParser();
      const { stream } = transport;
      this.splitter = splitter;
      this.crcErrorsSeen = 0;

      const onPacket = (packet: MavLinkPacket) => {
        this.collectCrcErrors();
        this.handlePacket(packet);
      };
      const onError = (err: Error) => settle(err);
      const onEnd = () => settle(new TransientIoError(`${this.connectionString} closed`));
      const onAbort = () => settle(new Error('shutdown'));

      let settled = false;
      const settle = (reason: unknown) => {
        if (settled) return;
        settled = true;
        this.collectCrcErrors();
        this.splitter = null;
        signal.removeEventListener('abort', onAbort);
        stream.removeListener('error', onError);
        stream.removeListener('end', onEnd);
        stream.removeListener('close', onEnd);
        stream.unpipe(splitter);
        splitter.unpipe(parser);
        parser.removeListener('data', onPacket);
        splitter.destroy();
        parser.destroy();
        resolve(reason);
      };

      parser.on('data', onPacket);
      splitter.on('error', onError);
      parser.on('error', onError);
      stream.on('error', onError);
      stream.on('end', onEnd);
      stream.on('close', onEnd);
      signal.addEventListener('abort', onAbort, { once: true });
      stream.pipe(splitter).pipe(parser);
    });
  }

  /**
   * udpout peers only start streaming once they hear a ground station, so
   * announce one until a HEARTBEAT comes back. Failing the handshake drops the link.
   */
  private async handshake(transport: MavlinkTransport, linkDone: AbortSignal): Promise<void> {
    this.heartbeatSeen = false;
    const attempts = this.options.handshakeAttempts ?? DEFAULT_HANDSHAKE_ATTEMPTS;
    const interval = this.options.handshakeIntervalMs ?? DEFAULT_HANDSHAKE_INTERVAL_MS;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (this.heartbeatSeen) return;
      try {
        await transport.write(this.heartbeat());
      } catch (err) {
        transport.stream.destroy(new TransientIoError(`heartbeat send failed: ${errorMessage(err)}`, err));
        return;
      }
      if (!(await sleep(interval, linkDone))) return;
    }
    if (!this.heartbeatSeen) {
      transport.stream.destroy(
        new TransientIoError(`no HEARTBEAT from ${this.connectionString} after ${attempts} tries`),
      );
    }
  }

  private heartbeat(): Buffer {
    const message = new minimal.Heartbeat();
    message.type = minimal.MavType.GCS;
    message.autopilot = minimal.MavAutopilot.INVALID;
    message.customMode = 0;
    message.systemStatus = minimal.MavState.ACTIVE;
    message.mavlinkVersion = 3;
    const seq = this.sequence;
    this.sequence = (this.sequence + 1) % 256;
    return this.protocol.serialize(message, seq);
  }

  private handlePacket(packet: MavLinkPacket): void {
    const msgid = packet.header.msgid;
    if (msgid === minimal.Heartbeat.MSG_ID) this.heartbeatSeen = true;
    if (!POSITION_MESSAGE_IDS.has(msgid)) {
      this.counts.discarded += 1;
      return;
    }

    let frame: TelemetryFrame | null;
    try {
      frame = decodePositionPacket(packet, this.options.now?.() ?? Date.now());
    } catch (err) {
      this.counts.decodeErrors += 1;
      this.log.warn(`Skipping undecodable message ${msgid} from system ${packet.header.sysid}: ${errorMessage(err)}`);
      return;
    }
    if (frame) {
      this.push(frame);
      return;
    }
    this.counts.discarded += 1;
    this.log.debug(`Discarding position-less report from system ${packet.header.sysid}`);
  }

  /** Frames the splitter rejected on checksum never reach the parser; fold them into the decode errors. */
  private collectCrcErrors(): void {
    const invalid = this.splitter?.invalidPackages ?? 0;
    if (invalid <= this.crcErrorsSeen) return;
    const fresh = invalid - this.crcErrorsSeen;
    this.crcErrorsSeen = invalid;
    this.counts.decodeErrors += fresh;
    this.log.warn(`Skipping ${fresh} corrupted frame(s) on ${this.connectionString}: bad checksum`);
  }

  private push(frame: TelemetryFrame): void {
    this.counts.frames += 1;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(frame);
      return;
    }
    this.queue.push(frame);
    const max = this.options.maxQueuedFrames ?? DEFAULT_MAX_QUEUED_FRAMES;
    if (this.queue.length > max) {
      this.queue.shift();
      this.counts.discarded += 1;
      if (!this.overflowWarned) {
        this.overflowWarned = true;
        this.log.warn(`Frame queue full (${max}), dropping oldest frames`);
      }
    }
  }

  private async closeTransport(): Promise<void> {
    const transport = this.transport;
    this.transport = null;
    if (!transport) return;
    try {
      await transport.close();
    } catch (err) {
      this.log.debug(`Closing ${this.connectionString}: ${errorMessage(err)}`);
    }
  }

  private finish(): void {
    if (this.ended && this.waiters.length === 0) return;
    this.ended = true;
    this.queue.length = 0;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter(null);
  }
}
