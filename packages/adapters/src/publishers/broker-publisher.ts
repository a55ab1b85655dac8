import { EventEmitter } from 'events';
import type {
  Logger,
  PayloadFormat,
  PublisherCounters,
  PublisherState,
  PublisherStatusEvent,
  PublisherStatusListener,
  PublishResult,
  ReconnectConfig,
  SinkKind,
  TrackingPublisherPort,
  TrackingUpdate,
} from '@uas-bridge/domain';
import { createLogger, errorMessage } from '../logging/console-logger.js';
import { backoffDelay, sleep } from '../resilience/backoff.js';
import { withTimeout } from '../resilience/timeout.js';
import { serializeTrackingUpdate } from '../serialization/tracking-payload.js';

/** The broker refused one message (nack, unroutable). The connection itself is fine. */
export class DeliveryRejectedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DeliveryRejectedError';
  }
}

export interface BrokerPublisherOptions {
  payloadFormat: PayloadFormat;
  publishTimeoutMs: number;
  reconnect: ReconnectConfig;
  connectTimeoutMs?: number;
  closeTimeoutMs?: number;
  /** Shutdown signal; aborting it stops reconnect attempts. */
  signal?: AbortSignal;
  logger?: Logger;
  random?: () => number;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const DEFAULT_CLOSE_TIMEOUT_MS = 2_000;
const SKIP_LOG_EVERY = 100;

/**
 * Connection state machine shared by the AMQP and MQTT sinks.
 *
 *   DISCONNECTED → CONNECTING → CONNECTED → (error) DISCONNECTED
 *   any → CLOSED (terminal)
 *
 * Only CONNECTED attempts delivery. A failed delivery drops the message and
 * starts a background reconnect loop with exponential backoff.
 */
export abstract class BrokerPublisher implements TrackingPublisherPort {
  protected readonly log: Logger;
  private currentState: PublisherState = 'DISCONNECTED';
  private readonly emitter = new EventEmitter();
  private readonly shutdown = new AbortController();
  private reconnecting: Promise<void> | null = null;
  private reconnectActive = false;
  private failedAttempts = 0;
  private delivered = 0;
  private skipped = 0;
  private failed = 0;
  private reconnects = 0;

  protected constructor(
    readonly kind: SinkKind,
    readonly name: string,
    private readonly options: BrokerPublisherOptions,
  ) {
    this.log = options.logger ?? createLogger(`${kind}-publisher`);
    const external = options.signal;
    if (external) {
      if (external.aborted) this.shutdown.abort();
      else external.addEventListener('abort', () => this.shutdown.abort(), { once: true });
    }
  }

  /** Open the broker connection. Must dispose of anything it opened if `signal` aborts. */
  protected abstract openConnection(signal: AbortSignal): Promise<void>;
  protected abstract sendPayload(payload: Buffer): Promise<void>;
  protected abstract closeConnection(): Promise<void>;

  get state(): PublisherState {
    return this.currentState;
  }

  onStatus(listener: PublisherStatusListener): () => void {
    this.emitter.on('status', listener);
    return () => {
      this.emitter.off('status', listener);
    };
  }

  counters(): PublisherCounters {
    return {
      delivered: this.delivered,
      skipped: this.skipped,
      failed: this.failed,
      reconnects: this.reconnects,
    };
  }

  /** Eager first connection. A failure is not fatal: reconnects continue in the background. */
  async connect(): Promise<void> {
    if (this.currentState !== 'DISCONNECTED' || this.reconnectActive) return;
    const connected = await this.attemptConnect();
    if (!connected) this.scheduleReconnect();
  }

  async publish(update: TrackingUpdate): Promise<PublishResult> {
    if (this.currentState !== 'CONNECTED') {
      this.skipped += 1;
      if (this.skipped === 1 || this.skipped % SKIP_LOG_EVERY === 0) {
        this.log.warn(
          `${this.name} is ${this.currentState}, dropped update for '${update.uavId}' (${this.skipped} dropped so far)`,
        );
      }
      return this.report({ sink: this.name, outcome: 'skipped' });
    }

    const payload = serializeTrackingUpdate(update, this.options.payloadFormat);
    try {
      await withTimeout(this.sendPayload(payload), this.options.publishTimeoutMs, `${this.name} publish`);
      this.delivered += 1;
      return this.report({ sink: this.name, outcome: 'delivered' });
    } catch (err) {
      this.failed += 1;
      const message = errorMessage(err);
      if (err instanceof DeliveryRejectedError) {
        this.log.warn(`${this.name} rejected update for '${update.uavId}': ${message}`);
      } else {
        this.log.warn(`${this.name} publish failed, dropping update for '${update.uavId}': ${message}`);
        this.handleConnectionLost(err);
      }
      return this.report({ sink: this.name, outcome: 'failed', error: message });
    }
  }

  async close(): Promise<void> {
    if (this.currentState === 'CLOSED') return;
    this.shutdown.abort();
    this.transition('CLOSED');
    try {
      await withTimeout(
        Promise.all([this.closeConnection(), this.reconnecting]),
        this.options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS,
        `${this.name} close`,
      );
    } catch (err) {
      this.log.warn(`${this.name} did not close cleanly: ${errorMessage(err)}`);
    }
    this.log.info(`${this.name} closed`);
  }

  /** Called by subclasses when the client reports the connection went away. */
  protected handleConnectionLost(error: unknown): void {
    if (this.currentState !== 'CONNECTED') return;
    this.log.warn(`${this.name} connection lost: ${errorMessage(error)}`);
    this.transition('DISCONNECTED', error);
    this.scheduleReconnect();
  }

  private async attemptConnect(): Promise<boolean> {
    const attempt = this.failedAttempts + 1;
    const attemptAbort = new AbortController();
    // a connection lost mid-publish is still open on our side
    await this.disposeConnection();
    this.transition('CONNECTING');
    try {
      await withTimeout(
        this.openConnection(attemptAbort.signal),
        this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
        `${this.name} connect`,
      );
    } catch (err) {
      attemptAbort.abort();
      this.failedAttempts = attempt;
      this.log.warn(`${this.name} connect attempt ${attempt} failed: ${errorMessage(err)}`);
      await this.disposeConnection();
      this.transition('DISCONNECTED', err);
      return false;
    }

    if (this.shutdown.signal.aborted) {
      // closed while the connection was being opened
      await this.disposeConnection();
      return true;
    }
    this.failedAttempts = 0;
    this.transition('CONNECTED');
    this.log.info(`${this.name} connected${attempt > 1 ? ` after ${attempt} attempts` : ''}`);
    return true;
  }

  private scheduleReconnect(): void {
    if (this.reconnectActive || this.shutdown.signal.aborted) return;
    this.reconnectActive = true;
    this.reconnecting = this.reconnectLoop();
  }

  private async reconnectLoop(): Promise<void> {
    const signal = this.shutdown.signal;
    try {
      while (!signal.aborted && this.currentState === 'DISCONNECTED') {
        const delay = backoffDelay(this.failedAttempts + 1, this.options.reconnect, this.options.random);
        this.log.info(`${this.name} reconnecting in ${delay} ms (retry ${this.failedAttempts + 1})`);
        const waited = await sleep(delay, signal);
        if (!waited) return;
        this.reconnects += 1;
        try {
          await this.attemptConnect();
        } catch (err) {
          // attemptConnect reports its own failures; anything here is unexpected
          this.log.error(`${this.name} reconnect attempt crashed: ${errorMessage(err)}`);
          this.transition('DISCONNECTED', err);
        }
      }
    } finally {
      this.reconnectActive = false;
    }
  }

  private async disposeConnection(): Promise<void> {
    try {
      await withTimeout(
        this.closeConnection(),
        this.options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS,
        `${this.name} cleanup`,
      );
    } catch (err) {
      this.log.debug(`${this.name} cleanup after failed connection: ${errorMessage(err)}`);
    }
  }

  private transition(next: PublisherState, error?: unknown): void {
    const previous = this.currentState;
    if (previous === next || previous === 'CLOSED') return;
    this.currentState = next;
    this.emit({
      type: 'state',
      sink: this.name,
      state: next,
      previous,
      attempt: this.failedAttempts,
      ...(error === undefined ? {} : { error: errorMessage(error) }),
    });
  }

  private report(result: PublishResult): PublishResult {
    this.emit({ type: 'publish', sink: this.name, result });
    return result;
  }

  private emit(event: PublisherStatusEvent): void {
    this.emitter.emit('status', event);
  }
}
