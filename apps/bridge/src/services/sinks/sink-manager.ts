import {
  InvariantViolationError,
  type Logger,
  type PublisherState,
  type PublisherStatusEvent,
  type PublishResult,
  type SinkKind,
  type TrackingPublisherPort,
  type TrackingUpdate,
} from '@uas-bridge/domain';
import { createLogger, errorMessage, withTimeout } from '@uas-bridge/adapters';

export interface SinkHealth {
  sink: string;
  kind: SinkKind;
  state: PublisherState;
  delivered: number;
  skipped: number;
  failed: number;
  reconnects: number;
  lastError: string | null;
  lastStateChange: number | null; // epoch ms
}

export interface SinkDispatchReport {
  uavId: string;
  results: PublishResult[];
}

export interface SinkManagerOptions {
  publishTimeoutMs: number;
  logger?: Logger;
  now?: () => number;
}

interface SinkEntry {
  publisher: TrackingPublisherPort;
  unsubscribe: () => void;
  lastError: string | null;
  lastStateChange: number | null;
}

/**
 * Fans each tracking update out to every configured publisher at once.
 * A slow or broken sink only affects its own delivery.
 */
export class SinkManager {
  private readonly entries: SinkEntry[];
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(
    publishers: readonly TrackingPublisherPort[],
    private readonly options: SinkManagerOptions,
  ) {
    if (publishers.length === 0) {
      throw new InvariantViolationError('SinkManager needs at least one publisher');
    }
    this.log = options.logger ?? createLogger('sinks');
    this.now = options.now ?? Date.now;
    this.entries = publishers.map((publisher) => {
      const entry: SinkEntry = { publisher, unsubscribe: () => undefined, lastError: null, lastStateChange: null };
      entry.unsubscribe = publisher.onStatus((event) => this.onStatus(entry, event));
      return entry;
    });
  }

  get size(): number {
    return this.entries.length;
  }

  async connectAll(): Promise<void> {
    await Promise.all(this.entries.map(({ publisher }) => publisher.connect()));
  }

  async publish(update: TrackingUpdate): Promise<SinkDispatchReport> {
    const settled = await Promise.allSettled(
      this.entries.map(({ publisher }) =>
        withTimeout(publisher.publish(update), this.options.publishTimeoutMs, `${publisher.name} publish`),
      ),
    );
    const results = settled.map((outcome, index): PublishResult => {
      if (outcome.status === 'fulfilled') return outcome.value;
      const sink = this.entries[index]?.publisher.name ?? 'unknown';
      this.log.warn(`${sink} dropped update for '${update.uavId}': ${errorMessage(outcome.reason)}`);
      return { sink, outcome: 'failed', error: errorMessage(outcome.reason) };
    });
    return { uavId: update.uavId, results };
  }

  health(): SinkHealth[] {
    return this.entries.map(({ publisher, lastError, lastStateChange }) => ({
      sink: publisher.name,
      kind: publisher.kind,
      state: publisher.state,
      ...publisher.counters(),
      lastError,
      lastStateChange,
    }));
  }

  async closeAll(timeoutMs: number): Promise<void> {
    const settled = await Promise.allSettled(
      this.entries.map(({ publisher }) => withTimeout(publisher.close(), timeoutMs, `${publisher.name} close`)),
    );
    settled.forEach((outcome, index) => {
      if (outcome.status === 'rejected') {
        this.log.warn(`${this.entries[index]?.publisher.name ?? 'sink'} close failed: ${errorMessage(outcome.reason)}`);
      }
    });
    for (const entry of this.entries) entry.unsubscribe();
  }

  private onStatus(entry: SinkEntry, event: PublisherStatusEvent): void {
    if (event.type === 'publish') {
      if (event.result.error !== undefined) entry.lastError = event.result.error;
      return;
    }
    entry.lastStateChange = this.now();
    if (event.error !== undefined) entry.lastError = event.error;
    if (event.state === 'CONNECTED') entry.lastError = null;
    this.log.info(
      `${event.sink}: ${event.previous} -> ${event.state}` +
        (event.attempt > 0 ? ` (attempt ${event.attempt})` : '') +
        (event.error ? `: ${event.error}` : ''),
    );
  }
}
