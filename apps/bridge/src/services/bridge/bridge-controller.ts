import type { BridgeConfig, Logger, TelemetrySourcePort } from '@uas-bridge/domain';
import { createLogger, errorMessage, withTimeout } from '@uas-bridge/adapters';
import type { SystemStateTracker } from '../tracker/system-state-tracker.js';
import { buildTrackingUpdate, describeUpdate } from '../builder/tracking-message.builder.js';
import type { SinkHealth, SinkManager } from '../sinks/sink-manager.js';

export interface BridgeControllerOptions {
  config: BridgeConfig;
  source: TelemetrySourcePort;
  tracker: SystemStateTracker;
  sinks: SinkManager;
  /** Shared with the source and publishers so one abort stops every wait. */
  shutdown: AbortController;
  logger?: Logger;
  evictionIntervalMs?: number;
  now?: () => number;
}

const DEFAULT_EVICTION_INTERVAL_MS = 60_000;

/** Drives frames from the source through tracker and builder into the sinks. */
export class BridgeController {
  private readonly log: Logger;
  private readonly now: () => number;
  private running: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private lastSweep: number;
  private processed = 0;

  constructor(private readonly options: BridgeControllerOptions) {
    this.log = options.logger ?? createLogger('bridge');
    this.now = options.now ?? Date.now;
    this.lastSweep = this.now();
  }

  get signal(): AbortSignal {
    return this.options.shutdown.signal;
  }

  get framesProcessed(): number {
    return this.processed;
  }

  health(): SinkHealth[] {
    return this.options.sinks.health();
  }

  /** Starts the ingest loop once and returns its completion. */
  run(): Promise<void> {
    if (!this.running) this.running = this.loop();
    return this.running;
  }

  /** Ends the loop and closes source and sinks within `shutdownTimeoutMs`. */
  stop(reason = 'stop requested'): Promise<void> {
    if (!this.stopping) this.stopping = this.shutdownAll(reason);
    return this.stopping;
  }

  private async loop(): Promise<void> {
    const { source, tracker, sinks, config } = this.options;
    const signal = this.signal;
    while (!signal.aborted) {
      const frame = await source.next();
      if (!frame || signal.aborted) break;

      const state = tracker.update(frame.systemId, frame);
      const update = buildTrackingUpdate(frame, state, config);
      this.log.debug(describeUpdate(update));
      await sinks.publish(update);
      this.processed += 1;
      this.sweep();
    }
    if (!signal.aborted) this.log.info(`Telemetry source ${source.connectionString} ended`);
  }

  private sweep(): void {
    const now = this.now();
    if (now - this.lastSweep < (this.options.evictionIntervalMs ?? DEFAULT_EVICTION_INTERVAL_MS)) return;
    this.lastSweep = now;
    const evicted = this.options.tracker.evictStale(now);
    if (evicted.length > 0) this.log.info(`Forgot idle UAVs: ${evicted.join(', ')}`);
  }

  private async shutdownAll(reason: string): Promise<void> {
    const { source, sinks, config, shutdown } = this.options;
    this.log.info(`Shutting down: ${reason}`);
    shutdown.abort();
    try {
      await withTimeout(
        Promise.all([source.close(), sinks.closeAll(config.shutdownTimeoutMs), this.running]),
        config.shutdownTimeoutMs,
        'shutdown',
      );
    } catch (err) {
      this.log.warn(`Shutdown incomplete, discarding in-flight work: ${errorMessage(err)}`);
    }
    const stats = source.stats();
    this.log.info(
      `Stopped after ${this.processed} frames (${stats.discarded} discarded, ${stats.decodeErrors} decode errors, ${stats.reconnects} source reconnects)`,
    );
  }
}
