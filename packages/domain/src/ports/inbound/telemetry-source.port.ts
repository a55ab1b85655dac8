import type { TelemetryFrame } from '../../entities/telemetry-frame.js';

export interface TelemetrySourceStats {
  frames: number;
  discarded: number;    // non-position messages and queue overflow
  decodeErrors: number;
  reconnects: number;
}

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface TelemetrySourcePort {
  readonly connectionString: string;
  open(): Promise<void>;
  /** Next position frame, or `null` once the source has been closed. */
  next(): Promise<TelemetryFrame | null>;
  close(): Promise<void>;
  stats(): TelemetrySourceStats;
}
