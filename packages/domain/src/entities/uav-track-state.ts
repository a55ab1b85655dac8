/**
 * Per-UAV state held by the system state tracker, keyed by MAVLink system id.
 * Callers only ever see frozen snapshots.
 */
export interface UavTrackState {
  readonly systemId: number;
  readonly isFlying: boolean;
  readonly firstSeen: number;          // epoch ms
  readonly lastSeen: number;           // epoch ms of the latest update call
  readonly lastFrameTimestamp: number; // timestamp of the latest frame processed, not the newest
  readonly frameCount: number;
}
