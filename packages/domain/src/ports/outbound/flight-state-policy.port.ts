import type { TelemetryFrame } from '../../entities/telemetry-frame.js';
import type { UavTrackState } from '../../entities/uav-track-state.js';

/** Decides the raw flying/grounded status of a UAV from one frame. */
export interface FlightStatePolicy {
  isFlying(frame: TelemetryFrame, previous: UavTrackState | undefined): boolean;
}
