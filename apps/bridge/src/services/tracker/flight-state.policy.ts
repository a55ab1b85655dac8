import type {
  FlightDetectionConfig,
  FlightStatePolicy,
  ReportedFlightState,
  TelemetryFrame,
} from '@uas-bridge/domain';

const GROUNDED_STATES: ReadonlySet<ReportedFlightState> = new Set(['ground', 'unknown']);

/**
 * Trusts the autopilot's own flight state when the frame carries one,
 * otherwise falls back to altitude above home and ground speed thresholds.
 */
export class ReportedFlightStatePolicy implements FlightStatePolicy {
  constructor(private readonly thresholds: FlightDetectionConfig) {}

  isFlying(frame: TelemetryFrame): boolean {
    if (frame.flightState !== undefined) return !GROUNDED_STATES.has(frame.flightState);
    const altitude = frame.relativeAltitude ?? 0;
    const speed = frame.groundSpeed ?? 0;
    return altitude > this.thresholds.altitudeThresholdMeters || speed > this.thresholds.speedThresholdMps;
  }
}
