import type { TelemetryFrame, TrackingUpdate, UavTrackState } from '@uas-bridge/domain';

export interface BuildOptions {
  altitudeOffsetMeters: number;
}

export function buildTrackingUpdate(
  frame: TelemetryFrame,
  trackState: UavTrackState,
  options: BuildOptions,
): TrackingUpdate {
  return Object.freeze({
    uavId: String(frame.systemId),
    systemId: frame.systemId,
    position: Object.freeze({
      latitude: frame.latitude,
      longitude: frame.longitude,
      altitude: frame.altitude + options.altitudeOffsetMeters,
    }),
    flying: trackState.isFlying,
    timestamp: frame.timestamp,
    headingDegrees: frame.headingDegrees ?? null,
    groundSpeed: frame.groundSpeed ?? null,
    verticalSpeed: frame.verticalSpeed ?? null,
  });
}

function fixed(value: number | null, digits: number): string {
  return value === null ? '?' : value.toFixed(digits);
}

/** One-line summary for debug logs. */
export function describeUpdate(update: TrackingUpdate): string {
  const { latitude, longitude, altitude } = update.position;
  return (
    `Tracked '${update.uavId}': ${latitude.toFixed(7)} N, ${longitude.toFixed(7)} E at ${altitude.toFixed(1)} m ` +
    `${update.flying ? 'flying' : 'grounded'} ${fixed(update.groundSpeed, 1)} m/s @ ${fixed(update.headingDegrees, 0)}°`
  );
}
