import type { PayloadFormat, TrackingUpdate } from '@uas-bridge/domain';

// ---------------------------------------------------------------------------
// Wire payloads. Both sinks carry the same bytes for the same update.
// ---------------------------------------------------------------------------

export interface TrackingPayload {
  uavId: string;
  systemId: number;
  latitude: number;
  longitude: number;
  altitude: number;
  flying: boolean;
  timestamp: number; // epoch ms
  heading: number | null;
  groundSpeed: number | null;
  verticalSpeed: number | null;
}

/** Tracking record understood by the UDVeo USSP prototype. */
export interface UdveoTrackingPayload {
  uavId: string;
  flightOperationId: string;
  timeStamp: number; // epoch seconds, float
  coordinate: {
    type: 'Point';
    coordinates: [number, number]; // [longitude, latitude]
  };
  heading: number;
  altitudeInMeters: number;
  speedInMetersPerSecond: number;
  isFlying: boolean;
}

export const UDVEO_FLIGHT_OPERATION_ID = 'USSP-HH-unknown';

export function toTrackingPayload(update: TrackingUpdate): TrackingPayload {
  return {
    uavId: update.uavId,
    systemId: update.systemId,
    latitude: update.position.latitude,
    longitude: update.position.longitude,
    altitude: update.position.altitude,
    flying: update.flying,
    timestamp: update.timestamp,
    heading: update.headingDegrees,
    groundSpeed: update.groundSpeed,
    verticalSpeed: update.verticalSpeed,
  };
}

export function toUdveoPayload(update: TrackingUpdate): UdveoTrackingPayload {
  return {
    uavId: update.uavId,
    flightOperationId: UDVEO_FLIGHT_OPERATION_ID,
    timeStamp: update.timestamp / 1000,
    coordinate: {
      type: 'Point',
      coordinates: [update.position.longitude, update.position.latitude],
    },
    heading: update.headingDegrees ?? 0,
    altitudeInMeters: update.position.altitude,
    speedInMetersPerSecond: update.groundSpeed ?? 0,
    isFlying: update.flying,
  };
}

export function serializeTrackingUpdate(update: TrackingUpdate, format: PayloadFormat): Buffer {
  const payload = format === 'udveo' ? toUdveoPayload(update) : toTrackingPayload(update);
  return Buffer.from(JSON.stringify(payload), 'utf8');
}
