export interface TrackingPosition {
  readonly latitude: number;
  readonly longitude: number;
  readonly altitude: number; // m, altitude offset already applied
}

/** Outbound tracking record. `null` marks a value the source did not report. */
export interface TrackingUpdate {
  readonly uavId: string;
  readonly systemId: number;
  readonly position: TrackingPosition;
  readonly flying: boolean;
  readonly timestamp: number; // epoch ms, copied from the frame
  readonly headingDegrees: number | null;
  readonly groundSpeed: number | null;
  readonly verticalSpeed: number | null;
}
