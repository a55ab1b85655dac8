// Position reports decoded from the MAVLink link

export type PositionMessageType = 'UTM_GLOBAL_POSITION' | 'GLOBAL_POSITION_INT';

/** Flight state as reported by the autopilot (UTM_GLOBAL_POSITION only) */
export type ReportedFlightState =
  | 'unknown'
  | 'ground'
  | 'airborne'
  | 'emergency'
  | 'noctrl'; // no active controls, still airborne

export interface TelemetryFrame {
  readonly systemId: number;     // MAVLink source system, stands in for the UAV id
  readonly componentId: number;
  readonly messageType: PositionMessageType;
  readonly latitude: number;     // degrees
  readonly longitude: number;    // degrees
  readonly altitude: number;     // m, reference frame as emitted by the message
  readonly relativeAltitude?: number; // m above home
  readonly headingDegrees?: number;
  readonly groundSpeed?: number;      // m/s
  readonly verticalSpeed?: number;    // m/s, positive up
  readonly flightState?: ReportedFlightState;
  readonly timestamp: number;    // epoch ms
  readonly receivedAt: number;   // epoch ms
}
