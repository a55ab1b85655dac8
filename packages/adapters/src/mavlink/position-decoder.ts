import { common, type MavLinkPacket } from 'node-mavlink';
import type { ReportedFlightState, TelemetryFrame } from '@uas-bridge/domain';

export class FrameDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrameDecodeError';
  }
}

export interface PacketOrigin {
  systemId: number;
  componentId: number;
  receivedAt: number; // epoch ms
}

export type UtmGlobalPositionFields = Pick<
  common.UtmGlobalPosition,
  'time' | 'lat' | 'lon' | 'alt' | 'relativeAlt' | 'vx' | 'vy' | 'vz' | 'flightState' | 'flags'
>;

export type GlobalPositionIntFields = Pick<
  common.GlobalPositionInt,
  'lat' | 'lon' | 'alt' | 'relativeAlt' | 'vx' | 'vy' | 'vz' | 'hdg'
>;

/** GLOBAL_POSITION_INT.hdg value meaning "unknown" */
const HEADING_UNKNOWN = 65_535;

export const POSITION_MESSAGE_IDS: ReadonlySet<number> = new Set([
  common.UtmGlobalPosition.MSG_ID,
  common.GlobalPositionInt.MSG_ID,
]);

function toFlightState(state: common.UtmFlightState): ReportedFlightState {
  switch (state) {
    case common.UtmFlightState.GROUND:
      return 'ground';
    case common.UtmFlightState.AIRBORNE:
      return 'airborne';
    case common.UtmFlightState.EMERGENCY:
      return 'emergency';
    case common.UtmFlightState.NOCTRL:
      return 'noctrl';
    default:
      return 'unknown';
  }
}

function degE7(value: number, limit: number, field: string): number {
  const degrees = value / 1e7;
  if (!Number.isFinite(degrees) || Math.abs(degrees) > limit) {
    throw new FrameDecodeError(`${field} out of range: ${value}`);
  }
  return degrees;
}

/** Course over ground from NED velocity, 0..360 degrees. */
function courseDegrees(vx: number, vy: number): number {
  const heading = (Math.atan2(vy, vx) * 180) / Math.PI;
  return heading < 0 ? heading + 360 : heading;
}

function hasFlag(flags: number, flag: common.UtmDataAvailFlags): boolean {
  return (flags & flag) !== 0;
}

/**
 * Fields whose UTM_DATA_AVAIL flag is cleared are left out of the frame.
 * Returns `null` when the message carries no position at all.
 */
export function fromUtmGlobalPosition(data: UtmGlobalPositionFields, origin: PacketOrigin): TelemetryFrame | null {
  const flags = data.flags;
  if (!hasFlag(flags, common.UtmDataAvailFlags.POSITION_AVAILABLE)) return null;

  const timeUs = Number(data.time);
  const timeValid = hasFlag(flags, common.UtmDataAvailFlags.TIME_VALID) && timeUs > 0;
  const horizontal = hasFlag(flags, common.UtmDataAvailFlags.HORIZONTAL_VELO_AVAILABLE);
  return {
    systemId: origin.systemId,
    componentId: origin.componentId,
    messageType: 'UTM_GLOBAL_POSITION',
    latitude: degE7(data.lat, 90, 'lat'),
    longitude: degE7(data.lon, 180, 'lon'),
    altitude: data.alt / 1000,
    ...(hasFlag(flags, common.UtmDataAvailFlags.RELATIVE_ALTITUDE_AVAILABLE)
      ? { relativeAltitude: data.relativeAlt / 1000 }
      : {}),
    ...(horizontal
      ? { headingDegrees: courseDegrees(data.vx, data.vy), groundSpeed: Math.hypot(data.vx, data.vy) / 100 }
      : {}),
    ...(hasFlag(flags, common.UtmDataAvailFlags.VERTICAL_VELO_AVAILABLE) ? { verticalSpeed: -data.vz / 100 } : {}),
    flightState: toFlightState(data.flightState),
    timestamp: timeValid ? Math.floor(timeUs / 1000) : origin.receivedAt,
    receivedAt: origin.receivedAt,
  };
}

export function fromGlobalPositionInt(data: GlobalPositionIntFields, origin: PacketOrigin): TelemetryFrame {
  return {
    systemId: origin.systemId,
    componentId: origin.componentId,
    messageType: 'GLOBAL_POSITION_INT',
    latitude: degE7(data.lat, 90, 'lat'),
    longitude: degE7(data.lon, 180, 'lon'),
    altitude: data.alt / 1000,
    relativeAltitude: data.relativeAlt / 1000,
    ...(data.hdg === HEADING_UNKNOWN ? {} : { headingDegrees: data.hdg / 100 }),
    groundSpeed: Math.hypot(data.vx, data.vy) / 100,
    verticalSpeed: -data.vz / 100,
    // time_boot_ms is not wall-clock time
    timestamp: origin.receivedAt,
    receivedAt: origin.receivedAt,
  };
}

/** Returns `null` for messages outside the global-position family and for position-less reports. */
export function decodePositionPacket(packet: MavLinkPacket, receivedAt: number): TelemetryFrame | null {
  const origin: PacketOrigin = {
    systemId: packet.header.sysid,
    componentId: packet.header.compid,
    receivedAt,
  };
  switch (packet.header.msgid) {
    case common.UtmGlobalPosition.MSG_ID:
      return fromUtmGlobalPosition(packet.protocol.data(packet.payload, common.UtmGlobalPosition), origin);
    case common.GlobalPositionInt.MSG_ID:
      return fromGlobalPositionInt(packet.protocol.data(packet.payload, common.GlobalPositionInt), origin);
    default:
      return null;
  }
}
