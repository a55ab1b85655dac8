import { ConfigError } from '@uas-bridge/domain';

export type MavlinkEndpoint =
  | { readonly kind: 'udpin'; readonly host: string; readonly port: number }
  | { readonly kind: 'udpout'; readonly host: string; readonly port: number }
  | { readonly kind: 'tcp'; readonly host: string; readonly port: number }
  | { readonly kind: 'serial'; readonly path: string; readonly baudRate: number };

const NETWORK_PATTERN = /^(udpin|udpout|udp|tcp):(.+):(\d+)$/;
const SERIAL_PATTERN = /^serial:([^:]+)(?::(\d+))?$/;
const DEVICE_PATTERN = /^(\/dev\/[^,]+|COM\d+)(?:,(\d+))?$/i;

function parsePort(raw: string, value: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new ConfigError(`Invalid port in MAVLink connection string "${value}"`);
  }
  return port;
}

function parseBaud(raw: string | undefined, fallback: number, value: string): number {
  if (raw === undefined) return fallback;
  const baud = Number(raw);
  if (!Number.isInteger(baud) || baud <= 0) {
    throw new ConfigError(`Invalid baud rate in MAVLink connection string "${value}"`);
  }
  return baud;
}

/**
 * Parses `udpin:<host>:<port>`, `udpout:<host>:<port>`, `udp:` (same as udpin),
 * `tcp:<host>:<port>`, `serial:<path>[:<baud>]` or a bare device path
 * (`/dev/ttyACM0`, `COM3`) with an optional `,<baud>` suffix.
 */
export function parseConnectionString(value: string, defaultBaudRate = 57_600): MavlinkEndpoint {
  const trimmed = value.trim();
  if (trimmed.length === 0) throw new ConfigError('MAVLink connection string is empty');

  const network = NETWORK_PATTERN.exec(trimmed);
  if (network) {
    const [, scheme = '', host = '', rawPort = ''] = network;
    const port = parsePort(rawPort, value);
    const kind = scheme === 'udp' ? 'udpin' : scheme;
    if (kind === 'udpin' || kind === 'udpout' || kind === 'tcp') return { kind, host, port };
  }

  const serial = SERIAL_PATTERN.exec(trimmed) ?? DEVICE_PATTERN.exec(trimmed);
  if (serial) {
    const [, path = '', rawBaud] = serial;
    return { kind: 'serial', path, baudRate: parseBaud(rawBaud, defaultBaudRate, value) };
  }

  throw new ConfigError(
    `Unsupported MAVLink connection string "${value}" (expected udpin:, udpout:, tcp:, serial: or a device path)`,
  );
}

export function describeEndpoint(endpoint: MavlinkEndpoint): string {
  return endpoint.kind === 'serial'
    ? `serial:${endpoint.path}@${endpoint.baudRate}`
    : `${endpoint.kind}:${endpoint.host}:${endpoint.port}`;
}
