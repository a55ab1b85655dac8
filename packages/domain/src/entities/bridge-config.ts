export type PayloadFormat = 'tracking' | 'udveo';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface AmqpSinkConfig {
  readonly host: string;
  readonly port?: number;
  readonly username: string;
  readonly password: string;
  readonly queue: string;
  readonly exchange: string;
  readonly vhost: string;
  readonly tls: boolean;
  readonly rejectUnauthorized: boolean;
}

export interface MqttSinkConfig {
  readonly host: string;
  readonly port: number;
  readonly topic: string;
  readonly username?: string;
  readonly password?: string;
  readonly clientId?: string;
  readonly qos: 0 | 1 | 2;
  readonly retain: boolean;
  readonly tls: boolean;
}

export interface MavlinkSourceConfig {
  readonly device: string;
  readonly baudRate: number;
  readonly sourceSystem: number;
  readonly sourceComponent: number;
}

export interface FlightDetectionConfig {
  readonly altitudeThresholdMeters: number;
  readonly speedThresholdMps: number;
}

export interface ReconnectConfig {
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
}

/** Validated, immutable bridge configuration. At least one sink section is present. */
export interface BridgeConfig {
  readonly amqp?: AmqpSinkConfig;
  readonly mqtt?: MqttSinkConfig;
  readonly mavlink: MavlinkSourceConfig;
  readonly altitudeOffsetMeters: number;
  readonly setFlyingWhenGrounded: boolean;
  readonly flightDetection: FlightDetectionConfig;
  readonly trackStateTtlSeconds?: number;
  readonly publishTimeoutMs: number;
  readonly shutdownTimeoutMs: number;
  readonly reconnect: ReconnectConfig;
  readonly payloadFormat: PayloadFormat;
  readonly logLevel: LogLevel;
}
