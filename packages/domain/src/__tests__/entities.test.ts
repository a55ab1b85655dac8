/**
 * Domain Entity and Error Tests
 *
 * The domain package is mostly interfaces and string-literal unions. These
 * tests pin the shapes callers depend on and the behaviour of the error classes.
 */

import { describe, it, expect } from '@jest/globals';

import {
  ConfigError,
  InvariantViolationError,
  TransientIoError,
  type BridgeConfig,
  type PublisherState,
  type PublisherStatusEvent,
  type ReportedFlightState,
  type TelemetryFrame,
  type TrackingUpdate,
  type UavTrackState,
} from '../index.js';

// ─── Factory helpers ──────────────────────────────────────────────────────────

function makeFrame(overrides: Partial<TelemetryFrame> = {}): TelemetryFrame {
  return {
    systemId: 7,
    componentId: 1,
    messageType: 'UTM_GLOBAL_POSITION',
    latitude: 53.55,
    longitude: 9.99,
    altitude: 100,
    timestamp: 1_700_000_000_000,
    receivedAt: 1_700_000_000_050,
    ...overrides,
  };
}

function makeConfig(overrides: Partial<BridgeConfig> = {}): BridgeConfig {
  return {
    mqtt: { host: 'localhost', port: 1883, topic: 'uas/tracking', qos: 0, retain: false, tls: false },
    mavlink: { device: 'udpin:0.0.0.0:14550', baudRate: 57_600, sourceSystem: 255, sourceComponent: 0 },
    altitudeOffsetMeters: 0,
    setFlyingWhenGrounded: false,
    flightDetection: { altitudeThresholdMeters: 2, speedThresholdMps: 1 },
    publishTimeoutMs: 2_000,
    shutdownTimeoutMs: 5_000,
    reconnect: { initialDelayMs: 500, maxDelayMs: 30_000 },
    payloadFormat: 'tracking',
    logLevel: 'warn',
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Entities
// ═══════════════════════════════════════════════════════════════════════════════

describe('TelemetryFrame entity', () => {
  it('constructs with only the required fields', () => {
    const frame = makeFrame();
    expect(frame.relativeAltitude).toBeUndefined();
    expect(frame.headingDegrees).toBeUndefined();
    expect(frame.flightState).toBeUndefined();
  });

  it('accepts optional kinematics and flight state', () => {
    const frame = makeFrame({ relativeAltitude: 12, groundSpeed: 4.2, flightState: 'airborne' });
    expect(frame.relativeAltitude).toBe(12);
    expect(frame.groundSpeed).toBe(4.2);
    expect(frame.flightState).toBe('airborne');
  });

  it('ReportedFlightState union covers the UTM flight states', () => {
    const states: ReportedFlightState[] = ['unknown', 'ground', 'airborne', 'emergency', 'noctrl'];
    expect(states).toHaveLength(5);
  });
});

describe('UavTrackState entity', () => {
  it('keeps first and last sighting separately', () => {
    const state: UavTrackState = {
      systemId: 7,
      isFlying: true,
      firstSeen: 1_000,
      lastSeen: 5_000,
      lastFrameTimestamp: 4_900,
      frameCount: 3,
    };
    expect(state.lastSeen - state.firstSeen).toBe(4_000);
  });
});

describe('TrackingUpdate entity', () => {
  it('uses null for values the source did not report', () => {
    const update: TrackingUpdate = {
      uavId: '7',
      systemId: 7,
      position: { latitude: 53.55, longitude: 9.99, altitude: 105 },
      flying: false,
      timestamp: 1_700_000_000_000,
      headingDegrees: null,
      groundSpeed: null,
      verticalSpeed: null,
    };
    expect(update.headingDegrees).toBeNull();
    expect(update.uavId).toBe(String(update.systemId));
  });
});

describe('BridgeConfig entity', () => {
  it('allows an MQTT-only configuration', () => {
    const config = makeConfig();
    expect(config.amqp).toBeUndefined();
    expect(config.mqtt?.topic).toBe('uas/tracking');
  });

  it('trackStateTtlSeconds is optional', () => {
    expect(makeConfig().trackStateTtlSeconds).toBeUndefined();
    expect(makeConfig({ trackStateTtlSeconds: 300 }).trackStateTtlSeconds).toBe(300);
  });
});

describe('PublisherStatusEvent', () => {
  it('PublisherState union covers the connection lifecycle', () => {
    const states: PublisherState[] = ['DISCONNECTED', 'CONNECTING', 'CONNECTED', 'CLOSED'];
    expect(new Set(states).size).toBe(4);
  });

  it('narrows on the type discriminator', () => {
    const events: PublisherStatusEvent[] = [
      { type: 'state', sink: 'mqtt:localhost:1883/t', state: 'CONNECTED', previous: 'CONNECTING', attempt: 0 },
      { type: 'publish', sink: 'mqtt:localhost:1883/t', result: { sink: 'mqtt:localhost:1883/t', outcome: 'skipped' } },
    ];
    const outcomes = events.map((event) => (event.type === 'publish' ? event.result.outcome : event.state));
    expect(outcomes).toEqual(['CONNECTED', 'skipped']);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Errors
// ═══════════════════════════════════════════════════════════════════════════════

describe('ConfigError', () => {
  it('lists every issue under the message', () => {
    const err = new ConfigError('Invalid settings', ['amqp.host: Required', 'amqp.queue: Required']);
    expect(err.message).toBe('Invalid settings:\n  - amqp.host: Required\n  - amqp.queue: Required');
    expect(err.issues).toHaveLength(2);
    expect(err.name).toBe('ConfigError');
    expect(err).toBeInstanceOf(Error);
  });

  it('keeps the bare message when there are no issues', () => {
    expect(new ConfigError('A valid AMQP or MQTT config is required').message).toBe(
      'A valid AMQP or MQTT config is required',
    );
  });
});

describe('TransientIoError', () => {
  it('carries the underlying cause', () => {
    const cause = new Error('ECONNREFUSED');
    const err = new TransientIoError('broker unreachable', cause);
    expect(err.cause).toBe(cause);
    expect(err.name).toBe('TransientIoError');
  });
});

describe('InvariantViolationError', () => {
  it('is a plain named error', () => {
    const err = new InvariantViolationError('no sinks');
    expect(err.name).toBe('InvariantViolationError');
    expect(err.message).toBe('no sinks');
  });
});
