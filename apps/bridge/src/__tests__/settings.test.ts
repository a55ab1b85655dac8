import { describe, it, expect } from '@jest/globals';
import { join } from 'path';
import { ConfigError } from '@uas-bridge/domain';
import { loadSettings, parseSettings, resolveSettingsPath } from '../config/settings.js';

const MQTT_ONLY = `
mavlink:
  device: udpin:0.0.0.0:14550
mqtt:
  host: localhost
  topic: uas/tracking
`;

const AMQP_ONLY = `
mavlink:
  device: /dev/ttyACM0
amqp:
  host: broker.test
  username: tracker
  password: test-secret
  queue: tracking
`;

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('parseSettings', () => {
  it('fills defaults around an MQTT-only file', () => {
    const config = parseSettings(MQTT_ONLY);

    expect(config.amqp).toBeUndefined();
    expect(config.mqtt).toEqual({
      host: 'localhost',
      port: 1883,
      topic: 'uas/tracking',
      qos: 0,
      retain: false,
      tls: false,
    });
    expect(config.mavlink).toEqual({
      device: 'udpin:0.0.0.0:14550',
      baudRate: 57_600,
      sourceSystem: 255,
      sourceComponent: 0,
    });
    expect(config.altitudeOffsetMeters).toBe(0);
    expect(config.setFlyingWhenGrounded).toBe(false);
    expect(config.flightDetection).toEqual({ altitudeThresholdMeters: 2, speedThresholdMps: 1 });
    expect(config.trackStateTtlSeconds).toBeUndefined();
    expect(config.reconnect).toEqual({ initialDelayMs: 500, maxDelayMs: 30_000 });
    expect(config.publishTimeoutMs).toBe(2_000);
    expect(config.shutdownTimeoutMs).toBe(5_000);
    expect(config.payloadFormat).toBe('tracking');
    expect(config.logLevel).toBe('warn');
  });

  it('defaults AMQP to TLS on the default exchange without certificate checks', () => {
    expect(parseSettings(AMQP_ONLY).amqp).toEqual({
      host: 'broker.test',
      username: 'tracker',
      password: 'test-secret',
      queue: 'tracking',
      exchange: '',
      vhost: '/',
      tls: true,
      rejectUnauthorized: false,
    });
  });

  it('requires at least one sink', () => {
    const err = configError(() => parseSettings('mavlink:\n  device: udpin:0.0.0.0:14550\n'));
    expect(err.message).toBe('Invalid settings:\n  - A valid AMQP or MQTT config is required');
  });

  it('reports every missing key of a partial AMQP section', () => {
    const err = configError(() => parseSettings('mavlink:\n  device: tcp:localhost:5760\namqp:\n  password: x\n'));
    expect(err.issues).toEqual(['amqp.host: Required', 'amqp.username: Required', 'amqp.queue: Required']);
  });

  it('requires a MAVLink device', () => {
    const err = configError(() => parseSettings(''));
    expect(err.issues).toContain('mavlink.device: Required');
  });

  it('rejects out-of-range values', () => {
    const yaml = 'mavlink:\n  device: x\n  sourceSystem: 0\nmqtt:\n  host: localhost\n  topic: t\npayloadFormat: xml\n';
    const err = configError(() => parseSettings(yaml));
    expect(err.issues.some((issue) => issue.startsWith('payloadFormat:'))).toBe(true);
    expect(err.issues.some((issue) => issue.startsWith('mavlink.sourceSystem:'))).toBe(true);
  });

  it('wraps YAML syntax errors', () => {
    expect(() => parseSettings('mqtt: [unclosed')).toThrow(/^Settings are not valid YAML/);
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseSettings('- a\n- b\n')).toThrow(new ConfigError('Settings must be a YAML mapping'));
  });

  it('applies CLI over environment over file for the device', () => {
    const env = { MAVLINK_DEVICE: 'tcp:sim:5760' };
    expect(parseSettings(MQTT_ONLY, {}, env).mavlink.device).toBe('tcp:sim:5760');
    expect(parseSettings(MQTT_ONLY, { device: 'udpout:10.0.0.2:14550' }, env).mavlink.device).toBe(
      'udpout:10.0.0.2:14550',
    );
  });

  it('takes LOG_LEVEL from the environment unless verbosity is given', () => {
    expect(parseSettings(MQTT_ONLY, {}, { LOG_LEVEL: 'INFO' }).logLevel).toBe('info');
    expect(parseSettings(MQTT_ONLY, { logLevel: 'debug' }, { LOG_LEVEL: 'info' }).logLevel).toBe('debug');
  });

  it('lets flags override altitude offset, flying override and payload format', () => {
    const config = parseSettings(`${MQTT_ONLY}altitudeOffsetMeters: 3\n`, {
      altitudeOffsetMeters: 5,
      setFlyingWhenGrounded: true,
      payloadFormat: 'udveo',
    });
    expect(config.altitudeOffsetMeters).toBe(5);
    expect(config.setFlyingWhenGrounded).toBe(true);
    expect(config.payloadFormat).toBe('udveo');
  });

  it('keeps the file value when the flying flag is not set', () => {
    const config = parseSettings(`${MQTT_ONLY}setFlyingWhenGrounded: true\n`, { setFlyingWhenGrounded: false });
    expect(config.setFlyingWhenGrounded).toBe(true);
  });

  it('accepts an eviction TTL', () => {
    expect(parseSettings(`${MQTT_ONLY}trackStateTtlSeconds: 300\n`).trackStateTtlSeconds).toBe(300);
  });
});

describe('resolveSettingsPath', () => {
  it('prefers the flag, then BRIDGE_SETTINGS, then settings.yml', () => {
    expect(resolveSettingsPath('a.yml', { BRIDGE_SETTINGS: 'b.yml' })).toBe('a.yml');
    expect(resolveSettingsPath(undefined, { BRIDGE_SETTINGS: 'b.yml' })).toBe('b.yml');
    expect(resolveSettingsPath(undefined, {})).toBe('settings.yml');
  });
});

describe('loadSettings', () => {
  it('reports an unreadable file as a ConfigError', async () => {
    const missing = join(__dirname, 'does-not-exist.yml');
    await expect(loadSettings(missing)).rejects.toBeInstanceOf(ConfigError);
    await expect(loadSettings(missing)).rejects.toThrow(`Cannot read settings file ${missing}`);
  });
});
