import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, type BridgeConfig, type LogLevel, type PayloadFormat } from '@uas-bridge/domain';

export const DEFAULT_SETTINGS_PATH = 'settings.yml';

// ─── Schema ───────────────────────────────────────────────────────────────────

const port = z.number().int().min(1).max(65_535);

const amqpSchema = z.object({
  host: z.string().min(1),
  port: port.optional(),
  username: z.string().min(1),
  password: z.string(),
  queue: z.string().min(1),
  exchange: z.string().default(''),
  vhost: z.string().default('/'),
  tls: z.boolean().default(true),
  rejectUnauthorized: z.boolean().default(false),
});

const mqttSchema = z.object({
  host: z.string().min(1),
  port: port.default(1883),
  topic: z.string().min(1),
  username: z.string().optional(),
  password: z.string().optional(),
  clientId: z.string().min(1).optional(),
  qos: z.union([z.literal(0), z.literal(1), z.literal(2)]).default(0),
  retain: z.boolean().default(false),
  tls: z.boolean().default(false),
});

const mavlinkSchema = z.object({
  device: z.string().min(1),
  baudRate: z.number().int().positive().default(57_600),
  sourceSystem: z.number().int().min(1).max(255).default(255),
  sourceComponent: z.number().int().min(0).max(255).default(0),
});

export const settingsSchema = z
  .object({
    amqp: amqpSchema.optional(),
    mqtt: mqttSchema.optional(),
    mavlink: mavlinkSchema,
    altitudeOffsetMeters: z.number().finite().default(0),
    setFlyingWhenGrounded: z.boolean().default(false),
    flightDetection: z
      .object({
        altitudeThresholdMeters: z.number().nonnegative().default(2),
        speedThresholdMps: z.number().nonnegative().default(1),
      })
      .default({}),
    trackStateTtlSeconds: z.number().positive().optional(),
    publishTimeoutMs: z.number().int().positive().default(2_000),
    shutdownTimeoutMs: z.number().int().positive().default(5_000),
    reconnect: z
      .object({
        initialDelayMs: z.number().int().positive().default(500),
        maxDelayMs: z.number().int().positive().default(30_000),
      })
      .default({})
      .refine((r) => r.maxDelayMs >= r.initialDelayMs, {
        message: 'maxDelayMs must not be smaller than initialDelayMs',
      }),
    payloadFormat: z.enum(['tracking', 'udveo']).default('tracking'),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
  })
  .refine((s) => s.amqp !== undefined || s.mqtt !== undefined, {
    message: 'A valid AMQP or MQTT config is required',
  });

// ─── Overrides ────────────────────────────────────────────────────────────────

/** Values from the command line. They win over the environment and the file. */
export interface SettingsOverrides {
  device?: string;
  altitudeOffsetMeters?: number;
  setFlyingWhenGrounded?: boolean;
  payloadFormat?: PayloadFormat;
  logLevel?: LogLevel;
}

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function applyOverrides(raw: Record<string, unknown>, overrides: SettingsOverrides, env: Env): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };
  const mavlink: Record<string, unknown> = isRecord(raw['mavlink']) ? { ...raw['mavlink'] } : {};

  const device = overrides.device ?? env['MAVLINK_DEVICE'];
  if (device) mavlink['device'] = device;
  merged['mavlink'] = mavlink;

  const logLevel = overrides.logLevel ?? env['LOG_LEVEL']?.toLowerCase();
  if (logLevel) merged['logLevel'] = logLevel;

  if (overrides.altitudeOffsetMeters !== undefined) merged['altitudeOffsetMeters'] = overrides.altitudeOffsetMeters;
  // the CLI flag can only switch the override on
  if (overrides.setFlyingWhenGrounded) merged['setFlyingWhenGrounded'] = true;
  if (overrides.payloadFormat) merged['payloadFormat'] = overrides.payloadFormat;
  return merged;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
  });
}

// ─── Loading ──────────────────────────────────────────────────────────────────

/** Validates settings YAML merged with overrides. Pure; throws `ConfigError`. */
export function parseSettings(yamlText: string, overrides: SettingsOverrides = {}, env: Env = {}): BridgeConfig {
  let raw: unknown;
  try {
    raw = parseYaml(yamlText);
  } catch (err) {
    throw new ConfigError(`Settings are not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (raw === null || raw === undefined) raw = {};
  if (!isRecord(raw)) throw new ConfigError('Settings must be a YAML mapping');

  const result = settingsSchema.safeParse(applyOverrides(raw, overrides, env));
  if (!result.success) throw new ConfigError('Invalid settings', formatIssues(result.error));
  return result.data;
}

export function resolveSettingsPath(cliPath: string | undefined, env: Env): string {
  return cliPath ?? env['BRIDGE_SETTINGS'] ?? DEFAULT_SETTINGS_PATH;
}

export async function loadSettings(path: string, overrides: SettingsOverrides = {}, env: Env = {}): Promise<BridgeConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read settings file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseSettings(text, overrides, env);
}
