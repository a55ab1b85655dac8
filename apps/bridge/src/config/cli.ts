import { Command, InvalidArgumentError, Option } from 'commander';
import type { LogLevel, PayloadFormat } from '@uas-bridge/domain';
import type { SettingsOverrides } from './settings.js';

export interface CliOptions {
  config?: string;
  device?: string;
  altitudeOffset?: number;
  setFlyingWhenGrounded: boolean;
  payloadFormat?: PayloadFormat;
  verbose: number;
}

function parseMeters(value: string): number {
  const meters = Number(value);
  if (value.trim() === '' || !Number.isFinite(meters)) {
    throw new InvalidArgumentError('Expected a number of meters.');
  }
  return meters;
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function createCli(): Command {
  return new Command()
    .name('uas-tracking-bridge')
    .description('Forward MAVLink position telemetry to AMQP and/or MQTT tracking sinks')
    .option('-c, --config <path>', 'settings file (default: $BRIDGE_SETTINGS or settings.yml)')
    .option('-d, --device <connection>', 'MAVLink connection string, e.g. udpin:0.0.0.0:14550 or /dev/ttyACM0,57600')
    .option('--altitude-offset <meters>', 'meters added to every reported altitude', parseMeters)
    .option('--set-flying-when-grounded', 'always report the UAV as flying', false)
    .addOption(
      new Option('--payload-format <format>', 'outbound message format').choices(['tracking', 'udveo']),
    )
    .option('-v, --verbose', 'increase log verbosity (-v info, -vv debug)', increaseVerbosity, 0)
    .helpOption('-h, --help', 'show this help');
}

/** Parses user arguments (no node/script prefix). Commander exits on `--help` and usage errors. */
export function parseCli(args: readonly string[], command: Command = createCli()): CliOptions {
  command.parse([...args], { from: 'user' });
  return command.opts<CliOptions>();
}

export function verbosityToLogLevel(verbose: number): LogLevel | undefined {
  if (verbose >= 2) return 'debug';
  if (verbose === 1) return 'info';
  return undefined;
}

export function toSettingsOverrides(options: CliOptions): SettingsOverrides {
  return {
    device: options.device,
    altitudeOffsetMeters: options.altitudeOffset,
    setFlyingWhenGrounded: options.setFlyingWhenGrounded,
    payloadFormat: options.payloadFormat,
    logLevel: verbosityToLogLevel(options.verbose),
  };
}
