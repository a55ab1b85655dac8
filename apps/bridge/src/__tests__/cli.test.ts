import { describe, it, expect } from '@jest/globals';
import { CommanderError } from 'commander';
import { createCli, parseCli, toSettingsOverrides, verbosityToLogLevel } from '../config/cli.js';

function quietCli() {
  return createCli()
    .exitOverride()
    .configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
}

function usageError(args: string[]): CommanderError {
  try {
    parseCli(args, quietCli());
  } catch (err) {
    if (err instanceof CommanderError) return err;
    throw err;
  }
  throw new Error('expected a usage error');
}

describe('parseCli', () => {
  it('has quiet defaults', () => {
    expect(parseCli([], quietCli())).toEqual({ setFlyingWhenGrounded: false, verbose: 0 });
  });

  it('reads every option', () => {
    const options = parseCli(
      [
        '-c',
        'field.yml',
        '-d',
        'udpout:10.0.0.2:14550',
        '--altitude-offset',
        '12.5',
        '--set-flying-when-grounded',
        '--payload-format',
        'udveo',
      ],
      quietCli(),
    );
    expect(options).toEqual({
      config: 'field.yml',
      device: 'udpout:10.0.0.2:14550',
      altitudeOffset: 12.5,
      setFlyingWhenGrounded: true,
      payloadFormat: 'udveo',
      verbose: 0,
    });
  });

  it('counts repeated -v flags', () => {
    expect(parseCli(['-v'], quietCli()).verbose).toBe(1);
    expect(parseCli(['-vv'], quietCli()).verbose).toBe(2);
    expect(parseCli(['-v', '--verbose', '-v'], quietCli()).verbose).toBe(3);
  });

  it('rejects a non-numeric altitude offset', () => {
    expect(usageError(['--altitude-offset', 'high']).code).toBe('commander.invalidArgument');
  });

  it('rejects an unknown payload format', () => {
    expect(usageError(['--payload-format', 'xml']).code).toBe('commander.invalidArgument');
  });

  it('rejects unknown options', () => {
    expect(usageError(['--bogus']).code).toBe('commander.unknownOption');
  });

  it('stops on --help', () => {
    expect(usageError(['-h']).code).toBe('commander.helpDisplayed');
  });
});

describe('verbosityToLogLevel', () => {
  it('maps -v to info and -vv or more to debug', () => {
    expect(verbosityToLogLevel(0)).toBeUndefined();
    expect(verbosityToLogLevel(1)).toBe('info');
    expect(verbosityToLogLevel(2)).toBe('debug');
    expect(verbosityToLogLevel(5)).toBe('debug');
  });
});

describe('toSettingsOverrides', () => {
  it('renames CLI options to settings keys', () => {
    expect(
      toSettingsOverrides({ device: 'tcp:sim:5760', altitudeOffset: 5, setFlyingWhenGrounded: true, verbose: 1 }),
    ).toEqual({
      device: 'tcp:sim:5760',
      altitudeOffsetMeters: 5,
      setFlyingWhenGrounded: true,
      payloadFormat: undefined,
      logLevel: 'info',
    });
  });
});
