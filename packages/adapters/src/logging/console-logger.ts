import type { Logger, LogLevel } from '@uas-bridge/domain';

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

let currentLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] <= LEVEL_RANK[currentLevel];
}

/** Console logger writing `<iso time> <LEVEL> [scope] message`, gated by the process-wide level. */
export function createLogger(scope: string): Logger {
  const line = (level: LogLevel, message: string) =>
    `${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${message}`;

  return {
    error: (message, ...details) => {
      if (enabled('error')) console.error(line('error', message), ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(line('warn', message), ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(line('info', message), ...details);
    },
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(line('debug', message), ...details);
    },
  };
}

export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
