import pino from 'pino';

export type LoggingConfig = {
  level: pino.LevelWithSilent;
  destination: 'stdout' | 'stderr' | string;
  format: 'json' | 'pretty';
};

const VALID_LEVELS: readonly pino.LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLevel(value: string): value is pino.LevelWithSilent {
  return VALID_LEVELS.some(level => level === value);
}

function resolveLogLevel(): pino.LevelWithSilent {
  const level = process.env.LOG_LEVEL?.trim().toLowerCase();

  if (level && isLevel(level)) {
    return level;
  }

  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true' ? 'warn' : 'info';
}

// Operators run this interactively, so pretty is the default outside of CI/log shipping.
function resolveFormat(): 'json' | 'pretty' {
  const rawFormat = process.env.LOG_FORMAT?.trim().toLowerCase();

  if (!rawFormat) {
    return process.stdout.isTTY ? 'pretty' : 'json';
  }

  if (rawFormat === 'json') return 'json';
  if (rawFormat === 'pretty') return 'pretty';

  throw new Error('LOG_FORMAT must be "json" or "pretty".');
}

function resolveDestination(): LoggingConfig['destination'] {
  const destination = process.env.LOG_DESTINATION?.trim();
  if (!destination || destination === 'stdout') {
    return 'stdout';
  }

  if (destination === 'stderr') {
    return 'stderr';
  }

  return destination;
}

export function getLoggingConfig(): LoggingConfig {
  return {
    level: resolveLogLevel(),
    destination: resolveDestination(),
    format: resolveFormat(),
  };
}
