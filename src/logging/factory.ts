import pino from 'pino';
import type { SonicBoom } from 'sonic-boom';
import { getLoggingConfig, type LoggingConfig } from './config.js';

export type LoggerBundle = {
  logger: pino.Logger;
  destination: SonicBoom | null;
};

function createDestination(destination: LoggingConfig['destination']): SonicBoom {
  if (destination === 'stdout') {
    return pino.destination({ dest: 1, sync: false });
  }

  if (destination === 'stderr') {
    return pino.destination({ dest: 2, sync: false });
  }

  return pino.destination({
    dest: destination,
    append: true,
    mkdir: true,
    sync: false,
  });
}

export function buildLogger(config: LoggingConfig = getLoggingConfig()): LoggerBundle {
  const forceStderr = process.env.FORCE_STDERR === 'true';
  const destinationTarget = forceStderr ? 'stderr' : config.destination;
  const baseOptions: pino.LoggerOptions = {
    level: config.level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.format === 'pretty' && (destinationTarget === 'stdout' || destinationTarget === 'stderr')) {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: destinationTarget === 'stderr' ? 2 : 1,
      },
    });

    return {
      logger: pino(baseOptions, transport),
      destination: null,
    };
  }

  const destination = createDestination(destinationTarget);
  return {
    logger: pino(baseOptions, destination),
    destination,
  };
}
