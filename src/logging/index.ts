import type pino from 'pino';
import { WeiPerEther } from 'ethers';
import { buildLogger } from './factory.js';

const { logger: rootLogger, destination } = buildLogger();

export const logger = rootLogger;

function flushLoggerSync(): void {
  if (!destination) {
    return;
  }
  try {
    destination.flushSync();
  } catch (error) {
    // sonic-boom refuses flushSync while its fd is still opening
    process.stderr.write(`Failed to flush log destination: ${String(error)}\n`);
  }
}

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}

export const configLogger = createChildLogger('CONFIG');
export const chainLogger = createChildLogger('CHAIN');
export const txLogger = createChildLogger('TX');
export const migrationLogger = createChildLogger('MIGRATION');
export const cliLogger = createChildLogger('CLI');

const baseStakingLogger = createChildLogger('STAKING');
export const stakingLogger = Object.assign(baseStakingLogger, {
  transition(serviceId: number, rule: string, message: string) {
    baseStakingLogger.info({ serviceId, rule }, message);
  },
});

export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const serialized: Record<string, unknown> = {
      type: err.name,
      message: err.message,
      stack: err.stack,
    };
    if (err.cause !== undefined) {
      serialized.cause = serializeError(err.cause);
    }
    return serialized;
  }
  return { message: String(err) };
}

const WEI_PER_CENT = WeiPerEther / 100n;

/**
 * Render a wei amount as OLAS rounded to two decimals, e.g. `1234500000000000000n` -> `"1.23"`.
 */
export function formatOlas(wei: bigint): string {
  const sign = wei < 0n ? '-' : '';
  const magnitude = wei < 0n ? -wei : wei;
  const cents = (magnitude + WEI_PER_CENT / 2n) / WEI_PER_CENT;
  return `${sign}${cents / 100n}.${(cents % 100n).toString().padStart(2, '0')}`;
}

export type ExitCode = 0 | 1 | 2;

export function exitWithCode(code: ExitCode, message: string, error?: Error): never {
  switch (code) {
    case 0:
      logger.info({ exitCode: code }, message);
      break;
    case 1:
      logger.error({ exitCode: code, error: error ? serializeError(error) : undefined }, message);
      break;
    case 2:
      configLogger.fatal({ exitCode: code, error: error ? serializeError(error) : undefined }, `Configuration Error: ${message}`);
      break;
  }

  flushLoggerSync();
  process.exit(code);
}
