/**
 * Legacy staking program sweep
 *
 * A service can only be staked on one program at a time, so before the target
 * program is considered the service is unstaked from every deprecated program
 * it is still on. The operator confirms each unstake.
 */

import { migrationLogger } from '../logging/index.js';
import type { OperatorPrompt } from '../operator/prompt.js';
import { describeDurationLock, readDurationLock, type DurationLockStatus } from './availability.js';
import { nowInSeconds } from './engine.js';
import { createOutcome, type StakingOutcome } from './outcome.js';
import {
  DEPRECATED_STAKING_PROGRAMS,
  enforcesMinStakingDuration,
  isStakedOnProgram,
  type DeprecatedStakingProgram,
} from './programs.js';
import type { StakingChainReader } from './reader.js';
import { submitBatch, type ConfirmedTransaction, type TransactionSubmitter } from './submitter.js';
import { buildUnstakeTransactions } from './transactions.js';

export interface MigrationDeps {
  reader: StakingChainReader;
  submitter: TransactionSubmitter;
  prompt: OperatorPrompt;
  now?: () => number;
  programs?: readonly DeprecatedStakingProgram[];
}

export type MigrationResult =
  | { status: 'completed'; transactions: ConfirmedTransaction[] }
  | { status: 'halted'; outcome: StakingOutcome };

function legacyLockNotice(serviceId: number, program: string, lock: DurationLockStatus): string {
  return [
    ...describeDurationLock(program, lock),
    '',
    'WARNING: Service cannot be unstaked yet',
    '---------------------------------------',
    `Service ${serviceId} cannot be unstaked from ${program} at this time.`,
    `You can still run your service, but it will stay staked in ${program}.`,
    'Please, try re-running this script again at a later time to try stake on a new program.',
  ].join('\n');
}

/**
 * Confirmation shown before unstaking from a deprecated program. The context
 * travels with the question so it is printed right above it.
 */
export function legacyUnstakeQuestion(serviceId: number, program: string): string {
  return [
    `Service ${serviceId} is staked on ${program}. To continue in a new staking program, first, it must be unstaked from ${program}.`,
    `Do you want to continue unstaking service ${serviceId} from ${program}?`,
  ].join('\n');
}

async function sweepProgram(
  serviceId: number,
  program: DeprecatedStakingProgram,
  deps: MigrationDeps,
  confirmed: ConfirmedTransaction[],
): Promise<StakingOutcome | null> {
  migrationLogger.info({ program: program.name, address: program.address }, `Checking if service is staked on ${program.name}...`);

  if (!(await isStakedOnProgram(deps.reader, serviceId, program))) {
    migrationLogger.info(`Service ${serviceId} is not staked on ${program.name}.`);
    return null;
  }

  if (enforcesMinStakingDuration(program)) {
    const lock = await readDurationLock(deps.reader, serviceId, program.address, (deps.now ?? nowInSeconds)());
    if (lock.locked) {
      migrationLogger.debug({ program: program.name, ...lock }, 'Legacy stake is still within its minimum duration');
      await deps.prompt.acknowledge(legacyLockNotice(serviceId, program.name, lock));
      return createOutcome('legacy-locked', `Service ${serviceId} stays staked on ${program.name} for now.`, confirmed);
    }
  }

  const proceed = await deps.prompt.confirm(legacyUnstakeQuestion(serviceId, program.name));
  if (!proceed) {
    return createOutcome('declined', 'Terminating script.', confirmed);
  }

  migrationLogger.info(`Unstaking service ${serviceId} from ${program.name}...`);
  confirmed.push(...(await submitBatch(deps.submitter, buildUnstakeTransactions(serviceId, program.address))));
  migrationLogger.info(`Successfully unstaked service ${serviceId} from ${program.name}.`);
  return null;
}

/**
 * Unstake the service from every deprecated program, in table order.
 */
export async function unstakeFromDeprecatedPrograms(serviceId: number, deps: MigrationDeps): Promise<MigrationResult> {
  migrationLogger.info('Unstaking from old programs...');
  const confirmed: ConfirmedTransaction[] = [];

  for (const program of deps.programs ?? DEPRECATED_STAKING_PROGRAMS) {
    const halted = await sweepProgram(serviceId, program, deps, confirmed);
    if (halted) {
      return { status: 'halted', outcome: halted };
    }
  }

  return { status: 'completed', transactions: confirmed };
}
