/**
 * Staking decision engine
 *
 * Reads one snapshot of the target staking contract and applies the first
 * matching transition:
 *
 *   unstake requested  -> already unstaked | eviction ack -> duration lock ->
 *                         checkpoint gap confirmation -> unstake
 *   staked + evicted   -> duration lock -> unstake -> fresh snapshot -> stake attempt
 *   staked, no rewards -> unstake
 *   staked             -> remain staked
 *   not staked         -> stake attempt
 *
 * Every unstake trigger goes through the same duration-lock guard.
 */

import { formatOlas, stakingLogger } from '../logging/index.js';
import type { OperatorPrompt } from '../operator/prompt.js';
import { checkDurationLock, formatStakingDuration, warnDurationLock } from './availability.js';
import { createOutcome, type StakingOutcome } from './outcome.js';
import { readStakingSnapshot, type StakingChainReader, type StakingContractState } from './reader.js';
import { submitBatch, type ConfirmedTransaction, type TransactionSubmitter } from './submitter.js';
import { buildStakeTransactions, buildUnstakeTransactions } from './transactions.js';

export interface StakingDecisionInput {
  serviceId: number;
  serviceRegistryAddress: string;
  stakingContractAddress: string;
  /** Label of the target program in operator messages */
  programName: string;
  unstakeRequested: boolean;
}

export interface StakingDecisionDeps {
  reader: StakingChainReader;
  submitter: TransactionSubmitter;
  prompt: OperatorPrompt;
  /** Seconds since epoch */
  now?: () => number;
}

export function nowInSeconds(): number {
  return Date.now() / 1000;
}

/**
 * `2024-05-01 12:00:00 UTC`
 */
export function formatUtcTimestamp(timestampSeconds: number): string {
  return `${new Date(timestampSeconds * 1000).toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function describeCheckpointGap(snapshot: StakingContractState): string {
  const lastCheckpoint = snapshot.nextCheckpointTimestamp - snapshot.livenessPeriod;
  return [
    'WARNING: Staking checkpoint call not available yet',
    '--------------------------------------------------',
    `The liveness period (${snapshot.livenessPeriod / 3600} hours) has not passed since the last checkpoint call.`,
    `  - ${formatUtcTimestamp(lastCheckpoint)} - Last checkpoint call.`,
    `  - ${formatUtcTimestamp(snapshot.nextCheckpointTimestamp)} - Next checkpoint call availability.`,
    '',
    "If you proceed with unstaking, your agent's work done between the last checkpoint call until now will not be accounted for rewards.",
    '(Note: To maximize agent work eligible for rewards, the recommended practice is to unstake shortly after a checkpoint has been called and stake again immediately after.)',
  ].join('\n');
}

class StakingDecision {
  private readonly now: () => number;

  constructor(
    private readonly input: StakingDecisionInput,
    private readonly deps: StakingDecisionDeps,
  ) {
    this.now = deps.now ?? nowInSeconds;
  }

  private get serviceId(): number {
    return this.input.serviceId;
  }

  private get program(): string {
    return this.input.programName;
  }

  async run(): Promise<StakingOutcome> {
    const snapshot = await readStakingSnapshot(this.deps.reader, this.serviceId, this.input.stakingContractAddress);
    const now = this.now();

    if (this.input.unstakeRequested) {
      return this.handleUnstakeRequest(snapshot, now);
    }

    if (snapshot.isStaked) {
      if (snapshot.isEvicted) {
        return this.handleEviction(snapshot, now);
      }

      if (snapshot.availableRewards === 0n) {
        stakingLogger.transition(this.serviceId, 'no-rewards-unstake',
          `No rewards available. Unstaking service ${this.serviceId} from ${this.program}...`);
        return this.guardedUnstake(snapshot, now, []);
      }

      return createOutcome('remained-staked',
        `There are rewards available. The service ${this.serviceId} should remain staked.`);
    }

    return this.tryStake(snapshot, []);
  }

  private async handleUnstakeRequest(snapshot: StakingContractState, now: number): Promise<StakingOutcome> {
    if (!snapshot.isStaked) {
      return createOutcome('already-unstaked', `Service ${this.serviceId} is not staked on ${this.program}.`);
    }

    if (snapshot.isEvicted) {
      await this.deps.prompt.acknowledge(
        `WARNING: Service ${this.serviceId} has been evicted from the ${this.program} staking program due to inactivity.`,
      );
    }

    const lock = checkDurationLock({ ...snapshot, now });
    if (lock.locked) {
      warnDurationLock(this.program, lock);
      return createOutcome('duration-locked', this.durationLockedMessage(snapshot));
    }

    if (now < snapshot.nextCheckpointTimestamp) {
      stakingLogger.debug({
        serviceId: this.serviceId,
        nextCheckpoint: formatUtcTimestamp(snapshot.nextCheckpointTimestamp),
      }, 'Unstaking before the next checkpoint forfeits rewards for the current period');

      const proceed = await this.deps.prompt.confirm(
        `${describeCheckpointGap(snapshot)}\n\nDo you want to continue unstaking service ${this.serviceId} from ${this.program}?`,
      );
      if (!proceed) {
        return createOutcome('declined', 'Terminating script.');
      }
    }

    stakingLogger.transition(this.serviceId, 'requested-unstake', `Unstaking service ${this.serviceId} from ${this.program}...`);
    const transactions = await this.unstake();
    return createOutcome('unstaked', `Successfully unstaked service ${this.serviceId} from ${this.program}.`, transactions);
  }

  private async handleEviction(snapshot: StakingContractState, now: number): Promise<StakingOutcome> {
    stakingLogger.transition(this.serviceId, 'evicted',
      `Service ${this.serviceId} has been evicted from the ${this.program} staking program due to inactivity. Unstaking...`);

    const lock = checkDurationLock({ ...snapshot, now });
    if (lock.locked) {
      warnDurationLock(this.program, lock);
      return createOutcome('duration-locked', this.durationLockedMessage(snapshot));
    }

    const unstaked = await this.unstake();
    stakingLogger.info(`Successfully unstaked service ${this.serviceId} from ${this.program}.`);

    // The unstake freed a slot and may have moved rewards; decide on fresh state
    const refreshed = await readStakingSnapshot(this.deps.reader, this.serviceId, this.input.stakingContractAddress);
    return this.tryStake(refreshed, unstaked);
  }

  private async guardedUnstake(
    snapshot: StakingContractState,
    now: number,
    previous: ConfirmedTransaction[],
  ): Promise<StakingOutcome> {
    const lock = checkDurationLock({ ...snapshot, now });
    if (lock.locked) {
      warnDurationLock(this.program, lock);
      return createOutcome('duration-locked', this.durationLockedMessage(snapshot), previous);
    }

    const transactions = [...previous, ...(await this.unstake())];
    return createOutcome('unstaked', `Successfully unstaked service ${this.serviceId} from ${this.program}.`, transactions);
  }

  private async tryStake(snapshot: StakingContractState, previous: ConfirmedTransaction[]): Promise<StakingOutcome> {
    if (snapshot.availableSlots <= 0) {
      return createOutcome('no-slots',
        `All staking slots for contract ${this.input.stakingContractAddress} are taken. Service ${this.serviceId} cannot be staked.`,
        previous);
    }

    stakingLogger.info(`Service ${this.serviceId} is not staked on ${this.program}. Checking for available rewards...`);
    if (snapshot.availableRewards === 0n) {
      return createOutcome('no-rewards', `No rewards available. Service ${this.serviceId} cannot be staked.`, previous);
    }

    stakingLogger.transition(this.serviceId, 'stake',
      `Rewards available: ${formatOlas(snapshot.availableRewards)} OLAS. Staking service ${this.serviceId}...`);
    const batch = buildStakeTransactions(this.serviceId, this.input.serviceRegistryAddress, this.input.stakingContractAddress);
    const staked = await submitBatch(this.deps.submitter, batch);
    return createOutcome('staked', `Service ${this.serviceId} staked successfully on ${this.program}.`, [...previous, ...staked]);
  }

  private unstake(): Promise<ConfirmedTransaction[]> {
    return submitBatch(this.deps.submitter, buildUnstakeTransactions(this.serviceId, this.input.stakingContractAddress));
  }

  private durationLockedMessage(snapshot: StakingContractState): string {
    return `Service ${this.serviceId} cannot be unstaked from ${this.program} before it has been staked for ${formatStakingDuration(snapshot.minStakingDuration)}. Terminating script.`;
  }
}

/**
 * Decide what the service should do on the target staking contract and apply it.
 */
export function applyStakingDecision(
  input: StakingDecisionInput,
  deps: StakingDecisionDeps,
): Promise<StakingOutcome> {
  return new StakingDecision(input, deps).run();
}
