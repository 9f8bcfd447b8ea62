import { stakingLogger } from '../logging/index.js';
import type { StakingChainReader } from './reader.js';

export interface DurationLockInput {
  stakeStartTimestamp: number;
  minStakingDuration: number;
  availableRewards: bigint;
  /** Seconds since epoch */
  now: number;
}

export interface DurationLockStatus {
  locked: boolean;
  stakedForSeconds: number;
  minStakingDuration: number;
}

/**
 * "1D 2h 3m" style rendering of a number of seconds.
 */
export function formatStakingDuration(durationSeconds: number): string {
  const total = Math.max(0, Math.floor(durationSeconds));
  const days = Math.floor(total / 86_400);
  const hours = Math.floor((total % 86_400) / 3_600);
  const minutes = Math.floor((total % 3_600) / 60);
  return `${days}D ${hours}h ${minutes}m`;
}

/**
 * Unstaking before the minimum duration forfeits rewards, so it is blocked
 * while the contract still has rewards to hand out.
 */
export function checkDurationLock(input: DurationLockInput): DurationLockStatus {
  const stakedForSeconds = input.now - input.stakeStartTimestamp;
  return {
    locked: stakedForSeconds < input.minStakingDuration && input.availableRewards > 0n,
    stakedForSeconds,
    minStakingDuration: input.minStakingDuration,
  };
}

export function describeDurationLock(programName: string, status: DurationLockStatus): string[] {
  return [
    `Your service has been staked on ${programName} for ${formatStakingDuration(status.stakedForSeconds)}.`,
    `You cannot unstake your service from ${programName} until it has been staked for at least ${formatStakingDuration(status.minStakingDuration)}.`,
  ];
}

export function warnDurationLock(programName: string, status: DurationLockStatus): void {
  for (const line of describeDurationLock(programName, status)) {
    stakingLogger.warn(line);
  }
}

/**
 * Read the lock inputs of one staking contract and evaluate them.
 */
export async function readDurationLock(
  reader: StakingChainReader,
  serviceId: number,
  stakingAddress: string,
  now: number,
): Promise<DurationLockStatus> {
  const info = await reader.getServiceInfo(serviceId, stakingAddress);
  return checkDurationLock({
    stakeStartTimestamp: info.tsStart,
    minStakingDuration: await reader.getMinStakingDuration(stakingAddress),
    availableRewards: await reader.getAvailableRewards(stakingAddress),
    now,
  });
}
