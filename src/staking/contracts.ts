/**
 * Olas staking contract surface used by the runner.
 *
 * Human-readable ABI fragments for the StakingToken/StakingNativeToken
 * contracts and the ERC721 part of the ServiceRegistry.
 */

import { Interface } from 'ethers';

export const STAKING_ABI = [
  'function getStakingState(uint256 serviceId) view returns (uint8)',
  'function getServiceInfo(uint256 serviceId) view returns (tuple(address multisig, address owner, uint256[] nonces, uint256 tsStart, uint256 reward, uint256 inactivity))',
  'function getServiceIds() view returns (uint256[])',
  'function minStakingDuration() view returns (uint256)',
  'function availableRewards() view returns (uint256)',
  'function maxNumServices() view returns (uint256)',
  'function getNextRewardCheckpointTimestamp() view returns (uint256)',
  'function livenessPeriod() view returns (uint256)',
  'function stake(uint256 serviceId) external',
  'function unstake(uint256 serviceId) external returns (uint256 reward)',
] as const;

export const SERVICE_REGISTRY_ABI = [
  'function approve(address spender, uint256 serviceId) external',
] as const;

export const stakingInterface = new Interface(STAKING_ABI);
export const serviceRegistryInterface = new Interface(SERVICE_REGISTRY_ABI);

/**
 * On-chain staking state of a service (`getStakingState`).
 */
export enum StakingState {
  Unstaked = 0,
  Staked = 1,
  Evicted = 2,
}

export function toStakingState(raw: bigint | number): StakingState {
  switch (Number(raw)) {
    case 0:
      return StakingState.Unstaked;
    case 1:
      return StakingState.Staked;
    case 2:
      return StakingState.Evicted;
    default:
      throw new Error(`Unknown staking state ${raw.toString()}`);
  }
}

/**
 * Decoded `getServiceInfo` tuple. `tsStart` is the fourth member.
 */
export interface StakedServiceInfo {
  multisig: string;
  owner: string;
  nonces: bigint[];
  tsStart: number;
  reward: bigint;
  inactivity: bigint;
}
