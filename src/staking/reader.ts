/**
 * Read-only queries against Olas staking contracts.
 *
 * Every method takes the staking contract address so the same reader serves
 * the target program and the deprecated ones swept before it.
 */

import { Contract, getBigInt, type ContractRunner } from 'ethers';
import { chainLogger } from '../logging/index.js';
import { STAKING_ABI, StakingState, toStakingState, type StakedServiceInfo } from './contracts.js';

export interface StakingChainReader {
  getServiceStakingState(serviceId: number, stakingAddress: string): Promise<StakingState>;
  isServiceStaked(serviceId: number, stakingAddress: string): Promise<boolean>;
  isServiceEvicted(serviceId: number, stakingAddress: string): Promise<boolean>;
  getServiceInfo(serviceId: number, stakingAddress: string): Promise<StakedServiceInfo>;
  getMinStakingDuration(stakingAddress: string): Promise<number>;
  getAvailableRewards(stakingAddress: string): Promise<bigint>;
  getAvailableStakingSlots(stakingAddress: string): Promise<number>;
  getNextCheckpointTimestamp(stakingAddress: string): Promise<number>;
  getLivenessPeriod(stakingAddress: string): Promise<number>;
  getStakedServiceIds(stakingAddress: string): Promise<number[]>;
}

/**
 * Snapshot of everything the decision engine looks at, read in one pass.
 */
export interface StakingContractState {
  stakingState: StakingState;
  isStaked: boolean;
  isEvicted: boolean;
  /** Seconds since epoch; 0 when the service is not staked */
  stakeStartTimestamp: number;
  minStakingDuration: number;
  availableRewards: bigint;
  availableSlots: number;
  nextCheckpointTimestamp: number;
  livenessPeriod: number;
}

export class EthersStakingReader implements StakingChainReader {
  private readonly contracts = new Map<string, Contract>();

  constructor(private readonly runner: ContractRunner) {}

  private staking(stakingAddress: string): Contract {
    const key = stakingAddress.toLowerCase();
    let contract = this.contracts.get(key);
    if (!contract) {
      contract = new Contract(stakingAddress, STAKING_ABI, this.runner);
      this.contracts.set(key, contract);
    }
    return contract;
  }

  async getServiceStakingState(serviceId: number, stakingAddress: string): Promise<StakingState> {
    const raw = getBigInt(await this.staking(stakingAddress).getStakingState(serviceId));
    return toStakingState(raw);
  }

  async isServiceStaked(serviceId: number, stakingAddress: string): Promise<boolean> {
    return (await this.getServiceStakingState(serviceId, stakingAddress)) !== StakingState.Unstaked;
  }

  async isServiceEvicted(serviceId: number, stakingAddress: string): Promise<boolean> {
    return (await this.getServiceStakingState(serviceId, stakingAddress)) === StakingState.Evicted;
  }

  async getServiceInfo(serviceId: number, stakingAddress: string): Promise<StakedServiceInfo> {
    const info = await this.staking(stakingAddress).getServiceInfo(serviceId);
    const nonces: unknown[] = Array.from(info.nonces);
    return {
      multisig: String(info.multisig),
      owner: String(info.owner),
      nonces: nonces.map(nonce => getBigInt(String(nonce))),
      tsStart: Number(getBigInt(info.tsStart)),
      reward: getBigInt(info.reward),
      inactivity: getBigInt(info.inactivity),
    };
  }

  async getMinStakingDuration(stakingAddress: string): Promise<number> {
    return Number(getBigInt(await this.staking(stakingAddress).minStakingDuration()));
  }

  async getAvailableRewards(stakingAddress: string): Promise<bigint> {
    return getBigInt(await this.staking(stakingAddress).availableRewards());
  }

  async getAvailableStakingSlots(stakingAddress: string): Promise<number> {
    const staking = this.staking(stakingAddress);
    const maxServices = Number(getBigInt(await staking.maxNumServices()));
    const stakedIds = await this.getStakedServiceIds(stakingAddress);
    return maxServices - stakedIds.length;
  }

  async getNextCheckpointTimestamp(stakingAddress: string): Promise<number> {
    return Number(getBigInt(await this.staking(stakingAddress).getNextRewardCheckpointTimestamp()));
  }

  async getLivenessPeriod(stakingAddress: string): Promise<number> {
    return Number(getBigInt(await this.staking(stakingAddress).livenessPeriod()));
  }

  async getStakedServiceIds(stakingAddress: string): Promise<number[]> {
    const ids: unknown[] = Array.from(await this.staking(stakingAddress).getServiceIds());
    return ids.map(id => Number(getBigInt(String(id))));
  }
}

/**
 * Read a fresh snapshot of the target staking contract for one decision.
 */
export async function readStakingSnapshot(
  reader: StakingChainReader,
  serviceId: number,
  stakingAddress: string,
): Promise<StakingContractState> {
  const stakingState = await reader.getServiceStakingState(serviceId, stakingAddress);
  const isStaked = stakingState !== StakingState.Unstaked;
  const stakeStartTimestamp = isStaked
    ? (await reader.getServiceInfo(serviceId, stakingAddress)).tsStart
    : 0;

  const snapshot: StakingContractState = {
    stakingState,
    isStaked,
    isEvicted: stakingState === StakingState.Evicted,
    stakeStartTimestamp,
    minStakingDuration: await reader.getMinStakingDuration(stakingAddress),
    availableRewards: await reader.getAvailableRewards(stakingAddress),
    availableSlots: await reader.getAvailableStakingSlots(stakingAddress),
    nextCheckpointTimestamp: await reader.getNextCheckpointTimestamp(stakingAddress),
    livenessPeriod: await reader.getLivenessPeriod(stakingAddress),
  };

  chainLogger.debug({
    serviceId,
    stakingAddress,
    ...snapshot,
    availableRewards: snapshot.availableRewards.toString(),
  }, 'Read staking contract snapshot');

  return snapshot;
}
