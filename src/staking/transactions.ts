import { serviceRegistryInterface, stakingInterface } from './contracts.js';

export type StakingTransactionKind = 'approve' | 'stake' | 'unstake';

export interface UnsignedStakingTransaction {
  kind: StakingTransactionKind;
  to: string;
  data: string;
  value: bigint;
  /** Operator-facing label used in logs and errors */
  description: string;
}

/**
 * Ordered transactions; each one must be confirmed before the next is sent.
 */
export type TransactionBatch = readonly UnsignedStakingTransaction[];

/**
 * Approve the staking contract to take the service NFT, then stake it.
 */
export function buildStakeTransactions(
  serviceId: number,
  serviceRegistryAddress: string,
  stakingAddress: string,
): TransactionBatch {
  return [
    {
      kind: 'approve',
      to: serviceRegistryAddress,
      data: serviceRegistryInterface.encodeFunctionData('approve', [stakingAddress, serviceId]),
      value: 0n,
      description: `approve staking contract ${stakingAddress} for service ${serviceId}`,
    },
    {
      kind: 'stake',
      to: stakingAddress,
      data: stakingInterface.encodeFunctionData('stake', [serviceId]),
      value: 0n,
      description: `stake service ${serviceId} on ${stakingAddress}`,
    },
  ];
}

export function buildUnstakeTransactions(serviceId: number, stakingAddress: string): TransactionBatch {
  return [
    {
      kind: 'unstake',
      to: stakingAddress,
      data: stakingInterface.encodeFunctionData('unstake', [serviceId]),
      value: 0n,
      description: `unstake service ${serviceId} from ${stakingAddress}`,
    },
  ];
}
