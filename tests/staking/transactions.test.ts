import { describe, expect, it } from 'vitest';
import { serviceRegistryInterface, stakingInterface } from '../../src/staking/contracts.js';
import { buildStakeTransactions, buildUnstakeTransactions } from '../../src/staking/transactions.js';
import { SERVICE_ID, SERVICE_REGISTRY, TARGET_STAKING } from '../helpers/fakes.js';

describe('buildStakeTransactions', () => {
  it('approves the staking contract on the registry before staking', () => {
    const [approve, stake] = buildStakeTransactions(SERVICE_ID, SERVICE_REGISTRY, TARGET_STAKING);
    if (!approve || !stake) throw new Error('incomplete batch');

    expect(approve.kind).toBe('approve');
    expect(approve.to).toBe(SERVICE_REGISTRY);
    expect(approve.value).toBe(0n);
    const approveArgs = serviceRegistryInterface.decodeFunctionData('approve', approve.data);
    expect(String(approveArgs[0]).toLowerCase()).toBe(TARGET_STAKING);
    expect(approveArgs[1]).toBe(BigInt(SERVICE_ID));

    expect(stake.kind).toBe('stake');
    expect(stake.to).toBe(TARGET_STAKING);
    expect(stakingInterface.decodeFunctionData('stake', stake.data)[0]).toBe(BigInt(SERVICE_ID));
  });
});

describe('buildUnstakeTransactions', () => {
  it('encodes a single unstake call', () => {
    const batch = buildUnstakeTransactions(SERVICE_ID, TARGET_STAKING);

    expect(batch).toHaveLength(1);
    expect(batch[0]?.description).toBe(`unstake service ${SERVICE_ID} from ${TARGET_STAKING}`);
    expect(batch[0]?.data.slice(0, 10)).toBe(stakingInterface.getFunction('unstake')?.selector);
  });
});
