import type { ContractRunner, TransactionRequest } from 'ethers';
import { describe, expect, it } from 'vitest';
import { StakingState, stakingInterface, toStakingState } from '../../src/staking/contracts.js';
import { EthersStakingReader, readStakingSnapshot } from '../../src/staking/reader.js';
import { DAY, FakeChainReader, NOW, OLAS, SERVICE_ID, TARGET_STAKING } from '../helpers/fakes.js';

const MULTISIG = '0x3333333333333333333333333333333333333333';
const OWNER = '0x4444444444444444444444444444444444444444';

/**
 * Answers `eth_call` for the staking ABI from a table of canned return values.
 */
function cannedRunner(results: Record<string, unknown[]>, calls: string[] = []): ContractRunner {
  return {
    provider: null,
    async call(tx: TransactionRequest): Promise<string> {
      const parsed = stakingInterface.parseTransaction({ data: tx.data ?? '0x' });
      if (!parsed) {
        throw new Error('unknown selector');
      }
      calls.push(`${parsed.name}(${parsed.args.map(String).join(',')})`);
      const values = results[parsed.name];
      if (!values) {
        throw new Error(`no canned result for ${parsed.name}`);
      }
      return stakingInterface.encodeFunctionResult(parsed.fragment, values);
    },
  };
}

describe('EthersStakingReader', () => {
  it('decodes the staking state and derives staked/evicted flags', async () => {
    const calls: string[] = [];
    const reader = new EthersStakingReader(cannedRunner({ getStakingState: [2] }, calls));

    expect(await reader.getServiceStakingState(SERVICE_ID, TARGET_STAKING)).toBe(StakingState.Evicted);
    expect(await reader.isServiceStaked(SERVICE_ID, TARGET_STAKING)).toBe(true);
    expect(await reader.isServiceEvicted(SERVICE_ID, TARGET_STAKING)).toBe(true);
    expect(calls[0]).toBe(`getStakingState(${SERVICE_ID})`);
  });

  it('decodes the service info tuple', async () => {
    const reader = new EthersStakingReader(cannedRunner({
      getServiceInfo: [[MULTISIG, OWNER, [1n, 2n], NOW - DAY, 5n, 0n]],
    }));

    const info = await reader.getServiceInfo(SERVICE_ID, TARGET_STAKING);

    expect(info).toEqual({
      multisig: MULTISIG,
      owner: OWNER,
      nonces: [1n, 2n],
      tsStart: NOW - DAY,
      reward: 5n,
      inactivity: 0n,
    });
  });

  it('computes free slots from the service cap and the staked id list', async () => {
    const reader = new EthersStakingReader(cannedRunner({
      maxNumServices: [3],
      getServiceIds: [[7n, 8n]],
    }));

    expect(await reader.getAvailableStakingSlots(TARGET_STAKING)).toBe(1);
    expect(await reader.getStakedServiceIds(TARGET_STAKING)).toEqual([7, 8]);
  });

  it('reads scalar contract parameters', async () => {
    const reader = new EthersStakingReader(cannedRunner({
      minStakingDuration: [3 * DAY],
      availableRewards: [12n * OLAS],
      getNextRewardCheckpointTimestamp: [NOW + 600],
      livenessPeriod: [DAY],
    }));

    expect(await reader.getMinStakingDuration(TARGET_STAKING)).toBe(3 * DAY);
    expect(await reader.getAvailableRewards(TARGET_STAKING)).toBe(12n * OLAS);
    expect(await reader.getNextCheckpointTimestamp(TARGET_STAKING)).toBe(NOW + 600);
    expect(await reader.getLivenessPeriod(TARGET_STAKING)).toBe(DAY);
  });
});

describe('toStakingState', () => {
  it('rejects values outside the enum', () => {
    expect(() => toStakingState(3n)).toThrow('Unknown staking state 3');
  });
});

describe('readStakingSnapshot', () => {
  it('skips the service info read for an unstaked service', async () => {
    const chain = new FakeChainReader().setContract(TARGET_STAKING, { maxNumServices: 4, stakedServiceIds: [1] });

    const snapshot = await readStakingSnapshot(chain, SERVICE_ID, TARGET_STAKING);

    expect(snapshot).toEqual({
      stakingState: StakingState.Unstaked,
      isStaked: false,
      isEvicted: false,
      stakeStartTimestamp: 0,
      minStakingDuration: 3 * DAY,
      availableRewards: 500n * OLAS,
      availableSlots: 3,
      nextCheckpointTimestamp: NOW - 60,
      livenessPeriod: DAY,
    });
    expect(chain.events.some(e => e.startsWith('read:getServiceInfo'))).toBe(false);
  });

  it('takes the stake start from the service info of a staked service', async () => {
    const chain = new FakeChainReader().setContract(TARGET_STAKING, {
      stakingState: StakingState.Staked,
      stakedServiceIds: [SERVICE_ID],
      tsStart: NOW - 2 * DAY,
    });

    const snapshot = await readStakingSnapshot(chain, SERVICE_ID, TARGET_STAKING);

    expect(snapshot.isStaked).toBe(true);
    expect(snapshot.stakeStartTimestamp).toBe(NOW - 2 * DAY);
  });
});
