import { describe, expect, it } from 'vitest';
import { checkDurationLock, describeDurationLock, formatStakingDuration, readDurationLock } from '../../src/staking/availability.js';
import { StakingState } from '../../src/staking/contracts.js';
import { DAY, FakeChainReader, NOW, OLAS, SERVICE_ID, TARGET_STAKING } from '../helpers/fakes.js';

describe('formatStakingDuration', () => {
  it.each([
    [0, '0D 0h 0m'],
    [59, '0D 0h 0m'],
    [90_061, '1D 1h 1m'],
    [3 * DAY, '3D 0h 0m'],
  ])('renders %i seconds as %s', (seconds, expected) => {
    expect(formatStakingDuration(seconds)).toBe(expected);
  });
});

describe('checkDurationLock', () => {
  const base = { stakeStartTimestamp: NOW - DAY, minStakingDuration: 3 * DAY, availableRewards: OLAS, now: NOW };

  it('locks a young stake while rewards remain', () => {
    expect(checkDurationLock(base)).toEqual({ locked: true, stakedForSeconds: DAY, minStakingDuration: 3 * DAY });
  });

  it('releases a young stake once rewards run out', () => {
    expect(checkDurationLock({ ...base, availableRewards: 0n }).locked).toBe(false);
  });

  it('releases a stake at exactly the minimum duration', () => {
    expect(checkDurationLock({ ...base, stakeStartTimestamp: NOW - 3 * DAY }).locked).toBe(false);
  });
});

describe('describeDurationLock', () => {
  it('states the elapsed time and the minimum duration', () => {
    expect(describeDurationLock('Alpine', { locked: true, stakedForSeconds: 90_061, minStakingDuration: 3 * DAY })).toEqual([
      'Your service has been staked on Alpine for 1D 1h 1m.',
      'You cannot unstake your service from Alpine until it has been staked for at least 3D 0h 0m.',
    ]);
  });
});

describe('readDurationLock', () => {
  it('reads the stake start, minimum duration and rewards of the given contract', async () => {
    const chain = new FakeChainReader().setContract(TARGET_STAKING, {
      stakingState: StakingState.Staked,
      stakedServiceIds: [SERVICE_ID],
      tsStart: NOW - 2 * DAY,
    });

    const status = await readDurationLock(chain, SERVICE_ID, TARGET_STAKING, NOW);

    expect(status).toEqual({ locked: true, stakedForSeconds: 2 * DAY, minStakingDuration: 3 * DAY });
    expect(chain.events).toEqual([
      `read:getServiceInfo:${TARGET_STAKING}`,
      `read:getMinStakingDuration:${TARGET_STAKING}`,
      `read:getAvailableRewards:${TARGET_STAKING}`,
    ]);
  });
});
