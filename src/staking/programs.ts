import type { StakingChainReader } from './reader.js';

interface StakingProgramBase {
  name: string;
  address: string;
}

/**
 * First-generation program: no staking-state getter, membership is read from
 * the staked service id list and no minimum staking duration is enforced.
 */
export interface MembershipStakingProgram extends StakingProgramBase {
  kind: 'membership';
}

/**
 * Program exposing `getStakingState` and a minimum staking duration.
 */
export interface StakingStateProgram extends StakingProgramBase {
  kind: 'staking-state';
}

export type DeprecatedStakingProgram = MembershipStakingProgram | StakingStateProgram;

export const DEPRECATED_STAKING_PROGRAMS: readonly DeprecatedStakingProgram[] = [
  { kind: 'membership', name: 'Everest', address: '0x5add592ce0a1B5DceCebB5Dcac086Cd9F9e3eA5C' },
  { kind: 'staking-state', name: 'Alpine', address: '0x2Ef503950Be67a98746F484DA0bBAdA339DF3326' },
  { kind: 'staking-state', name: 'CoastalTest', address: '0x97371B1C0cDA1D04dFc43DFb50a04645b7Bc9BEe' },
];

export async function isStakedOnProgram(
  reader: StakingChainReader,
  serviceId: number,
  program: DeprecatedStakingProgram,
): Promise<boolean> {
  switch (program.kind) {
    case 'membership': {
      const stakedIds = await reader.getStakedServiceIds(program.address);
      return stakedIds.includes(serviceId);
    }
    case 'staking-state':
      return reader.isServiceStaked(serviceId, program.address);
  }
}

export function enforcesMinStakingDuration(program: DeprecatedStakingProgram): boolean {
  return program.kind === 'staking-state';
}
