import { stakingLogger } from '../logging/index.js';
import { applyStakingDecision, type StakingDecisionDeps, type StakingDecisionInput } from './engine.js';
import { unstakeFromDeprecatedPrograms, type MigrationDeps } from './migration.js';
import type { StakingOutcome } from './outcome.js';

export type StakingWorkflowDeps = StakingDecisionDeps & Pick<MigrationDeps, 'programs'>;

/**
 * Clear deprecated stakes, then decide on the target program. The decision
 * only starts once the sweep has finished every program.
 */
export async function runStakingWorkflow(
  input: StakingDecisionInput,
  deps: StakingWorkflowDeps,
): Promise<StakingOutcome> {
  const migration = await unstakeFromDeprecatedPrograms(input.serviceId, deps);
  if (migration.status === 'halted') {
    return migration.outcome;
  }

  stakingLogger.info({
    serviceId: input.serviceId,
    stakingContract: input.stakingContractAddress,
    unstakeRequested: input.unstakeRequested,
    legacyUnstakes: migration.transactions.length,
  }, `Evaluating staking state on ${input.programName}`);

  const outcome = await applyStakingDecision(input, deps);
  return { ...outcome, transactions: [...migration.transactions, ...outcome.transactions] };
}
