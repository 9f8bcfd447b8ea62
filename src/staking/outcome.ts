import type { ExitCode } from '../logging/index.js';
import type { ConfirmedTransaction } from './submitter.js';

/**
 * How a run ended. Business-rule aborts are outcomes, not exceptions; only
 * submission failures and unexpected faults are thrown.
 */
export type StakingOutcomeKind =
  | 'already-unstaked'
  | 'unstaked'
  | 'remained-staked'
  | 'staked'
  | 'no-rewards'
  | 'no-slots'
  | 'duration-locked'
  | 'legacy-locked'
  | 'declined';

const EXIT_CODES: Record<StakingOutcomeKind, ExitCode> = {
  'already-unstaked': 0,
  unstaked: 0,
  'remained-staked': 0,
  staked: 0,
  'no-rewards': 0,
  'no-slots': 1,
  'duration-locked': 1,
  // A legacy stake that cannot be released yet still lets the service run
  'legacy-locked': 0,
  declined: 1,
};

export interface StakingOutcome {
  kind: StakingOutcomeKind;
  exitCode: ExitCode;
  message: string;
  /** Transactions confirmed during this run, in submission order */
  transactions: ConfirmedTransaction[];
}

export function createOutcome(
  kind: StakingOutcomeKind,
  message: string,
  transactions: ConfirmedTransaction[] = [],
): StakingOutcome {
  return { kind, exitCode: EXIT_CODES[kind], message, transactions };
}
