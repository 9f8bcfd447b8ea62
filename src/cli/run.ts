/**
 * stake-service command
 *
 * Parses arguments, connects the owner wallet and runs the staking workflow.
 * Business-rule aborts come back as outcomes with their own exit code; any
 * thrown error is handled once here: it is logged, USE_STAKING is cleared from
 * the runner env file and the run exits 1.
 */

import { JsonRpcProvider } from 'ethers';
import { getRunnerEnvPath, getStakingProgramName, getTxConfirmations, getTxReceiptTimeoutMs } from '../config/index.js';
import { unsetEnvKey, USE_STAKING_KEY } from '../env/runner-env.js';
import { cliLogger, serializeError, type ExitCode } from '../logging/index.js';
import { TerminalPrompt, type OperatorPrompt } from '../operator/prompt.js';
import { StakingConfigError } from '../staking/errors.js';
import type { StakingOutcome } from '../staking/outcome.js';
import { EthersStakingReader, type StakingChainReader } from '../staking/reader.js';
import { OwnerTransactionSubmitter, type TransactionSubmitter } from '../staking/submitter.js';
import { runStakingWorkflow } from '../staking/workflow.js';
import { loadOwnerWallet } from '../wallet/owner.js';
import { parseStakingArgs, USAGE, type ParsedCommand, type StakingCliArgs } from './args.js';

export interface StakingRuntime {
  reader: StakingChainReader;
  submitter: TransactionSubmitter;
  ownerAddress: string;
}

export interface StakingCliDeps {
  connect(args: StakingCliArgs): Promise<StakingRuntime>;
  prompt: OperatorPrompt;
  now?: () => number;
}

export interface CliResult {
  exitCode: ExitCode;
  message: string;
  outcome?: StakingOutcome;
}

export const RETRY_GUIDANCE =
  'Please confirm whether your service is participating in a staking program, and then retry running the script.';

export async function connectToChain(args: StakingCliArgs): Promise<StakingRuntime> {
  const provider = new JsonRpcProvider(args.rpc);
  const wallet = await loadOwnerWallet({ privateKeyPath: args.ownerPrivateKeyPath, password: args.password }, provider);
  const submitter = new OwnerTransactionSubmitter(wallet, {
    confirmations: getTxConfirmations(),
    receiptTimeoutMs: getTxReceiptTimeoutMs(),
  });

  return {
    reader: new EthersStakingReader(provider),
    submitter,
    ownerAddress: wallet.address,
  };
}

export function createDefaultDeps(): StakingCliDeps {
  return {
    connect: connectToChain,
    prompt: new TerminalPrompt(),
  };
}

/**
 * Top-level handler for faults that are not staking outcomes.
 */
export async function handleUnexpectedFailure(error: unknown, runnerEnvPath: string): Promise<CliResult> {
  const reason = error instanceof Error ? error.message : String(error);
  cliLogger.error({ error: serializeError(error) }, `An error occurred while executing stake-service: ${reason}`);

  try {
    const cleared = await unsetEnvKey(runnerEnvPath, USE_STAKING_KEY);
    if (cleared) {
      cliLogger.warn({ envPath: runnerEnvPath }, `Cleared ${USE_STAKING_KEY} from the runner env file`);
    }
  } catch (clearError) {
    cliLogger.error({ envPath: runnerEnvPath, error: serializeError(clearError) }, `Failed to clear ${USE_STAKING_KEY}`);
  }

  return { exitCode: 1, message: RETRY_GUIDANCE };
}

export async function runStakingCli(argv: string[], deps: StakingCliDeps = createDefaultDeps()): Promise<CliResult> {
  let command: ParsedCommand;
  let programName: string;
  let runnerEnvPath: string;
  try {
    command = parseStakingArgs(argv);
    programName = getStakingProgramName();
    runnerEnvPath = getRunnerEnvPath();
  } catch (error) {
    if (error instanceof StakingConfigError) {
      return { exitCode: 2, message: error.message };
    }
    throw error;
  }

  if (command.command === 'help') {
    console.log(USAGE);
    return { exitCode: 0, message: 'Help displayed' };
  }

  const { args } = command;
  cliLogger.info(`Starting stake-service (${programName})...`);

  try {
    const runtime = await deps.connect(args);
    cliLogger.info({ serviceId: args.serviceId, owner: runtime.ownerAddress, stakingContract: args.stakingContractAddress },
      args.unstake ? 'Unstake requested' : 'Checking staking state');

    const outcome = await runStakingWorkflow(
      {
        serviceId: args.serviceId,
        serviceRegistryAddress: args.serviceRegistryAddress,
        stakingContractAddress: args.stakingContractAddress,
        programName,
        unstakeRequested: args.unstake,
      },
      {
        reader: runtime.reader,
        submitter: runtime.submitter,
        prompt: deps.prompt,
        now: deps.now,
      },
    );

    return { exitCode: outcome.exitCode, message: outcome.message, outcome };
  } catch (error) {
    return handleUnexpectedFailure(error, runnerEnvPath);
  } finally {
    deps.prompt.close();
  }
}
