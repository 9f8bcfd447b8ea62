#!/usr/bin/env node
/**
 * Stake or unstake an Olas service based on its on-chain state.
 *
 * Usage:
 *   stake-service 42 <registry> <staking> ./owner.key https://rpc.gnosischain.com false
 *   stake-service 42 <registry> <staking> ./keystore.json https://rpc.gnosischain.com true --password <pw>
 */

import '../env/index.js';
import { exitWithCode } from '../logging/index.js';
import { runStakingCli } from './run.js';

runStakingCli(process.argv.slice(2)).then(
  (result) => exitWithCode(result.exitCode, result.message),
  (error: unknown) => exitWithCode(1, 'stake-service failed unexpectedly', error instanceof Error ? error : new Error(String(error))),
);
