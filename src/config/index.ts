/**
 * Canonical configuration module for the staking runner.
 *
 * All environment variable access goes through the typed getters exported here.
 * Values are validated with Zod on first use; invalid configuration throws a
 * `StakingConfigError` before any chain interaction happens.
 *
 * Note: `.env` loading is done by `env/index.ts`, which the CLI imports first.
 */

import { z } from 'zod';
import { StakingConfigError } from '../staking/errors.js';

// ============================================================================
// Configuration Schema
// ============================================================================

/**
 * Transaction confirmation settings
 */
const transactionSchema = z.object({
  // TX_CONFIRMATIONS: Blocks to wait on top of the inclusion block
  TX_CONFIRMATIONS: z.coerce.number().int().positive('TX_CONFIRMATIONS must be a positive integer').default(1),

  // TX_RECEIPT_TIMEOUT_MS: Give up waiting for a receipt after this long (fatal)
  TX_RECEIPT_TIMEOUT_MS: z.coerce.number().int().positive('TX_RECEIPT_TIMEOUT_MS must be a positive integer').default(300_000),
});

/**
 * Runner integration settings
 */
const runnerSchema = z.object({
  // RUNNER_ENV_PATH: env file whose USE_STAKING key is cleared after an unexpected failure
  RUNNER_ENV_PATH: z.string().min(1).default('../.trader_runner/.env'),

  // STAKING_PROGRAM_NAME: Human label of the target staking program
  STAKING_PROGRAM_NAME: z.string().min(1).default('Coastal'),
});

const configSchema = z.object({
  ...transactionSchema.shape,
  ...runnerSchema.shape,
});

export type StakingRunnerConfig = z.infer<typeof configSchema>;

// ============================================================================
// Internal Configuration Loading
// ============================================================================

let _config: StakingRunnerConfig | null = null;

function loadConfig(): StakingRunnerConfig {
  // Empty strings from a half-filled .env mean "unset"
  const env = Object.fromEntries(
    Object.entries(process.env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );

  const result = configSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    throw new StakingConfigError(`Configuration validation failed:\n${issues}\n\nSee .env.example for the supported variables.`);
  }
  return result.data;
}

/**
 * Get validated configuration (loads and caches on first call).
 * Under Vitest the environment is re-read every time so tests can override it.
 */
function getConfig(): StakingRunnerConfig {
  if (!_config || process.env.VITEST === 'true') {
    _config = loadConfig();
  }
  return _config;
}

/**
 * @internal
 */
export function resetConfigForTests(): void {
  _config = null;
}

// ============================================================================
// Public API
// ============================================================================

export function getTxConfirmations(): number {
  return getConfig().TX_CONFIRMATIONS;
}

export function getTxReceiptTimeoutMs(): number {
  return getConfig().TX_RECEIPT_TIMEOUT_MS;
}

export function getRunnerEnvPath(): string {
  return getConfig().RUNNER_ENV_PATH;
}

export function getStakingProgramName(): string {
  return getConfig().STAKING_PROGRAM_NAME;
}
