import { parseArgs } from 'util';
import { isAddress } from 'ethers';
import { z } from 'zod';
import { StakingConfigError } from '../staking/errors.js';

export const USAGE = `
Stake or unstake an Olas service based on its on-chain state.

Usage:
  stake-service <service_id> <service_registry_address> <staking_contract_address> \\
                <owner_private_key_path> <rpc> [unstake] [--password <password>]

Arguments:
  service_id                 The on-chain service id
  service_registry_address   The service registry contract address
  staking_contract_address   The staking contract address
  owner_private_key_path     File with the service owner's private key or keystore
  rpc                        JSON-RPC endpoint of the chain
  unstake                    true to unstake the service, false to stake it (default: false)

Options:
  --password, -p   Password of an encrypted owner keystore
  --help, -h       Show this help message
`;

/**
 * Accepts true/false, 1/0 and yes/no; anything else is rejected rather than
 * silently read as "true".
 */
const booleanArgSchema = z.string().trim().toLowerCase().transform((value, ctx) => {
  if (['true', '1', 'yes', 'y'].includes(value)) return true;
  if (['false', '0', 'no', 'n'].includes(value)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected true or false, got "${value}"` });
  return z.NEVER;
});

const addressSchema = z.string().refine(value => isAddress(value), { message: 'must be a 0x-prefixed 20-byte address' });

const stakingArgsSchema = z.object({
  serviceId: z.string().regex(/^\d+$/, 'must be a positive decimal integer').pipe(z.coerce.number().int().positive()),
  serviceRegistryAddress: addressSchema,
  stakingContractAddress: addressSchema,
  ownerPrivateKeyPath: z.string().min(1),
  rpc: z.string().url().refine(value => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' }),
  unstake: booleanArgSchema.optional().transform(value => value ?? false),
  password: z.string().optional(),
});

export type StakingCliArgs = z.infer<typeof stakingArgsSchema>;

export type ParsedCommand =
  | { command: 'help' }
  | { command: 'run'; args: StakingCliArgs };

const POSITIONAL_NAMES = [
  'serviceId',
  'serviceRegistryAddress',
  'stakingContractAddress',
  'ownerPrivateKeyPath',
  'rpc',
  'unstake',
] as const;

export function parseStakingArgs(argv: string[]): ParsedCommand {
  let parsed: ReturnType<typeof parseCliTokens>;
  try {
    parsed = parseCliTokens(argv);
  } catch (error) {
    throw new StakingConfigError(error instanceof Error ? error.message : String(error), { cause: error });
  }

  if (parsed.values.help) {
    return { command: 'help' };
  }

  const { positionals } = parsed;
  if (positionals.length < 5 || positionals.length > POSITIONAL_NAMES.length) {
    throw new StakingConfigError(
      `Expected 5 or 6 positional arguments, got ${positionals.length}.\n${USAGE}`,
    );
  }

  const raw: Record<string, string | undefined> = { password: parsed.values.password };
  POSITIONAL_NAMES.forEach((name, index) => {
    raw[name] = positionals[index];
  });

  const result = stakingArgsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    throw new StakingConfigError(`Invalid arguments:\n${issues}`);
  }

  return { command: 'run', args: result.data };
}

function parseCliTokens(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      password: { type: 'string', short: 'p' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
    strict: true,
  });
}
