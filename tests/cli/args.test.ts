import { describe, expect, it } from 'vitest';
import { parseStakingArgs } from '../../src/cli/args.js';
import { StakingConfigError } from '../../src/staking/errors.js';
import { SERVICE_REGISTRY, TARGET_STAKING } from '../helpers/fakes.js';

const BASE = ['42', SERVICE_REGISTRY, TARGET_STAKING, '/keys/owner.txt', 'http://localhost:8545'];

function runArgs(argv: string[]) {
  const parsed = parseStakingArgs(argv);
  if (parsed.command !== 'run') {
    throw new Error(`expected a run command, got ${parsed.command}`);
  }
  return parsed.args;
}

describe('parseStakingArgs', () => {
  it('parses the five required positionals and defaults unstake to false', () => {
    expect(runArgs(BASE)).toEqual({
      serviceId: 42,
      serviceRegistryAddress: SERVICE_REGISTRY,
      stakingContractAddress: TARGET_STAKING,
      ownerPrivateKeyPath: '/keys/owner.txt',
      rpc: 'http://localhost:8545',
      unstake: false,
      password: undefined,
    });
  });

  it.each([
    ['true', true],
    ['True', true],
    ['1', true],
    ['yes', true],
    ['false', false],
    ['0', false],
    ['n', false],
  ])('reads the unstake flag %s as %s', (flag, expected) => {
    expect(runArgs([...BASE, flag]).unstake).toBe(expected);
  });

  it('rejects an unstake flag that is not a boolean', () => {
    expect(() => parseStakingArgs([...BASE, 'maybe'])).toThrow('unstake: expected true or false, got "maybe"');
  });

  it('takes the keystore password from --password or -p', () => {
    expect(runArgs([...BASE, '--password', 'test-secret']).password).toBe('test-secret');
    expect(runArgs(['-p', 'test-secret', ...BASE]).password).toBe('test-secret');
  });

  it('returns help for --help', () => {
    expect(parseStakingArgs(['--help'])).toEqual({ command: 'help' });
    expect(parseStakingArgs(['-h', ...BASE])).toEqual({ command: 'help' });
  });

  it('rejects a wrong positional count', () => {
    expect(() => parseStakingArgs(BASE.slice(0, 4))).toThrow('Expected 5 or 6 positional arguments, got 4.');
    expect(() => parseStakingArgs([...BASE, 'true', 'extra'])).toThrow(StakingConfigError);
  });

  it('rejects unknown options', () => {
    expect(() => parseStakingArgs([...BASE, '--force'])).toThrow(StakingConfigError);
  });

  it.each(['1e3', '0x10', '-5', '4.0', '0'])('rejects the service id %j', id => {
    expect(() => parseStakingArgs([id, ...BASE.slice(1)])).toThrow(StakingConfigError);
  });

  it('validates ids, addresses and the rpc url', () => {
    expect(() => parseStakingArgs(['abc', ...BASE.slice(1)])).toThrow('serviceId');
    expect(() => parseStakingArgs(['42', '0x1234', ...BASE.slice(2)])).toThrow(
      'serviceRegistryAddress: must be a 0x-prefixed 20-byte address',
    );
    expect(() => parseStakingArgs([...BASE.slice(0, 4), 'ws://localhost:8546'])).toThrow('rpc: must be an http(s) URL');
  });
});
