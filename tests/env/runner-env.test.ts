import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { unsetEnvKey } from '../../src/env/runner-env.js';

describe('unsetEnvKey', () => {
  let dir: string;
  let envPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'runner-env-'));
    envPath = join(dir, '.env');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('removes the staking flag and keeps every other line', async () => {
    writeFileSync(envPath, 'FOO=1\nUSE_STAKING=true\nBAR=2\n');

    expect(await unsetEnvKey(envPath)).toBe(true);
    expect(readFileSync(envPath, 'utf8')).toBe('FOO=1\nBAR=2\n');
  });

  it('removes quoted and exported assignments', async () => {
    writeFileSync(envPath, 'export USE_STAKING="false"\nRPC=http://localhost:8545\n');

    expect(await unsetEnvKey(envPath)).toBe(true);
    expect(readFileSync(envPath, 'utf8')).toBe('RPC=http://localhost:8545\n');
  });

  it('leaves keys that only share a prefix untouched', async () => {
    writeFileSync(envPath, 'USE_STAKING_EXTRA=1\n# USE_STAKING=true\n');

    expect(await unsetEnvKey(envPath)).toBe(false);
    expect(readFileSync(envPath, 'utf8')).toBe('USE_STAKING_EXTRA=1\n# USE_STAKING=true\n');
  });

  it('unsets an arbitrary key', async () => {
    writeFileSync(envPath, 'A=1\nB=2');

    expect(await unsetEnvKey(envPath, 'A')).toBe(true);
    expect(readFileSync(envPath, 'utf8')).toBe('B=2');
  });

  it('returns false for a missing file', async () => {
    expect(await unsetEnvKey(join(dir, 'absent.env'))).toBe(false);
  });
});
