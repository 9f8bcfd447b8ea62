/**
 * Runner env file mutation
 *
 * The runner script decides whether to start the service in staking mode from
 * the USE_STAKING key of its .env file. After an unexpected failure we cannot
 * tell whether the service is still staked, so the key is removed and the
 * runner asks again on its next start.
 */

import { promises as fs } from 'fs';
import * as dotenv from 'dotenv';

export const USE_STAKING_KEY = 'USE_STAKING';

function definesKey(line: string, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(dotenv.parse(line), key);
}

/**
 * Remove every assignment of `key` from the env file at `envPath`.
 *
 * @returns true when the file was rewritten, false when the file is missing or
 * never defined the key
 */
export async function unsetEnvKey(envPath: string, key: string = USE_STAKING_KEY): Promise<boolean> {
  let raw: string;
  try {
    raw = await fs.readFile(envPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }

  const lines = raw.split('\n');
  const kept = lines.filter(line => !definesKey(line, key));
  if (kept.length === lines.length) {
    return false;
  }

  await fs.writeFile(envPath, kept.join('\n'), 'utf8');
  return true;
}
