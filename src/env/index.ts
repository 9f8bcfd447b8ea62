import * as dotenv from 'dotenv';
import * as path from 'path';
import { existsSync } from 'fs';

// Idempotent load guard
if (process.env.__ENV_LOADED !== '1') {
  const envPath = process.env.STAKING_ENV_PATH
    ? path.resolve(process.env.STAKING_ENV_PATH)
    : path.join(process.cwd(), '.env');

  // Values already exported by the caller win over the file
  if (existsSync(envPath)) {
    const result = dotenv.config({ path: envPath, override: false });
    if (result.error) {
      throw result.error;
    }
  }

  process.env.__ENV_LOADED = '1';
}

export { };
