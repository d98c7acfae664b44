import * as dotenv from 'dotenv';
import * as os from 'os';
import * as path from 'path';

if (process.env.NODE_ENV !== 'production') {
  dotenv.config({ path: path.resolve(process.cwd(), '.env.development') });
}

// Override via GITSIFT_CONFIG_DIR to keep several setups side by side.
export const CONFIG_DIR =
  process.env.GITSIFT_CONFIG_DIR ?? path.join(os.homedir(), '.gitsift');

export const GIT_BINARY = process.env.GITSIFT_GIT_BINARY ?? 'git';

export const DEBUG = process.env.GITSIFT_DEBUG === '1' || process.env.GITSIFT_DEBUG === 'true';
