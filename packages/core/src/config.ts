/**
 * Where the task file lives and what to do when it can't be read.
 * Explicit options win over environment variables, which win over defaults.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { ValidationError } from './errors.js';

export const CorruptDataPolicy = {
  Fail: 'fail',
  StartEmpty: 'start-empty',
} as const;

export type CorruptDataPolicy = (typeof CorruptDataPolicy)[keyof typeof CorruptDataPolicy];

export interface TrackerConfig {
  readonly dataFile: string;
  readonly onCorrupt: CorruptDataPolicy;
}

export interface ConfigOverrides {
  dataFile?: string;
  onCorrupt?: string;
}

export const ENV_DATA_FILE = 'DOLIST_DATA_FILE';
export const ENV_ON_CORRUPT = 'DOLIST_ON_CORRUPT';

const APP_DIR = 'dolist';
const DATA_FILE_NAME = 'tasks.json';

/** Returns the platform-appropriate default task file path */
export function getDefaultDataPath(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string {
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', APP_DIR);
  } else if (platform === 'win32') {
    dir = join(env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), APP_DIR);
  } else {
    dir = join(env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), APP_DIR);
  }

  return join(dir, DATA_FILE_NAME);
}

export function parseCorruptDataPolicy(value: string): CorruptDataPolicy {
  switch (value.trim().toLowerCase()) {
    case 'fail': return CorruptDataPolicy.Fail;
    case 'start-empty': case 'empty': return CorruptDataPolicy.StartEmpty;
    default:
      throw new ValidationError('onCorrupt', `Unknown corrupt-data policy '${value}'. Use: fail, start-empty`);
  }
}

export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): TrackerConfig {
  const dataFile = overrides.dataFile || env[ENV_DATA_FILE] || getDefaultDataPath(process.platform, env);
  const policy = overrides.onCorrupt || env[ENV_ON_CORRUPT];

  return {
    dataFile,
    onCorrupt: policy ? parseCorruptDataPolicy(policy) : CorruptDataPolicy.Fail,
  };
}
