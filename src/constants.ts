/**
 * Cronark Shared Constants
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import * as os from 'node:os';
import type { StateKey } from './types.js';

/** Product name used as the diagnostics prefix */
export const PRODUCT_NAME = 'Cronark';

/** Worker used when none is named */
export const DEFAULT_WORKER = 'main';

/** Default delay between two jobs in milliseconds */
export const DEFAULT_DELAY_MS = 100;

/** Default config directory */
export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.cronark');

/** Default config file name */
export const CONFIG_FILE_NAME = 'cronark.config.yaml';

/** Default database file name */
export const DB_FILE_NAME = 'cronark.db';

/** Persisted state keys */
export const STATE_KEYS = {
  jobsHash: 'jobs_hash',
  currentJobIndex: 'current_job_index',
  pid: 'pid',
} as const satisfies Record<string, StateKey>;

/**
 * Get default paths for config and database
 */
export function getDefaultPaths(): { configPath: string; dbPath: string } {
  return {
    configPath: path.join(DEFAULT_CONFIG_DIR, CONFIG_FILE_NAME),
    dbPath: path.join(DEFAULT_CONFIG_DIR, DB_FILE_NAME),
  };
}
