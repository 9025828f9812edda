/**
 * Cronark - cron-driven background job runner
 *
 * Keeps one long-running process per worker and cycles through its jobs.
 *
 * @packageDocumentation
 */

// =============================================================================
// Core Exports
// =============================================================================

export { Cronark, JobRegistry, JobCatalog, WorkerState, jobTypeOf } from './core/index.js'
export type { CronarkConfig } from './core/index.js'

// =============================================================================
// Collaborator Exports
// =============================================================================

export { SQLiteStore } from './storage/sqlite.js'
export { MemoryStore } from './storage/memory.js'
export { NodeProcessMonitor } from './process/monitor.js'

// =============================================================================
// Error Exports
// =============================================================================

export { CronarkError, StateStoreError } from './errors.js'

// =============================================================================
// Config Exports
// =============================================================================

export {
  loadConfigFromFile,
  loadConfigFromString,
  resolveJobs,
  createCronarkFromFile,
  ConfigError,
  EnvVarError,
  CronarkConfigSchema,
} from './config/index.js'
export type { CronarkConfigInput, CronarkConfigOutput, ResolvedJob, ConfiguredCronark } from './config/index.js'

// =============================================================================
// Constants
// =============================================================================

export { DEFAULT_WORKER, DEFAULT_DELAY_MS, getDefaultPaths } from './constants.js'

// =============================================================================
// Type-only Exports
// =============================================================================

export type {
  WorkerName,
  JobType,
  Pid,
  Job,
  JobConstructor,
  StoredValue,
  StateKey,
  StateStore,
  ProcessMonitor,
  CronarkHooks,
} from './types.js'
