/**
 * Cronark Core Module
 *
 * Job registry, persisted worker state and the scheduler loop.
 *
 * @packageDocumentation
 */

export { Cronark, type CronarkConfig } from './scheduler.js';
export { JobRegistry, JobCatalog, jobTypeOf } from './registry.js';
export { WorkerState } from './worker-state.js';
