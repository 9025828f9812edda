/**
 * Cronark Configuration Schema
 *
 * Zod schemas for validating Cronark configuration files.
 *
 * @packageDocumentation
 */

import { z } from 'zod'
import { DEFAULT_DELAY_MS } from '../constants.js'

// =============================================================================
// Job Entry Schema
// =============================================================================

export const JobEntrySchema = z.object({
  /** Job type identifier */
  job: z.string().min(1),
  /** Module path, relative to the config file */
  module: z.string().min(1),
  /** Export holding the job class */
  export: z.string().min(1).default('default'),
})

// =============================================================================
// Root Config Schema
// =============================================================================

export const CronarkConfigSchema = z.object({
  cronark: z
    .object({
      database: z.string().min(1).optional(),
      delay: z.number().min(0).default(DEFAULT_DELAY_MS),
      diagnostics: z.boolean().optional(),
    })
    .default({}),
  workers: z.record(
    z.string().min(1),
    z
      .array(JobEntrySchema)
      .nullable()
      .transform((jobs) => jobs ?? [])
  ),
})

// =============================================================================
// Type Exports
// =============================================================================

export type JobEntryInput = z.input<typeof JobEntrySchema>
export type JobEntryOutput = z.output<typeof JobEntrySchema>

export type CronarkConfigInput = z.input<typeof CronarkConfigSchema>
export type CronarkConfigOutput = z.output<typeof CronarkConfigSchema>
