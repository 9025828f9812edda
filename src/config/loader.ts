/**
 * Cronark Configuration Loader
 *
 * Functions for loading configuration files and turning them into a
 * ready-to-start Cronark instance.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { pathToFileURL } from 'node:url'
import * as yaml from 'yaml'
import { CronarkConfigSchema, type CronarkConfigOutput } from './schema.js'
import { Cronark } from '../core/scheduler.js'
import { SQLiteStore } from '../storage/sqlite.js'
import { getDefaultPaths } from '../constants.js'
import type { CronarkHooks, JobConstructor, JobType, WorkerName } from '../types.js'

// =============================================================================
// Error Classes
// =============================================================================

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export class EnvVarError extends ConfigError {
  constructor(varName: string) {
    super(`Environment variable '${varName}' is not defined and has no default value`)
    this.name = 'EnvVarError'
  }
}

// =============================================================================
// Environment Variable Expansion
// =============================================================================

/**
 * Expand environment variables in a string.
 *
 * Supports:
 * - ${VAR} - throws if VAR is not defined
 * - ${VAR:-default} - uses default if VAR is not defined
 *
 * @throws EnvVarError if required env var is not defined
 */
export function expandEnvVars(input: string): string {
  const envVarPattern = /\$\{([^}:]+)(?::-([^}]*))?\}/g

  return input.replace(envVarPattern, (_match, varName: string, defaultValue?: string) => {
    const value = process.env[varName]

    if (value !== undefined) {
      return value
    }

    if (defaultValue !== undefined) {
      return defaultValue
    }

    throw new EnvVarError(varName)
  })
}

/**
 * Replace a leading `~` with the home directory.
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return os.homedir()
  }
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2))
  }
  return filePath
}

// =============================================================================
// Config Loading Functions
// =============================================================================

/**
 * Load and validate config from a YAML string.
 *
 * @throws ConfigError on invalid YAML
 * @throws ZodError on validation failure
 */
export function loadConfigFromString(yamlStr: string): CronarkConfigOutput {
  try {
    const parsed = yaml.parse(yamlStr)
    return CronarkConfigSchema.parse(parsed)
  } catch (error) {
    if (error instanceof yaml.YAMLParseError) {
      throw new ConfigError(`Invalid YAML: ${error.message}`)
    }
    throw error
  }
}

/**
 * Load and validate config from a file path.
 *
 * Environment variables in the config will be expanded.
 *
 * @throws ConfigError if file doesn't exist or is invalid
 * @throws EnvVarError if required env vars are not defined
 */
export function loadConfigFromFile(filePath: string): CronarkConfigOutput {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Configuration file not found: ${filePath}`)
  }

  const content = fs.readFileSync(filePath, 'utf-8')
  const expandedContent = expandEnvVars(content)

  return loadConfigFromString(expandedContent)
}

// =============================================================================
// Job Resolution
// =============================================================================

/**
 * A job entry with its class loaded
 */
export interface ResolvedJob {
  worker: WorkerName
  jobType: JobType
  jobClass: JobConstructor
}

/**
 * Loads a module by file URL
 */
export type ModuleImporter = (url: string) => Promise<Record<string, unknown>>

const importModule: ModuleImporter = (url) => import(url)

function isJobConstructor(value: unknown): value is JobConstructor {
  return typeof value === 'function'
}

/**
 * Import every job module named in the config, in worker and list order.
 *
 * @param config - Validated configuration
 * @param baseDir - Directory relative module paths are resolved against
 * @param importer - Module loader (dynamic import by default)
 * @throws ConfigError when a module cannot be loaded, an export is not a class
 *   or one job name is bound to two classes
 */
export async function resolveJobs(
  config: CronarkConfigOutput,
  baseDir: string,
  importer: ModuleImporter = importModule
): Promise<ResolvedJob[]> {
  const modules = new Map<string, Record<string, unknown>>()
  const bindings = new Map<JobType, { jobClass: JobConstructor; source: string }>()
  const resolved: ResolvedJob[] = []

  for (const [worker, entries] of Object.entries(config.workers)) {
    for (const entry of entries) {
      const url = pathToFileURL(path.resolve(baseDir, expandHome(entry.module))).href

      let namespace = modules.get(url)
      if (!namespace) {
        try {
          namespace = await importer(url)
        } catch (error) {
          throw new ConfigError(
            `Cannot load module '${entry.module}' for job '${entry.job}': ${error instanceof Error ? error.message : String(error)}`
          )
        }
        modules.set(url, namespace)
      }

      const jobClass = namespace[entry.export]
      if (!isJobConstructor(jobClass)) {
        throw new ConfigError(`Export '${entry.export}' of '${entry.module}' is not a job class (job '${entry.job}')`)
      }

      const source = `${entry.module}#${entry.export}`
      const bound = bindings.get(entry.job)
      if (bound && bound.jobClass !== jobClass) {
        throw new ConfigError(`Job '${entry.job}' is bound to both '${bound.source}' and '${source}'`)
      }
      bindings.set(entry.job, bound ?? { jobClass, source })

      resolved.push({ worker, jobType: entry.job, jobClass })
    }
  }

  return resolved
}

// =============================================================================
// Config to Cronark
// =============================================================================

export interface CreateCronarkOptions {
  /** Overrides the configured database path */
  dbPath?: string
  /** Overrides the configured diagnostics switch */
  diagnostics?: boolean
  hooks?: CronarkHooks
  importer?: ModuleImporter
}

export interface ConfiguredCronark {
  cronark: Cronark
  store: SQLiteStore
  config: CronarkConfigOutput
}

/**
 * Build a Cronark instance with every configured worker and job registered.
 *
 * The caller owns the returned store and closes it when done.
 */
export async function createCronarkFromFile(
  filePath: string,
  options: CreateCronarkOptions = {}
): Promise<ConfiguredCronark> {
  const config = loadConfigFromFile(filePath)
  const jobs = await resolveJobs(config, path.dirname(path.resolve(filePath)), options.importer)

  const dbPath = options.dbPath ?? expandHome(config.cronark.database ?? getDefaultPaths().dbPath)
  const store = new SQLiteStore(dbPath)

  const cronark = new Cronark({
    store,
    delay: config.cronark.delay,
    diagnostics: options.diagnostics ?? config.cronark.diagnostics,
    hooks: options.hooks,
  })

  for (const worker of Object.keys(config.workers)) {
    cronark.registerWorker(worker)
  }

  for (const { worker, jobType, jobClass } of jobs) {
    cronark.define(jobType, jobClass)
    cronark.addJob(jobType, worker)
  }

  return { cronark, store, config }
}
