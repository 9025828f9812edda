/**
 * Cronark Config Module
 *
 * @packageDocumentation
 */

export {
  loadConfigFromFile,
  loadConfigFromString,
  expandEnvVars,
  expandHome,
  resolveJobs,
  createCronarkFromFile,
  ConfigError,
  EnvVarError,
  type ResolvedJob,
  type ModuleImporter,
  type CreateCronarkOptions,
  type ConfiguredCronark,
} from './loader.js'
export {
  CronarkConfigSchema,
  JobEntrySchema,
  type CronarkConfigInput,
  type CronarkConfigOutput,
  type JobEntryInput,
  type JobEntryOutput,
} from './schema.js'
