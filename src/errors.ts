/**
 * Cronark Errors
 *
 * @packageDocumentation
 */

import type { WorkerName } from './types.js'

/**
 * Base class for errors raised by Cronark itself
 */
export class CronarkError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'CronarkError'
  }
}

/**
 * A write to the state store did not go through
 */
export class StateStoreError extends CronarkError {
  constructor(
    message: string,
    public readonly worker: WorkerName,
    public readonly key: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'StateStoreError'
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value
  }
  return new CronarkError(typeof value === 'string' ? value : `Non-error thrown: ${String(value)}`, value)
}
