/**
 * Runtime settings resolved from the environment.
 *
 * Every key is optional; a key that is present but malformed fails fast
 * with a ConfigError naming each offending variable.
 */

import { envSchema, type LogLevel } from './schema.js'

export interface RowspaceConfig {
  /** Default tolerance for floating-point singularity and convergence tests */
  tolerance: number
  /** Default iteration cap for power iteration and the QR algorithm */
  maxIterations: number
  logLevel: LogLevel
}

export const DEFAULT_CONFIG: RowspaceConfig = {
  tolerance: 1e-10,
  maxIterations: 1000,
  logLevel: 'warn',
}

export class ConfigError extends Error {
  constructor(public readonly issues: Record<string, string[]>) {
    super(
      `Invalid rowspace configuration: ${Object.entries(issues)
        .map(([key, messages]) => `${key} (${messages.join('; ')})`)
        .join(', ')}`,
    )
    this.name = 'ConfigError'
  }
}

type EnvRecord = Record<string, string | undefined>

function readProcessEnv(): EnvRecord {
  if (typeof process !== 'undefined' && process.env) {
    return process.env
  }
  return {}
}

/** Parse an env record into a config. Throws ConfigError on invalid values. */
export function loadConfig(env: EnvRecord = readProcessEnv()): RowspaceConfig {
  const result = envSchema.safeParse({
    ROWSPACE_TOLERANCE: env.ROWSPACE_TOLERANCE,
    ROWSPACE_MAX_ITERATIONS: env.ROWSPACE_MAX_ITERATIONS,
    ROWSPACE_LOG_LEVEL: env.ROWSPACE_LOG_LEVEL,
  })
  if (!result.success) {
    const fieldErrors = result.error.flatten().fieldErrors
    const issues: Record<string, string[]> = {}
    for (const [key, messages] of Object.entries(fieldErrors)) {
      if (messages && messages.length > 0) issues[key] = messages
    }
    throw new ConfigError(issues)
  }
  return {
    tolerance: result.data.ROWSPACE_TOLERANCE,
    maxIterations: result.data.ROWSPACE_MAX_ITERATIONS,
    logLevel: result.data.ROWSPACE_LOG_LEVEL,
  }
}

let cached: RowspaceConfig | undefined

/** Resolved config for the current process (env overrides > defaults). */
export function getConfig(): RowspaceConfig {
  if (cached === undefined) {
    cached = loadConfig()
  }
  return cached
}

/** Drop the memoized config so the next getConfig() re-reads the environment. */
export function resetConfig(): void {
  cached = undefined
}
