import { z } from 'zod'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export const logLevelSchema = z.enum(LOG_LEVELS)

export type LogLevel = z.infer<typeof logLevelSchema>

/** Blank strings count as unset so that `FOO=` falls back to the default. */
const unsetIfBlank = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

export const envSchema = z.object({
  ROWSPACE_TOLERANCE: z.preprocess(
    unsetIfBlank,
    z.coerce.number().positive('Tolerance must be a positive number').default(1e-10),
  ),
  ROWSPACE_MAX_ITERATIONS: z.preprocess(
    unsetIfBlank,
    z.coerce.number().int().positive('Iteration cap must be a positive integer').default(1000),
  ),
  ROWSPACE_LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? unsetIfBlank(value.toLowerCase()) : value),
    logLevelSchema.default('warn'),
  ),
})

/** Per-call options for iterative solvers. */
export const iterationOptionsSchema = z.object({
  maxIterations: z.number().int().positive('maxIterations must be a positive integer').optional(),
})
