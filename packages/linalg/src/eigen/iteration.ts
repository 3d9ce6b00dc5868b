import { getConfig, iterationOptionsSchema } from '@rowspace/config';
import type { IterativeOptions } from '../types.js';
import type { Scalar } from '../scalar/field.js';
import { checkTolerance } from '../scalar/field.js';
import { InvalidArgumentError } from '../errors.js';
import { defaultLogger, type Logger } from '../logger.js';

export interface ResolvedIteration<T> {
  tolerance: T;
  maxIterations: number;
  logger: Logger;
}

/**
 * Fills in tolerance, iteration cap and logger for an iterative solver.
 * Omitted values come from the scalar's epsilon and the process config.
 */
export function resolveIteration<T>(
  S: Scalar<T>,
  options: IterativeOptions<T>,
  scope: string,
): ResolvedIteration<T> {
  const parsed = iterationOptionsSchema.safeParse({ maxIterations: options.maxIterations });
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw new InvalidArgumentError('maxIterations', reason);
  }

  return {
    tolerance: checkTolerance(S, options.tolerance ?? S.epsilon),
    maxIterations: parsed.data.maxIterations ?? getConfig().maxIterations,
    logger: options.logger ?? defaultLogger().child(scope),
  };
}
