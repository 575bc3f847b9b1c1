import { EnvConfigSchema, type EnvConfig } from '@pricepipe/schemas';
import { PipelineError, errorMessage } from '../errors/pipeline-error';
import { logger } from '../logger/logger';

/**
 * Validate environment variables on startup.
 *
 * @param env - Environment to validate (defaults to process.env)
 * @returns Validated environment configuration
 * @throws PipelineError('ConfigInvalid') if validation fails
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvConfigSchema.safeParse(env);
  if (!result.success) {
    logger.error({ err: errorMessage(result.error) }, 'Invalid environment variables');
    throw new PipelineError('ConfigInvalid', 'Invalid environment variables', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  logger.debug({ nodeEnv: result.data.NODE_ENV }, 'Environment variables validated');
  return result.data;
}
