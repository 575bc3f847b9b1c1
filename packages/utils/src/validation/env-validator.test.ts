import { describe, it, expect } from 'vitest';
import { PipelineError } from '../errors/pipeline-error';
import { validateEnv } from './env-validator';

describe('validateEnv', () => {
  it('applies defaults to an empty environment', () => {
    expect(validateEnv({})).toEqual({
      NODE_ENV: 'production',
      PIPELINE_CONFIG_PATH: 'config/pipeline.json',
    });
  });

  it('keeps recognised variables', () => {
    const env = validateEnv({
      NODE_ENV: 'development',
      OLLAMA_HOST: 'http://localhost:11500',
      LOG_LEVEL: 'debug',
    });

    expect(env.OLLAMA_HOST).toBe('http://localhost:11500');
    expect(env.LOG_LEVEL).toBe('debug');
  });

  it('accepts log levels in any case', () => {
    expect(validateEnv({ LOG_LEVEL: 'DEBUG' }).LOG_LEVEL).toBe('debug');
    expect(validateEnv({ LOG_LEVEL: 'Warn' }).LOG_LEVEL).toBe('warn');
  });

  it('throws ConfigInvalid listing the bad variables', () => {
    try {
      validateEnv({ OLLAMA_HOST: 'localhost', LOG_LEVEL: 'loud' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PipelineError);
      expect(error instanceof PipelineError && error.code).toBe('ConfigInvalid');
      expect(error instanceof PipelineError && error.details.issues).toHaveLength(2);
    }
  });
});
