import { readFile } from 'node:fs/promises';
import {
  PipelineConfigSchema,
  type EnvConfig,
  type PipelineConfig,
} from '@pricepipe/schemas';
import { PipelineError, createLogger, errorMessage, validateEnv } from '@pricepipe/utils';

const logger = createLogger({ name: 'pipeline:config', service: 'pipeline' });

export interface LoadConfigOptions {
  /** Config document path; defaults to PIPELINE_CONFIG_PATH */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  config: PipelineConfig;
  env: EnvConfig;
  /** Path the document was read from */
  path: string;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Parse and validate a config document. OLLAMA_HOST, when set, replaces
 * `llm.host`.
 *
 * @throws PipelineError('ConfigInvalid')
 */
export function parsePipelineConfig(text: string, env: EnvConfig, source = 'config'): PipelineConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new PipelineError('ConfigInvalid', `${source} is not valid JSON: ${errorMessage(error)}`, {
      path: source,
    });
  }

  const result = PipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    logger.error({ path: source, issues }, 'Invalid pipeline config');
    throw new PipelineError('ConfigInvalid', `Invalid pipeline config in ${source}: ${issues.join('; ')}`, {
      path: source,
      issues,
    });
  }

  const config = result.data;
  if (env.OLLAMA_HOST) {
    return { ...config, llm: { ...config.llm, host: env.OLLAMA_HOST } };
  }
  return config;
}

/**
 * Read the pipeline config once at startup
 *
 * @throws PipelineError('ConfigInvalid') for a missing, unreadable or invalid document
 */
export async function loadPipelineConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = validateEnv(options.env);
  const path = options.path ?? env.PIPELINE_CONFIG_PATH;

  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const reason = isMissingFile(error) ? 'not found' : errorMessage(error);
    logger.error({ path, reason }, 'Cannot read pipeline config');
    throw new PipelineError('ConfigInvalid', `Config file ${path}: ${reason}`, { path });
  }

  const config = parsePipelineConfig(text, env, path);
  logger.info(
    { path, dataPath: config.data.rawDataPath, model: config.llm.model },
    'Pipeline config loaded'
  );
  return { config, env, path };
}
