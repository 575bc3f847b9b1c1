import { z } from 'zod';

/**
 * Log levels accepted in config and LOG_LEVEL* env vars
 */
export const LogLevelSchema = z.enum([
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
]);

/**
 * Log level read case-insensitively, matching how the logger treats
 * LOG_LEVEL* env vars
 */
const LogLevelInputSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.toLowerCase() : value),
  LogLevelSchema
);

/**
 * Environment configuration schema
 * Validated once on startup; every variable is optional.
 */
export const EnvConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),

  /** Location of the pipeline config document */
  PIPELINE_CONFIG_PATH: z.string().min(1).default('config/pipeline.json'),

  /** Overrides llm.host from the config document */
  OLLAMA_HOST: z.string().url('Invalid Ollama host URL').optional(),

  LOG_LEVEL: LogLevelInputSchema.optional(),
});

export type EnvConfig = z.infer<typeof EnvConfigSchema>;

const PeriodSchema = z.number().int().positive();

/**
 * Pipeline configuration document (config/pipeline.json)
 */
export const PipelineConfigSchema = z.object({
  data: z.object({
    /** CSV with Date, Open, High, Low, Close, Adj Close, Volume */
    rawDataPath: z.string().min(1),
  }),

  llm: z
    .object({
      model: z.string().min(1).default('llama3.1:8b'),
      host: z.string().url().default('http://localhost:11434'),
      maxTokens: z.number().int().positive().default(2048),
      timeoutSeconds: z.number().positive().default(30),
    })
    .default({}),

  indicators: z
    .object({
      smaPeriods: z.array(PeriodSchema).min(1).default([5, 20]),
      rsiPeriod: PeriodSchema.default(14),
      /** Per-column minimum-row overrides, keyed by column name (e.g. { "SMA_20": 19 }) */
      minRows: z.record(z.number().int().nonnegative()).default({}),
    })
    .default({}),

  report: z
    .object({
      /** Trailing window handed to the report stage */
      lookbackDays: PeriodSchema.default(30),
      /** 'calendar' selects by date, 'rows' by row count */
      selection: z.enum(['calendar', 'rows']).default('calendar'),
    })
    .default({}),

  system: z
    .object({
      logLevel: LogLevelInputSchema.default('info'),
    })
    .default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type ExcerptSelection = PipelineConfig['report']['selection'];
