import { defaultIndicatorSpecs } from '@pricepipe/indicators';
import { OllamaReportGenerator } from '@pricepipe/report';
import { applyLogLevel, createLogger, errorMessage, isPipelineError } from '@pricepipe/utils';
import { loadPipelineConfig, type LoadedConfig } from './config/load-config';
import { parsePipelineCliOptions } from './cli-args';
import { CsvPriceSource } from './services/csv-price-source.service';
import { PipelineOrchestrator, type PipelineResult } from './services/pipeline-orchestrator.service';

const logger = createLogger({ name: 'pipeline:app', service: 'pipeline' });

export interface RunPipelineDeps {
  env?: NodeJS.ProcessEnv;
  /** Report model transport; defaults to global fetch */
  fetchFn?: typeof fetch;
  /** stdout line writer */
  write?: (line: string) => void;
}

/**
 * Run one pipeline invocation from CLI arguments and print its outcome.
 *
 * @returns process exit code (0 on success, 1 on failure)
 */
export async function runPipeline(argv: readonly string[], deps: RunPipelineDeps = {}): Promise<number> {
  const write = deps.write ?? ((line: string) => console.log(line));
  const cli = parsePipelineCliOptions(argv);

  let loaded: LoadedConfig;
  try {
    loaded = await loadPipelineConfig({ path: cli.configPath, env: deps.env });
  } catch (error) {
    if (!isPipelineError(error)) {
      throw error;
    }
    write(`Pipeline failed at stage 'config' (${error.code}): ${error.message}`);
    return 1;
  }
  const { config } = loaded;
  applyLogLevel(config.system.logLevel);

  const { smaPeriods, rsiPeriod, minRows } = config.indicators;
  const specs = defaultIndicatorSpecs(smaPeriods, rsiPeriod, minRows);

  const orchestrator = new PipelineOrchestrator({
    source: new CsvPriceSource(cli.dataPath ?? config.data.rawDataPath),
    specs,
    excerpt: {
      window: config.report.lookbackDays,
      selection: config.report.selection,
      columns: ['close', ...specs.map((spec) => spec.name)],
    },
    reportGenerator: cli.report
      ? new OllamaReportGenerator({
          host: config.llm.host,
          model: config.llm.model,
          maxTokens: config.llm.maxTokens,
          timeoutMs: config.llm.timeoutSeconds * 1000,
          fetchFn: deps.fetchFn,
        })
      : undefined,
  });

  const result = await orchestrator.run();
  printResult(result, write);
  return result.status === 'success' ? 0 : 1;
}

export function printResult(result: PipelineResult, write: (line: string) => void): void {
  if (result.status === 'failed') {
    write(`Pipeline failed at stage '${result.stage}' (${result.code}): ${result.cause}`);
    return;
  }

  write(`Recent data (${result.excerpt.rows} rows, ${result.excerpt.selection}):`);
  write(result.excerpt.text);
  if (result.insufficient.length > 0) {
    write(`Not enough history for: ${result.insufficient.join(', ')}`);
  }
  if (result.report !== null) {
    write('');
    write('Pattern report:');
    write(result.report);
  }
}

export function reportFatal(error: unknown): void {
  logger.fatal({ err: errorMessage(error) }, 'Pipeline crashed');
}
