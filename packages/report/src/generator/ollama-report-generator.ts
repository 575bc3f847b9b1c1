import { z } from 'zod';
import { createLogger, errorMessage } from '@pricepipe/utils';
import { buildAnalysisPrompt } from '../prompt/analysis-prompt';
import type { ReportExcerpt } from '../excerpt/excerpt-formatter';
import { reportError, type ReportGenerator } from './report-generator';

const logger = createLogger({ name: 'report:ollama', service: 'report' });

/**
 * Subset of the Ollama /api/generate response we rely on
 */
const GenerateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
  done: z.boolean().optional(),
});

export interface OllamaReportGeneratorOptions {
  /** Ollama base URL, e.g. http://localhost:11434 */
  host: string;
  /** Model identifier, e.g. llama3.1:8b */
  model: string;
  /** Upper bound on generated tokens (num_predict) */
  maxTokens: number;
  timeoutMs: number;
  /** Injected for tests; defaults to global fetch */
  fetchFn?: typeof fetch;
}

/**
 * Ollama Report Generator
 *
 * Sends the analysis prompt to a local Ollama server (non-streaming) and
 * returns the generated text.
 */
export class OllamaReportGenerator implements ReportGenerator {
  private readonly endpoint: string;
  private readonly options: OllamaReportGeneratorOptions;
  private readonly fetchFn: typeof fetch;

  constructor(options: OllamaReportGeneratorOptions) {
    this.options = options;
    this.endpoint = `${options.host.replace(/\/+$/, '')}/api/generate`;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async generate(excerpt: ReportExcerpt, period: number): Promise<string> {
    const prompt = buildAnalysisPrompt(excerpt, period);
    logger.info(
      { model: this.options.model, promptChars: prompt.length },
      'Requesting pattern report'
    );

    try {
      const response = await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.options.model,
          prompt,
          stream: false,
          options: { num_predict: this.options.maxTokens },
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!response.ok) {
        const text = await response.text();
        logger.error({ status: response.status, error: text }, 'Ollama request failed');
        return reportError(`Report model request failed with status ${response.status}`);
      }

      const parsed = GenerateResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        logger.error({ issues: parsed.error.issues.length }, 'Unexpected Ollama response');
        return reportError('Report model returned an unexpected response');
      }

      const report = parsed.data.response.trim();
      if (report === '') {
        return reportError('Report model returned an empty report');
      }

      logger.info({ chars: report.length }, 'Report generated');
      return report;
    } catch (error) {
      logger.error({ err: errorMessage(error) }, 'Error during report generation');
      return reportError(`Failed to generate report due to an unexpected error: ${errorMessage(error)}`);
    }
  }
}
