import type {
  IndicatorSpec,
  PipelineErrorCode,
  PipelineStage,
  PipelineState,
  TransitionRecord,
} from '@pricepipe/schemas';
import { computeIndicators, type TimeSeriesTable } from '@pricepipe/indicators';
import {
  formatExcerpt,
  isReportError,
  type ExcerptOptions,
  type ReportExcerpt,
  type ReportGenerator,
} from '@pricepipe/report';
import { createLogger, errorMessage, isPipelineError } from '@pricepipe/utils';
import type { PriceDataSource } from './csv-price-source.service';
import { PipelineStateMachine } from './pipeline-state-machine.service';

const logger = createLogger({ name: 'pipeline:orchestrator', service: 'pipeline' });

export interface PipelineSuccess {
  status: 'success';
  /** Indicator-augmented copy of the ingested table, as a read-only view */
  table: TimeSeriesTable;
  excerpt: Readonly<ReportExcerpt>;
  /** Generated report, or null when no report generator is configured */
  report: string | null;
  /** Columns degraded to the missing marker for lack of history */
  insufficient: readonly string[];
  transitions: readonly Readonly<TransitionRecord>[];
}

export interface PipelineFailure {
  status: 'failed';
  stage: PipelineStage;
  code: PipelineErrorCode;
  /** Human-readable cause */
  cause: string;
  transitions: readonly Readonly<TransitionRecord>[];
}

export type PipelineResult = Readonly<PipelineSuccess> | Readonly<PipelineFailure>;

export interface PipelineOrchestratorOptions {
  source: PriceDataSource;
  specs: readonly IndicatorSpec[];
  excerpt: ExcerptOptions;
  /** Report stage is skipped when absent */
  reportGenerator?: ReportGenerator;
  now?: () => Date;
}

/**
 * Raised inside a run to leave the current stage; carries the code the
 * failure is reported under
 */
class StageFailure extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string) {
    super(message);
    this.name = 'StageFailure';
    this.code = code;
  }
}

function frozenHistory(machine: PipelineStateMachine): readonly Readonly<TransitionRecord>[] {
  return Object.freeze(machine.getTransitionHistory().map((record) => Object.freeze(record)));
}

const STAGE_BY_STATE: Partial<Record<PipelineState, PipelineStage>> = {
  ingesting: 'ingestion',
  computing_indicators: 'indicators',
  formatting_report: 'formatting',
  generating_report: 'report',
};

/**
 * PipelineOrchestrator
 *
 * Runs ingestion, indicator computation, excerpt formatting and (optionally)
 * report generation strictly in sequence. The first failing stage ends the
 * run; nothing it produced is exposed.
 */
export class PipelineOrchestrator {
  private readonly options: PipelineOrchestratorOptions;

  constructor(options: PipelineOrchestratorOptions) {
    this.options = options;
  }

  async run(): Promise<PipelineResult> {
    const machine = new PipelineStateMachine(this.options.now);

    try {
      machine.transition('ingesting');
      const table = await this.ingest();

      machine.transition('computing_indicators');
      const { insufficient } = computeIndicators(table, this.options.specs);

      machine.transition('formatting_report');
      const excerpt = formatExcerpt(table, this.options.excerpt);

      let report: string | null = null;
      if (this.options.reportGenerator) {
        machine.transition('generating_report');
        report = await this.generateReport(this.options.reportGenerator, excerpt);
      }

      machine.transition('done');
      logger.info(
        { rows: table.length(), excerptRows: excerpt.rows, insufficient, report: report !== null },
        'Pipeline finished'
      );

      const result: PipelineSuccess = {
        status: 'success',
        table: table.tail(table.length()),
        excerpt: Object.freeze({ ...excerpt, columns: Object.freeze([...excerpt.columns]) }),
        report,
        insufficient: Object.freeze([...insufficient]),
        transitions: frozenHistory(machine),
      };
      return Object.freeze(result);
    } catch (error) {
      return this.fail(machine, error);
    }
  }

  private async ingest(): Promise<TimeSeriesTable> {
    const loaded = await this.options.source.load();
    if (!loaded) {
      throw new StageFailure('InputAbsent', 'Ingestion produced no table');
    }
    if (loaded.length() === 0) {
      throw new StageFailure('InputAbsent', 'Ingestion produced an empty table');
    }
    // Downstream stages append columns; the ingested table stays untouched
    return loaded.clone();
  }

  private async generateReport(generator: ReportGenerator, excerpt: ReportExcerpt): Promise<string> {
    const report = await generator.generate(excerpt, this.options.excerpt.window);
    if (isReportError(report)) {
      throw new StageFailure('ReportFailed', report);
    }
    return report;
  }

  private fail(machine: PipelineStateMachine, error: unknown): PipelineResult {
    const state = machine.getCurrentState();
    const stage = STAGE_BY_STATE[state];
    if (!stage) {
      // Thrown before the first stage started
      throw error;
    }

    const code = error instanceof StageFailure || isPipelineError(error) ? error.code : 'Unexpected';
    const cause = errorMessage(error);
    machine.transition('failed');
    logger.error({ stage, code, cause }, 'Pipeline failed');

    const result: PipelineFailure = {
      status: 'failed',
      stage,
      code,
      cause,
      transitions: frozenHistory(machine),
    };
    return Object.freeze(result);
  }
}
