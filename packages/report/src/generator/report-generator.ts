import type { ReportExcerpt } from '../excerpt/excerpt-formatter';

/**
 * Report-generation collaborator. Receives the rendered excerpt (its
 * Markdown text plus the columns and selection it was built with) and the
 * lookback period.
 *
 * Implementations never throw: a failure is returned as a string starting
 * with REPORT_ERROR_PREFIX.
 */
export interface ReportGenerator {
  generate(excerpt: ReportExcerpt, period: number): Promise<string>;
}

export const REPORT_ERROR_PREFIX = 'ERROR:';

export function isReportError(report: string): boolean {
  return report.startsWith(REPORT_ERROR_PREFIX);
}

export function reportError(message: string): string {
  return `${REPORT_ERROR_PREFIX} ${message}`;
}
