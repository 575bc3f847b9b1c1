import type { ReportExcerpt } from '../excerpt/excerpt-formatter';

/**
 * Prompt for the pattern report. `{indicator_list}`, `{period}`,
 * `{period_unit}` and `{data_subset}` are substituted by `buildAnalysisPrompt`.
 */
export const ANALYSIS_PROMPT_TEMPLATE = `Role: You are a Technical Analysis Assistant specialized in stock chart patterns.
Task: Analyze the provided recent stock data table below (last {period} {period_unit}), which includes
the closing price and these indicators: {indicator_list}.
Generate a concise analysis report focusing ONLY on the following technical signals, based SOLELY on the provided data:
1. SMA Crossover: Identify the most recent crossover between the shorter and the longer simple moving average, if any. State whether it was bullish (short crossed above long) or bearish (short crossed below long) and the approximate date. If there is no recent crossover, say so.
2. RSI Level: Describe the current RSI level from the last row. Is it overbought (>70), oversold (<30), or neutral? Mention if it recently crossed these thresholds.
3. Price vs. SMAs: From the last row, state whether the closing price is above or below each moving average.
4. Overall Summary: A very brief (1-2 sentence) technical summary based only on the signals above. Do not give financial advice or predict future prices.

Cells marked n/a have no value (not enough history).
Strictly adhere to analyzing only the provided data table and the requested signals.

Recent Data Table (Markdown Format):
{data_subset}

Concise Analysis Report:`;

/** Columns of the excerpt other than the close price */
export function excerptIndicatorColumns(excerpt: Pick<ReportExcerpt, 'columns'>): string[] {
  return excerpt.columns.filter((name) => name !== 'close');
}

export function buildAnalysisPrompt(
  excerpt: Pick<ReportExcerpt, 'text' | 'columns' | 'selection'>,
  period: number
): string {
  const indicators = excerptIndicatorColumns(excerpt);
  const indicatorList = indicators.length > 0 ? indicators.join(', ') : 'none';
  const periodUnit = excerpt.selection === 'calendar' ? 'days' : 'rows';
  return ANALYSIS_PROMPT_TEMPLATE.replace('{indicator_list}', () => indicatorList)
    .replace('{period}', () => String(period))
    .replace('{period_unit}', () => periodUnit)
    .replace('{data_subset}', () => excerpt.text);
}
