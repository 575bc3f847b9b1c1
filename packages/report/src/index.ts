/**
 * @pricepipe/report
 *
 * Excerpt formatting and pattern-report generation
 */

export * from './excerpt/excerpt-formatter';
export * from './prompt/analysis-prompt';
export * from './generator/report-generator';
export * from './generator/ollama-report-generator';
