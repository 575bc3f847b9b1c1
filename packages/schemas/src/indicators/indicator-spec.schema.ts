import { z } from 'zod';

/**
 * Indicator kinds supported by the engine
 */
export const IndicatorKindSchema = z.enum(['sma', 'rsi']);
export type IndicatorKind = z.infer<typeof IndicatorKindSchema>;

/**
 * Named indicator computation.
 *
 * `window` is the number of trailing observations including the current
 * row. `minRows` is the table length below which the whole column is
 * filled with the missing marker; it defaults per kind (see `resolveMinRows`).
 */
export const IndicatorSpecSchema = z.object({
  /** Column name the result is appended under (e.g. 'SMA_20') */
  name: z.string().min(1),
  kind: IndicatorKindSchema,
  window: z.number().int().positive(),
  minRows: z.number().int().nonnegative().optional(),
});

export type IndicatorSpec = z.infer<typeof IndicatorSpecSchema>;

export const RSI_DEFAULT_WINDOW = 14;

/**
 * Default column name for an indicator: `SMA_5`, `RSI_14`
 */
export function indicatorName(kind: IndicatorKind, window: number): string {
  return `${kind.toUpperCase()}_${window}`;
}

/**
 * Minimum table length for an indicator to be computed at all.
 * SMA needs `window` closes; RSI needs `window` changes, i.e. `window + 1` closes.
 */
export function resolveMinRows(spec: IndicatorSpec): number {
  if (spec.minRows !== undefined) {
    return spec.minRows;
  }
  return spec.kind === 'rsi' ? spec.window + 1 : spec.window;
}

/**
 * Build a spec with its default column name
 */
export function indicatorSpec(
  kind: IndicatorKind,
  window: number,
  minRows?: number
): IndicatorSpec {
  return IndicatorSpecSchema.parse({
    name: indicatorName(kind, window),
    kind,
    window,
    minRows,
  });
}
