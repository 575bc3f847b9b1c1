/**
 * @pricepipe/schemas
 *
 * Single source of truth for all Zod schemas and TypeScript types
 * shared by the pipeline packages
 */

// Market data schemas
export * from './market/price-record.schema';

// Indicator schemas
export * from './indicators/indicator-spec.schema';

// Pipeline lifecycle schemas
export * from './pipeline/pipeline-state.schema';

// Environment and configuration schemas
export * from './env/config.schema';
