/**
 * @pricepipe/utils
 *
 * Shared utility functions and helpers
 */

// Logger
export * from './logger/logger';
export * from './logger/log-config';

// Errors
export * from './errors/pipeline-error';

// Validation utilities
export * from './validation/env-validator';
