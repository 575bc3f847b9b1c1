import { z } from 'zod';

// ============================================
// Pipeline State: run lifecycle
// ============================================

export const PipelineStateSchema = z.enum([
  'idle',
  'ingesting',
  'computing_indicators',
  'formatting_report',
  'generating_report',
  'done',
  'failed',
]);

export type PipelineState = z.infer<typeof PipelineStateSchema>;

// ============================================
// State Machine: Valid Transitions
// ============================================

/**
 * Allowed transitions for a single pipeline run.
 *
 * idle                 -> ingesting | failed
 * ingesting            -> computing_indicators | failed
 * computing_indicators -> formatting_report | failed
 * formatting_report    -> generating_report | done | failed   (generating_report only with a report generator)
 * generating_report    -> done | failed
 * done, failed         -> (terminal)
 */
export const VALID_TRANSITIONS = {
  idle: ['ingesting', 'failed'],
  ingesting: ['computing_indicators', 'failed'],
  computing_indicators: ['formatting_report', 'failed'],
  formatting_report: ['generating_report', 'done', 'failed'],
  generating_report: ['done', 'failed'],
  done: [],
  failed: [],
} as const satisfies Record<PipelineState, readonly PipelineState[]>;

export function isTerminalState(state: PipelineState): boolean {
  return state === 'done' || state === 'failed';
}

// ============================================
// Stages and error codes
// ============================================

/**
 * Stage reported on failure
 */
export const PipelineStageSchema = z.enum([
  'config',
  'ingestion',
  'indicators',
  'formatting',
  'report',
]);

export type PipelineStage = z.infer<typeof PipelineStageSchema>;

export const PipelineErrorCodeSchema = z.enum([
  'InputAbsent',
  'InvalidDate',
  'UnorderedDates',
  'MissingRequiredColumn',
  'InsufficientHistory',
  'LengthMismatch',
  'DuplicateColumn',
  'UnknownColumn',
  'ReadOnlyView',
  'EmptySelection',
  'ReportFailed',
  'ConfigInvalid',
  /** Error thrown by a stage that carries no pipeline error code */
  'Unexpected',
]);

export type PipelineErrorCode = z.infer<typeof PipelineErrorCodeSchema>;

export interface TransitionRecord {
  from: PipelineState;
  to: PipelineState;
  at: string;
}
