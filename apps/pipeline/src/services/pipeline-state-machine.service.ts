import {
  VALID_TRANSITIONS,
  isTerminalState,
  type PipelineState,
  type TransitionRecord,
} from '@pricepipe/schemas';
import { createLogger } from '@pricepipe/utils';

const logger = createLogger({ name: 'pipeline:state-machine', service: 'pipeline' });

const MAX_HISTORY = 50;

/**
 * PipelineStateMachine
 *
 * Validates and records state transitions for a single pipeline run.
 * Uses VALID_TRANSITIONS from @pricepipe/schemas as the transition map.
 * One instance per run; there is no way back out of `done` or `failed`.
 */
export class PipelineStateMachine {
  private currentState: PipelineState = 'idle';
  private transitionHistory: TransitionRecord[] = [];
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  /**
   * Attempt a state transition. Validates against VALID_TRANSITIONS.
   *
   * @throws Error if the transition is not allowed from the current state.
   */
  transition(to: PipelineState): void {
    const from = this.currentState;
    const allowed: readonly PipelineState[] = VALID_TRANSITIONS[from];

    if (!allowed.includes(to)) {
      logger.error({ from, to }, 'Invalid state transition');
      throw new Error(`Invalid state transition: ${from} -> ${to}`);
    }

    // FIFO, capped
    this.transitionHistory.push({ from, to, at: this.now().toISOString() });
    if (this.transitionHistory.length > MAX_HISTORY) {
      this.transitionHistory = this.transitionHistory.slice(-MAX_HISTORY);
    }

    this.currentState = to;
    logger.debug({ from, to }, 'State transition');
  }

  getCurrentState(): PipelineState {
    return this.currentState;
  }

  isFinished(): boolean {
    return isTerminalState(this.currentState);
  }

  /**
   * Get a copy of the transition history (most recent last).
   */
  getTransitionHistory(): TransitionRecord[] {
    return this.transitionHistory.map((record) => ({ ...record }));
  }
}
