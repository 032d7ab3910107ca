import { isTerminalPhase, nextPhase } from './states.js';
import type { PipelinePhase } from './states.js';
import { PipelineFinishedError, StageOrderError } from './errors.js';
import type { PipelineStateError } from './errors.js';
import { logger } from '../../observability/logger.js';

interface PhaseTransition {
  from: PipelinePhase;
  to: PipelinePhase;
  reason?: string;
}

/** Tracks one run's progress through STAGE_ORDER. Not reusable across runs. */
export class PipelineStateMachine {
  private phase: PipelinePhase = 'init';
  private readonly transitions: PhaseTransition[] = [];

  constructor(private readonly runId: string) {}

  getCurrentPhase(): PipelinePhase {
    return this.phase;
  }

  isTerminal(): boolean {
    return isTerminalPhase(this.phase);
  }

  transition(target: PipelinePhase, reason?: string): void {
    const violation = this.checkTransition(target);
    if (violation) {
      logger.error('illegal_state_transition', 'Illegal pipeline transition attempted', {
        runId: this.runId,
        from: this.phase,
        to: target,
        error: violation.message,
        transitionHistory: this.getStateHistorySummary(),
      });
      throw violation;
    }

    this.transitions.push({ from: this.phase, to: target, reason });
    this.phase = target;
  }

  getStateHistorySummary(): string[] {
    return this.transitions.map(t => (t.reason ? `${t.from}→${t.to} (${t.reason})` : `${t.from}→${t.to}`));
  }

  private checkTransition(target: PipelinePhase): PipelineStateError | null {
    const current = this.phase;
    if (isTerminalPhase(current)) {
      return new PipelineFinishedError(current, target);
    }
    if (target === 'aborted') {
      return null;
    }
    const expected = nextPhase(current) ?? 'completed';
    return expected === target ? null : new StageOrderError(current, target, expected);
  }
}
