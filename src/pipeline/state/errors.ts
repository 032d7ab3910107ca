import type { PipelinePhase, StageName, TerminalPhase } from './states.js';

export abstract class PipelineStateError extends Error {
  constructor(
    message: string,
    public readonly from: PipelinePhase,
    public readonly attempted: PipelinePhase
  ) {
    super(message);
  }
}

/** A stage was entered out of turn: skipped, repeated, or run before its predecessor. */
export class StageOrderError extends PipelineStateError {
  constructor(
    from: Exclude<PipelinePhase, TerminalPhase>,
    attempted: PipelinePhase,
    public readonly expected: StageName | 'completed'
  ) {
    super(`Cannot enter ${attempted} after ${from}: expected ${expected}`, from, attempted);
    this.name = 'StageOrderError';
  }
}

export class PipelineFinishedError extends PipelineStateError {
  constructor(from: TerminalPhase, attempted: PipelinePhase) {
    super(`Review run already ${from}, cannot enter ${attempted}`, from, attempted);
    this.name = 'PipelineFinishedError';
  }
}
