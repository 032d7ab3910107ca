import type { ReviewState, StatePatch } from '../state.js';
import type { StageName } from '../../pipeline/state/states.js';

export interface PipelineStage {
  readonly name: StageName;
  run(state: ReviewState): Promise<StatePatch>;
}
