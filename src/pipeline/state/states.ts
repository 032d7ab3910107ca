export type AnalysisStageName =
  | 'bug_logic_review'
  | 'engineering_quality_review'
  | 'production_readiness_review';

export type StageName =
  | 'intent_analysis'
  | AnalysisStageName
  | 'decision_engine'
  | 'report_generator';

export type TerminalPhase = 'completed' | 'aborted';

export type PipelinePhase = 'init' | StageName | TerminalPhase;

export const STAGE_ORDER: readonly StageName[] = [
  'intent_analysis',
  'bug_logic_review',
  'engineering_quality_review',
  'production_readiness_review',
  'decision_engine',
  'report_generator',
];

const PHASE_DESCRIPTIONS: Record<PipelinePhase, string> = {
  init: 'State created, no stage has run',
  intent_analysis: 'Summarizing change intent',
  bug_logic_review: 'Reviewing correctness and logic',
  engineering_quality_review: 'Reviewing engineering quality',
  production_readiness_review: 'Reviewing production readiness',
  decision_engine: 'Reducing findings to a verdict',
  report_generator: 'Rendering the report',
  completed: 'Review completed with a verdict',
  aborted: 'Review aborted by an unrecovered error',
};

export function describePhase(phase: PipelinePhase): string {
  return PHASE_DESCRIPTIONS[phase];
}

export function isTerminalPhase(phase: PipelinePhase): phase is TerminalPhase {
  return phase === 'completed' || phase === 'aborted';
}

/**
 * The phase a successful run enters after `phase`: the next stage in
 * STAGE_ORDER, `completed` after the last stage, nothing once terminal.
 */
export function nextPhase(phase: PipelinePhase): StageName | 'completed' | null {
  if (isTerminalPhase(phase)) {
    return null;
  }
  const index = phase === 'init' ? -1 : STAGE_ORDER.indexOf(phase);
  return STAGE_ORDER[index + 1] ?? 'completed';
}

/** Every running phase may abort; otherwise only the next phase is reachable. */
export function canTransition(from: PipelinePhase, to: PipelinePhase): boolean {
  if (isTerminalPhase(from)) {
    return false;
  }
  return to === 'aborted' || nextPhase(from) === to;
}
