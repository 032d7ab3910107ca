import { createIntentStage } from '../review/stages/intent.js';
import { createAnalysisStage } from '../review/stages/analysis.js';
import { createDecisionStage } from '../review/stages/decision.js';
import type { DecisionPolicy } from '../review/stages/decision.js';
import { createReportStage } from '../review/stages/report.js';
import type { PipelineStage } from '../review/stages/types.js';
import { ANALYSIS_STAGES } from '../review/prompts/stage-prompts.js';
import { mergeState } from '../review/state.js';
import type { ReviewState } from '../review/state.js';
import type { TextGenerator } from '../generation/types.js';
import { PipelineStateMachine } from './state/machine.js';
import { describePhase } from './state/states.js';
import { logger, generateReviewId, describeError } from '../observability/logger.js';

export interface ReviewPipelineOptions {
  generator: TextGenerator;
  decisionPolicy?: DecisionPolicy;
  runUrl?: string;
}

export interface ReviewPipeline {
  readonly stages: readonly PipelineStage[];
  run(initialState: ReviewState, runId?: string): Promise<ReviewState>;
}

export function createReviewStages(options: ReviewPipelineOptions): PipelineStage[] {
  return [
    createIntentStage(options.generator),
    ...ANALYSIS_STAGES.map(definition => createAnalysisStage(definition, options.generator)),
    createDecisionStage(options.decisionPolicy),
    createReportStage({ runUrl: options.runUrl }),
  ];
}

/**
 * Runs each stage in order against the state left by its predecessor and
 * merges the returned patch. Any error aborts the whole run; no partial
 * state is returned.
 */
export async function runStages(
  stages: readonly PipelineStage[],
  initialState: ReviewState,
  runId: string
): Promise<ReviewState> {
  const machine = new PipelineStateMachine(runId);
  let state = initialState;

  logger.info('pipeline_start', 'Review pipeline starting', {
    runId,
    stages: stages.map(stage => stage.name),
    diffLength: state.diff.length,
    languages: state.languages,
  });

  try {
    for (const stage of stages) {
      machine.transition(stage.name);
      const startedAt = Date.now();

      const patch = await stage.run(state);
      state = mergeState(state, { ...patch, currentStage: stage.name });

      logger.info('stage_complete', 'Pipeline stage completed', {
        runId,
        stage: stage.name,
        durationMs: Date.now() - startedAt,
        totalFindings: state.findings.length,
      });
    }

    machine.transition('completed');
  } catch (error) {
    const failedPhase = machine.getCurrentPhase();
    if (!machine.isTerminal()) {
      machine.transition('aborted', describeError(error));
    }

    logger.error('pipeline_aborted', 'Review pipeline aborted', {
      runId,
      phase: failedPhase,
      phaseDescription: describePhase(failedPhase),
      error: describeError(error),
      transitions: machine.getStateHistorySummary(),
    });

    throw error;
  }

  logger.info('pipeline_complete', 'Review pipeline completed', {
    runId,
    decision: state.decision,
    confidenceScore: state.confidenceScore,
    totalFindings: state.findings.length,
    transitions: machine.getStateHistorySummary(),
  });

  return state;
}

export function createReviewPipeline(options: ReviewPipelineOptions): ReviewPipeline {
  const stages = createReviewStages(options);
  return {
    stages,
    run: (initialState, runId = generateReviewId()) => runStages(stages, initialState, runId),
  };
}
