import { countBySeverity, isBlocking } from '../findings.js';
import type { Finding } from '../findings.js';
import type { Decision, ReviewState, StatePatch } from '../state.js';
import type { PipelineStage } from './types.js';

export interface DecisionPolicy {
  /** Confidence reported when no stage produced a finding. */
  emptyConfidence: number;
  /** Added to the mean on FAIL, subtracted on PASS. */
  nudge: number;
  failCeiling: number;
  passFloor: number;
}

export const DEFAULT_DECISION_POLICY: DecisionPolicy = {
  emptyConfidence: 0.9,
  nudge: 0.1,
  failCeiling: 0.95,
  passFloor: 0.7,
};

export interface DecisionResult {
  decision: Decision;
  confidenceScore: number;
}

function roundScore(value: number): number {
  return Math.round(Math.min(1, Math.max(0, value)) * 100) / 100;
}

/**
 * FAIL iff any finding is BLOCKING. Confidence is the mean finding
 * confidence, nudged toward certainty on FAIL and away from it on PASS.
 * Pure and independent of finding order.
 */
export function reduceDecision(
  findings: readonly Finding[],
  policy: DecisionPolicy = DEFAULT_DECISION_POLICY
): DecisionResult {
  const decision: Decision = findings.some(isBlocking) ? 'FAIL' : 'PASS';

  if (findings.length === 0) {
    return { decision, confidenceScore: roundScore(policy.emptyConfidence) };
  }

  // Summed in sorted order so the float result cannot depend on finding order.
  const total = findings
    .map(finding => finding.confidence)
    .sort((a, b) => a - b)
    .reduce((sum, confidence) => sum + confidence, 0);
  const mean = total / findings.length;
  const adjusted = decision === 'FAIL'
    ? Math.min(policy.failCeiling, mean + policy.nudge)
    : Math.max(policy.passFloor, mean - policy.nudge);

  return { decision, confidenceScore: roundScore(adjusted) };
}

export function summarizeDecision(state: Pick<ReviewState, 'decision' | 'confidenceScore' | 'findings'>): string {
  const counts = countBySeverity(state.findings);
  return [
    `Decision: ${state.decision ?? 'UNKNOWN'}`,
    `Confidence: ${Math.round(state.confidenceScore * 100)}%`,
    `Blocking issues: ${counts.BLOCKING}`,
    `Non-blocking issues: ${counts.NON_BLOCKING}`,
    `Suggestions: ${counts.SUGGESTION}`,
  ].join('\n');
}

export function createDecisionStage(policy: DecisionPolicy = DEFAULT_DECISION_POLICY): PipelineStage {
  return {
    name: 'decision_engine',

    async run(state: ReviewState): Promise<StatePatch> {
      const result = reduceDecision(state.findings, policy);
      return {
        currentStage: 'decision_engine',
        decision: result.decision,
        confidenceScore: result.confidenceScore,
      };
    },
  };
}
