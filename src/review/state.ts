import type { PRContext } from '../types.js';
import type { Language } from '../languages/detector.js';
import type { Finding } from './findings.js';
import type { StageName } from '../pipeline/state/states.js';

export type Decision = 'PASS' | 'FAIL';

export interface ReviewState {
  readonly diff: string;
  readonly pr: Readonly<PRContext>;
  readonly languages: readonly Language[];

  readonly intentSummary: string;
  readonly findings: readonly Finding[];

  readonly decision: Decision | null;
  readonly confidenceScore: number;
  readonly report: string;

  readonly currentStage: StageName | 'init';
  readonly errorMessage?: string;
}

/**
 * What a stage hands back. Inputs cannot appear here, and `findings` are
 * appended to the running list rather than replacing it.
 */
export interface StatePatch {
  readonly currentStage: StageName;
  readonly intentSummary?: string;
  readonly findings?: readonly Finding[];
  readonly decision?: Decision;
  readonly confidenceScore?: number;
  readonly report?: string;
  readonly errorMessage?: string;
}

export interface ReviewInput {
  diff: string;
  pr: PRContext;
  languages: readonly Language[];
}

export function createInitialState(input: ReviewInput): ReviewState {
  return Object.freeze({
    diff: input.diff,
    pr: Object.freeze({ ...input.pr, filesChanged: [...input.pr.filesChanged] }),
    languages: Object.freeze([...input.languages]),
    intentSummary: '',
    findings: Object.freeze([]),
    decision: null,
    confidenceScore: 0,
    report: '',
    currentStage: 'init',
  });
}

export function mergeState(state: ReviewState, patch: StatePatch): ReviewState {
  return Object.freeze({
    ...state,
    currentStage: patch.currentStage,
    intentSummary: patch.intentSummary ?? state.intentSummary,
    findings: patch.findings
      ? Object.freeze([...state.findings, ...patch.findings])
      : state.findings,
    decision: patch.decision ?? state.decision,
    confidenceScore: patch.confidenceScore ?? state.confidenceScore,
    report: patch.report ?? state.report,
    errorMessage: patch.errorMessage ?? state.errorMessage,
  });
}
