import { countBySeverity } from '../review/findings.js';
import type { ReviewState } from '../review/state.js';
import { describeError } from '../observability/logger.js';

export const STATUS_CONTEXT = 'review-gate';
export const MAX_STATUS_DESCRIPTION = 140;
const MAX_ERROR_DETAIL = 100;

export type CommitState = 'pending' | 'success' | 'failure' | 'error';

export interface CommitStatus {
  state: CommitState;
  description: string;
}

export const PENDING_STATUS: CommitStatus = {
  state: 'pending',
  description: 'AI review in progress...',
};

export function buildCommitStatus(state: Pick<ReviewState, 'decision' | 'findings'>): CommitStatus {
  if (state.decision === 'PASS') {
    return { state: 'success', description: 'AI review passed - no blocking issues found' };
  }
  if (state.decision === 'FAIL') {
    const blocking = countBySeverity(state.findings).BLOCKING;
    return { state: 'failure', description: `AI review failed - ${blocking} blocking issue(s)` };
  }
  return { state: 'error', description: 'AI review finished without a decision' };
}

export function buildErrorStatus(error: unknown): CommitStatus {
  return {
    state: 'error',
    description: `AI review error: ${describeError(error).slice(0, MAX_ERROR_DETAIL)}`,
  };
}

export function truncateDescription(description: string): string {
  return description.slice(0, MAX_STATUS_DESCRIPTION);
}
