import type { Octokit } from '@octokit/rest';
import { workflowRunUrl } from './config.js';
import type { Config } from './config.js';
import type { PullRequestRef } from './types.js';
import type { TextGenerator } from './generation/types.js';
import { fetchPullRequest, listDiffFiles, toPRContext, buildDiffText } from './github/pull-request.js';
import { publishReport, setCommitStatus } from './output/publisher.js';
import { PENDING_STATUS, buildCommitStatus, buildErrorStatus } from './output/status.js';
import { detectLanguages } from './languages/detector.js';
import { createInitialState } from './review/state.js';
import type { ReviewState } from './review/state.js';
import { summarizeDecision } from './review/stages/decision.js';
import { createReviewPipeline } from './pipeline/orchestrator.js';
import { logger, describeError } from './observability/logger.js';

export interface ReviewDependencies {
  octokit: Octokit;
  generator: TextGenerator;
}

/**
 * Reviews one pull request end to end: fetch, pipeline, comment, status.
 * Errors after the pending status is set are reported as an `error` status
 * and rethrown.
 */
export async function runReview(
  config: Config,
  deps: ReviewDependencies,
  reviewId: string
): Promise<ReviewState> {
  const { octokit, generator } = deps;
  const ref: PullRequestRef = {
    owner: config.github.owner,
    repo: config.github.repo,
    pull_number: config.github.pullNumber,
  };
  const runUrl = workflowRunUrl(config);

  logger.info('review_start', 'Fetching pull request', { pullNumber: ref.pull_number });
  const pr = await fetchPullRequest(octokit, ref);

  await setCommitStatus(octokit, ref, pr.headSha, PENDING_STATUS, runUrl);

  try {
    const files = await listDiffFiles(octokit, ref);
    const context = toPRContext(pr, files);
    const languages = detectLanguages(context.filesChanged);

    logger.info('diff_extraction', 'Diff extracted', {
      fileCount: files.length,
      patchedFiles: files.filter(f => f.patch).length,
      languages,
    });

    const pipeline = createReviewPipeline({ generator, runUrl });
    const finalState = await pipeline.run(
      createInitialState({ diff: buildDiffText(files), pr: context, languages }),
      reviewId
    );

    if (finalState.errorMessage) {
      logger.warn('review_diagnostic', 'A stage produced unreadable output', {
        errorMessage: finalState.errorMessage,
      });
    }

    const outcome = await publishReport(octokit, ref, finalState.report);
    logger.info('report_published', `Report comment ${outcome.action}`, { commentId: outcome.commentId });

    await setCommitStatus(octokit, ref, pr.headSha, buildCommitStatus(finalState), runUrl);

    logger.info('review_complete', summarizeDecision(finalState), {
      decision: finalState.decision,
      confidenceScore: finalState.confidenceScore,
    });

    return finalState;
  } catch (error) {
    try {
      await setCommitStatus(octokit, ref, pr.headSha, buildErrorStatus(error), runUrl);
    } catch (statusError) {
      logger.error('status_error', 'Failed to set error status', {
        error: describeError(statusError),
      });
    }
    throw error;
  }
}
