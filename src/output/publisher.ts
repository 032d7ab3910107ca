import type { Octokit } from '@octokit/rest';
import type { PullRequestRef } from '../types.js';
import { REPORT_HEADING } from './formatter.js';
import { STATUS_CONTEXT, truncateDescription } from './status.js';
import type { CommitStatus } from './status.js';

export type PublishOutcome =
  | { action: 'created'; commentId: number }
  | { action: 'updated'; commentId: number };

/** Updates the previous report comment when there is one, so each PR carries a single report. */
export async function publishReport(
  octokit: Octokit,
  ref: PullRequestRef,
  body: string
): Promise<PublishOutcome> {
  const comments = await octokit.paginate(octokit.issues.listComments, {
    owner: ref.owner,
    repo: ref.repo,
    issue_number: ref.pull_number,
    per_page: 100,
  });

  const existing = comments.find(comment => comment.body?.startsWith(REPORT_HEADING));
  if (existing) {
    await octokit.issues.updateComment({
      owner: ref.owner,
      repo: ref.repo,
      comment_id: existing.id,
      body,
    });
    return { action: 'updated', commentId: existing.id };
  }

  const { data: created } = await octokit.issues.createComment({
    owner: ref.owner,
    repo: ref.repo,
    issue_number: ref.pull_number,
    body,
  });
  return { action: 'created', commentId: created.id };
}

export async function setCommitStatus(
  octokit: Octokit,
  ref: PullRequestRef,
  sha: string,
  status: CommitStatus,
  targetUrl?: string
): Promise<void> {
  await octokit.repos.createCommitStatus({
    owner: ref.owner,
    repo: ref.repo,
    sha,
    state: status.state,
    description: truncateDescription(status.description),
    context: STATUS_CONTEXT,
    target_url: targetUrl,
  });
}
