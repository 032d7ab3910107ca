import type { Octokit } from '@octokit/rest';
import type { DiffFile, PRContext, PullRequestRef } from '../types.js';

export interface PullRequestSnapshot {
  number: number;
  title: string;
  description: string | null;
  author: string;
  baseBranch: string;
  headBranch: string;
  headSha: string;
  additions: number;
  deletions: number;
  url: string;
}

export async function fetchPullRequest(octokit: Octokit, ref: PullRequestRef): Promise<PullRequestSnapshot> {
  const { data: pr } = await octokit.pulls.get(ref);

  return {
    number: pr.number,
    title: pr.title,
    description: pr.body,
    author: pr.user?.login ?? 'unknown',
    baseBranch: pr.base.ref,
    headBranch: pr.head.ref,
    headSha: pr.head.sha,
    additions: pr.additions,
    deletions: pr.deletions,
    url: pr.html_url,
  };
}

export async function listDiffFiles(octokit: Octokit, ref: PullRequestRef): Promise<DiffFile[]> {
  const files = await octokit.paginate(octokit.pulls.listFiles, {
    ...ref,
    per_page: 100,
  });

  return files.map(file => ({
    filename: file.filename,
    status: file.status,
    additions: file.additions,
    deletions: file.deletions,
    patch: file.patch,
  }));
}

export function toPRContext(pr: PullRequestSnapshot, files: readonly DiffFile[]): PRContext {
  return {
    number: pr.number,
    title: pr.title,
    description: pr.description,
    author: pr.author,
    baseBranch: pr.baseBranch,
    headBranch: pr.headBranch,
    filesChanged: files.map(f => f.filename),
    additions: pr.additions,
    deletions: pr.deletions,
    url: pr.url,
  };
}

/**
 * One `=== <file> (<status>) ===` header per patched file, then the patch and
 * a blank line. Files without a patch (binary, too large) are left out.
 */
export function buildDiffText(files: readonly DiffFile[]): string {
  const parts: string[] = [];

  for (const file of files) {
    if (!file.patch) {
      continue;
    }
    parts.push(`=== ${file.filename} (${file.status}) ===`);
    parts.push(file.patch);
    parts.push('');
  }

  return parts.join('\n');
}
