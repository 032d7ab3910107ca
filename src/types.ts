// Must stay a type alias: Octokit request parameters need an implicit index signature.
export type PullRequestRef = {
  owner: string;
  repo: string;
  pull_number: number;
};

export interface PRContext {
  number: number;
  title: string;
  description: string | null;
  author: string;
  baseBranch: string;
  headBranch: string;
  filesChanged: string[];
  additions: number;
  deletions: number;
  url: string;
}

export interface DiffFile {
  filename: string;
  status: string;
  additions: number;
  deletions: number;
  patch?: string;
}
