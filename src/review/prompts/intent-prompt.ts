import type { PRContext } from '../../types.js';
import { formatDiffBlock, INTENT_DIFF_LIMIT } from './stage-prompts.js';

const MAX_LISTED_FILES = 20;

export function buildIntentSystemPrompt(): string {
  return `You are a senior software engineer analyzing a Pull Request to understand its intent.

Your task is to:
1. Summarize what this PR is trying to accomplish in 2-3 sentences
2. Identify the main areas of change (new features, bug fixes, refactoring, etc.)
3. Assess the risk level (low, medium, high) based on the scope of changes

Output your analysis as JSON with this structure:
{
    "summary": "Brief description of what this PR does",
    "change_type": "feature|bugfix|refactor|docs|test|chore",
    "risk_level": "low|medium|high",
    "areas_affected": ["list", "of", "affected", "areas"],
    "key_concerns": ["list of things to watch out for during review"]
}

Be concise and focus on the most important information.`;
}

export function buildIntentUserPrompt(pr: Readonly<PRContext>, diff: string): string {
  const files = pr.filesChanged.slice(0, MAX_LISTED_FILES).map(file => `- ${file}`);
  if (pr.filesChanged.length > MAX_LISTED_FILES) {
    files.push('... and more files');
  }

  return [
    `# Pull Request: ${pr.title}`,
    '',
    '## Description',
    pr.description || 'No description provided.',
    '',
    `## Files Changed (${pr.filesChanged.length} files, +${pr.additions}/-${pr.deletions})`,
    ...files,
    '',
    '## Diff',
    formatDiffBlock(diff, INTENT_DIFF_LIMIT),
  ].join('\n');
}
