import type { Category } from '../findings.js';
import type { Language } from '../../languages/detector.js';
import type { AnalysisStageName } from '../../pipeline/state/states.js';

export const ANALYSIS_DIFF_LIMIT = 12000;
export const INTENT_DIFF_LIMIT = 8000;
export const TRUNCATION_MARKER = '... (diff truncated)';

export interface AnalysisPromptTemplate {
  role: string;
  goal: string;
  checks: string[];
  severityGuidelines: string[];
  heading: string;
  task: string;
}

export interface AnalysisStageDefinition {
  name: AnalysisStageName;
  category: Category;
  prompt: AnalysisPromptTemplate;
}

const FINDINGS_OUTPUT_FORMAT = `For each issue found, output JSON in this format:
{
    "findings": [
        {
            "severity": "BLOCKING|NON_BLOCKING|SUGGESTION",
            "title": "Short title",
            "description": "Detailed explanation of the issue",
            "file_path": "path/to/file.py",
            "line_start": 42,
            "line_end": 45,
            "code_snippet": "the problematic code",
            "suggested_fix": "how to fix it",
            "confidence": 0.9
        }
    ]
}`;

const EMPTY_FINDINGS_INSTRUCTION = 'If no issues are found, return: {"findings": []}';

export const CORRECTNESS_STAGE: AnalysisStageDefinition = {
  name: 'bug_logic_review',
  category: 'correctness',
  prompt: {
    role: 'You are a senior software engineer performing a code review focused on correctness and logic errors.',
    goal: 'Your task is to identify bugs, logic errors, and correctness issues in the code diff provided.',
    checks: [
      'Null/undefined reference errors',
      'Off-by-one errors',
      'Incorrect conditional logic',
      'Edge cases not handled (empty arrays, zero values, negative numbers)',
      'Type mismatches or incorrect assumptions',
      'Race conditions or concurrency issues',
      'Incorrect error handling',
    ],
    severityGuidelines: [
      'Use BLOCKING for issues that will definitely cause bugs in production',
      'Use NON_BLOCKING for potential issues that should be addressed',
      'Use SUGGESTION for style improvements or minor concerns',
      'Set confidence based on how certain you are (0.5-1.0)',
      'Say "UNCERTAIN" in the description if you need more context',
      'Do NOT flag issues that do not exist in the diff',
      'Be specific about file paths and line numbers when possible',
    ],
    heading: 'Bug and Logic Analysis',
    task: 'Identify any bugs, logic errors, or correctness issues in this diff.',
  },
};

export const ENGINEERING_QUALITY_STAGE: AnalysisStageDefinition = {
  name: 'engineering_quality_review',
  category: 'engineering_quality',
  prompt: {
    role: 'You are a senior software engineer reviewing code for engineering quality and best practices.',
    goal: 'Your task is to identify engineering quality issues that could cause problems at scale or during maintenance.',
    checks: [
      'Missing pagination on list/query operations',
      'N+1 query patterns (database queries in loops)',
      'Missing input validation',
      'Improper error handling (catching generic exceptions, swallowing errors)',
      'Performance anti-patterns (unbounded loops, excessive allocations)',
      'Missing type safety / type hints',
      'Code duplication that should be abstracted',
      'Async/await issues (blocking calls in async context)',
    ],
    severityGuidelines: [
      'BLOCKING: Issues that will cause production outages or data loss at scale',
      'NON_BLOCKING: Best practice violations that should be fixed',
      'SUGGESTION: Improvements that would be nice to have',
      'Be specific about WHY something is a problem',
      'Provide actionable fixes',
    ],
    heading: 'Engineering Quality Analysis',
    task: 'Identify any engineering quality issues in this diff.',
  },
};

export const PRODUCTION_READINESS_STAGE: AnalysisStageDefinition = {
  name: 'production_readiness_review',
  category: 'production_readiness',
  prompt: {
    role: 'You are a senior SRE/DevOps engineer reviewing code for production readiness.',
    goal: 'Your task is to identify issues that could cause problems when this code runs in production.',
    checks: [
      'Hardcoded secrets, API keys, or credentials',
      'Missing logging for important operations',
      'Missing timeout configuration on HTTP/database calls',
      'Environment variables not used for configuration',
      'Missing health checks or observability hooks',
      'Not handling transient failures (missing retries)',
      'Security issues (SQL injection, XSS, SSRF potential)',
      'Missing rate limiting on public endpoints',
    ],
    severityGuidelines: [
      'BLOCKING: Security issues, hardcoded secrets, or issues that will cause outages',
      'NON_BLOCKING: Missing logging, timeouts, or observability',
      'SUGGESTION: Nice-to-have operational improvements',
      'Be VERY strict about hardcoded secrets - this is always BLOCKING',
    ],
    heading: 'Production Readiness Analysis',
    task: 'Identify any production readiness issues in this diff.',
  },
};

export const ANALYSIS_STAGES: readonly AnalysisStageDefinition[] = [
  CORRECTNESS_STAGE,
  ENGINEERING_QUALITY_STAGE,
  PRODUCTION_READINESS_STAGE,
];

export interface TruncatedDiff {
  text: string;
  truncated: boolean;
}

export function truncateDiff(diff: string, limit: number): TruncatedDiff {
  if (diff.length <= limit) {
    return { text: diff, truncated: false };
  }
  return { text: diff.slice(0, limit), truncated: true };
}

export function formatDiffBlock(diff: string, limit: number): string {
  const { text, truncated } = truncateDiff(diff, limit);
  const block = ['```diff', text, '```'].join('\n');
  return truncated ? `${block}\n${TRUNCATION_MARKER}` : block;
}

export function buildAnalysisSystemPrompt(template: AnalysisPromptTemplate, criteria: string): string {
  return [
    template.role,
    '',
    template.goal,
    '',
    'Look for:',
    ...template.checks.map((check, index) => `${index + 1}. ${check}`),
    '',
    criteria,
    '',
    FINDINGS_OUTPUT_FORMAT,
    '',
    'Guidelines:',
    ...template.severityGuidelines.map(line => `- ${line}`),
    '',
    EMPTY_FINDINGS_INSTRUCTION,
  ].join('\n');
}

export interface AnalysisPromptInput {
  intentSummary: string;
  languages: readonly Language[];
  diff: string;
}

export function buildAnalysisUserPrompt(template: AnalysisPromptTemplate, input: AnalysisPromptInput): string {
  return [
    `# Code Review: ${template.heading}`,
    '',
    '## PR Context',
    input.intentSummary,
    '',
    '## Languages',
    input.languages.join(', ') || 'General',
    '',
    '## Diff to Review',
    formatDiffBlock(input.diff, ANALYSIS_DIFF_LIMIT),
    '',
    template.task,
  ].join('\n');
}
