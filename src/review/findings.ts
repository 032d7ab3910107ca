export const SEVERITIES = ['BLOCKING', 'NON_BLOCKING', 'SUGGESTION'] as const;
export type Severity = (typeof SEVERITIES)[number];

export type Category =
  | 'correctness'
  | 'engineering_quality'
  | 'production_readiness'
  // Reserved: no stage emits security findings yet.
  | 'security';

/** Higher rank blocks harder. */
export const SEVERITY_RANK: Record<Severity, number> = {
  BLOCKING: 3,
  NON_BLOCKING: 2,
  SUGGESTION: 1,
};

export const DEFAULT_FINDING_TITLE = 'Untitled issue';
export const DEFAULT_FINDING_DESCRIPTION = 'No description';
export const DEFAULT_FINDING_CONFIDENCE = 0.8;

export interface Finding {
  readonly severity: Severity;
  readonly category: Category;
  readonly title: string;
  readonly description: string;
  readonly filePath?: string;
  readonly lineStart?: number;
  readonly lineEnd?: number;
  readonly codeSnippet?: string;
  readonly suggestedFix?: string;
  readonly confidence: number;
}

export type SeverityCounts = Record<Severity, number>;

export function countBySeverity(findings: readonly Finding[]): SeverityCounts {
  const counts: SeverityCounts = { BLOCKING: 0, NON_BLOCKING: 0, SUGGESTION: 0 };
  for (const finding of findings) {
    counts[finding.severity] += 1;
  }
  return counts;
}

export function isBlocking(finding: Finding): boolean {
  return finding.severity === 'BLOCKING';
}

export function formatLocation(finding: Finding): string | null {
  if (!finding.filePath) {
    return null;
  }
  if (finding.lineStart === undefined) {
    return finding.filePath;
  }
  if (finding.lineEnd === undefined || finding.lineEnd === finding.lineStart) {
    return `${finding.filePath}:${finding.lineStart}`;
  }
  return `${finding.filePath}:${finding.lineStart}-${finding.lineEnd}`;
}
