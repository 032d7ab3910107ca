import { SEVERITIES, SEVERITY_RANK, countBySeverity, formatLocation } from '../review/findings.js';
import type { Category, Finding, Severity } from '../review/findings.js';
import type { ReviewState } from '../review/state.js';

export const REPORT_HEADING = '## Review Gate Report';

export interface ReportOptions {
  runUrl?: string;
}

const SEVERITY_SECTIONS: Record<Severity, { title: string; label: string }> = {
  BLOCKING: { title: '### 🚫 Blocking Issues', label: '🚫 Blocking' },
  NON_BLOCKING: { title: '### ⚠️ Non-Blocking Issues', label: '⚠️ Non-blocking' },
  SUGGESTION: { title: '### 💡 Suggestions', label: '💡 Suggestion' },
};

// Most severe first.
const SEVERITY_ORDER: Severity[] = [...SEVERITIES].sort((a, b) => SEVERITY_RANK[b] - SEVERITY_RANK[a]);

const CATEGORY_LABELS: Record<Category, string> = {
  correctness: 'Correctness',
  engineering_quality: 'Engineering quality',
  production_readiness: 'Production readiness',
  security: 'Security',
};

function formatPercent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

/** A fence longer than any backtick run inside the snippet. */
function codeFence(snippet: string): string {
  const longestRun = Math.max(0, ...(snippet.match(/`+/g) ?? []).map(run => run.length));
  return '`'.repeat(Math.max(3, longestRun + 1));
}

function formatFinding(finding: Finding, index: number): string {
  const lines: string[] = [];
  lines.push(`#### ${index}. ${finding.title}`);

  const meta: string[] = [];
  const location = formatLocation(finding);
  if (location) {
    meta.push(`**Location**: \`${location}\``);
  }
  meta.push(`**Category**: ${CATEGORY_LABELS[finding.category]}`);
  meta.push(`**Confidence**: ${formatPercent(finding.confidence)}`);
  lines.push(meta.join(' · '));
  lines.push('');
  lines.push(finding.description);

  if (finding.codeSnippet) {
    const fence = codeFence(finding.codeSnippet);
    lines.push('');
    lines.push(fence);
    lines.push(finding.codeSnippet);
    lines.push(fence);
  }

  if (finding.suggestedFix) {
    lines.push('');
    lines.push(`**Suggested fix**: ${finding.suggestedFix}`);
  }

  lines.push('');
  return lines.join('\n');
}

export function formatVerdict(state: Pick<ReviewState, 'decision' | 'findings'>): string {
  if (state.decision === 'FAIL') {
    const blocking = countBySeverity(state.findings).BLOCKING;
    return `### ❌ FAIL: ${blocking} blocking issue(s)`;
  }
  if (state.decision === 'PASS') {
    return '### ✅ PASS: no blocking issues';
  }
  return '### ⏳ No decision';
}

export function formatReport(state: ReviewState, options: ReportOptions = {}): string {
  const sections: string[] = [];
  const counts = countBySeverity(state.findings);

  sections.push(REPORT_HEADING);
  sections.push('');
  sections.push(formatVerdict(state));
  sections.push(`**Confidence**: ${formatPercent(state.confidenceScore)}`);
  sections.push('');

  sections.push('| Severity | Count |');
  sections.push('|---|---|');
  SEVERITY_ORDER.forEach(severity => sections.push(`| ${SEVERITY_SECTIONS[severity].label} | ${counts[severity]} |`));
  sections.push('');

  sections.push('### Change Intent');
  sections.push(state.intentSummary || '_No intent summary available_');
  sections.push('');

  if (state.findings.length === 0) {
    sections.push('No issues found by the correctness, engineering quality and production readiness reviews.');
    sections.push('');
  }

  for (const severity of SEVERITY_ORDER) {
    const findings = state.findings.filter(f => f.severity === severity);
    if (findings.length === 0) {
      continue;
    }
    sections.push(SEVERITY_SECTIONS[severity].title);
    findings.forEach((finding, i) => sections.push(formatFinding(finding, i + 1)));
  }

  const pr = state.pr;
  const footer = [
    `_PR #${pr.number} by ${pr.author} · ${pr.filesChanged.length} files changed (+${pr.additions}/-${pr.deletions})_`,
  ];
  if (options.runUrl) {
    footer.push(`[Workflow run](${options.runUrl})`);
  }

  sections.push('---');
  sections.push(footer.join(' · '));

  return sections.join('\n');
}
