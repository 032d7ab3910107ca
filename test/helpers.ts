import type { TextGenerator } from '../src/generation/types.js';
import type { Finding } from '../src/review/findings.js';
import type { PRContext } from '../src/types.js';

export function makeFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    severity: 'NON_BLOCKING',
    category: 'correctness',
    title: 'Potential null dereference',
    description: 'user may be undefined when the session expires',
    filePath: 'src/session.ts',
    lineStart: 10,
    lineEnd: 12,
    confidence: 0.8,
    ...overrides,
  };
}

export function makePRContext(overrides: Partial<PRContext> = {}): PRContext {
  return {
    number: 42,
    title: 'Add retry to payment client',
    description: 'Retries transient failures when charging cards.',
    author: 'octo-dev',
    baseBranch: 'main',
    headBranch: 'feature/retry',
    filesChanged: ['src/payments/client.ts', 'README.md'],
    additions: 30,
    deletions: 4,
    url: 'https://github.com/acme/shop/pull/42',
    ...overrides,
  };
}

export interface GeneratorCall {
  systemInstruction: string;
  userContent: string;
}

/** Replays canned responses in call order; an Error entry is thrown instead. */
export class ScriptedGenerator implements TextGenerator {
  readonly calls: GeneratorCall[] = [];

  constructor(private readonly responses: Array<string | Error>) {}

  async generate(systemInstruction: string, userContent: string): Promise<string> {
    this.calls.push({ systemInstruction, userContent });
    const next = this.responses[this.calls.length - 1];
    if (next === undefined) {
      throw new Error(`No scripted response for call ${this.calls.length}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export function findingsJson(findings: Array<Record<string, unknown>>): string {
  return JSON.stringify({ findings });
}

export const INTENT_RESPONSE = JSON.stringify({
  summary: 'Adds retries to the payment client',
  change_type: 'feature',
  risk_level: 'medium',
  areas_affected: ['payments'],
  key_concerns: ['Idempotency of retried charges'],
});
