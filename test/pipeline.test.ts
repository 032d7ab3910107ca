import { describe, expect, it, vi } from 'vitest';

import { createReviewPipeline, runStages } from '../src/pipeline/orchestrator.js';
import { StageOrderError } from '../src/pipeline/state/errors.js';
import { STAGE_ORDER } from '../src/pipeline/state/states.js';
import type { StageName } from '../src/pipeline/state/states.js';
import { REPORT_HEADING } from '../src/output/formatter.js';
import { createInitialState } from '../src/review/state.js';
import type { ReviewState, StatePatch } from '../src/review/state.js';
import type { PipelineStage } from '../src/review/stages/types.js';
import { INTENT_RESPONSE, ScriptedGenerator, findingsJson, makeFinding, makePRContext } from './helpers.js';

const NO_FINDINGS = '{"findings": []}';

function initialState(): ReviewState {
  return createInitialState({
    diff: '=== src/payments/client.ts (modified) ===\n@@ -1 +1 @@\n-a\n+b\n',
    pr: makePRContext(),
    languages: ['typescript'],
  });
}

function fakeStage(name: StageName, patch: Omit<StatePatch, 'currentStage'> = {}, seen: string[] = []): PipelineStage {
  return {
    name,
    run: async (state: ReviewState): Promise<StatePatch> => {
      seen.push(state.currentStage);
      return { currentStage: name, ...patch };
    },
  };
}

describe('createReviewPipeline', () => {
  it('fails a change with one blocking correctness finding', async () => {
    const generator = new ScriptedGenerator([
      INTENT_RESPONSE,
      findingsJson([{ severity: 'BLOCKING', title: 'SQL injection in search', confidence: 0.95 }]),
      NO_FINDINGS,
      NO_FINDINGS,
    ]);

    const result = await createReviewPipeline({ generator }).run(initialState(), 'run-a');

    expect(generator.calls).toHaveLength(4);
    expect(result.decision).toBe('FAIL');
    expect(result.confidenceScore).toBe(0.95);
    expect(result.findings).toHaveLength(1);
    expect(result.findings[0]?.category).toBe('correctness');
    expect(result.currentStage).toBe('report_generator');
    expect(result.report.startsWith(REPORT_HEADING)).toBe(true);
    expect(result.report).toContain('### ❌ FAIL: 1 blocking issue(s)');
  });

  it('passes a change with no findings', async () => {
    const generator = new ScriptedGenerator([INTENT_RESPONSE, NO_FINDINGS, NO_FINDINGS, NO_FINDINGS]);

    const result = await createReviewPipeline({ generator }).run(initialState(), 'run-b');

    expect(result.decision).toBe('PASS');
    expect(result.confidenceScore).toBe(0.9);
    expect(result.findings).toEqual([]);
    expect(result.errorMessage).toBeUndefined();
    expect(result.report).toContain('### ✅ PASS: no blocking issues');
  });

  it('floors the confidence of a low-confidence pass', async () => {
    const generator = new ScriptedGenerator([
      INTENT_RESPONSE,
      findingsJson([{ severity: 'SUGGESTION', title: 'Rename variable', confidence: 0.6 }]),
      findingsJson([{ severity: 'NON_BLOCKING', title: 'Missing pagination', confidence: 0.7 }]),
      NO_FINDINGS,
    ]);

    const result = await createReviewPipeline({ generator }).run(initialState(), 'run-c');

    expect(result.decision).toBe('PASS');
    expect(result.confidenceScore).toBe(0.7);
  });

  it('completes when one stage returns prose instead of JSON', async () => {
    const generator = new ScriptedGenerator([
      INTENT_RESPONSE,
      findingsJson([{ severity: 'NON_BLOCKING', title: 'Unbounded retry loop', confidence: 0.8 }]),
      NO_FINDINGS,
      'Everything looks production ready.',
    ]);

    const result = await createReviewPipeline({ generator }).run(initialState(), 'run-d');

    expect(result.decision).toBe('PASS');
    expect(result.confidenceScore).toBe(0.7);
    expect(result.findings.map(f => f.title)).toEqual(['Unbounded retry loop']);
    expect(result.errorMessage).toMatch(/^production_readiness_review: invalid JSON: /);
  });

  it('keeps findings in stage order, then generator order', async () => {
    const generator = new ScriptedGenerator([
      INTENT_RESPONSE,
      findingsJson([{ title: 'A1' }, { title: 'A2' }]),
      findingsJson([{ title: 'B1' }]),
      findingsJson([{ title: 'C1' }, { title: 'C2' }]),
    ]);

    const result = await createReviewPipeline({ generator }).run(initialState(), 'run-order');

    expect(result.findings.map(f => [f.title, f.category])).toEqual([
      ['A1', 'correctness'],
      ['A2', 'correctness'],
      ['B1', 'engineering_quality'],
      ['C1', 'production_readiness'],
      ['C2', 'production_readiness'],
    ]);
  });

  it('passes the intent summary to every analysis stage', async () => {
    const generator = new ScriptedGenerator([INTENT_RESPONSE, NO_FINDINGS, NO_FINDINGS, NO_FINDINGS]);

    await createReviewPipeline({ generator }).run(initialState(), 'run-intent');

    for (const call of generator.calls.slice(1)) {
      expect(call.userContent).toContain('## PR Context\n**Intent**: Adds retries to the payment client');
    }
  });

  it('aborts on a generator failure without running later stages', async () => {
    const generator = new ScriptedGenerator([INTENT_RESPONSE, NO_FINDINGS, new Error('rate limited')]);
    const state = initialState();

    await expect(createReviewPipeline({ generator }).run(state, 'run-abort')).rejects.toThrow('rate limited');

    expect(generator.calls).toHaveLength(3);
    expect(state.currentStage).toBe('init');
    expect(state.findings).toEqual([]);
  });

  it('links the workflow run in the report footer', async () => {
    const generator = new ScriptedGenerator([INTENT_RESPONSE, NO_FINDINGS, NO_FINDINGS, NO_FINDINGS]);
    const runUrl = 'https://github.com/acme/shop/actions/runs/7';

    const result = await createReviewPipeline({ generator, runUrl }).run(initialState(), 'run-url');

    expect(result.report.endsWith(`· [Workflow run](${runUrl})`)).toBe(true);
  });

  it('can run more than once with identical results', async () => {
    const responses = [INTENT_RESPONSE, findingsJson([{ severity: 'BLOCKING', title: 'x' }]), NO_FINDINGS, NO_FINDINGS];
    const generator = new ScriptedGenerator([...responses, ...responses]);
    const pipeline = createReviewPipeline({ generator });

    const first = await pipeline.run(initialState(), 'run-1');
    const second = await pipeline.run(initialState(), 'run-2');

    expect(second).toEqual(first);
  });
});

describe('runStages', () => {
  it('hands each stage the state left by the one before', async () => {
    const seen: string[] = [];
    const stages = STAGE_ORDER.map(name =>
      fakeStage(name, name === 'bug_logic_review' ? { findings: [makeFinding()] } : {}, seen)
    );

    const result = await runStages(stages, initialState(), 'run-seen');

    expect(seen).toEqual([
      'init',
      'intent_analysis',
      'bug_logic_review',
      'engineering_quality_review',
      'production_readiness_review',
      'decision_engine',
    ]);
    expect(result.findings).toHaveLength(1);
  });

  it('records the running stage even when a patch names another', async () => {
    const stages = STAGE_ORDER.map(name => ({
      name,
      run: async (): Promise<StatePatch> => ({ currentStage: 'intent_analysis' }),
    }));

    const result = await runStages(stages, initialState(), 'run-rename');

    expect(result.currentStage).toBe('report_generator');
  });

  it('rejects stages out of order before running them', async () => {
    const run = vi.fn(async (): Promise<StatePatch> => ({ currentStage: 'decision_engine' }));

    await expect(runStages([{ name: 'decision_engine', run }], initialState(), 'run-skip')).rejects.toBeInstanceOf(
      StageOrderError
    );
    expect(run).not.toHaveBeenCalled();
  });

  it('rejects a pipeline that stops before the report stage', async () => {
    const stages = STAGE_ORDER.slice(0, 4).map(name => fakeStage(name));

    await expect(runStages(stages, initialState(), 'run-short')).rejects.toBeInstanceOf(StageOrderError);
  });
});
