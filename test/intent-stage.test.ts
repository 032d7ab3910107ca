import { describe, expect, it } from 'vitest';

import { createIntentStage, summarizeIntent } from '../src/review/stages/intent.js';
import { TRUNCATION_MARKER } from '../src/review/prompts/stage-prompts.js';
import { createInitialState } from '../src/review/state.js';
import { INTENT_RESPONSE, ScriptedGenerator, makePRContext } from './helpers.js';

const FORMATTED_INTENT = [
  '**Intent**: Adds retries to the payment client',
  '',
  '**Change Type**: feature',
  '**Risk Level**: medium',
  '**Areas Affected**: payments',
  '',
  '**Key Concerns**:',
  '- Idempotency of retried charges',
].join('\n');

describe('summarizeIntent', () => {
  it('formats a JSON intent analysis', () => {
    expect(summarizeIntent(INTENT_RESPONSE)).toBe(FORMATTED_INTENT);
  });

  it('reads the analysis from a fenced block', () => {
    expect(summarizeIntent('Sure.\n```json\n' + INTENT_RESPONSE + '\n```')).toBe(FORMATTED_INTENT);
  });

  it('fills placeholders for missing fields', () => {
    expect(summarizeIntent('{}')).toBe(
      '**Intent**: Unable to determine\n\n**Change Type**: unknown\n**Risk Level**: unknown\n**Areas Affected**: \n\n**Key Concerns**:'
    );
  });

  it('falls back to the raw text when the output is not a JSON object', () => {
    expect(summarizeIntent('[1]')).toBe('Intent analysis: [1]');
    expect(summarizeIntent('a'.repeat(600))).toBe('Intent analysis: ' + 'a'.repeat(500));
  });
});

describe('createIntentStage', () => {
  it('describes the pull request to the generator', async () => {
    const generator = new ScriptedGenerator([INTENT_RESPONSE]);
    const filesChanged = Array.from({ length: 25 }, (_, i) => `src/file${i}.ts`);
    const state = createInitialState({
      diff: 'd'.repeat(8001),
      pr: makePRContext({ description: null, filesChanged }),
      languages: ['typescript'],
    });

    const patch = await createIntentStage(generator).run(state);

    expect(patch).toEqual({ currentStage: 'intent_analysis', intentSummary: FORMATTED_INTENT });
    const userContent = generator.calls[0]?.userContent ?? '';
    expect(userContent).toContain('# Pull Request: Add retry to payment client');
    expect(userContent).toContain('## Description\nNo description provided.');
    expect(userContent).toContain('## Files Changed (25 files, +30/-4)\n- src/file0.ts');
    expect(userContent).toContain('- src/file19.ts\n... and more files');
    expect(userContent).not.toContain('- src/file20.ts');
    expect(userContent).toContain('d'.repeat(8000) + '\n```\n' + TRUNCATION_MARKER);
  });

  it('propagates generator failures', async () => {
    const generator = new ScriptedGenerator([new Error('timeout')]);
    const state = createInitialState({ diff: '', pr: makePRContext(), languages: [] });

    await expect(createIntentStage(generator).run(state)).rejects.toThrow('timeout');
  });
});
