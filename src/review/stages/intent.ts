import { z } from 'zod';
import { parseJsonPayload } from '../extractor.js';
import { buildIntentSystemPrompt, buildIntentUserPrompt } from '../prompts/intent-prompt.js';
import type { ReviewState, StatePatch } from '../state.js';
import type { TextGenerator } from '../../generation/types.js';
import type { PipelineStage } from './types.js';
import { logger } from '../../observability/logger.js';

const RAW_FALLBACK_LENGTH = 500;

const intentSchema = z.object({
  summary: z.string().catch('Unable to determine'),
  change_type: z.string().catch('unknown'),
  risk_level: z.string().catch('unknown'),
  areas_affected: z.array(z.string()).catch([]),
  key_concerns: z.array(z.string()).catch([]),
});

export type IntentAnalysis = z.output<typeof intentSchema>;

export function formatIntentSummary(analysis: IntentAnalysis): string {
  return [
    `**Intent**: ${analysis.summary}`,
    '',
    `**Change Type**: ${analysis.change_type}`,
    `**Risk Level**: ${analysis.risk_level}`,
    `**Areas Affected**: ${analysis.areas_affected.join(', ')}`,
    '',
    '**Key Concerns**:',
    ...analysis.key_concerns.map(concern => `- ${concern}`),
  ].join('\n');
}

export function summarizeIntent(response: string): string {
  const parsed = parseJsonPayload(response);
  if (parsed.ok) {
    const result = intentSchema.safeParse(parsed.value);
    if (result.success) {
      return formatIntentSummary(result.data);
    }
  }

  logger.warn('stage_output_degraded', 'Intent output was not a JSON object, using raw text', {
    stage: 'intent_analysis',
    reason: parsed.ok ? 'unexpected shape' : parsed.reason,
  });
  return `Intent analysis: ${response.slice(0, RAW_FALLBACK_LENGTH)}`;
}

export function createIntentStage(generator: TextGenerator): PipelineStage {
  return {
    name: 'intent_analysis',

    async run(state: ReviewState): Promise<StatePatch> {
      const response = await generator.generate(
        buildIntentSystemPrompt(),
        buildIntentUserPrompt(state.pr, state.diff)
      );

      return {
        currentStage: 'intent_analysis',
        intentSummary: summarizeIntent(response),
      };
    },
  };
}
