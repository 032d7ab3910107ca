import { decodeFindings } from '../extractor.js';
import { getCombinedCriteria } from '../prompts/criteria.js';
import { buildAnalysisSystemPrompt, buildAnalysisUserPrompt } from '../prompts/stage-prompts.js';
import type { AnalysisStageDefinition } from '../prompts/stage-prompts.js';
import type { ReviewState, StatePatch } from '../state.js';
import type { TextGenerator } from '../../generation/types.js';
import type { PipelineStage } from './types.js';
import { logger } from '../../observability/logger.js';

/**
 * One generation call per run, decoded into findings tagged with the
 * definition's category. Generator failures propagate; malformed output
 * degrades to no findings.
 */
export function createAnalysisStage(
  definition: AnalysisStageDefinition,
  generator: TextGenerator
): PipelineStage {
  return {
    name: definition.name,

    async run(state: ReviewState): Promise<StatePatch> {
      const systemPrompt = buildAnalysisSystemPrompt(
        definition.prompt,
        getCombinedCriteria(state.languages)
      );
      const userPrompt = buildAnalysisUserPrompt(definition.prompt, {
        intentSummary: state.intentSummary,
        languages: state.languages,
        diff: state.diff,
      });

      const response = await generator.generate(systemPrompt, userPrompt);
      const decoded = decodeFindings(response, definition.category);

      if (decoded.status === 'degraded') {
        logger.warn('stage_output_degraded', 'Stage output could not be decoded, no findings recorded', {
          stage: definition.name,
          reason: decoded.reason,
          responsePreview: response.slice(0, 200),
        });

        return {
          currentStage: definition.name,
          findings: [],
          errorMessage: `${definition.name}: ${decoded.reason}`,
        };
      }

      logger.info('stage_findings', 'Stage findings decoded', {
        stage: definition.name,
        findingCount: decoded.findings.length,
      });

      return {
        currentStage: definition.name,
        findings: decoded.findings,
      };
    },
  };
}
