import { formatReport } from '../../output/formatter.js';
import type { ReportOptions } from '../../output/formatter.js';
import type { ReviewState, StatePatch } from '../state.js';
import type { PipelineStage } from './types.js';

export function createReportStage(options: ReportOptions = {}): PipelineStage {
  return {
    name: 'report_generator',

    async run(state: ReviewState): Promise<StatePatch> {
      return {
        currentStage: 'report_generator',
        report: formatReport(state, options),
      };
    },
  };
}
