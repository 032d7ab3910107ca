import { describe, expect, it } from 'vitest';

import { PipelineStateMachine } from '../src/pipeline/state/machine.js';
import { PipelineFinishedError, StageOrderError } from '../src/pipeline/state/errors.js';
import { STAGE_ORDER, canTransition, describePhase, isTerminalPhase, nextPhase } from '../src/pipeline/state/states.js';

describe('phase order', () => {
  it('follows the stage order from init to completed', () => {
    expect(nextPhase('init')).toBe('intent_analysis');
    expect(nextPhase('intent_analysis')).toBe('bug_logic_review');
    expect(nextPhase('production_readiness_review')).toBe('decision_engine');
    expect(nextPhase('report_generator')).toBe('completed');
    expect(nextPhase('completed')).toBeNull();
    expect(nextPhase('aborted')).toBeNull();
  });

  it('allows only the next phase or an abort', () => {
    expect(canTransition('init', 'intent_analysis')).toBe(true);
    expect(canTransition('report_generator', 'completed')).toBe(true);
    expect(canTransition('init', 'bug_logic_review')).toBe(false);
    expect(canTransition('decision_engine', 'production_readiness_review')).toBe(false);
    expect(canTransition('intent_analysis', 'intent_analysis')).toBe(false);
    expect(canTransition('init', 'completed')).toBe(false);
  });

  it('lets every running phase abort', () => {
    for (const phase of ['init', ...STAGE_ORDER] as const) {
      expect(canTransition(phase, 'aborted')).toBe(true);
    }
  });

  it('marks completed and aborted as terminal', () => {
    expect(isTerminalPhase('completed')).toBe(true);
    expect(isTerminalPhase('aborted')).toBe(true);
    expect(isTerminalPhase('report_generator')).toBe(false);
    expect(canTransition('completed', 'aborted')).toBe(false);
    expect(describePhase('aborted')).toBe('Review aborted by an unrecovered error');
  });
});

describe('PipelineStateMachine', () => {
  it('walks every stage to completion', () => {
    const machine = new PipelineStateMachine('run-1');

    for (const stage of STAGE_ORDER) {
      machine.transition(stage);
    }
    machine.transition('completed');

    expect(machine.isTerminal()).toBe(true);
    expect(machine.getCurrentPhase()).toBe('completed');
    expect(machine.getStateHistorySummary()).toEqual([
      'init→intent_analysis',
      'intent_analysis→bug_logic_review',
      'bug_logic_review→engineering_quality_review',
      'engineering_quality_review→production_readiness_review',
      'production_readiness_review→decision_engine',
      'decision_engine→report_generator',
      'report_generator→completed',
    ]);
  });

  it('names the expected stage when one is skipped', () => {
    const machine = new PipelineStateMachine('run-2');
    machine.transition('intent_analysis');

    let caught: unknown;
    try {
      machine.transition('engineering_quality_review');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(StageOrderError);
    expect(caught instanceof StageOrderError && caught.expected).toBe('bug_logic_review');
    expect(caught instanceof Error && caught.message).toBe(
      'Cannot enter engineering_quality_review after intent_analysis: expected bug_logic_review'
    );
    expect(machine.getCurrentPhase()).toBe('intent_analysis');
    expect(machine.isTerminal()).toBe(false);
  });

  it('refuses to complete before the report stage', () => {
    const machine = new PipelineStateMachine('run-3');
    machine.transition('intent_analysis');

    expect(() => machine.transition('completed')).toThrow(
      'Cannot enter completed after intent_analysis: expected bug_logic_review'
    );
  });

  it('refuses to leave a terminal phase and records the abort reason', () => {
    const machine = new PipelineStateMachine('run-4');
    machine.transition('intent_analysis');
    machine.transition('aborted', 'generator failed');

    expect(() => machine.transition('bug_logic_review')).toThrow(PipelineFinishedError);
    expect(() => machine.transition('aborted')).toThrow('Review run already aborted, cannot enter aborted');
    expect(machine.getStateHistorySummary()).toEqual([
      'init→intent_analysis',
      'intent_analysis→aborted (generator failed)',
    ]);
  });
});
