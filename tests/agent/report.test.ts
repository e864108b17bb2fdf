import { describe, expect, it } from 'vitest';

import { formatExecutionReport, serializeAdaptivePlan } from '../../src/agent/orchestrator/report.js';
import { applyStepResult, createAdaptivePlan } from '../../src/agent/orchestrator/state.js';
import type { StepResult } from '../../src/agent/orchestrator/types.js';
import { createPlan } from '../../src/agent/planning/planner.js';

const plan = createPlan(
  [{ description: 'Find revenue', focusArea: 'revenue' }, { description: 'Compare peers' }],
  'Gather data first',
  ['revenue']
);

const first: StepResult = {
  status: 'completed',
  stepId: 'step_1',
  description: 'Find revenue',
  query: 'q (Current focus: Find revenue)',
  selection: { kind: 'calculator', parameters: { expression: '40 + 2' } },
  output: { result: 42 },
  summary: 'Step: Find revenue | Result: Calculation result: 42',
  accumulatedKnowledge: 'Step: Find revenue | Result: Calculation result: 42',
  finalAnswer: null,
  durationMs: 3,
};

const second: StepResult = {
  status: 'failed',
  stepId: 'step_2',
  description: 'Compare peers',
  query: 'q (Current focus: Compare peers)',
  error: 'Unknown tool: scraper',
  errorName: 'UnknownToolError',
  durationMs: 1,
};

describe('formatExecutionReport', () => {
  it('lists every executed step with its outcome', () => {
    const state = applyStepResult(applyStepResult(createAdaptivePlan(plan), first), second);

    const report = formatExecutionReport({
      query: 'q',
      context: '',
      success: false,
      stopReason: 'step_failed',
      plan: state,
      stepResults: [first, second],
      accumulatedKnowledge: first.accumulatedKnowledge,
      finalAnswer: null,
    });

    expect(report).toBe(
      [
        '# Plan Execution Summary',
        '',
        '## Query',
        'q',
        '',
        '## Execution Results',
        '- **Status**: Failed (halted after a failed step)',
        '- **Steps Completed**: 1/2',
        '- **Steps Failed**: 1',
        '- **Adaptations**: 0',
        '- **Final Confidence**: 50%',
        '',
        '## Step Details',
        '1. [x] Find revenue',
        '   - Tool Used: calculator',
        '   - Result: Step: Find revenue | Result: Calculation result: 42',
        '2. [ ] Compare peers',
        '   - Tool Used: none',
        '   - Result: Step failed with error: Unknown tool: scraper',
        '',
        '## Key Findings',
        '- Calculation result: 42',
      ].join('\n')
    );
  });
});

describe('serializeAdaptivePlan', () => {
  it('writes a snake_case audit record', () => {
    const state = applyStepResult(createAdaptivePlan(plan), first);

    expect(serializeAdaptivePlan(state)).toEqual({
      original_plan: {
        steps: [
          { id: 'step_1', description: 'Find revenue', status: 'pending', result: null, focus_area: 'revenue' },
          { id: 'step_2', description: 'Compare peers', status: 'pending', result: null },
        ],
        reasoning: 'Gather data first',
        priority_areas: ['revenue'],
      },
      current_steps: [
        { id: 'step_2', description: 'Compare peers', status: 'pending', result: null },
      ],
      completed_steps: [
        {
          id: 'step_1',
          description: 'Find revenue',
          status: 'completed',
          result: { result: 42 },
          focus_area: 'revenue',
          tool_kind: 'calculator',
        },
      ],
      adaptation_history: [],
      total_adaptations: 0,
      current_confidence: 0.5,
    });
  });
});
