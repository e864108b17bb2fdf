/**
 * Session Reporting
 *
 * Markdown execution summary and the audit record of an AdaptivePlan.
 */

import { extractKeyFindings } from '../context/accumulator.js';
import type { AdaptivePlan, Plan, PlanStep } from '../planning/types.js';
import type { StepResult, StopReason } from './types.js';

export interface ExecutionReportInput {
  query: string;
  context: string;
  success: boolean;
  stopReason: StopReason;
  plan: AdaptivePlan;
  stepResults: StepResult[];
  accumulatedKnowledge: string;
  finalAnswer: string | null;
  maxKeyFindings?: number;
  minFindingChars?: number;
}

const STOP_REASON_LABELS: Record<StopReason, string> = {
  plan_exhausted: 'all steps executed',
  final: 'final answer reached',
  step_failed: 'halted after a failed step',
  aborted: 'cancelled',
};

export function formatExecutionReport(input: ExecutionReportInput): string {
  const completed = input.stepResults.filter((result) => result.status === 'completed').length;
  const failed = input.stepResults.length - completed;
  const planned = input.stepResults.length + input.plan.currentSteps.length;

  const lines: string[] = [
    '# Plan Execution Summary',
    '',
    '## Query',
    input.query,
  ];

  if (input.context) {
    lines.push('', '## Context', input.context);
  }

  lines.push(
    '',
    '## Execution Results',
    `- **Status**: ${input.success ? 'Success' : 'Failed'} (${STOP_REASON_LABELS[input.stopReason]})`,
    `- **Steps Completed**: ${completed}/${planned}`,
    `- **Steps Failed**: ${failed}`,
    `- **Adaptations**: ${input.plan.totalAdaptations}`,
    `- **Final Confidence**: ${(input.plan.currentConfidence * 100).toFixed(0)}%`,
    '',
    '## Step Details'
  );

  input.stepResults.forEach((result, index) => {
    const marker = result.status === 'completed' ? '[x]' : '[ ]';
    lines.push(`${index + 1}. ${marker} ${result.description}`);
    lines.push(`   - Tool Used: ${result.selection?.kind ?? 'none'}`);
    lines.push(
      `   - Result: ${
        result.status === 'completed' ? result.summary : `Step failed with error: ${result.error}`
      }`
    );
  });

  if (input.plan.adaptationHistory.length > 0) {
    lines.push('', '## Adaptations');
    input.plan.adaptationHistory.forEach((entry, index) => {
      lines.push(`${index + 1}. ${entry}`);
    });
  }

  const findings = extractKeyFindings(
    input.accumulatedKnowledge,
    input.maxKeyFindings,
    input.minFindingChars
  );
  if (findings.length > 0) {
    lines.push('', '## Key Findings', ...findings.map((finding) => `- ${finding}`));
  }

  if (input.finalAnswer !== null) {
    lines.push('', '## Final Answer', input.finalAnswer);
  }

  return lines.join('\n');
}

export interface SerializedStep {
  id: string;
  description: string;
  status: PlanStep['status'];
  result: unknown;
  focus_area?: string;
  expected_outcome?: string;
  tool_kind?: string;
  error?: string;
}

export interface SerializedPlan {
  steps: SerializedStep[];
  reasoning: string;
  priority_areas: string[];
}

export interface SerializedAdaptivePlan {
  original_plan: SerializedPlan;
  current_steps: SerializedStep[];
  completed_steps: SerializedStep[];
  adaptation_history: string[];
  total_adaptations: number;
  current_confidence: number;
}

function serializeStep(step: PlanStep): SerializedStep {
  return {
    id: step.id,
    description: step.description,
    status: step.status,
    result: step.result ?? null,
    ...(step.focusArea ? { focus_area: step.focusArea } : {}),
    ...(step.expectedOutcome ? { expected_outcome: step.expectedOutcome } : {}),
    ...(step.toolKind ? { tool_kind: step.toolKind } : {}),
    ...(step.error ? { error: step.error } : {}),
  };
}

function serializePlan(plan: Plan): SerializedPlan {
  return {
    steps: plan.steps.map(serializeStep),
    reasoning: plan.reasoning,
    priority_areas: [...plan.priorityAreas],
  };
}

/**
 * JSON-ready audit record of a session's plan state.
 */
export function serializeAdaptivePlan(plan: AdaptivePlan): SerializedAdaptivePlan {
  return {
    original_plan: serializePlan(plan.originalPlan),
    current_steps: plan.currentSteps.map(serializeStep),
    completed_steps: plan.completedSteps.map(serializeStep),
    adaptation_history: [...plan.adaptationHistory],
    total_adaptations: plan.totalAdaptations,
    current_confidence: plan.currentConfidence,
  };
}
