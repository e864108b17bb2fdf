/**
 * Adaptive Plan State
 *
 * Every change to an AdaptivePlan goes through these functions; each
 * returns a new plan and leaves its input untouched.
 */

import type { AdaptationDecision } from '../feedback/types.js';
import { toPlanSteps } from '../planning/planner.js';
import type { AdaptivePlan, Plan, PlanStep } from '../planning/types.js';
import type { StepResult } from './types.js';

const INITIAL_CONFIDENCE = 0.5;

function snapshotPlan(plan: Plan): Plan {
  return {
    steps: plan.steps.map((step) => ({ ...step })),
    reasoning: plan.reasoning,
    priorityAreas: [...plan.priorityAreas],
  };
}

/**
 * Create the session state for a new plan.
 */
export function createAdaptivePlan(plan: Plan): AdaptivePlan {
  const originalPlan = snapshotPlan(plan);
  return {
    originalPlan,
    currentSteps: originalPlan.steps.map((step) => ({ ...step })),
    completedSteps: [],
    adaptationHistory: [],
    totalAdaptations: 0,
    currentConfidence: INITIAL_CONFIDENCE,
  };
}

/**
 * Pop the step at the head of the queue and record its outcome.
 */
export function applyStepResult(plan: AdaptivePlan, result: StepResult): AdaptivePlan {
  const [head, ...rest] = plan.currentSteps;
  if (!head || head.id !== result.stepId) {
    throw new Error(`Step ${result.stepId} is not at the head of the plan`);
  }

  const updated: PlanStep =
    result.status === 'completed'
      ? {
          ...head,
          status: 'completed',
          result: result.output,
          toolKind: result.selection.kind,
          summary: result.summary,
        }
      : {
          ...head,
          status: 'failed',
          error: result.error,
          ...(result.selection ? { toolKind: result.selection.kind } : {}),
        };

  return {
    ...plan,
    currentSteps: rest,
    completedSteps: [...plan.completedSteps, updated],
  };
}

/**
 * Replace the remaining steps with the decision's steps. A decision that
 * does not update, or updates to an empty list, returns the plan as is.
 */
export function applyAdaptation(
  plan: AdaptivePlan,
  decision: AdaptationDecision,
  rationale: string
): AdaptivePlan {
  if (!decision.shouldUpdate || !decision.updatedSteps || decision.updatedSteps.length === 0) {
    return plan;
  }

  return {
    ...plan,
    currentSteps: toPlanSteps(decision.updatedSteps, plan.completedSteps.length),
    adaptationHistory: [...plan.adaptationHistory, rationale],
    totalAdaptations: plan.totalAdaptations + 1,
    currentConfidence: decision.confidence,
  };
}

export function canAdapt(plan: AdaptivePlan, maxAdaptations: number): boolean {
  return plan.totalAdaptations < maxAdaptations;
}

/**
 * Get a summary of the current state for logging.
 */
export function getStateSummary(plan: AdaptivePlan): string {
  const failed = plan.completedSteps.filter((step) => step.status === 'failed').length;
  const lines = [
    `Steps: ${plan.completedSteps.length - failed} completed, ${failed} failed, ${plan.currentSteps.length} pending`,
    `Adaptations: ${plan.totalAdaptations}`,
    `Confidence: ${(plan.currentConfidence * 100).toFixed(0)}%`,
  ];
  const next = plan.currentSteps[0];
  if (next) {
    lines.push(`Next: ${next.description}`);
  }
  return lines.join('\n');
}
