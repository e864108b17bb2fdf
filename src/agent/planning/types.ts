/**
 * Planning Types
 *
 * Plans, steps, and the adaptive session state that wraps a plan's
 * execution progress.
 */

import { z } from 'zod';

import type { ToolKind } from '../tools/types.js';

export const MIN_PLAN_STEPS = 2;
export const MAX_PLAN_STEPS = 4;

/**
 * Status of a plan step.
 */
export type StepStatus = 'pending' | 'completed' | 'failed';

/**
 * A step as proposed by the reasoning service, before it is scheduled.
 */
export const StepDraftSchema = z.object({
  description: z.string().min(1),
  focusArea: z.string().optional(),
  expectedOutcome: z.string().optional(),
});

export type StepDraft = z.infer<typeof StepDraftSchema>;

/**
 * A single step in a plan.
 */
export interface PlanStep {
  /** `step_<n>` in execution order */
  id: string;

  /** Human-readable description */
  description: string;

  focusArea?: string;

  expectedOutcome?: string;

  /** Current status */
  status: StepStatus;

  /** Raw tool output, once the step has run */
  result?: unknown;

  /** Tool the step dispatched */
  toolKind?: ToolKind;

  /** One-line finding recorded into accumulated knowledge */
  summary?: string;

  /** Error message if failed */
  error?: string;
}

/**
 * An ordered plan of 2-4 steps. Only `createPlan` builds one.
 */
export interface Plan {
  steps: PlanStep[];

  /** Why the steps were chosen */
  reasoning: string;

  priorityAreas: string[];
}

/**
 * Session state for one plan's execution.
 */
export interface AdaptivePlan {
  /** Snapshot of the plan as first created */
  readonly originalPlan: Plan;

  /** Queue of steps still to run; head runs next */
  currentSteps: PlanStep[];

  /** Append-only history of steps that ran */
  completedSteps: PlanStep[];

  /** Rationale recorded for each adaptation */
  adaptationHistory: string[];

  totalAdaptations: number;

  /** 0-1 */
  currentConfidence: number;
}
