/**
 * Research Planner
 *
 * Builds the initial plan through the reasoning service and enforces the
 * plan's step-count bounds.
 */

import { PlanShapeError } from '../../core/errors.js';
import { Logger, defaultLogger } from '../../core/logger.js';
import type { ReasoningCallOptions, ReasoningService } from '../reasoning/types.js';
import { MAX_PLAN_STEPS, MIN_PLAN_STEPS } from './types.js';
import type { Plan, PlanStep, StepDraft } from './types.js';

/**
 * Turn drafts into pending steps. Ids continue from `offset` so steps added
 * by an adaptation do not reuse ids of steps that already ran.
 */
export function toPlanSteps(drafts: StepDraft[], offset = 0): PlanStep[] {
  return drafts.map((draft, index): PlanStep => ({
    id: `step_${offset + index + 1}`,
    description: draft.description,
    ...(draft.focusArea ? { focusArea: draft.focusArea } : {}),
    ...(draft.expectedOutcome ? { expectedOutcome: draft.expectedOutcome } : {}),
    status: 'pending',
  }));
}

/**
 * Create a plan. Throws PlanShapeError unless there are 2-4 steps.
 */
export function createPlan(
  drafts: StepDraft[],
  reasoning: string,
  priorityAreas: string[] = []
): Plan {
  if (drafts.length < MIN_PLAN_STEPS || drafts.length > MAX_PLAN_STEPS) {
    throw new PlanShapeError(
      `Plan must have between ${MIN_PLAN_STEPS} and ${MAX_PLAN_STEPS} steps, got ${drafts.length}`,
      drafts.length
    );
  }

  return {
    steps: toPlanSteps(drafts),
    reasoning,
    priorityAreas: [...priorityAreas],
  };
}

export class Planner {
  private logger: Logger;

  constructor(
    private reasoning: ReasoningService,
    logger?: Logger
  ) {
    this.logger = (logger ?? defaultLogger()).child('planner');
  }

  /**
   * Ask the reasoning service for a plan and rebuild it through
   * `createPlan`, so a service that skips the bounds still cannot start a
   * session with a malformed plan.
   */
  async plan(query: string, context: string, options?: ReasoningCallOptions): Promise<Plan> {
    const proposed = await this.reasoning.plan(query, context, options);
    const plan = createPlan(proposed.steps, proposed.reasoning, proposed.priorityAreas);

    this.logger.info(`created plan with ${plan.steps.length} steps`, {
      steps: plan.steps.map((step) => step.description),
    });
    return plan;
  }
}
