/**
 * Feedback Evaluator
 *
 * Decides after each step whether the remaining plan should be revised.
 * The reasoning service is only consulted when the feedback trips a
 * threshold or carries suggested adjustments.
 */

import { AdaptationDecisionError } from '../../core/errors.js';
import { Logger, defaultLogger } from '../../core/logger.js';
import type { PlanStep } from '../planning/types.js';
import type { ReasoningCallOptions, ReasoningService } from '../reasoning/types.js';
import { AdaptationDecisionSchema } from './types.js';
import type { AdaptationDecision, ExecutionFeedback } from './types.js';

export interface AdaptationThresholds {
  qualityThreshold: number;
  confidenceThreshold: number;
}

export const DEFAULT_ADAPTATION_THRESHOLDS: AdaptationThresholds = {
  qualityThreshold: 0.6,
  confidenceThreshold: 0.5,
};

/**
 * Reasons the feedback calls for a plan review; empty when none apply.
 */
export function adaptationTriggers(
  feedback: ExecutionFeedback,
  thresholds: AdaptationThresholds = DEFAULT_ADAPTATION_THRESHOLDS
): string[] {
  const triggers: string[] = [];
  if (feedback.findingsQuality < thresholds.qualityThreshold) {
    triggers.push(
      `findings quality ${feedback.findingsQuality.toFixed(2)} below ${thresholds.qualityThreshold}`
    );
  }
  if (feedback.confidenceLevel < thresholds.confidenceThreshold) {
    triggers.push(
      `confidence ${feedback.confidenceLevel.toFixed(2)} below ${thresholds.confidenceThreshold}`
    );
  }
  if (feedback.suggestedAdjustments.length > 0) {
    triggers.push(`${feedback.suggestedAdjustments.length} suggested adjustment(s)`);
  }
  return triggers;
}

export function shouldEvaluate(
  feedback: ExecutionFeedback,
  remainingSteps: PlanStep[],
  thresholds: AdaptationThresholds = DEFAULT_ADAPTATION_THRESHOLDS
): boolean {
  return remainingSteps.length > 0 && adaptationTriggers(feedback, thresholds).length > 0;
}

export interface MaybeAdaptOptions extends ReasoningCallOptions {
  query?: string;
  accumulatedKnowledge?: string;
}

export class FeedbackEvaluator {
  private thresholds: AdaptationThresholds;
  private logger: Logger;

  constructor(
    private reasoning: ReasoningService,
    thresholds: Partial<AdaptationThresholds> = {},
    logger?: Logger
  ) {
    this.thresholds = { ...DEFAULT_ADAPTATION_THRESHOLDS, ...thresholds };
    this.logger = (logger ?? defaultLogger()).child('feedback');
  }

  /**
   * Returns null when no review is warranted. Failures of the reasoning
   * call, including a reply outside the decision schema, surface as
   * AdaptationDecisionError.
   */
  async maybeAdapt(
    stepIndex: number,
    feedback: ExecutionFeedback,
    remainingSteps: PlanStep[],
    options: MaybeAdaptOptions = {}
  ): Promise<AdaptationDecision | null> {
    if (remainingSteps.length === 0) {
      return null;
    }
    const triggers = adaptationTriggers(feedback, this.thresholds);
    if (triggers.length === 0) {
      return null;
    }

    this.logger.info(`reviewing plan after step ${stepIndex + 1}`, { triggers });

    let decision: unknown;
    try {
      decision = await this.reasoning.evaluateUpdate(
        {
          query: options.query ?? '',
          currentStepIndex: stepIndex,
          feedback,
          remainingSteps,
          accumulatedKnowledge: options.accumulatedKnowledge ?? '',
        },
        { signal: options.signal, history: options.history }
      );
    } catch (error) {
      throw new AdaptationDecisionError(error);
    }

    const checked = AdaptationDecisionSchema.safeParse(decision);
    if (!checked.success) {
      throw new AdaptationDecisionError(checked.error);
    }
    return checked.data;
  }
}
