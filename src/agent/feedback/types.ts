/**
 * Feedback Types
 *
 * Assessments of a completed step and the adaptation decisions made from
 * them. Scores are validated to [0, 1] at construction.
 */

import { z } from 'zod';

import { StepDraftSchema } from '../planning/types.js';

const score = z.number().min(0).max(1);

export const ExecutionFeedbackSchema = z.object({
  stepCompleted: z.string(),
  findingsQuality: score,
  dataGaps: z.array(z.string()).default([]),
  unexpectedFindings: z.array(z.string()).default([]),
  suggestedAdjustments: z.array(z.string()).default([]),
  confidenceLevel: score,
  nextStepRecommendation: z.string().optional(),
});

export type ExecutionFeedback = z.infer<typeof ExecutionFeedbackSchema>;
export type ExecutionFeedbackInput = z.input<typeof ExecutionFeedbackSchema>;

export const AdaptationDecisionSchema = z.object({
  shouldUpdate: z.boolean(),
  updatedSteps: z.array(StepDraftSchema).optional(),
  reasoning: z.string().default(''),
  confidence: score,
});

export type AdaptationDecision = z.infer<typeof AdaptationDecisionSchema>;
export type AdaptationDecisionInput = z.input<typeof AdaptationDecisionSchema>;

/**
 * Build feedback, throwing a ZodError when a score is outside [0, 1].
 */
export function createExecutionFeedback(input: ExecutionFeedbackInput): ExecutionFeedback {
  return ExecutionFeedbackSchema.parse(input);
}

export function createAdaptationDecision(input: AdaptationDecisionInput): AdaptationDecision {
  return AdaptationDecisionSchema.parse(input);
}
