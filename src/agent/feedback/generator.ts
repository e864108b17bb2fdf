/**
 * Feedback Generation
 *
 * Produces an ExecutionFeedback assessment for a completed step.
 */

import { z } from 'zod';

import { defaultConfig } from '../../core/config.js';
import type { ResearchConfig } from '../../core/config.js';
import { ReasoningContractError } from '../../core/errors.js';
import type { LlmClient } from '../../core/llm.js';
import { truncateText } from '../context/accumulator.js';
import type { PlanStep } from '../planning/types.js';
import { parseJsonReply } from '../reasoning/json.js';
import type { ReasoningCallOptions } from '../reasoning/types.js';
import { formatIssues } from '../tools/selection.js';
import { ExecutionFeedbackSchema } from './types.js';
import type { ExecutionFeedback } from './types.js';

export interface FeedbackRequest {
  query: string;
  step: PlanStep;
  /** Raw tool output */
  stepResult: unknown;
  /** One-line finding recorded for the step */
  summary: string;
  accumulatedKnowledge: string;
}

export interface FeedbackGenerator {
  generate(request: FeedbackRequest, options?: ReasoningCallOptions): Promise<ExecutionFeedback>;
}

const FeedbackReplySchema = z
  .object({
    findings_quality: z.number(),
    confidence_level: z.number(),
    data_gaps: z.array(z.string()).default([]),
    unexpected_findings: z.array(z.string()).default([]),
    suggested_adjustments: z.array(z.string()).default([]),
    next_step_recommendation: z.string().optional(),
  })
  .transform((reply) => ({
    findingsQuality: reply.findings_quality,
    confidenceLevel: reply.confidence_level,
    dataGaps: reply.data_gaps,
    unexpectedFindings: reply.unexpected_findings,
    suggestedAdjustments: reply.suggested_adjustments,
    nextStepRecommendation: reply.next_step_recommendation,
  }));

const FEEDBACK_SYSTEM_PROMPT = `You assess the outcome of one research step.

Rate how well the result serves the research query and note what is missing.

## Response Format

Respond with a JSON object:
{
  "findings_quality": 0.0,
  "confidence_level": 0.0,
  "data_gaps": ["Information still missing"],
  "unexpected_findings": ["Results that change the picture"],
  "suggested_adjustments": ["Changes to the remaining plan, if any"],
  "next_step_recommendation": "Optional advice for the next step"
}

Scores are between 0 and 1.`;

function renderResult(result: unknown, maxChars: number): string {
  let text: string;
  try {
    text = typeof result === 'string' ? result : JSON.stringify(result, null, 2);
  } catch {
    text = String(result);
  }
  return truncateText(text ?? '', maxChars);
}

export class LlmFeedbackGenerator implements FeedbackGenerator {
  constructor(
    private llm: LlmClient,
    private config: ResearchConfig = defaultConfig()
  ) {}

  async generate(
    request: FeedbackRequest,
    options?: ReasoningCallOptions
  ): Promise<ExecutionFeedback> {
    const sections = [
      `## Query\n${request.query}`,
      `## Step\n${request.step.description}`,
    ];
    if (request.step.expectedOutcome) {
      sections.push(`## Expected Outcome\n${request.step.expectedOutcome}`);
    }
    sections.push(`## Summary\n${request.summary}`);
    sections.push(
      `## Raw Result\n${renderResult(request.stepResult, this.config.context.maxToolOutputChars)}`
    );
    if (request.accumulatedKnowledge) {
      sections.push(`## Accumulated Knowledge\n${request.accumulatedKnowledge}`);
    }

    const response = await this.llm.complete(
      [
        { role: 'system', content: FEEDBACK_SYSTEM_PROMPT },
        { role: 'user', content: sections.join('\n\n') },
      ],
      {
        temperature: this.config.llm.temperature,
        maxTokens: this.config.llm.maxTokens,
        timeoutMs: this.config.llm.timeoutMs,
        signal: options?.signal,
      }
    );

    const reply = parseJsonReply('feedback', response.content, FeedbackReplySchema);
    return toExecutionFeedback(request.step.description, reply);
  }
}

function toExecutionFeedback(
  stepCompleted: string,
  reply: z.infer<typeof FeedbackReplySchema>
): ExecutionFeedback {
  const result = ExecutionFeedbackSchema.safeParse({ stepCompleted, ...reply });
  if (!result.success) {
    throw new ReasoningContractError('feedback', formatIssues(result.error).join('; '));
  }
  return result.data;
}
