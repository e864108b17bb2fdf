/**
 * Reasoning Service contract
 *
 * The planner, orchestrator and feedback evaluator receive an explicit
 * ReasoningService; none of them reach for a shared client.
 */

import type { ConversationTurn } from '../../memory/conversation_memory.js';
import type { AdaptationDecision, ExecutionFeedback } from '../feedback/types.js';
import type { Plan, PlanStep } from '../planning/types.js';
import type { ToolSelection } from '../tools/types.js';

export interface ReasoningCallOptions {
  signal?: AbortSignal;
  /** Managed conversation history for the session */
  history?: ConversationTurn[];
}

/**
 * Per-step input for tool selection. Built fresh for every step.
 */
export interface ExecutionContext {
  /** Original query with the step focus appended */
  query: string;
  /** Original context with recent key findings appended */
  context: string;
  accumulatedKnowledge: string;
  stepId: string;
  stepDescription: string;
  focusArea?: string;
  expectedOutcome?: string;
  /** Catalogue of registered tools, one per line */
  toolCatalogue: string;
}

export interface PlanUpdateRequest {
  query: string;
  currentStepIndex: number;
  feedback: ExecutionFeedback;
  remainingSteps: PlanStep[];
  accumulatedKnowledge: string;
}

export interface ReasoningService {
  plan(query: string, context: string, options?: ReasoningCallOptions): Promise<Plan>;

  selectTool(context: ExecutionContext, options?: ReasoningCallOptions): Promise<ToolSelection>;

  evaluateUpdate(
    request: PlanUpdateRequest,
    options?: ReasoningCallOptions
  ): Promise<AdaptationDecision>;

  summarize?(turns: ConversationTurn[], options?: ReasoningCallOptions): Promise<ConversationTurn>;
}
