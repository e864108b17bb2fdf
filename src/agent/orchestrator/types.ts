/**
 * Orchestrator Types
 */

import type { ResearchConfig } from '../../core/config.js';
import type { Logger } from '../../core/logger.js';
import type { ConversationTurn } from '../../memory/conversation_memory.js';
import type { FeedbackGenerator } from '../feedback/generator.js';
import type { AdaptivePlan } from '../planning/types.js';
import type { ReasoningService } from '../reasoning/types.js';
import type { ToolDispatcher } from '../tools/dispatcher.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolExecution, ToolOutput, ToolSelection } from '../tools/types.js';

interface StepResultBase {
  stepId: string;
  description: string;
  /** Query as focused for this step */
  query: string;
  durationMs: number;
}

export interface CompletedStepResult extends StepResultBase {
  status: 'completed';
  selection: ToolSelection;
  output: ToolOutput;
  /** `Step: ... | Result: ...` line merged into accumulated knowledge */
  summary: string;
  /** Accumulated knowledge after merging this step */
  accumulatedKnowledge: string;
  /** Set when the terminal tool ran */
  finalAnswer: string | null;
}

export interface FailedStepResult extends StepResultBase {
  status: 'failed';
  /** Present when the failure happened after tool selection */
  selection?: ToolSelection;
  error: string;
  errorName: string;
}

export type StepResult = CompletedStepResult | FailedStepResult;

/**
 * What a step reads from the session.
 */
export interface StepInput {
  query: string;
  context: string;
  accumulatedKnowledge: string;
}

export type StopReason = 'plan_exhausted' | 'final' | 'step_failed' | 'aborted';

export interface SessionRequest {
  query: string;
  context?: string;
}

export interface SessionDeps {
  reasoning: ReasoningService;
  /** A registry gets a dispatcher of its own for this session */
  tools: ToolDispatcher | ToolRegistry;
  /** Without a generator no feedback is produced and the plan never adapts */
  feedback?: FeedbackGenerator;
  logger?: Logger;
  /** Called after every plan state transition */
  onUpdate?: (plan: AdaptivePlan) => void;
}

export interface SessionOptions {
  maxAdaptations?: number;
  signal?: AbortSignal;
  config?: ResearchConfig;
}

export interface SessionResult {
  success: boolean;
  plan: AdaptivePlan;
  accumulatedKnowledge: string;
  stepResults: StepResult[];
  finalAnswer: string | null;
  stopReason: StopReason;
  /** Managed conversation history at session end */
  conversation: ConversationTurn[];
  /** Markdown execution summary */
  report: string;
  /** Tool calls dispatched during this session */
  toolHistory: ToolExecution[];
  metadata: {
    startedAt: string;
    completedAt: string;
    durationMs: number;
  };
}
