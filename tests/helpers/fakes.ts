import type { ChatMessage, LlmClient, LlmClientOptions } from '../../src/core/llm.js';
import { Logger } from '../../src/core/logger.js';
import type { FeedbackGenerator, FeedbackRequest } from '../../src/agent/feedback/generator.js';
import type { AdaptationDecision, ExecutionFeedback } from '../../src/agent/feedback/types.js';
import { createPlan } from '../../src/agent/planning/planner.js';
import type { Plan } from '../../src/agent/planning/types.js';
import type {
  ExecutionContext,
  PlanUpdateRequest,
  ReasoningService,
} from '../../src/agent/reasoning/types.js';
import { SearchOutputSchema, SearchParametersSchema } from '../../src/agent/tools/types.js';
import type { ToolHandler, ToolSelection } from '../../src/agent/tools/types.js';

export const quietLogger = () => new Logger('error');

/**
 * LLM client that replays canned replies in order.
 */
export class ScriptedLlm implements LlmClient {
  calls: Array<{ messages: ChatMessage[]; options?: LlmClientOptions }> = [];
  meta = { provider: 'openai' as const, model: 'test-model' };

  constructor(private replies: string[]) {}

  async complete(messages: ChatMessage[], options?: LlmClientOptions) {
    this.calls.push({ messages, options });
    const content = this.replies.shift();
    if (content === undefined) {
      throw new Error('No scripted reply left');
    }
    return { content, model: 'test-model' };
  }
}

/**
 * Reasoning service that returns a fixed plan and scripted selections and
 * decisions, recording every request.
 */
export class ScriptedReasoning implements ReasoningService {
  selectCalls: ExecutionContext[] = [];
  updateCalls: PlanUpdateRequest[] = [];

  constructor(
    private planValue: Plan,
    private selections: Array<ToolSelection | Error>,
    private decisions: Array<AdaptationDecision | Error> = []
  ) {}

  async plan(): Promise<Plan> {
    return this.planValue;
  }

  async selectTool(context: ExecutionContext): Promise<ToolSelection> {
    this.selectCalls.push(context);
    const next = this.selections.shift();
    if (next === undefined) throw new Error('No scripted selection left');
    if (next instanceof Error) throw next;
    return next;
  }

  async evaluateUpdate(request: PlanUpdateRequest): Promise<AdaptationDecision> {
    this.updateCalls.push(request);
    const next = this.decisions.shift();
    if (next === undefined) throw new Error('No scripted decision left');
    if (next instanceof Error) throw next;
    return next;
  }
}

/**
 * Feedback generator returning the same assessment for every step.
 */
export class FixedFeedback implements FeedbackGenerator {
  requests: FeedbackRequest[] = [];

  constructor(private feedback: Omit<ExecutionFeedback, 'stepCompleted'> | Error) {}

  async generate(request: FeedbackRequest): Promise<ExecutionFeedback> {
    this.requests.push(request);
    if (this.feedback instanceof Error) throw this.feedback;
    return { stepCompleted: request.step.description, ...this.feedback };
  }
}

export const lowFeedback: Omit<ExecutionFeedback, 'stepCompleted'> = {
  findingsQuality: 0.4,
  confidenceLevel: 0.3,
  dataGaps: ['segment revenue'],
  unexpectedFindings: [],
  suggestedAdjustments: [],
};

export const highFeedback: Omit<ExecutionFeedback, 'stepCompleted'> = {
  findingsQuality: 0.9,
  confidenceLevel: 0.9,
  dataGaps: [],
  unexpectedFindings: [],
  suggestedAdjustments: [],
};

export function threeStepPlan(): Plan {
  return createPlan(
    [
      { description: 'Find recent revenue figures' },
      { description: 'Compare with competitors' },
      { description: 'Summarize growth outlook' },
    ],
    'Gather data first'
  );
}

export function searchSelection(query: string): ToolSelection {
  return { kind: 'search', parameters: { queries: [query] } };
}

/**
 * Search handler returning three fixed results.
 */
export const fakeSearchTool: ToolHandler<'search'> = {
  kind: 'search',
  description: 'Search the web.',
  parameters: SearchParametersSchema,
  output: SearchOutputSchema,
  execute: async ({ queries }) => ({
    results: [
      { url: 'https://example.test/1', title: `Results for ${queries[0]}` },
      { url: 'https://example.test/2', title: 'Second result' },
      { url: 'https://example.test/3', title: 'Third result' },
    ],
  }),
};
