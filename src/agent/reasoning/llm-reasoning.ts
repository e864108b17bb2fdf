/**
 * LLM-backed Reasoning Service
 *
 * Prompts a chat model for plans, tool selections, plan updates and
 * conversation summaries, and validates every reply before it reaches the
 * session.
 */

import { z } from 'zod';

import { defaultConfig } from '../../core/config.js';
import type { ResearchConfig } from '../../core/config.js';
import { ReasoningContractError } from '../../core/errors.js';
import type { ChatMessage, LlmClient } from '../../core/llm.js';
import { Logger, defaultLogger } from '../../core/logger.js';
import type { ConversationTurn } from '../../memory/conversation_memory.js';
import { truncateText } from '../context/accumulator.js';
import { AdaptationDecisionSchema } from '../feedback/types.js';
import type { AdaptationDecision } from '../feedback/types.js';
import { createPlan } from '../planning/planner.js';
import { MAX_PLAN_STEPS, MIN_PLAN_STEPS } from '../planning/types.js';
import type { Plan, PlanStep } from '../planning/types.js';
import { parseToolSelection } from '../tools/selection.js';
import type { ToolSelection } from '../tools/types.js';
import { parseJsonReply } from './json.js';
import type {
  ExecutionContext,
  PlanUpdateRequest,
  ReasoningCallOptions,
  ReasoningService,
} from './types.js';

const StepReplySchema = z.object({
  description: z.string().min(1),
  focus_area: z.string().optional(),
  expected_outcome: z.string().optional(),
});

const PlanReplySchema = z.object({
  steps: z.array(StepReplySchema),
  reasoning: z.string().default(''),
  priority_areas: z.array(z.string()).default([]),
});

const SelectionReplySchema = z.object({
  tool: z.string().min(1),
  parameters: z.record(z.unknown()).optional(),
  reasoning: z.string().optional(),
});

const UpdateReplySchema = z
  .object({
    should_update: z.boolean(),
    updated_steps: z.array(StepReplySchema).optional(),
    reasoning: z.string().default(''),
    confidence: z.number(),
  })
  .transform((reply) => ({
    shouldUpdate: reply.should_update,
    updatedSteps: reply.updated_steps?.map(toStepDraft),
    reasoning: reply.reasoning,
    confidence: reply.confidence,
  }))
  .pipe(AdaptationDecisionSchema);

function toStepDraft(step: z.infer<typeof StepReplySchema>) {
  return {
    description: step.description,
    ...(step.focus_area ? { focusArea: step.focus_area } : {}),
    ...(step.expected_outcome ? { expectedOutcome: step.expected_outcome } : {}),
  };
}

const PLANNER_SYSTEM_PROMPT = `You are a research planning agent.

Break the user's research query into a short, ordered plan.

## Planning Rules

1. Use between ${MIN_PLAN_STEPS} and ${MAX_PLAN_STEPS} steps.
2. Each step investigates one focused question.
3. Order steps so later steps can build on earlier findings.

## Response Format

Respond with a JSON object:
{
  "steps": [
    {
      "description": "What this step investigates",
      "focus_area": "Topic the step concentrates on",
      "expected_outcome": "What a good result looks like"
    }
  ],
  "reasoning": "Why this plan answers the query",
  "priority_areas": ["Most important areas to cover"]
}`;

const TOOL_SELECTION_SYSTEM_PROMPT = `You are a research execution agent.

Choose exactly one tool to advance the current plan step.
Use the "final" tool only when the accumulated findings already answer the query.

## Available Tools

{TOOLS}

## Response Format

Respond with a JSON object:
{
  "tool": "tool kind",
  "parameters": { },
  "reasoning": "Why this tool and these parameters"
}`;

const UPDATE_SYSTEM_PROMPT = `You review research progress and decide whether the remaining plan should change.

Change the plan only when the feedback shows gaps or unexpected findings that the remaining steps would miss.

## Response Format

Respond with a JSON object:
{
  "should_update": true,
  "updated_steps": [
    { "description": "...", "focus_area": "...", "expected_outcome": "..." }
  ],
  "reasoning": "Why the plan should or should not change",
  "confidence": 0.0
}

Omit "updated_steps" when "should_update" is false. "confidence" is between 0 and 1.`;

const SUMMARY_SYSTEM_PROMPT = `You summarize research conversations.

Preserve key findings and data points, plan decisions and adaptations, open gaps, and recommendations.
Omit routine tool calls, repetition and small talk.
Reply with the summary text only.`;

export const CONVERSATION_SUMMARY_PREFIX = 'Conversation summary: ';

/**
 * Render one turn as a transcript line.
 */
export function renderTurn(turn: ConversationTurn): string {
  switch (turn.type) {
    case 'request':
      return `[${turn.role}] ${turn.content}`;
    case 'response':
      return `[assistant] ${turn.content}`;
    case 'tool_call':
      return `[tool call] ${turn.calls
        .map((call) => `${call.toolName}(${JSON.stringify(call.parameters)})`)
        .join(', ')}`;
    case 'tool_result':
      return `[tool result: ${turn.toolName}] ${turn.content}`;
  }
}

export function renderHistory(turns: ConversationTurn[], maxChars: number): string {
  return truncateText(turns.map(renderTurn).join('\n'), maxChars);
}

function renderSteps(steps: PlanStep[]): string {
  if (steps.length === 0) return '(none)';
  return steps
    .map((step, index) => {
      const extras = [
        step.focusArea ? `focus: ${step.focusArea}` : null,
        step.expectedOutcome ? `expected: ${step.expectedOutcome}` : null,
      ].filter((value): value is string => value !== null);
      return `${index + 1}. ${step.description}${extras.length > 0 ? ` (${extras.join('; ')})` : ''}`;
    })
    .join('\n');
}

function renderList(items: string[]): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : '- (none)';
}

export class LlmReasoningService implements ReasoningService {
  private logger: Logger;

  constructor(
    private llm: LlmClient,
    private config: ResearchConfig = defaultConfig(),
    logger?: Logger
  ) {
    this.logger = (logger ?? defaultLogger()).child('reasoning');
  }

  async plan(query: string, context: string, options?: ReasoningCallOptions): Promise<Plan> {
    const sections = [`## Query\n${query}`];
    if (context) {
      sections.push(`## Context\n${context}`);
    }
    sections.push('Create the research plan.');

    const reply = await this.ask('plan', PLANNER_SYSTEM_PROMPT, sections.join('\n\n'), options);
    const parsed = parseJsonReply('plan', reply, PlanReplySchema);
    return createPlan(parsed.steps.map(toStepDraft), parsed.reasoning, parsed.priority_areas);
  }

  async selectTool(
    context: ExecutionContext,
    options?: ReasoningCallOptions
  ): Promise<ToolSelection> {
    const sections = [
      `## Query\n${context.query}`,
      `## Current Step (${context.stepId})\n${context.stepDescription}`,
    ];
    if (context.focusArea) {
      sections.push(`## Focus Area\n${context.focusArea}`);
    }
    if (context.expectedOutcome) {
      sections.push(`## Expected Outcome\n${context.expectedOutcome}`);
    }
    if (context.context) {
      sections.push(`## Context\n${context.context}`);
    }
    if (context.accumulatedKnowledge) {
      sections.push(`## Accumulated Knowledge\n${context.accumulatedKnowledge}`);
    }

    const system = TOOL_SELECTION_SYSTEM_PROMPT.replace('{TOOLS}', context.toolCatalogue);
    const reply = await this.ask('tool selection', system, sections.join('\n\n'), options);
    const parsed = parseJsonReply('tool selection', reply, SelectionReplySchema);
    if (parsed.reasoning) {
      this.logger.debug(`selected ${parsed.tool}`, { reasoning: parsed.reasoning });
    }
    return parseToolSelection({ tool: parsed.tool, parameters: parsed.parameters ?? {} });
  }

  async evaluateUpdate(
    request: PlanUpdateRequest,
    options?: ReasoningCallOptions
  ): Promise<AdaptationDecision> {
    const { feedback } = request;
    const sections = [
      `## Query\n${request.query}`,
      `## Completed Step ${request.currentStepIndex + 1}\n${feedback.stepCompleted}`,
      [
        '## Feedback',
        `Findings quality: ${feedback.findingsQuality.toFixed(2)}`,
        `Confidence: ${feedback.confidenceLevel.toFixed(2)}`,
        `Data gaps:\n${renderList(feedback.dataGaps)}`,
        `Unexpected findings:\n${renderList(feedback.unexpectedFindings)}`,
        `Suggested adjustments:\n${renderList(feedback.suggestedAdjustments)}`,
      ].join('\n'),
      `## Remaining Steps\n${renderSteps(request.remainingSteps)}`,
    ];
    if (request.accumulatedKnowledge) {
      sections.push(`## Accumulated Knowledge\n${request.accumulatedKnowledge}`);
    }

    const reply = await this.ask('plan update', UPDATE_SYSTEM_PROMPT, sections.join('\n\n'), options);
    return parseJsonReply('plan update', reply, UpdateReplySchema);
  }

  async summarize(
    turns: ConversationTurn[],
    options?: ReasoningCallOptions
  ): Promise<ConversationTurn> {
    const transcript = renderHistory(turns, this.config.context.maxResearchChars);
    const response = await this.llm.complete(
      [
        { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
        { role: 'user', content: `Summarize this research conversation:\n\n${transcript}` },
      ],
      this.completionOptions(options)
    );
    const summary = response.content.trim();
    if (!summary) {
      throw new ReasoningContractError('summary', 'empty response');
    }
    return { type: 'response', content: `${CONVERSATION_SUMMARY_PREFIX}${summary}` };
  }

  private async ask(
    operation: string,
    system: string,
    user: string,
    options?: ReasoningCallOptions
  ): Promise<string> {
    const messages: ChatMessage[] = [{ role: 'system', content: system }];
    if (options?.history && options.history.length > 0) {
      messages.push({
        role: 'system',
        content: `## Conversation So Far\n${renderHistory(
          options.history,
          this.config.context.maxResearchChars
        )}`,
      });
    }
    messages.push({ role: 'user', content: user });

    this.logger.debug(`requesting ${operation}`);
    const response = await this.llm.complete(messages, this.completionOptions(options));
    return response.content;
  }

  private completionOptions(options?: ReasoningCallOptions) {
    return {
      temperature: this.config.llm.temperature,
      maxTokens: this.config.llm.maxTokens,
      timeoutMs: this.config.llm.timeoutMs,
      signal: options?.signal,
    };
  }
}
