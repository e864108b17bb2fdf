/**
 * Adaptive Research Session
 *
 * Top-level driver:
 *   plan -> (step -> feedback -> maybe adapt -> memory)* -> report
 *
 * Steps run strictly in order. The session owns the AdaptivePlan and
 * changes it only through the transitions in state.ts.
 */

import { defaultConfig } from '../../core/config.js';
import { AdaptationDecisionError, errorMessage } from '../../core/errors.js';
import { Logger } from '../../core/logger.js';
import { MemoryManager } from '../../memory/conversation_memory.js';
import type { ConversationSummarizer, ConversationTurn } from '../../memory/conversation_memory.js';
import { mergeContexts } from '../context/accumulator.js';
import { FeedbackEvaluator } from '../feedback/evaluator.js';
import type { AdaptationDecision, ExecutionFeedback } from '../feedback/types.js';
import { Planner } from '../planning/planner.js';
import type { AdaptivePlan, PlanStep } from '../planning/types.js';
import type { ReasoningService } from '../reasoning/types.js';
import { ToolDispatcher } from '../tools/dispatcher.js';
import { Orchestrator } from './orchestrator.js';
import { formatExecutionReport } from './report.js';
import {
  applyAdaptation,
  applyStepResult,
  canAdapt,
  createAdaptivePlan,
  getStateSummary,
} from './state.js';
import type {
  CompletedStepResult,
  SessionDeps,
  SessionOptions,
  SessionRequest,
  SessionResult,
  StepResult,
  StopReason,
} from './types.js';

function summarizerFor(reasoning: ReasoningService): ConversationSummarizer | undefined {
  const summarize = reasoning.summarize;
  if (!summarize) return undefined;
  return (turns, options) => summarize.call(reasoning, turns, options);
}

function stepTurns(result: StepResult): ConversationTurn[] {
  const turns: ConversationTurn[] = [{ type: 'request', role: 'user', content: result.query }];

  if (result.selection) {
    const callId = `${result.stepId}_call`;
    turns.push({
      type: 'tool_call',
      content: `Using ${result.selection.kind} for ${result.description}`,
      calls: [
        { id: callId, toolName: result.selection.kind, parameters: result.selection.parameters },
      ],
    });
    turns.push({
      type: 'tool_result',
      callId,
      toolName: result.selection.kind,
      content: result.status === 'completed' ? result.summary : `Error: ${result.error}`,
    });
  }

  if (result.status === 'failed') {
    turns.push({ type: 'response', content: `Step failed: ${result.error}` });
  }
  return turns;
}

function adaptationRationale(step: PlanStep, decision: AdaptationDecision): string {
  const reasoning = decision.reasoning || 'no reasoning given';
  return `After ${step.id} (${step.description}): ${reasoning}`;
}

/**
 * Run one research session to completion. Planning errors (including a
 * plan outside 2-4 steps) propagate; everything after planning is reported
 * in the result.
 */
export async function runAdaptiveSession(
  request: SessionRequest,
  deps: SessionDeps,
  options: SessionOptions = {}
): Promise<SessionResult> {
  const config = options.config ?? defaultConfig();
  const maxAdaptations = options.maxAdaptations ?? config.session.maxAdaptations;
  const signal = options.signal;
  const query = request.query;
  const context = request.context ?? '';

  const baseLogger = deps.logger ?? new Logger(config.logging.level);
  const logger = baseLogger.child('session');
  const dispatcher =
    deps.tools instanceof ToolDispatcher ? deps.tools : new ToolDispatcher(deps.tools, baseLogger);
  const historyStart = dispatcher.getHistory().length;
  const planner = new Planner(deps.reasoning, baseLogger);
  const orchestrator = new Orchestrator(deps.reasoning, dispatcher, config, baseLogger);
  const evaluator = new FeedbackEvaluator(deps.reasoning, config.feedback, baseLogger);
  const memory = new MemoryManager(config.memory, summarizerFor(deps.reasoning), baseLogger);

  const startedAt = new Date();
  let conversation: ConversationTurn[] = [
    {
      type: 'request',
      role: 'system',
      content: 'Adaptive research session: plan, execute one tool per step, adapt on feedback.',
    },
    {
      type: 'request',
      role: 'user',
      content: context ? `${query}\n\nContext: ${context}` : query,
    },
  ];

  const plan = await planner.plan(query, context, { signal, history: conversation });
  let state: AdaptivePlan = createAdaptivePlan(plan);
  let accumulatedKnowledge = mergeContexts(
    '',
    `Planning reasoning: ${plan.reasoning}`,
    config.session.maxAccumulatedChars
  );
  conversation.push({
    type: 'response',
    content: `Research plan: ${plan.steps.map((step) => step.description).join('; ')}`,
  });

  const emit = (next: AdaptivePlan) => {
    state = next;
    deps.onUpdate?.(state);
  };
  emit(state);

  const stepResults: StepResult[] = [];
  let stopReason: StopReason = 'plan_exhausted';
  let finalAnswer: string | null = null;

  while (state.currentSteps.length > 0) {
    if (signal?.aborted) {
      stopReason = 'aborted';
      break;
    }

    const step = state.currentSteps[0];
    if (!step) break;
    const stepIndex = state.completedSteps.length;

    const result = await orchestrator.executeStep(
      step,
      { query, context, accumulatedKnowledge },
      { signal, history: conversation }
    );
    stepResults.push(result);
    emit(applyStepResult(state, result));
    conversation.push(...stepTurns(result));

    if (result.status === 'failed') {
      stopReason = signal?.aborted ? 'aborted' : 'step_failed';
      logger.warn(`halting after failed ${result.stepId}`, { error: result.error });
      conversation = memory.process(conversation);
      break;
    }

    accumulatedKnowledge = result.accumulatedKnowledge;

    if (result.finalAnswer !== null) {
      finalAnswer = result.finalAnswer;
      stopReason = 'final';
      logger.info(`final answer reached at ${result.stepId}`);
      conversation = memory.process(conversation);
      break;
    }

    if (deps.feedback && state.currentSteps.length > 0) {
      if (!canAdapt(state, maxAdaptations)) {
        logger.debug('adaptation cap reached, continuing with current plan', {
          totalAdaptations: state.totalAdaptations,
          maxAdaptations,
        });
      } else {
        const feedback = await generateFeedback(deps, logger, {
          query,
          step,
          result,
          accumulatedKnowledge,
          signal,
          history: conversation,
        });

        if (feedback) {
          let decision: AdaptationDecision | null = null;
          try {
            decision = await evaluator.maybeAdapt(stepIndex, feedback, state.currentSteps, {
              query,
              accumulatedKnowledge,
              signal,
              history: conversation,
            });
          } catch (error) {
            if (!(error instanceof AdaptationDecisionError)) throw error;
            logger.warn('plan update evaluation failed, keeping current plan', {
              error: errorMessage(error.cause),
            });
          }

          if (decision) {
            const rationale = adaptationRationale(step, decision);
            const adapted = applyAdaptation(state, decision, rationale);
            if (adapted !== state) {
              emit(adapted);
              logger.info(`plan adapted (${state.totalAdaptations}/${maxAdaptations})`, {
                steps: state.currentSteps.map((next) => next.description),
              });
              conversation.push({ type: 'response', content: `Plan update: ${rationale}` });
            } else {
              conversation.push({
                type: 'response',
                content: `Plan kept after ${step.id}: ${decision.reasoning || 'no update needed'}`,
              });
            }
          }
        }
      }
    }

    conversation = await memory.compact(conversation, { signal });
    logger.debug(getStateSummary(state));
  }

  const success = stopReason === 'plan_exhausted' || stopReason === 'final';
  const completedAt = new Date();
  logger.info(`session finished: ${stopReason}`, {
    success,
    steps: stepResults.length,
    adaptations: state.totalAdaptations,
  });

  return {
    success,
    plan: state,
    accumulatedKnowledge,
    stepResults,
    finalAnswer,
    stopReason,
    conversation,
    report: formatExecutionReport({
      query,
      context,
      success,
      stopReason,
      plan: state,
      stepResults,
      accumulatedKnowledge,
      finalAnswer,
      maxKeyFindings: config.context.maxKeyFindings,
      minFindingChars: config.context.minFindingChars,
    }),
    toolHistory: dispatcher.getHistory().slice(historyStart),
    metadata: {
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startedAt.getTime(),
    },
  };
}

/**
 * Feedback failures are logged and treated as "no feedback".
 */
async function generateFeedback(
  deps: SessionDeps,
  logger: Logger,
  input: {
    query: string;
    step: PlanStep;
    result: CompletedStepResult;
    accumulatedKnowledge: string;
    signal?: AbortSignal;
    history: ConversationTurn[];
  }
): Promise<ExecutionFeedback | null> {
  if (!deps.feedback) return null;
  try {
    return await deps.feedback.generate(
      {
        query: input.query,
        step: input.step,
        stepResult: input.result.output,
        summary: input.result.summary,
        accumulatedKnowledge: input.accumulatedKnowledge,
      },
      { signal: input.signal, history: input.history }
    );
  } catch (error) {
    logger.warn('feedback generation failed, skipping adaptation', {
      error: errorMessage(error),
    });
    return null;
  }
}
