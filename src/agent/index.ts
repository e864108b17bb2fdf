/**
 * Agent Module
 *
 * Adaptive research agent: plans 2-4 steps, runs one tool per step, and
 * revises the remaining plan when step feedback calls for it.
 *
 * @example
 * ```typescript
 * import {
 *   runAdaptiveSession,
 *   LlmReasoningService,
 *   calculatorTool,
 *   createToolRegistry,
 * } from 'adaptive-research';
 *
 * const tools = createToolRegistry().register(calculatorTool);
 * const result = await runAdaptiveSession(
 *   { query: 'How has revenue grown over the last three years?' },
 *   { reasoning: new LlmReasoningService(llm, config), tools }
 * );
 *
 * console.log(result.report);
 * ```
 */

// === Session (main entry point) ===
export { runAdaptiveSession } from './orchestrator/session.js';
export { Orchestrator } from './orchestrator/orchestrator.js';
export { formatExecutionReport, serializeAdaptivePlan } from './orchestrator/report.js';

// === State Management ===
export {
  createAdaptivePlan,
  applyStepResult,
  applyAdaptation,
  canAdapt,
  getStateSummary,
} from './orchestrator/state.js';

// === Planning ===
export { Planner, createPlan, toPlanSteps } from './planning/planner.js';
export { MIN_PLAN_STEPS, MAX_PLAN_STEPS, StepDraftSchema } from './planning/types.js';

// === Context ===
export {
  summarizeStepResult,
  describeToolOutput,
  buildStepFinding,
  formatStepFinding,
  parseStepFindings,
  mergeContexts,
  extractKeyFindings,
  createFocusedContext,
  truncateText,
} from './context/accumulator.js';

// === Feedback ===
export {
  FeedbackEvaluator,
  adaptationTriggers,
  shouldEvaluate,
  DEFAULT_ADAPTATION_THRESHOLDS,
} from './feedback/evaluator.js';
export { LlmFeedbackGenerator } from './feedback/generator.js';
export {
  ExecutionFeedbackSchema,
  AdaptationDecisionSchema,
  createExecutionFeedback,
  createAdaptationDecision,
} from './feedback/types.js';

// === Reasoning ===
export { LlmReasoningService, renderTurn, renderHistory } from './reasoning/llm-reasoning.js';
export { extractJsonCandidate, parseJsonReply } from './reasoning/json.js';

// === Tools ===
export { ToolRegistry, createToolRegistry, finalAnswerTool } from './tools/registry.js';
export { ToolDispatcher } from './tools/dispatcher.js';
export { parseToolSelection } from './tools/selection.js';
export { calculatorTool, evaluateExpression, CalculationError } from './tools/calculator.js';
export {
  TOOL_KINDS,
  FINAL_TOOL_KIND,
  isToolKind,
  normalizeToolKind,
  SearchParametersSchema,
  RagParametersSchema,
  DeepResearchParametersSchema,
  CalculatorParametersSchema,
  FinalParametersSchema,
  SearchOutputSchema,
  AnswerOutputSchema,
  CalculatorOutputSchema,
  FinalOutputSchema,
} from './tools/types.js';

// === Types ===
export * from './types.js';
