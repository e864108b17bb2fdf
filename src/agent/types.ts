/**
 * Agent Types
 *
 * Shared types re-exported for external consumers.
 */

// Tool types
export type {
  ToolKind,
  ToolParameterMap,
  ToolOutputMap,
  ToolParameters,
  ToolOutput,
  ToolSelection,
  ToolHandler,
  ToolCallContext,
  ToolExecution,
} from './tools/types.js';
export type { RegisteredTool } from './tools/registry.js';
export type { DispatchOptions } from './tools/dispatcher.js';

// Planning types
export type { AdaptivePlan, Plan, PlanStep, StepDraft, StepStatus } from './planning/types.js';

// Context types
export type { FocusedContext, StepFinding } from './context/accumulator.js';

// Feedback types
export type {
  AdaptationDecision,
  AdaptationDecisionInput,
  ExecutionFeedback,
  ExecutionFeedbackInput,
} from './feedback/types.js';
export type { AdaptationThresholds, MaybeAdaptOptions } from './feedback/evaluator.js';
export type { FeedbackGenerator, FeedbackRequest } from './feedback/generator.js';

// Reasoning types
export type {
  ExecutionContext,
  PlanUpdateRequest,
  ReasoningCallOptions,
  ReasoningService,
} from './reasoning/types.js';

// Orchestrator types
export type {
  CompletedStepResult,
  FailedStepResult,
  SessionDeps,
  SessionOptions,
  SessionRequest,
  SessionResult,
  StepInput,
  StepResult,
  StopReason,
} from './orchestrator/types.js';
export type {
  ExecutionReportInput,
  SerializedAdaptivePlan,
  SerializedPlan,
  SerializedStep,
} from './orchestrator/report.js';
