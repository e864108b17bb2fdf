/**
 * Error types raised by the planning/execution core.
 *
 * Fatal kinds (plan shape, tool validation, tool execution) stop the
 * session; adaptation and summarization failures are recovered locally by
 * their callers.
 */

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export class PlanShapeError extends Error {
  constructor(
    message: string,
    public readonly stepCount: number
  ) {
    super(message);
    this.name = 'PlanShapeError';
  }
}

export class UnknownToolError extends Error {
  constructor(public readonly toolKind: string) {
    super(`Unknown tool: ${toolKind}`);
    this.name = 'UnknownToolError';
  }
}

export class ToolValidationError extends Error {
  constructor(
    public readonly toolKind: string,
    public readonly issues: string[],
    public readonly stage: 'parameters' | 'output' = 'parameters'
  ) {
    super(`Invalid ${stage} for ${toolKind} tool: ${issues.join('; ')}`);
    this.name = 'ToolValidationError';
  }
}

export class ToolExecutionError extends Error {
  constructor(
    public readonly toolKind: string,
    public readonly cause: unknown
  ) {
    super(`Tool ${toolKind} failed: ${errorMessage(cause)}`);
    this.name = 'ToolExecutionError';
  }
}

export class ReasoningContractError extends Error {
  constructor(
    public readonly operation: string,
    detail: string
  ) {
    super(`Reasoning service returned invalid ${operation} output: ${detail}`);
    this.name = 'ReasoningContractError';
  }
}

export class AdaptationDecisionError extends Error {
  constructor(public readonly cause: unknown) {
    super(`Plan update evaluation failed: ${errorMessage(cause)}`);
    this.name = 'AdaptationDecisionError';
  }
}

export class SummarizationError extends Error {
  constructor(public readonly cause: unknown) {
    super(`Conversation summarization failed: ${errorMessage(cause)}`);
    this.name = 'SummarizationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
