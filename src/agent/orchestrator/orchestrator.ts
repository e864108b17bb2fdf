/**
 * Step Orchestrator
 *
 * Runs one plan step:
 *   focused context -> tool selection -> dispatch -> summary -> merge
 *
 * Any error on the way fails the step; the session decides what happens
 * next.
 */

import { defaultConfig } from '../../core/config.js';
import type { ResearchConfig } from '../../core/config.js';
import { errorMessage } from '../../core/errors.js';
import { Logger, defaultLogger } from '../../core/logger.js';
import {
  buildStepFinding,
  createFocusedContext,
  formatStepFinding,
  mergeContexts,
} from '../context/accumulator.js';
import type { PlanStep } from '../planning/types.js';
import type { ExecutionContext, ReasoningCallOptions, ReasoningService } from '../reasoning/types.js';
import type { ToolDispatcher } from '../tools/dispatcher.js';
import { FINAL_TOOL_KIND } from '../tools/types.js';
import type { ToolOutput, ToolSelection } from '../tools/types.js';
import type { StepInput, StepResult } from './types.js';

function finalAnswerOf(selection: ToolSelection, output: ToolOutput): string | null {
  if (selection.kind !== FINAL_TOOL_KIND) return null;
  return 'answer' in output ? output.answer : selection.parameters.answer;
}

export class Orchestrator {
  private logger: Logger;

  constructor(
    private reasoning: ReasoningService,
    private dispatcher: ToolDispatcher,
    private config: ResearchConfig = defaultConfig(),
    logger?: Logger
  ) {
    this.logger = (logger ?? defaultLogger()).child('orchestrator');
  }

  buildExecutionContext(step: PlanStep, input: StepInput): ExecutionContext {
    const focused = createFocusedContext(
      input.query,
      input.context,
      input.accumulatedKnowledge,
      step.description,
      this.config.context.focusedFindings
    );

    return {
      query: focused.query,
      context: focused.context,
      accumulatedKnowledge: input.accumulatedKnowledge,
      stepId: step.id,
      stepDescription: step.description,
      ...(step.focusArea ? { focusArea: step.focusArea } : {}),
      ...(step.expectedOutcome ? { expectedOutcome: step.expectedOutcome } : {}),
      toolCatalogue: this.dispatcher.describeTools(),
    };
  }

  async executeStep(
    step: PlanStep,
    input: StepInput,
    options: ReasoningCallOptions = {}
  ): Promise<StepResult> {
    const startTime = Date.now();
    const context = this.buildExecutionContext(step, input);
    let selection: ToolSelection | undefined;

    this.logger.info(`executing ${step.id}: ${step.description}`);

    try {
      selection = await this.reasoning.selectTool(context, options);
      const output = await this.dispatcher.execute(selection, { signal: options.signal });

      const summary = formatStepFinding(
        buildStepFinding(step.description, output, selection.kind, this.config.context.summaryChars)
      );
      const accumulatedKnowledge = mergeContexts(
        input.accumulatedKnowledge,
        summary,
        this.config.session.maxAccumulatedChars
      );

      this.logger.info(`${step.id} completed using ${selection.kind}`, {
        summary: summary.slice(0, 100),
      });

      return {
        status: 'completed',
        stepId: step.id,
        description: step.description,
        query: context.query,
        selection,
        output,
        summary,
        accumulatedKnowledge,
        finalAnswer: finalAnswerOf(selection, output),
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      this.logger.warn(`${step.id} failed`, { error: errorMessage(error) });
      return {
        status: 'failed',
        stepId: step.id,
        description: step.description,
        query: context.query,
        ...(selection ? { selection } : {}),
        error: errorMessage(error),
        errorName: error instanceof Error ? error.name : 'Error',
        durationMs: Date.now() - startTime,
      };
    }
  }
}
