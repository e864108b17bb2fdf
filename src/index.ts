/**
 * Adaptive Research
 *
 * Main entry point for the library.
 */

import { runAdaptiveSession } from './agent/orchestrator/session.js';
import type { SessionResult } from './agent/orchestrator/types.js';
import { LlmFeedbackGenerator } from './agent/feedback/generator.js';
import { LlmReasoningService } from './agent/reasoning/llm-reasoning.js';
import { calculatorTool } from './agent/tools/calculator.js';
import { ToolRegistry, createToolRegistry } from './agent/tools/registry.js';
import { defaultConfig, type ResearchConfig } from './core/config.js';
import { createLlmClient, type LlmClient } from './core/llm.js';
import { Logger } from './core/logger.js';

export * from './agent/index.js';
export * from './memory/conversation_memory.js';
export * from './core/config.js';
export * from './core/errors.js';
export * from './core/llm.js';
export * from './core/logger.js';

export interface ResearchAgentOptions {
  config?: ResearchConfig;
  /** Defaults to the client selected by `config.llm.provider` */
  llm?: LlmClient;
  /** Defaults to the `final` and `calculator` tools */
  tools?: ToolRegistry;
  logger?: Logger;
}

/**
 * Wires an LLM client, the LLM-backed reasoning and feedback services and a
 * tool registry into reusable sessions. Each `research` call dispatches
 * through its own ToolDispatcher; its tool history is on the result.
 */
export class ResearchAgent {
  readonly config: ResearchConfig;
  readonly tools: ToolRegistry;
  private reasoning: LlmReasoningService;
  private feedback: LlmFeedbackGenerator;
  private logger: Logger;

  constructor(options: ResearchAgentOptions = {}) {
    this.config = options.config ?? defaultConfig();
    this.logger = options.logger ?? new Logger(this.config.logging.level);
    const llm = options.llm ?? createLlmClient(this.config, this.logger);

    this.tools = options.tools ?? createToolRegistry().register(calculatorTool);
    this.reasoning = new LlmReasoningService(llm, this.config, this.logger);
    this.feedback = new LlmFeedbackGenerator(llm, this.config);
  }

  async research(
    query: string,
    context = '',
    options: { signal?: AbortSignal; maxAdaptations?: number } = {}
  ): Promise<SessionResult> {
    return runAdaptiveSession(
      { query, context },
      {
        reasoning: this.reasoning,
        tools: this.tools,
        feedback: this.feedback,
        logger: this.logger,
      },
      { config: this.config, signal: options.signal, maxAdaptations: options.maxAdaptations }
    );
  }
}
