/**
 * Tool Registry
 *
 * Holds at most one handler per tool kind. Handlers are wrapped at
 * registration so that every call validates its input and output against
 * the schemas the handler declares.
 */

import { ToolExecutionError, ToolValidationError } from '../../core/errors.js';
import { formatIssues } from './selection.js';
import { FinalOutputSchema, FinalParametersSchema, TOOL_PARAMETER_HINTS } from './types.js';
import type { ToolCallContext, ToolHandler, ToolKind, ToolOutput } from './types.js';

/**
 * A handler as stored in the registry, with its types erased behind
 * validation.
 */
export interface RegisteredTool {
  kind: ToolKind;
  description: string;
  invoke: (parameters: unknown, ctx: ToolCallContext) => Promise<ToolOutput>;
}

/**
 * Built-in terminal tool: echoes the answer back as its output.
 */
export const finalAnswerTool: ToolHandler<'final'> = {
  kind: 'final',
  description:
    'Finish the research and return the final answer once enough information has been gathered.',
  parameters: FinalParametersSchema,
  output: FinalOutputSchema,
  execute: async (parameters) => ({ answer: parameters.answer }),
};

function wrapHandler<K extends ToolKind>(handler: ToolHandler<K>): RegisteredTool {
  return {
    kind: handler.kind,
    description: handler.description,
    invoke: async (parameters, ctx) => {
      const input = handler.parameters.safeParse(parameters);
      if (!input.success) {
        throw new ToolValidationError(handler.kind, formatIssues(input.error));
      }

      let output: ToolOutput<K>;
      try {
        output = await handler.execute(input.data, ctx);
      } catch (error) {
        throw new ToolExecutionError(handler.kind, error);
      }

      const checked = handler.output.safeParse(output);
      if (!checked.success) {
        throw new ToolValidationError(handler.kind, formatIssues(checked.error), 'output');
      }
      // Returned as produced; the parsed copy would drop undeclared fields.
      return output;
    },
  };
}

export class ToolRegistry {
  private tools: Map<ToolKind, RegisteredTool> = new Map();

  /**
   * Register a handler. Each kind may be registered once.
   */
  register<K extends ToolKind>(handler: ToolHandler<K>): this {
    if (this.tools.has(handler.kind)) {
      throw new Error(`Tool already registered: ${handler.kind}`);
    }
    this.tools.set(handler.kind, wrapHandler(handler));
    return this;
  }

  /**
   * Register or replace a handler.
   */
  override<K extends ToolKind>(handler: ToolHandler<K>): this {
    this.tools.set(handler.kind, wrapHandler(handler));
    return this;
  }

  get(kind: ToolKind): RegisteredTool | undefined {
    return this.tools.get(kind);
  }

  has(kind: ToolKind): boolean {
    return this.tools.has(kind);
  }

  listKinds(): ToolKind[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Tool catalogue for reasoning prompts.
   */
  describe(): string {
    return Array.from(this.tools.values())
      .map((tool) => `- ${tool.kind}: ${tool.description}\n  parameters: ${TOOL_PARAMETER_HINTS[tool.kind]}`)
      .join('\n');
  }
}

/**
 * Create a registry pre-loaded with the terminal `final` tool.
 */
export function createToolRegistry(): ToolRegistry {
  return new ToolRegistry().register(finalAnswerTool);
}
