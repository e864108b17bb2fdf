/**
 * Tool Dispatcher
 *
 * Runs a ToolSelection against the handler registered for its kind and
 * keeps a history of dispatched calls.
 */

import { UnknownToolError, errorMessage } from '../../core/errors.js';
import { Logger, defaultLogger } from '../../core/logger.js';
import type { ToolRegistry } from './registry.js';
import type { ToolExecution, ToolOutput, ToolSelection } from './types.js';

export interface DispatchOptions {
  signal?: AbortSignal;
}

export class ToolDispatcher {
  private history: ToolExecution[] = [];
  private logger: Logger;

  constructor(
    private registry: ToolRegistry,
    logger?: Logger
  ) {
    this.logger = (logger ?? defaultLogger()).child('tools');
  }

  /**
   * Execute the selected tool. Unknown kinds, parameter/output mismatches
   * and handler failures all throw; nothing here is retried.
   */
  async execute(selection: ToolSelection, options?: DispatchOptions): Promise<ToolOutput> {
    const startTime = Date.now();
    const timestamp = new Date().toISOString();

    try {
      const tool = this.registry.get(selection.kind);
      if (!tool) {
        throw new UnknownToolError(selection.kind);
      }

      const output = await tool.invoke(selection.parameters, { signal: options?.signal });

      this.record({
        kind: selection.kind,
        parameters: selection.parameters,
        success: true,
        timestamp,
        durationMs: Date.now() - startTime,
      });
      this.logger.debug('tool execution', {
        tool: selection.kind,
        durationMs: Date.now() - startTime,
      });
      return output;
    } catch (error) {
      this.record({
        kind: selection.kind,
        parameters: selection.parameters,
        success: false,
        error: errorMessage(error),
        timestamp,
        durationMs: Date.now() - startTime,
      });
      this.logger.warn(`tool ${selection.kind} failed`, { error: errorMessage(error) });
      throw error;
    }
  }

  availableKinds(): string[] {
    return this.registry.listKinds();
  }

  describeTools(): string {
    return this.registry.describe();
  }

  getHistory(limit?: number): ToolExecution[] {
    if (limit !== undefined) {
      return limit > 0 ? this.history.slice(-limit) : [];
    }
    return [...this.history];
  }

  clearHistory(): void {
    this.history = [];
  }

  private record(execution: ToolExecution): void {
    this.history.push(execution);
  }
}
