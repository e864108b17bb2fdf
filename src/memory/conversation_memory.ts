/**
 * Conversation Memory
 *
 * Trims a research conversation by length while keeping every retained
 * tool call immediately followed by its result(s).
 */

import { SummarizationError, errorMessage } from '../core/errors.js';
import { Logger, defaultLogger } from '../core/logger.js';

export interface ToolCallRecord {
  id: string;
  toolName: string;
  parameters: unknown;
}

export type ConversationTurn =
  | { type: 'request'; role: 'system' | 'user'; content: string }
  | { type: 'response'; content: string }
  | { type: 'tool_call'; content: string; calls: ToolCallRecord[] }
  | { type: 'tool_result'; callId: string; toolName: string; content: string };

export type MemoryStrategy = 'validate_only' | 'filter_and_trim' | 'aggressive_trim';

export interface MemoryOptions {
  /** Up to this many turns, only the repair pass runs */
  validateOnlyMax: number;
  /** Up to this many turns, filter and keep `mediumKeep` */
  mediumMax: number;
  mediumKeep: number;
  longKeep: number;
  /** Turns kept verbatim after a summary */
  summaryKeepRecent: number;
  /** Responses at least this long are kept even without a keyword */
  minResponseChars: number;
}

export const DEFAULT_MEMORY_OPTIONS: MemoryOptions = {
  validateOnlyMax: 6,
  mediumMax: 12,
  mediumKeep: 8,
  longKeep: 6,
  summaryKeepRecent: 3,
  minResponseChars: 50,
};

export const RELEVANCE_KEYWORDS = [
  'analysis',
  'findings',
  'recommendation',
  'financial',
  'risk',
  'opportunity',
  'metric',
  'valuation',
  'growth',
  'market',
  'plan',
  'strategy',
  'update',
  'adapt',
  'confidence',
] as const;

export type ConversationSummarizer = (
  turns: ConversationTurn[],
  options?: { signal?: AbortSignal }
) => Promise<ConversationTurn>;

function isSystemTurn(turn: ConversationTurn | undefined): boolean {
  return turn?.type === 'request' && turn.role === 'system';
}

/**
 * Drop tool results that do not follow a tool call, and tool calls that
 * are not immediately followed by a result. Idempotent.
 */
export function repairToolPairing(turns: ConversationTurn[]): ConversationTurn[] {
  const repaired: ConversationTurn[] = [];
  let expectingToolResult = false;

  turns.forEach((turn, index) => {
    switch (turn.type) {
      case 'tool_call':
        if (turns[index + 1]?.type === 'tool_result') {
          repaired.push(turn);
          expectingToolResult = true;
        } else {
          expectingToolResult = false;
        }
        return;
      case 'tool_result':
        // A call may fan out into several consecutive results.
        if (expectingToolResult) {
          repaired.push(turn);
        }
        return;
      default:
        repaired.push(turn);
        expectingToolResult = false;
    }
  });

  return repaired;
}

export function isLowValueResponse(
  turn: ConversationTurn,
  minChars: number = DEFAULT_MEMORY_OPTIONS.minResponseChars
): boolean {
  if (turn.type !== 'response') return false;
  const text = turn.content.toLowerCase();
  if (RELEVANCE_KEYWORDS.some((keyword) => text.includes(keyword))) return false;
  return text.length <= minChars;
}

/**
 * Remove short plain responses with no research content. Requests and
 * tool turns are always kept.
 */
export function filterLowValueResponses(
  turns: ConversationTurn[],
  minChars: number = DEFAULT_MEMORY_OPTIONS.minResponseChars
): ConversationTurn[] {
  return turns.filter((turn) => !isLowValueResponse(turn, minChars));
}

/**
 * Keep the last `maxTurns` turns; a leading system turn stays in place and
 * counts toward the limit.
 */
export function keepRecentWithContext(
  turns: ConversationTurn[],
  maxTurns: number
): ConversationTurn[] {
  if (turns.length <= maxTurns) return [...turns];
  if (maxTurns <= 0) return [];

  const [first, ...rest] = turns;
  if (first && isSystemTurn(first)) {
    const recent = maxTurns > 1 ? rest.slice(-(maxTurns - 1)) : [];
    return [first, ...recent];
  }
  return turns.slice(-maxTurns);
}

export function selectStrategy(
  turnCount: number,
  options: MemoryOptions = DEFAULT_MEMORY_OPTIONS
): MemoryStrategy {
  if (turnCount <= options.validateOnlyMax) return 'validate_only';
  if (turnCount <= options.mediumMax) return 'filter_and_trim';
  return 'aggressive_trim';
}

/**
 * Apply the length-based strategy and finish with the repair pass.
 */
export function processConversation(
  turns: ConversationTurn[],
  options: MemoryOptions = DEFAULT_MEMORY_OPTIONS
): ConversationTurn[] {
  switch (selectStrategy(turns.length, options)) {
    case 'validate_only':
      return repairToolPairing(turns);
    case 'filter_and_trim': {
      const filtered = filterLowValueResponses(turns, options.minResponseChars);
      return repairToolPairing(keepRecentWithContext(filtered, options.mediumKeep));
    }
    case 'aggressive_trim': {
      // The filter never drops requests, so the leading system turn is
      // still first here and keepRecentWithContext retains it.
      const filtered = filterLowValueResponses(turns, options.minResponseChars);
      return repairToolPairing(keepRecentWithContext(filtered, options.longKeep));
    }
  }
}

/**
 * Replace everything but the last `keepRecent` turns with one summary turn.
 * A leading system turn stays first and is not summarized. When the
 * summarizer fails, only that system turn and the recent turns are kept
 * and the failure is passed to `onError`.
 */
export async function summarizeConversation(
  turns: ConversationTurn[],
  summarize: ConversationSummarizer,
  options: {
    keepRecent?: number;
    signal?: AbortSignal;
    onError?: (error: SummarizationError) => void;
  } = {}
): Promise<ConversationTurn[]> {
  const keepRecent = options.keepRecent ?? DEFAULT_MEMORY_OPTIONS.summaryKeepRecent;
  if (turns.length <= keepRecent) {
    return repairToolPairing(turns);
  }

  const [first] = turns;
  const lead = first && isSystemTurn(first) ? [first] : [];
  const older = turns.slice(lead.length, turns.length - keepRecent);
  const recent = turns.slice(turns.length - keepRecent);
  if (older.length === 0) {
    return repairToolPairing(turns);
  }

  try {
    const summary = await summarize(older, { signal: options.signal });
    return repairToolPairing([...lead, summary, ...recent]);
  } catch (error) {
    options.onError?.(new SummarizationError(error));
    return repairToolPairing([...lead, ...recent]);
  }
}

/**
 * Per-session conversation history manager.
 */
export class MemoryManager {
  private options: MemoryOptions;
  private logger: Logger;

  constructor(
    options: Partial<MemoryOptions> = {},
    private summarizer?: ConversationSummarizer,
    logger?: Logger
  ) {
    this.options = { ...DEFAULT_MEMORY_OPTIONS, ...options };
    this.logger = (logger ?? defaultLogger()).child('memory');
  }

  process(turns: ConversationTurn[]): ConversationTurn[] {
    const strategy = selectStrategy(turns.length, this.options);
    const processed = processConversation(turns, this.options);
    this.logger.debug('conversation processed', {
      strategy,
      before: turns.length,
      after: processed.length,
    });
    return processed;
  }

  /**
   * Like `process`, but long conversations are summarized when a
   * summarizer was provided.
   */
  async compact(
    turns: ConversationTurn[],
    options: { signal?: AbortSignal } = {}
  ): Promise<ConversationTurn[]> {
    if (!this.summarizer || turns.length <= this.options.mediumMax) {
      return this.process(turns);
    }

    return summarizeConversation(turns, this.summarizer, {
      keepRecent: this.options.summaryKeepRecent,
      signal: options.signal,
      onError: (error) => {
        this.logger.warn('summarization failed, keeping recent turns only', {
          error: errorMessage(error.cause),
        });
      },
    });
  }
}
