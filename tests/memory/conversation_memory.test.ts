import { describe, expect, it, vi } from 'vitest';

import { SummarizationError } from '../../src/core/errors.js';
import {
  DEFAULT_MEMORY_OPTIONS,
  MemoryManager,
  filterLowValueResponses,
  keepRecentWithContext,
  processConversation,
  repairToolPairing,
  selectStrategy,
  summarizeConversation,
  type ConversationTurn,
} from '../../src/memory/conversation_memory.js';
import { quietLogger } from '../helpers/fakes.js';

const system: ConversationTurn = { type: 'request', role: 'system', content: 'You are a researcher.' };
const user = (content: string): ConversationTurn => ({ type: 'request', role: 'user', content });
const reply = (content: string): ConversationTurn => ({ type: 'response', content });
const call = (id: string): ConversationTurn => ({
  type: 'tool_call',
  content: `calling ${id}`,
  calls: [{ id, toolName: 'search', parameters: { queries: [id] } }],
});
const result = (id: string): ConversationTurn => ({
  type: 'tool_result',
  callId: id,
  toolName: 'search',
  content: `result ${id}`,
});

function pairingHolds(turns: ConversationTurn[]): boolean {
  return turns.every((turn, index) => {
    if (turn.type === 'tool_call') return turns[index + 1]?.type === 'tool_result';
    if (turn.type === 'tool_result') {
      const previous = turns[index - 1];
      return previous?.type === 'tool_call' || previous?.type === 'tool_result';
    }
    return true;
  });
}

describe('repairToolPairing', () => {
  it('drops orphan tool results', () => {
    const turns = [system, user('q1'), call('c1'), result('c1'), user('q2'), reply('done')];
    const withOrphans = [...turns.slice(0, 2), result('x1'), ...turns.slice(2), result('x2')];

    const repaired = repairToolPairing(withOrphans);

    expect(repaired).toEqual(turns);
    expect(withOrphans.length - repaired.length).toBe(2);
  });

  it('keeps several results after one call', () => {
    const turns = [user('q'), call('c1'), result('c1'), result('c1b'), reply('ok')];
    expect(repairToolPairing(turns)).toEqual(turns);
  });

  it('drops calls that are not followed by a result', () => {
    expect(repairToolPairing([user('q'), call('c1'), reply('ok'), call('c2')])).toEqual([
      user('q'),
      reply('ok'),
    ]);
  });

  it('is idempotent', () => {
    const messy = [
      result('orphan'),
      system,
      call('c1'),
      user('interrupt'),
      result('c1'),
      call('c2'),
      result('c2'),
      result('c2b'),
      reply('analysis'),
      call('c3'),
    ];
    const once = repairToolPairing(messy);
    expect(repairToolPairing(once)).toEqual(once);
    expect(pairingHolds(once)).toBe(true);
  });
});

describe('filtering and trimming', () => {
  it('drops short responses without research keywords', () => {
    const long = 'This reply is long enough to be kept even without any keyword in it.';
    const turns = [user('q'), reply('ok'), reply('Market risk is rising'), reply(long), call('c1')];
    expect(filterLowValueResponses(turns)).toEqual([
      user('q'),
      reply('Market risk is rising'),
      reply(long),
      call('c1'),
    ]);
  });

  it('keeps a leading system turn when trimming', () => {
    const turns = [system, ...Array.from({ length: 9 }, (_, index) => user(`q${index}`))];
    expect(keepRecentWithContext(turns, 4)).toEqual([system, user('q6'), user('q7'), user('q8')]);
  });

  it('selects the strategy by length', () => {
    expect(selectStrategy(6)).toBe('validate_only');
    expect(selectStrategy(7)).toBe('filter_and_trim');
    expect(selectStrategy(12)).toBe('filter_and_trim');
    expect(selectStrategy(13)).toBe('aggressive_trim');
  });
});

describe('processConversation', () => {
  it('only repairs short conversations', () => {
    const turns = [system, reply('ok'), result('orphan'), user('q')];
    expect(processConversation(turns)).toEqual([system, reply('ok'), user('q')]);
  });

  it('filters medium conversations and keeps eight turns', () => {
    const turns = [
      system,
      user('q1'),
      reply('ok'),
      call('c1'),
      result('c1'),
      user('q2'),
      reply('ok'),
      call('c2'),
      result('c2'),
      user('q3'),
    ];
    expect(processConversation(turns)).toEqual([
      system,
      user('q1'),
      call('c1'),
      result('c1'),
      user('q2'),
      call('c2'),
      result('c2'),
      user('q3'),
    ]);
  });

  it('repairs pairs split by the cap', () => {
    const turns = [
      system,
      user('q1'),
      user('q2'),
      user('q3'),
      call('c1'),
      result('c1'),
      user('q4'),
      user('q5'),
      call('c2'),
      result('c2'),
      user('q6'),
      user('q7'),
    ];
    expect(processConversation(turns)).toEqual([
      system,
      user('q4'),
      user('q5'),
      call('c2'),
      result('c2'),
      user('q6'),
      user('q7'),
    ]);
  });

  it('keeps the original system turn first in long conversations', () => {
    const turns: ConversationTurn[] = [system];
    for (let index = 1; index <= 7; index += 1) {
      turns.push(user(`q${index}`));
      if (index < 7) turns.push(reply('ok'));
    }
    expect(turns).toHaveLength(14);

    const processed = processConversation(turns);

    expect(processed[0]).toBe(system);
    expect(processed).toEqual([system, user('q3'), user('q4'), user('q5'), user('q6'), user('q7')]);
  });

  it('keeps the system turn under a smaller long-conversation cap', () => {
    const turns: ConversationTurn[] = [system];
    for (let index = 1; index <= 13; index += 1) {
      turns.push(user(`q${index}`));
    }

    expect(processConversation(turns, { ...DEFAULT_MEMORY_OPTIONS, longKeep: 2 })).toEqual([
      system,
      user('q13'),
    ]);
  });
});

describe('summarization', () => {
  const turns = [system, user('q1'), call('c1'), result('c1'), reply('Market analysis'), user('q2'), reply('Growth plan'), user('q3')];

  it('replaces older turns with one summary turn after the system turn', async () => {
    const summary: ConversationTurn = { type: 'response', content: 'Conversation summary: revenue up' };
    const summarize = vi.fn(async (_turns: ConversationTurn[]) => summary);

    const compacted = await summarizeConversation(turns, summarize);

    expect(summarize).toHaveBeenCalledWith(turns.slice(1, 5), { signal: undefined });
    expect(compacted).toEqual([system, summary, user('q2'), reply('Growth plan'), user('q3')]);
    expect(compacted[0]).toBe(system);
  });

  it('puts the summary first when there is no system turn', async () => {
    const summary: ConversationTurn = { type: 'response', content: 'Conversation summary: s' };
    const withoutSystem = turns.slice(1);

    const compacted = await summarizeConversation(withoutSystem, async () => summary);

    expect(compacted).toEqual([summary, user('q2'), reply('Growth plan'), user('q3')]);
  });

  it('falls back to the system turn and the last three turns when summarizing fails', async () => {
    const errors: SummarizationError[] = [];
    const compacted = await summarizeConversation(
      turns,
      async () => {
        throw new Error('model offline');
      },
      { onError: (error) => errors.push(error) }
    );

    expect(compacted).toEqual([system, user('q2'), reply('Growth plan'), user('q3')]);
    expect(errors[0]?.message).toBe('Conversation summarization failed: model offline');
  });

  it('summarizes only long conversations through the manager', async () => {
    const summary: ConversationTurn = { type: 'response', content: 'Conversation summary: s' };
    const summarize = vi.fn(async () => summary);
    const manager = new MemoryManager({}, summarize, quietLogger());

    await manager.compact(turns);
    expect(summarize).not.toHaveBeenCalled();

    const long = [...turns, user('q4'), user('q5'), user('q6'), user('q7'), user('q8')];
    const compacted = await manager.compact(long);
    expect(summarize).toHaveBeenCalledTimes(1);
    expect(compacted).toEqual([system, summary, user('q6'), user('q7'), user('q8')]);
  });

  it('falls back to process without a summarizer', async () => {
    const manager = new MemoryManager({}, undefined, quietLogger());
    await expect(manager.compact(turns)).resolves.toEqual(manager.process(turns));
  });
});
