import { describe, expect, it } from 'vitest';

import { PlanShapeError, ReasoningContractError, UnknownToolError } from '../../src/core/errors.js';
import { createExecutionFeedback } from '../../src/agent/feedback/types.js';
import { toPlanSteps } from '../../src/agent/planning/planner.js';
import { extractJsonCandidate } from '../../src/agent/reasoning/json.js';
import { LlmReasoningService, renderTurn } from '../../src/agent/reasoning/llm-reasoning.js';
import type { ExecutionContext } from '../../src/agent/reasoning/types.js';
import { ScriptedLlm, lowFeedback, quietLogger } from '../helpers/fakes.js';

const executionContext: ExecutionContext = {
  query: 'How is Acme growing? (Current focus: Find recent revenue figures)',
  context: '',
  accumulatedKnowledge: 'Planning reasoning: Gather data first',
  stepId: 'step_1',
  stepDescription: 'Find recent revenue figures',
  toolCatalogue: '- search: Search the web.',
};

describe('extractJsonCandidate', () => {
  it('prefers a fenced block', () => {
    expect(extractJsonCandidate('Here you go:\n```json\n{"a": 1}\n```\nThanks {b}')).toBe('{"a": 1}');
  });

  it('falls back to the outermost braces', () => {
    expect(extractJsonCandidate('Plan: {"steps": [{"description": "x"}]} done')).toBe(
      '{"steps": [{"description": "x"}]}'
    );
  });

  it('returns null without an object', () => {
    expect(extractJsonCandidate('no json here')).toBeNull();
  });
});

describe('LlmReasoningService', () => {
  it('builds a plan from a snake_case reply', async () => {
    const llm = new ScriptedLlm([
      '```json\n' +
        JSON.stringify({
          steps: [
            { description: 'Find recent revenue figures', focus_area: 'revenue' },
            { description: 'Compare with competitors', expected_outcome: 'peer table' },
          ],
          reasoning: 'Gather data first',
          priority_areas: ['revenue'],
        }) +
        '\n```',
    ]);
    const service = new LlmReasoningService(llm, undefined, quietLogger());

    const plan = await service.plan('How is Acme growing?', 'Public company');

    expect(plan).toEqual({
      steps: [
        { id: 'step_1', description: 'Find recent revenue figures', focusArea: 'revenue', status: 'pending' },
        {
          id: 'step_2',
          description: 'Compare with competitors',
          expectedOutcome: 'peer table',
          status: 'pending',
        },
      ],
      reasoning: 'Gather data first',
      priorityAreas: ['revenue'],
    });
    expect(llm.calls[0]?.messages[1]?.content).toBe(
      '## Query\nHow is Acme growing?\n\n## Context\nPublic company\n\nCreate the research plan.'
    );
  });

  it('rejects plans with too many steps', async () => {
    const steps = Array.from({ length: 5 }, (_, index) => ({ description: `Step ${index + 1}` }));
    const service = new LlmReasoningService(
      new ScriptedLlm([JSON.stringify({ steps, reasoning: 'r' })]),
      undefined,
      quietLogger()
    );
    await expect(service.plan('q', '')).rejects.toThrow(PlanShapeError);
  });

  it('raises a contract error for replies without JSON', async () => {
    const service = new LlmReasoningService(new ScriptedLlm(['I cannot help']), undefined, quietLogger());
    await expect(service.plan('q', '')).rejects.toThrow(
      'Reasoning service returned invalid plan output: no JSON object in response'
    );
  });

  it('puts the tool catalogue into the selection prompt', async () => {
    const llm = new ScriptedLlm([
      '{"tool": "web_search", "parameters": {"queries": ["acme revenue"]}, "reasoning": "need data"}',
    ]);
    const service = new LlmReasoningService(llm, undefined, quietLogger());

    const selection = await service.selectTool(executionContext);

    expect(selection).toEqual({ kind: 'search', parameters: { queries: ['acme revenue'] } });
    expect(llm.calls[0]?.messages[0]?.content).toContain('## Available Tools\n\n- search: Search the web.');
    expect(llm.calls[0]?.messages[1]?.content).toBe(
      [
        '## Query\nHow is Acme growing? (Current focus: Find recent revenue figures)',
        '## Current Step (step_1)\nFind recent revenue figures',
        '## Accumulated Knowledge\nPlanning reasoning: Gather data first',
      ].join('\n\n')
    );
  });

  it('rejects unknown tools', async () => {
    const service = new LlmReasoningService(
      new ScriptedLlm(['{"tool": "scraper", "parameters": {}}']),
      undefined,
      quietLogger()
    );
    await expect(service.selectTool(executionContext)).rejects.toThrow(UnknownToolError);
  });

  it('passes the conversation so far as a second system message', async () => {
    const llm = new ScriptedLlm(['{"tool": "final", "parameters": {"answer": "done"}}']);
    const service = new LlmReasoningService(llm, undefined, quietLogger());

    await service.selectTool(executionContext, {
      history: [
        { type: 'request', role: 'user', content: 'How is Acme growing?' },
        { type: 'response', content: 'Research plan: a; b' },
      ],
    });

    expect(llm.calls[0]?.messages).toHaveLength(3);
    expect(llm.calls[0]?.messages[1]).toEqual({
      role: 'system',
      content: '## Conversation So Far\n[user] How is Acme growing?\n[assistant] Research plan: a; b',
    });
  });

  it('maps plan update replies into decisions', async () => {
    const llm = new ScriptedLlm([
      JSON.stringify({
        should_update: true,
        updated_steps: [{ description: 'Check segment data', focus_area: 'segments' }],
        reasoning: 'gap in segments',
        confidence: 0.7,
      }),
    ]);
    const service = new LlmReasoningService(llm, undefined, quietLogger());

    const decision = await service.evaluateUpdate({
      query: 'q',
      currentStepIndex: 0,
      feedback: createExecutionFeedback({ stepCompleted: 'Find recent revenue figures', ...lowFeedback }),
      remainingSteps: toPlanSteps([{ description: 'Compare with competitors' }], 1),
      accumulatedKnowledge: '',
    });

    expect(decision).toEqual({
      shouldUpdate: true,
      updatedSteps: [{ description: 'Check segment data', focusArea: 'segments' }],
      reasoning: 'gap in segments',
      confidence: 0.7,
    });
    const prompt = llm.calls[0]?.messages[1]?.content ?? '';
    expect(prompt).toContain('Findings quality: 0.40');
    expect(prompt).toContain('Data gaps:\n- segment revenue');
    expect(prompt).toContain('## Remaining Steps\n1. Compare with competitors');
  });

  it('rejects update confidence outside [0, 1]', async () => {
    const service = new LlmReasoningService(
      new ScriptedLlm(['{"should_update": false, "confidence": 1.4}']),
      undefined,
      quietLogger()
    );
    await expect(
      service.evaluateUpdate({
        query: 'q',
        currentStepIndex: 0,
        feedback: createExecutionFeedback({ stepCompleted: 's', ...lowFeedback }),
        remainingSteps: [],
        accumulatedKnowledge: '',
      })
    ).rejects.toThrow(ReasoningContractError);
  });

  it('summarizes into a single response turn', async () => {
    const llm = new ScriptedLlm(['  Revenue grew 12%.  ']);
    const service = new LlmReasoningService(llm, undefined, quietLogger());

    await expect(
      service.summarize([{ type: 'request', role: 'user', content: 'q' }])
    ).resolves.toEqual({ type: 'response', content: 'Conversation summary: Revenue grew 12%.' });
    expect(llm.calls[0]?.messages[1]?.content).toBe('Summarize this research conversation:\n\n[user] q');
  });

  it('rejects empty summaries', async () => {
    const service = new LlmReasoningService(new ScriptedLlm(['   ']), undefined, quietLogger());
    await expect(service.summarize([])).rejects.toThrow(ReasoningContractError);
  });
});

describe('renderTurn', () => {
  it('renders tool calls and results', () => {
    expect(
      renderTurn({
        type: 'tool_call',
        content: 'x',
        calls: [{ id: 'c1', toolName: 'calculator', parameters: { expression: '1 + 1' } }],
      })
    ).toBe('[tool call] calculator({"expression":"1 + 1"})');
    expect(
      renderTurn({ type: 'tool_result', callId: 'c1', toolName: 'calculator', content: '2' })
    ).toBe('[tool result: calculator] 2');
  });
});
