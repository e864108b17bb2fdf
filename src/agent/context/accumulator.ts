/**
 * Context Accumulator
 *
 * Summarizes each step's tool output and keeps the running knowledge text
 * bounded. Findings are held as `{ step, result }` pairs and rendered as
 * `Step: <description> | Result: <summary>` lines, the form reasoning
 * prompts expect.
 */

import { normalizeToolKind } from '../tools/types.js';

export interface StepFinding {
  step: string;
  result: string;
}

export const DEFAULT_MAX_CONTEXT_CHARS = 2000;
export const DEFAULT_SUMMARY_CHARS = 200;
export const DEFAULT_MAX_KEY_FINDINGS = 5;
export const DEFAULT_MIN_FINDING_CHARS = 10;
export const DEFAULT_FOCUSED_FINDINGS = 3;
export const MAX_STEP_DESCRIPTION_CHARS = 100;

const MERGE_SEPARATOR = '\n\n';
const TRUNCATION_MARKER = '...';
// Room reserved for the marker and separator when the existing text is cut.
const MERGE_OVERHEAD = 10;

const FINDING_PREFIX = 'Step:';
const RESULT_TAG = 'Result:';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function clip(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}${TRUNCATION_MARKER}` : text;
}

function tail(text: string, maxChars: number): string {
  if (maxChars <= 0) return '';
  return text.length > maxChars ? text.slice(-maxChars) : text;
}

function readAnswer(output: unknown): string | null {
  return isRecord(output) && typeof output.answer === 'string' ? output.answer : null;
}

/**
 * Kind-specific one-line description of a tool's output.
 */
export function describeToolOutput(
  toolKind: string,
  output: unknown,
  maxChars: number = DEFAULT_SUMMARY_CHARS
): string {
  switch (normalizeToolKind(toolKind)) {
    case 'search': {
      if (!isRecord(output) || !Array.isArray(output.results)) {
        return 'Web search completed';
      }
      const results: unknown[] = output.results;
      let summary = `Web search found ${results.length} results`;
      const first = results[0];
      if (isRecord(first) && typeof first.title === 'string') {
        summary += `, top result: ${first.title.slice(0, 100)}...`;
      }
      return summary;
    }
    case 'rag': {
      const answer = readAnswer(output);
      return answer === null ? 'RAG search completed' : `RAG search found: ${clip(answer, maxChars)}`;
    }
    case 'deep-research': {
      const answer = readAnswer(output);
      return answer === null
        ? 'Deep research completed'
        : `Deep research analysis: ${clip(answer, maxChars)}`;
    }
    case 'calculator': {
      if (isRecord(output) && 'result' in output) {
        return `Calculation result: ${String(output.result)}`;
      }
      return 'Calculation completed';
    }
    case 'final': {
      const answer = readAnswer(output);
      return answer === null ? 'Final answer recorded' : `Final answer: ${clip(answer, maxChars)}`;
    }
    default:
      return `Tool '${toolKind}' executed successfully`;
  }
}

export function buildStepFinding(
  stepDescription: string,
  toolOutput: unknown,
  toolKind: string,
  maxChars: number = DEFAULT_SUMMARY_CHARS
): StepFinding {
  const step = clip(stepDescription, MAX_STEP_DESCRIPTION_CHARS);
  try {
    return { step, result: describeToolOutput(toolKind, toolOutput, maxChars) };
  } catch (error) {
    return {
      step,
      result: `Tool execution completed (summary generation failed: ${
        error instanceof Error ? error.message : 'Unknown'
      })`,
    };
  }
}

export function formatStepFinding(finding: StepFinding): string {
  const step = finding.step.replace(/\s*\n\s*/g, ' ').trim();
  const result = finding.result.replace(/\s*\n\s*/g, ' ').trim();
  return `${FINDING_PREFIX} ${step} | ${RESULT_TAG} ${result}`;
}

/**
 * Read `Step: ... | Result: ...` lines back into findings, oldest first.
 */
export function parseStepFindings(text: string): StepFinding[] {
  if (!text) return [];

  const findings: StepFinding[] = [];
  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    const resultIndex = line.indexOf(RESULT_TAG);
    if (!line.startsWith(FINDING_PREFIX) || resultIndex === -1) {
      continue;
    }
    const step = line
      .slice(FINDING_PREFIX.length, resultIndex)
      .trim()
      .replace(/\|$/, '')
      .trim();
    const result = line.slice(resultIndex + RESULT_TAG.length).trim();
    findings.push({ step, result });
  }
  return findings;
}

/**
 * One-line summary of a step's outcome, in the tagged text form.
 */
export function summarizeStepResult(
  stepDescription: string,
  toolOutput: unknown,
  toolKind: string,
  maxChars: number = DEFAULT_SUMMARY_CHARS
): string {
  return formatStepFinding(buildStepFinding(stepDescription, toolOutput, toolKind, maxChars));
}

/**
 * Append new information to the running context, never exceeding
 * `maxLength`. When space runs out the oldest text is dropped; the new
 * information is kept whole whenever it fits on its own.
 */
export function mergeContexts(
  existing: string,
  incoming: string,
  maxLength: number = DEFAULT_MAX_CONTEXT_CHARS
): string {
  const limit = Math.max(0, maxLength);

  if (!existing) {
    return incoming.slice(0, limit);
  }

  if (!incoming) {
    return tail(existing, limit);
  }

  const merged = `${existing}${MERGE_SEPARATOR}${incoming}`;
  if (merged.length <= limit) {
    return merged;
  }

  const available = limit - incoming.length - MERGE_OVERHEAD;
  if (available > 0) {
    return `${TRUNCATION_MARKER}${tail(existing, available)}${MERGE_SEPARATOR}${incoming}`;
  }

  return incoming.slice(0, limit);
}

/**
 * Result fragments of the tagged findings in `context`, most recent first,
 * skipping fragments too short to carry information.
 */
export function extractKeyFindings(
  context: string,
  maxFindings: number = DEFAULT_MAX_KEY_FINDINGS,
  minChars: number = DEFAULT_MIN_FINDING_CHARS
): string[] {
  if (maxFindings <= 0) return [];
  return parseStepFindings(context)
    .map((finding) => finding.result)
    .filter((result) => result.length > minChars)
    .reverse()
    .slice(0, maxFindings);
}

export interface FocusedContext {
  query: string;
  context: string;
}

/**
 * Narrow the original query/context to one step, carrying forward the
 * latest key findings.
 */
export function createFocusedContext(
  query: string,
  context: string,
  accumulatedKnowledge: string,
  stepDescription: string,
  maxFindings: number = DEFAULT_FOCUSED_FINDINGS
): FocusedContext {
  const focusedQuery = `${query} (Current focus: ${stepDescription})`;
  const findings = extractKeyFindings(accumulatedKnowledge, maxFindings);

  let focusedContext = context;
  if (findings.length > 0) {
    focusedContext += `${MERGE_SEPARATOR}Previous research findings: ${findings.join(' | ')}`;
  }

  return { query: focusedQuery, context: focusedContext };
}

/**
 * Cap text rendered into a prompt (tool output, research bodies).
 */
export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const marker = '\n...[truncated]';
  if (maxChars <= marker.length) return text.slice(0, Math.max(0, maxChars));
  return `${text.slice(0, maxChars - marker.length)}${marker}`;
}
