import type { z } from 'zod';

import { ReasoningContractError } from '../../core/errors.js';
import { formatIssues } from '../tools/selection.js';

/**
 * Pull the JSON object out of a model reply: a ```json fence wins,
 * otherwise the outermost braces.
 */
export function extractJsonCandidate(text: string): string | null {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const body = fenced?.[1]?.trim();
  if (body && body.startsWith('{')) {
    return body;
  }
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start >= 0 && end > start) {
    return text.slice(start, end + 1);
  }
  return null;
}

/**
 * Parse a reply against `schema`, raising ReasoningContractError when it
 * holds no JSON object or the object does not fit.
 */
export function parseJsonReply<T>(
  operation: string,
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  const candidate = extractJsonCandidate(text);
  if (candidate === null) {
    throw new ReasoningContractError(operation, 'no JSON object in response');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(candidate);
  } catch (error) {
    throw new ReasoningContractError(
      operation,
      `malformed JSON (${error instanceof Error ? error.message : 'Unknown'})`
    );
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ReasoningContractError(operation, formatIssues(result.error).join('; '));
  }
  return result.data;
}
