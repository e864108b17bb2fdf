/**
 * Tool Selection Parsing
 *
 * Turns raw reasoning-service output into a typed ToolSelection.
 */

import { z } from 'zod';

import { ToolValidationError, UnknownToolError } from '../../core/errors.js';
import {
  CalculatorParametersSchema,
  DeepResearchParametersSchema,
  FinalParametersSchema,
  RagParametersSchema,
  SearchParametersSchema,
  isToolKind,
  normalizeToolKind,
} from './types.js';
import type { ToolSelection } from './types.js';

const RawSelectionSchema = z.object({
  tool: z.string().min(1),
  parameters: z.unknown().optional(),
  tool_parameters: z.unknown().optional(),
});

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

export function validateParameters<T>(
  kind: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ToolValidationError(kind, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Parse `{ tool, parameters }` into a ToolSelection. Unknown kinds raise
 * UnknownToolError; parameters that do not fit the kind raise
 * ToolValidationError.
 */
export function parseToolSelection(raw: unknown): ToolSelection {
  const envelope = RawSelectionSchema.safeParse(raw);
  if (!envelope.success) {
    throw new ToolValidationError('unknown', formatIssues(envelope.error));
  }

  const kind = normalizeToolKind(envelope.data.tool);
  const parameters = envelope.data.parameters ?? envelope.data.tool_parameters ?? {};

  if (!isToolKind(kind)) {
    throw new UnknownToolError(kind);
  }

  switch (kind) {
    case 'search':
      return { kind, parameters: validateParameters(kind, SearchParametersSchema, parameters) };
    case 'rag':
      return { kind, parameters: validateParameters(kind, RagParametersSchema, parameters) };
    case 'deep-research':
      return {
        kind,
        parameters: validateParameters(kind, DeepResearchParametersSchema, parameters),
      };
    case 'calculator':
      return { kind, parameters: validateParameters(kind, CalculatorParametersSchema, parameters) };
    case 'final':
      return { kind, parameters: validateParameters(kind, FinalParametersSchema, parameters) };
    default: {
      const unreachable: never = kind;
      throw new UnknownToolError(String(unreachable));
    }
  }
}
