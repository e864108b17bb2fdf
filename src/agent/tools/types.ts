/**
 * Tool Types
 *
 * Closed set of tool kinds the reasoning service may select, with the
 * parameter and output shapes each kind declares.
 */

import { z } from 'zod';

export const TOOL_KINDS = ['search', 'rag', 'deep-research', 'calculator', 'final'] as const;

export type ToolKind = (typeof TOOL_KINDS)[number];

/** Tool kind that ends the session once selected. */
export const FINAL_TOOL_KIND = 'final' satisfies ToolKind;

/** Alternate spellings the reasoning service is known to emit. */
export const TOOL_KIND_ALIASES: Readonly<Record<string, ToolKind>> = {
  'web-search': 'search',
  web_search: 'search',
  deep_research: 'deep-research',
  final_answer: 'final',
};

const KNOWN_KINDS: ReadonlySet<string> = new Set(TOOL_KINDS);

export function isToolKind(value: string): value is ToolKind {
  return KNOWN_KINDS.has(value);
}

export function normalizeToolKind(value: string): string {
  const trimmed = value.trim();
  return TOOL_KIND_ALIASES[trimmed] ?? trimmed;
}

// --- Parameters ---

export const SearchParametersSchema = z.object({
  queries: z.array(z.string().min(1)).min(1).max(3),
  category: z.enum(['general', 'news', 'social_media']).optional(),
});

export const RagParametersSchema = z.object({
  query: z.string().min(1),
  docType: z.string().optional(),
  numResults: z.number().int().positive().optional(),
});

export const DeepResearchParametersSchema = z.object({
  question: z.string().min(1),
});

export const CalculatorParametersSchema = z.object({
  expression: z.string().min(1),
});

export const FinalParametersSchema = z.object({
  answer: z.string(),
});

export interface ToolParameterMap {
  search: z.infer<typeof SearchParametersSchema>;
  rag: z.infer<typeof RagParametersSchema>;
  'deep-research': z.infer<typeof DeepResearchParametersSchema>;
  calculator: z.infer<typeof CalculatorParametersSchema>;
  final: z.infer<typeof FinalParametersSchema>;
}

// --- Outputs ---

export const SearchResultSchema = z.object({
  url: z.string(),
  title: z.string(),
  content: z.string().optional(),
  publishedDate: z.string().optional(),
});

export const SearchOutputSchema = z.object({
  results: z.array(SearchResultSchema),
});

export const AnswerOutputSchema = z.object({
  answer: z.string(),
  sources: z.array(z.string()).optional(),
});

export const CalculatorOutputSchema = z.object({
  result: z.union([z.number(), z.string()]),
});

export const FinalOutputSchema = z.object({
  answer: z.string(),
});

export interface ToolOutputMap {
  search: z.infer<typeof SearchOutputSchema>;
  rag: z.infer<typeof AnswerOutputSchema>;
  'deep-research': z.infer<typeof AnswerOutputSchema>;
  calculator: z.infer<typeof CalculatorOutputSchema>;
  final: z.infer<typeof FinalOutputSchema>;
}

export type ToolParameters<K extends ToolKind = ToolKind> = ToolParameterMap[K];
export type ToolOutput<K extends ToolKind = ToolKind> = ToolOutputMap[K];

/**
 * A reasoning-service decision: which tool to run and with what input.
 * Discriminated on `kind`, so `parameters` always matches the kind.
 */
export type ToolSelection<K extends ToolKind = ToolKind> = {
  [P in K]: { kind: P; parameters: ToolParameterMap[P] };
}[K];

/**
 * Prompt-facing description of each kind's parameters.
 */
export const TOOL_PARAMETER_HINTS: Readonly<Record<ToolKind, string>> = {
  search: '{ "queries": string[1-3], "category"?: "general" | "news" | "social_media" }',
  rag: '{ "query": string, "docType"?: string, "numResults"?: integer }',
  'deep-research': '{ "question": string }',
  calculator: '{ "expression": string }',
  final: '{ "answer": string }',
};

/**
 * Context passed to a tool handler.
 */
export interface ToolCallContext {
  /** Cancellation for the surrounding session */
  signal?: AbortSignal;
}

/**
 * A registered tool implementation.
 */
export interface ToolHandler<K extends ToolKind = ToolKind> {
  kind: K;

  /** Human-readable description shown to the reasoning service */
  description: string;

  /** Declared input shape */
  parameters: z.ZodType<ToolParameterMap[K], z.ZodTypeDef, unknown>;

  /** Declared output shape */
  output: z.ZodType<ToolOutputMap[K], z.ZodTypeDef, unknown>;

  execute: (parameters: ToolParameterMap[K], ctx: ToolCallContext) => Promise<ToolOutputMap[K]>;
}

/**
 * Record of a dispatched tool call.
 */
export interface ToolExecution {
  kind: ToolKind;
  parameters: unknown;
  success: boolean;
  error?: string;
  timestamp: string;
  durationMs: number;
}
