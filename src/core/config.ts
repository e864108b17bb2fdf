import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

import { ConfigError } from './errors.js';

const score = z.number().min(0).max(1);

// Thresholds and character caps are untuned defaults.
const ConfigSchema = z.object({
  llm: z
    .object({
      provider: z.enum(['anthropic', 'openai']).default('openai'),
      model: z.string().default('gpt-4o-mini'),
      baseUrl: z.string().default('https://openrouter.ai/api/v1'),
      temperature: z.number().min(0).max(2).default(0.2),
      maxTokens: z.number().int().positive().default(1024),
      timeoutMs: z.number().int().positive().default(60_000),
    })
    .default({}),
  session: z
    .object({
      maxAdaptations: z.number().int().min(0).default(2),
      maxAccumulatedChars: z.number().int().positive().default(2000),
    })
    .default({}),
  feedback: z
    .object({
      qualityThreshold: score.default(0.6),
      confidenceThreshold: score.default(0.5),
    })
    .default({}),
  memory: z
    .object({
      validateOnlyMax: z.number().int().min(0).default(6),
      mediumMax: z.number().int().min(0).default(12),
      mediumKeep: z.number().int().positive().default(8),
      longKeep: z.number().int().positive().default(6),
      summaryKeepRecent: z.number().int().positive().default(3),
      minResponseChars: z.number().int().min(0).default(50),
    })
    .default({}),
  context: z
    .object({
      summaryChars: z.number().int().positive().default(200),
      maxKeyFindings: z.number().int().positive().default(5),
      focusedFindings: z.number().int().min(0).default(3),
      minFindingChars: z.number().int().min(0).default(10),
      maxToolOutputChars: z.number().int().positive().default(50_000),
      maxResearchChars: z.number().int().positive().default(380_000),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type ResearchConfig = z.infer<typeof ConfigSchema>;

export function parseConfig(raw: unknown): ResearchConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  return result.data;
}

export function defaultConfig(): ResearchConfig {
  return parseConfig({});
}

function applyEnvOverrides(cfg: ResearchConfig, env: NodeJS.ProcessEnv): ResearchConfig {
  const level = env.RESEARCH_LOG_LEVEL?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    cfg.logging.level = level;
  }

  const maxAdaptations = env.RESEARCH_MAX_ADAPTATIONS;
  if (maxAdaptations) {
    const value = Number(maxAdaptations);
    if (Number.isInteger(value) && value >= 0) {
      cfg.session.maxAdaptations = value;
    }
  }

  if (env.RESEARCH_LLM_MODEL) {
    cfg.llm.model = env.RESEARCH_LLM_MODEL;
  }

  return cfg;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): ResearchConfig {
  const path =
    configPath ??
    env.RESEARCH_CONFIG_PATH ??
    join(homedir(), '.adaptive-research', 'config.yaml');

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Unable to read config at ${path}: ${error instanceof Error ? error.message : 'Unknown'}`
    );
  }

  const parsed: unknown = yaml.parse(raw) ?? {};
  return applyEnvOverrides(parseConfig(parsed), env);
}
