import Anthropic from '@anthropic-ai/sdk';
import fetch from 'node-fetch';
import { z } from 'zod';

import type { ResearchConfig } from './config.js';
import { Logger } from './logger.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmResponse {
  content: string;
  model: string;
}

export type LlmClientOptions = {
  temperature?: number;
  timeoutMs?: number;
  maxTokens?: number;
  signal?: AbortSignal;
};

export type LlmClientMeta = {
  provider: 'anthropic' | 'openai';
  model: string;
};

export interface LlmClient {
  complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse>;
  meta?: LlmClientMeta;
}

/**
 * Links an optional caller signal with a request timeout. `dispose` must be
 * called once the request settles.
 */
function createRequestSignal(
  signal: AbortSignal | undefined,
  timeoutMs: number | undefined
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  let timeout: NodeJS.Timeout | null = null;
  if (timeoutMs && timeoutMs > 0) {
    timeout = setTimeout(() => controller.abort(), timeoutMs);
  }
  const onAbort = () => controller.abort();
  if (signal) {
    if (signal.aborted) {
      controller.abort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  }
  return {
    signal: controller.signal,
    dispose: () => {
      if (timeout) clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    },
  };
}

export class AnthropicLlmClient implements LlmClient {
  private client: Anthropic;
  private model: string;
  meta?: LlmClientMeta;

  constructor(
    private config: ResearchConfig,
    modelOverride?: string
  ) {
    this.client = new Anthropic({
      apiKey: process.env.ANTHROPIC_API_KEY ?? '',
    });
    this.model = modelOverride ?? config.llm.model;
    this.meta = { provider: 'anthropic', model: this.model };
  }

  async complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse> {
    const system = messages
      .filter((msg) => msg.role === 'system')
      .map((msg) => msg.content)
      .join('\n\n');
    const converted = messages
      .filter((msg): msg is ChatMessage & { role: 'user' | 'assistant' } => msg.role !== 'system')
      .map((msg) => ({ role: msg.role, content: msg.content }));

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: options?.maxTokens ?? this.config.llm.maxTokens,
        temperature: options?.temperature ?? this.config.llm.temperature,
        system,
        messages: converted,
      },
      {
        signal: options?.signal,
        timeout: options?.timeoutMs ?? this.config.llm.timeoutMs,
      }
    );

    const text = response.content
      .map((block) => ('text' in block ? block.text : ''))
      .join('')
      .trim();

    return { content: text, model: this.model };
  }
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).optional() }))
    .optional(),
});

/**
 * Chat-completions client for OpenAI and compatible gateways (OpenRouter by
 * default).
 */
export class OpenAiCompatibleLlmClient implements LlmClient {
  private model: string;
  private baseUrl: string;
  meta?: LlmClientMeta;

  constructor(
    private config: ResearchConfig,
    modelOverride?: string
  ) {
    this.model = modelOverride ?? config.llm.model;
    this.baseUrl = config.llm.baseUrl.replace(/\/+$/, '');
    this.meta = { provider: 'openai', model: this.model };
  }

  async complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse> {
    const request = createRequestSignal(
      options?.signal,
      options?.timeoutMs ?? this.config.llm.timeoutMs
    );

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${process.env.OPENAI_API_KEY ?? ''}`,
          'Content-Type': 'application/json',
        },
        signal: request.signal,
        body: JSON.stringify({
          model: this.model,
          temperature: options?.temperature ?? this.config.llm.temperature,
          max_tokens: options?.maxTokens ?? this.config.llm.maxTokens,
          messages,
        }),
      });

      if (!response.ok) {
        let detail = '';
        try {
          detail = await response.text();
        } catch {
          detail = '';
        }
        throw new Error(`LLM request failed: ${detail || `status ${response.status}`}`);
      }

      const data = ChatCompletionSchema.safeParse(await response.json());
      if (!data.success) {
        throw new Error('LLM request failed: unexpected response shape');
      }
      const text = data.data.choices?.[0]?.message?.content?.trim() ?? '';
      return { content: text, model: this.model };
    } finally {
      request.dispose();
    }
  }
}

class LoggingLlmClient implements LlmClient {
  meta?: LlmClientMeta;

  constructor(
    private inner: LlmClient,
    private logger: Logger
  ) {
    this.meta = inner.meta;
  }

  async complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse> {
    const start = Date.now();
    try {
      const response = await this.inner.complete(messages, options);
      this.logger.debug('llm call completed', {
        model: response.model,
        messages: messages.length,
        durationMs: Date.now() - start,
      });
      return response;
    } catch (error) {
      this.logger.warn('llm call failed', {
        model: this.meta?.model,
        durationMs: Date.now() - start,
        error: error instanceof Error ? error.message : 'Unknown',
      });
      throw error;
    }
  }
}

export function createLlmClient(config: ResearchConfig, logger?: Logger): LlmClient {
  const log = (logger ?? new Logger(config.logging.level)).child('llm');
  switch (config.llm.provider) {
    case 'anthropic':
      return new LoggingLlmClient(new AnthropicLlmClient(config), log);
    case 'openai':
      return new LoggingLlmClient(new OpenAiCompatibleLlmClient(config), log);
  }
}
