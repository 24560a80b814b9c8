/**
 * @module providers/llm
 * LLM provider abstraction: unified interface for text generation.
 */

import { z } from 'zod';
import type { RunContext } from '../context.js';
import type { LLMConfig } from '../config.js';
import { requestOk } from '../utils/http.js';

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface LLMRequest {
  prompt: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LLMResponse {
  text: string;
  model: string;
  usage?: { promptTokens: number; completionTokens: number; totalTokens: number };
}

export interface LLMProvider {
  readonly name: string;
  generate(req: LLMRequest, ctx: RunContext): Promise<LLMResponse>;
}

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }) }))
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

// ---------------------------------------------------------------------------
// OpenAI-compatible provider (works for OpenAI & OpenRouter)
// ---------------------------------------------------------------------------

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name: string;
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly extraHeaders: Record<string, string>;

  constructor(opts: {
    name: string;
    baseUrl: string;
    apiKey: string;
    model: string;
    extraHeaders?: Record<string, string>;
  }) {
    this.name = opts.name;
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.apiKey = opts.apiKey;
    this.model = opts.model;
    this.extraHeaders = opts.extraHeaders ?? {};
  }

  async generate(req: LLMRequest, ctx: RunContext): Promise<LLMResponse> {
    const messages: Array<{ role: string; content: string }> = [];
    if (req.systemPrompt) {
      messages.push({ role: 'system', content: req.systemPrompt });
    }
    messages.push({ role: 'user', content: req.prompt });

    ctx.logger.debug(`LLM request to ${this.name} (${this.model})`);

    const res = await requestOk(`LLM ${this.name}`, `${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        authorization: `Bearer ${this.apiKey}`,
        ...this.extraHeaders,
      },
      body: {
        model: this.model,
        messages,
        temperature: req.temperature ?? ctx.config.llm.temperature,
        max_tokens: req.maxTokens ?? ctx.config.llm.maxTokens,
      },
      timeoutMs: ctx.config.llm.timeoutMs,
      signal: ctx.signal,
    });

    const json = ChatCompletionSchema.parse(res.body);
    const text = json.choices[0]?.message.content ?? '';
    if (!text) {
      throw new Error(`LLM ${this.name} returned empty response`);
    }

    return {
      text,
      model: json.model ?? this.model,
      usage: json.usage
        ? {
          promptTokens: json.usage.prompt_tokens,
          completionTokens: json.usage.completion_tokens,
          totalTokens: json.usage.total_tokens,
        }
        : undefined,
    };
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** Create an LLM provider from WorkflowConfig.llm */
export function createLLMProvider(config: LLMConfig): LLMProvider {
  switch (config.provider) {
    case 'openai':
      return new OpenAICompatibleProvider({
        name: 'openai',
        baseUrl: 'https://api.openai.com/v1',
        apiKey: config.apiKey,
        model: config.model,
      });
    case 'openrouter':
      return new OpenAICompatibleProvider({
        name: 'openrouter',
        baseUrl: 'https://openrouter.ai/api/v1',
        apiKey: config.apiKey,
        model: config.model,
        extraHeaders: { 'X-Title': 'podcast-flow' },
      });
  }
}
