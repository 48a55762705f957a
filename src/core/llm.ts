/**
 * Model client
 *
 * One synchronous request/response call per completion. The caller re-sends
 * the whole conversation every time; nothing is kept between calls.
 */

import fetch from 'node-fetch';
import { z } from 'zod';

import { LlmRequestError } from '../api/errors.js';
import type { DuetConfig } from './config.js';
import { readSecret } from './config.js';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  model?: string;
}

export interface CompletionResponse {
  content: string;
}

export interface LlmClient {
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<CompletionResponse>;
}

const ChatCompletionBodySchema = z
  .object({
    choices: z
      .array(z.object({ message: z.object({ content: z.string().nullable().optional() }).optional() }))
      .optional(),
    error: z.union([z.string(), z.object({ message: z.string().optional() }).passthrough()]).optional(),
  })
  .passthrough();

type ChatCompletionBody = z.infer<typeof ChatCompletionBodySchema>;

function parseBody(text: string): ChatCompletionBody | null {
  if (!text) return null;
  try {
    const parsed = ChatCompletionBodySchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function extractErrorText(body: ChatCompletionBody | null, fallback: string): string {
  if (!body?.error) return fallback;
  if (typeof body.error === 'string') return body.error;
  return body.error.message ?? fallback;
}

/**
 * Chat-completions client for any OpenAI-compatible endpoint.
 */
export class OpenAiCompatibleClient implements LlmClient {
  constructor(
    private readonly params: {
      baseUrl: string;
      apiKey?: string;
      model: string;
      temperature?: number;
      timeoutMs?: number;
    }
  ) {}

  async complete(messages: ChatMessage[], options?: CompletionOptions): Promise<CompletionResponse> {
    const url = `${this.params.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.params.apiKey) {
      headers.Authorization = `Bearer ${this.params.apiKey}`;
    }

    let response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model: options?.model ?? this.params.model,
          temperature: options?.temperature ?? this.params.temperature,
          messages,
        }),
        signal: AbortSignal.timeout(this.params.timeoutMs ?? 120_000),
      });
    } catch (error) {
      throw new LlmRequestError(
        `LLM request failed: ${error instanceof Error ? error.message : 'Unknown'}`
      );
    }

    const text = await response.text();
    const body = parseBody(text);

    if (!response.ok) {
      const detail = extractErrorText(body, text || 'no response body');
      const prefix = response.status === 429 ? 'RateLimit' : 'LLM error';
      throw new LlmRequestError(`${prefix} (${response.status}): ${detail}`, response.status);
    }

    const content = body?.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new LlmRequestError('LLM response did not contain message content', response.status);
    }
    return { content };
  }
}

export function createLlmClient(config: DuetConfig, role: 'planner' | 'executor' = 'planner'): LlmClient {
  const model =
    role === 'executor' ? config.agent.executorModel ?? config.agent.model : config.agent.model;
  return new OpenAiCompatibleClient({
    baseUrl: config.llm.baseUrl,
    apiKey: readSecret(config.llm.apiKeyEnv),
    model,
    temperature: config.agent.temperature,
    timeoutMs: config.llm.timeoutMs,
  });
}
