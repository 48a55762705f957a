import type { ApiPayload, BenchmarkApiClient } from '../../src/api/client.js';
import { ApiError } from '../../src/api/errors.js';
import type { ChatMessage, CompletionOptions, LlmClient } from '../../src/core/llm.js';

export type EndpointHandler = (payload: ApiPayload) => unknown;

/**
 * In-process benchmark API: one handler per endpoint, every call recorded.
 */
export class FakeApiClient implements BenchmarkApiClient {
  readonly calls: Array<{ endpoint: string; payload: ApiPayload }> = [];

  constructor(private readonly handlers: Record<string, EndpointHandler> = {}) {}

  on(endpoint: string, handler: EndpointHandler): this {
    this.handlers[endpoint] = handler;
    return this;
  }

  async dispatch(endpoint: string, payload: ApiPayload = {}): Promise<unknown> {
    this.calls.push({ endpoint, payload });
    const handler = this.handlers[endpoint];
    if (!handler) {
      throw new ApiError(`unknown endpoint ${endpoint}`, { endpoint, status: 404 });
    }
    return handler(payload);
  }

  endpoints(): string[] {
    return this.calls.map((call) => call.endpoint);
  }
}

export function apiError(message: string, endpoint = '/test', status = 400): ApiError {
  return new ApiError(message, { endpoint, status });
}

/**
 * Model stub answering from a fixed script; an Error entry is thrown.
 */
export class ScriptedLlm implements LlmClient {
  readonly calls: Array<{ messages: ChatMessage[]; options?: CompletionOptions }> = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async complete(messages: ChatMessage[], options?: CompletionOptions) {
    this.calls.push({ messages: messages.map((message) => ({ ...message })), options });
    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error('ScriptedLlm: script exhausted');
    }
    if (next instanceof Error) {
      throw next;
    }
    return { content: next };
  }

  /** Text of the last user message of call `index`. */
  prompt(index: number): string {
    const messages = this.calls[index]?.messages ?? [];
    return messages.filter((message) => message.role === 'user').at(-1)?.content ?? '';
  }
}

export function toolCalls(...calls: Array<{ tool: string; input?: Record<string, unknown> }>): string {
  return '```json\n' + JSON.stringify(calls) + '\n```';
}
