/**
 * Benchmark API client
 *
 * Request/response RPC keyed by endpoint path ("/products/list",
 * "/basket/checkout", "/employees/get", ...). Every call is scoped to one task.
 */

import fetch from 'node-fetch';

import { ApiError } from './errors.js';

export type ApiPayload = Record<string, unknown>;

export interface BenchmarkApiClient {
  dispatch(endpoint: string, payload?: ApiPayload): Promise<unknown>;
}

export interface HttpBenchmarkClientOptions {
  baseUrl: string;
  benchmark: string;
  taskId: string;
  apiKey?: string;
  timeoutMs?: number;
}

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function extractServerError(body: unknown, fallback: string): string {
  if (typeof body === 'string' && body.trim()) return body.trim();
  if (typeof body === 'object' && body !== null) {
    const error = 'error' in body ? body.error : undefined;
    if (typeof error === 'string' && error.trim()) return error.trim();
    const message = 'message' in body ? body.message : undefined;
    if (typeof message === 'string' && message.trim()) return message.trim();
  }
  return fallback;
}

export class HttpBenchmarkClient implements BenchmarkApiClient {
  private readonly root: string;

  constructor(private readonly options: HttpBenchmarkClientOptions) {
    const base = options.baseUrl.replace(/\/+$/, '');
    this.root = `${base}/${encodeURIComponent(options.benchmark)}/${encodeURIComponent(options.taskId)}`;
  }

  get taskId(): string {
    return this.options.taskId;
  }

  async dispatch(endpoint: string, payload: ApiPayload = {}): Promise<unknown> {
    const path = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    const response = await fetch(`${this.root}${path}`, {
      method: 'POST',
      headers,
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.options.timeoutMs ?? 30_000),
    });

    const body = parseBody(await response.text());
    if (!response.ok) {
      throw new ApiError(extractServerError(body, `HTTP ${response.status}`), {
        endpoint: path,
        status: response.status,
      });
    }
    return body;
  }
}
