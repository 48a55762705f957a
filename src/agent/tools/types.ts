import type { z } from 'zod';

import type { BenchmarkApiClient } from '../../api/client.js';
import type { ActionLogger } from '../logging/action-logger.js';
import type { CompletionLatch } from '../orchestrator/completion.js';
import type { PaginationOptions } from './pagination.js';

/**
 * A tool the executor may call. `execute` receives input that already passed
 * `schema`; its return value is shown to the executor verbatim.
 */
export interface ToolDefinition<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  schema: TSchema;
  execute(input: z.infer<TSchema>): Promise<unknown>;
}

export interface ToolLlmSchema {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

export interface ToolSetContext {
  client: BenchmarkApiClient;
  logger: ActionLogger;
  latch: CompletionLatch;
  pagination?: Partial<PaginationOptions>;
}

export type ToolErrorResult = { error: string };

/**
 * Helper so object literals keep their schema-specific `execute` input type.
 */
export function defineTool<TSchema extends z.ZodTypeAny>(
  tool: ToolDefinition<TSchema>
): ToolDefinition<TSchema> {
  return tool;
}
