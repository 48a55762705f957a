import { zodToJsonSchema } from 'zod-to-json-schema';

import type { ToolDefinition, ToolErrorResult, ToolLlmSchema } from './types.js';

function formatZodIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; ');
}

/**
 * The executor's view of the tool set of one task.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  constructor(tools: ToolDefinition[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  listNames(): string[] {
    return [...this.tools.keys()];
  }

  getLlmSchemas(): ToolLlmSchema[] {
    return [...this.tools.values()].map((tool) => {
      const inputSchema: Record<string, unknown> = {
        ...zodToJsonSchema(tool.schema, { target: 'openApi3' }),
      };
      delete inputSchema.$schema;
      return {
        name: tool.name,
        description: tool.description,
        input_schema: inputSchema,
      };
    });
  }

  /**
   * Validate and run a tool. Unknown tools and invalid input come back as
   * `{ error }` values; exceptions thrown by the tool itself propagate.
   */
  async execute(name: string, input: unknown): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      const error: ToolErrorResult = {
        error: `Unknown tool "${name}". Available: ${this.listNames().join(', ')}`,
      };
      return error;
    }

    const parsed = tool.schema.safeParse(input ?? {});
    if (!parsed.success) {
      const error: ToolErrorResult = {
        error: `Invalid input for ${name}: ${formatZodIssues(parsed.error.issues)}`,
      };
      return error;
    }
    return tool.execute(parsed.data);
  }
}
