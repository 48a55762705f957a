/**
 * Executor
 *
 * Turns one planner instruction into tool calls. A new Executor is built for
 * every turn and keeps nothing afterwards: all it knows is the domain
 * knowledge, the instruction and the tool schemas.
 *
 * Each step the model answers with a fenced JSON array of calls:
 *
 *   ```json
 *   [{ "tool": "get_basket", "input": {} }]
 *   ```
 *
 * Calls run in order. Calling `final_answer` ends the run.
 */

import { z } from 'zod';

import { errorMessage } from '../../api/errors.js';
import type { ChatMessage, LlmClient } from '../../core/llm.js';
import type { ActionLogger } from '../logging/action-logger.js';
import { isRateLimitError } from '../orchestrator/retry_classifier.js';
import type { VerificationOwner } from '../profiles/types.js';
import type { ToolRegistry } from '../tools/registry.js';

export const FINAL_ANSWER_TOOL = 'final_answer';
export const DEFAULT_MAX_STEPS = 2;

const ToolCallSchema = z.object({
  tool: z.string().min(1),
  input: z.record(z.unknown()).default({}),
});

const ToolCallsSchema = z.union([z.array(ToolCallSchema), ToolCallSchema.transform((call) => [call])]);

export type ToolCall = z.infer<typeof ToolCallSchema>;

export type ParsedToolCalls = { ok: true; calls: ToolCall[] } | { ok: false; error: string };

/**
 * Pull the tool calls out of a model answer: the first fenced block, or the
 * whole answer when there is none.
 */
export function parseToolCalls(text: string): ParsedToolCalls {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  const source = (fenced ? fenced[1] : text).trim();
  if (!source) {
    return { ok: false, error: 'No tool calls found in the response.' };
  }

  let json: unknown;
  try {
    json = JSON.parse(source);
  } catch (error) {
    return { ok: false, error: `Tool calls are not valid JSON: ${errorMessage(error)}` };
  }

  const parsed = ToolCallsSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      ok: false,
      error: `Tool calls have the wrong shape: ${issue ? `${issue.path.join('.') || 'root'}: ${issue.message}` : 'unknown'}`,
    };
  }
  return { ok: true, calls: parsed.data };
}

export function formatToolResult(result: unknown): string {
  if (typeof result === 'string') return result;
  if (result === undefined) return 'null';
  return JSON.stringify(result);
}

export interface ExecutorParams {
  llm: LlmClient;
  tools: ToolRegistry;
  actionLogger: ActionLogger;
  knowledge: string;
  instruction: string;
  rules: string[];
  maxSteps?: number;
  verificationOwner?: VerificationOwner;
  temperature?: number;
}

export interface ExecutorResult {
  /** Everything the run produced, in order, as one block. */
  output: string;
  steps: number;
  finished: boolean;
  finalAnswer?: string;
}

const PROTOCOL_RULES = [
  'Answer with a fenced ```json block holding an array of calls: [{"tool": "<name>", "input": {...}}].',
  'Calls run in order. If one throws, the rest of that step is skipped.',
  `Call ${FINAL_ANSWER_TOOL} with {"answer": "..."} when the GOAL is done; it ends your run.`,
  'Perform ONLY the steps the GOAL asks for. Nothing from earlier turns is available to you.',
  'NEVER change parameters the GOAL gives you.',
];

const EXECUTOR_VERIFICATION_RULE =
  'If the GOAL asks you to verify a condition before an action and the condition is false, do NOT perform the action.';

export class Executor {
  private readonly maxSteps: number;

  constructor(private readonly params: ExecutorParams) {
    this.maxSteps = Math.max(1, params.maxSteps ?? DEFAULT_MAX_STEPS);
  }

  buildPrompt(): string {
    const { knowledge, instruction, rules, tools, verificationOwner } = this.params;
    const allRules = [
      ...PROTOCOL_RULES,
      ...(verificationOwner === 'executor' ? [EXECUTOR_VERIFICATION_RULE] : []),
      ...rules,
    ];
    const toolSchemas = [
      ...tools.getLlmSchemas(),
      {
        name: FINAL_ANSWER_TOOL,
        description: 'End the run with a short report.',
        input_schema: { type: 'object', properties: { answer: { type: 'string' } } },
      },
    ];

    return [
      knowledge,
      '',
      'ROLE:',
      'You carry out the GOAL exactly, using the tools below and the environment rules above.',
      '',
      `GOAL: ${instruction}`,
      '',
      'TOOLS:',
      JSON.stringify(toolSchemas, null, 2),
      '',
      'RULES:',
      allRules.map((rule, index) => `${index + 1}. ${rule}`).join('\n'),
    ].join('\n');
  }

  async run(): Promise<ExecutorResult> {
    const { llm, actionLogger, temperature } = this.params;
    const lines: string[] = [];
    const capture = (line: string) => {
      lines.push(line);
    };
    actionLogger.on('line', capture);

    try {
      const messages: ChatMessage[] = [{ role: 'user', content: this.buildPrompt() }];
      let finalAnswer: string | undefined;
      let steps = 0;

      while (steps < this.maxSteps && finalAnswer === undefined) {
        steps += 1;
        const stepStart = lines.length;
        const response = await llm.complete(messages, { temperature });
        messages.push({ role: 'assistant', content: response.content });

        const parsed = parseToolCalls(response.content);
        if (!parsed.ok) {
          lines.push(`[PARSE ERROR] ${parsed.error}`);
        } else {
          finalAnswer = await this.runCalls(parsed.calls, lines);
        }

        if (finalAnswer === undefined) {
          messages.push({
            role: 'user',
            content: `Observation:\n${lines.slice(stepStart).join('\n') || '(no output)'}`,
          });
        }
      }

      if (finalAnswer === undefined) {
        lines.push(`[Executor] Step budget of ${this.maxSteps} exhausted without ${FINAL_ANSWER_TOOL}.`);
      }

      return {
        output: lines.join('\n'),
        steps,
        finished: finalAnswer !== undefined,
        ...(finalAnswer !== undefined && { finalAnswer }),
      };
    } finally {
      actionLogger.off('line', capture);
    }
  }

  /**
   * Run one step's calls. Returns the final answer when `final_answer` was
   * called.
   */
  private async runCalls(calls: ToolCall[], lines: string[]): Promise<string | undefined> {
    for (const call of calls) {
      if (call.tool === FINAL_ANSWER_TOOL) {
        const answer = typeof call.input.answer === 'string' ? call.input.answer : 'DONE';
        lines.push(`[FINAL ANSWER] ${answer}`);
        return answer;
      }

      try {
        const result = await this.params.tools.execute(call.tool, call.input);
        lines.push(`[${call.tool}] ${formatToolResult(result)}`);
      } catch (error) {
        if (isRateLimitError(error)) throw error;
        lines.push(`[TOOL ERROR] ${call.tool}: ${errorMessage(error)}`);
        return undefined;
      }
    }
    return undefined;
  }
}
