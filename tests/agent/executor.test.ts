import { describe, expect, it } from 'vitest';

import { Executor, formatToolResult, parseToolCalls } from '../../src/agent/executor/executor.js';
import { ActionLogger } from '../../src/agent/logging/action-logger.js';
import { CompletionLatch } from '../../src/agent/orchestrator/completion.js';
import { createStoreTools } from '../../src/agent/tools/adapters/store-tools.js';
import { ToolRegistry } from '../../src/agent/tools/registry.js';
import { apiError, FakeApiClient, ScriptedLlm, toolCalls } from '../helpers/fakes.js';

function setup(client: FakeApiClient, replies: Array<string | Error>, maxSteps = 2) {
  const actionLogger = new ActionLogger();
  const tools = new ToolRegistry(createStoreTools({ client, logger: actionLogger, latch: new CompletionLatch() }));
  const llm = new ScriptedLlm(replies);
  const executor = new Executor({
    llm,
    tools,
    actionLogger,
    knowledge: 'STORE KNOWLEDGE',
    instruction: 'Check the basket.',
    rules: ['Treat a null discount as 0.'],
    maxSteps,
  });
  return { executor, llm, actionLogger };
}

describe('parseToolCalls', () => {
  it('reads a fenced JSON array', () => {
    expect(parseToolCalls('Plan:\n```json\n[{"tool": "get_basket"}]\n```')).toEqual({
      ok: true,
      calls: [{ tool: 'get_basket', input: {} }],
    });
  });

  it('accepts a bare single call', () => {
    expect(parseToolCalls('{"tool": "checkout", "input": {}}')).toEqual({
      ok: true,
      calls: [{ tool: 'checkout', input: {} }],
    });
  });

  it('rejects calls without a tool name', () => {
    const parsed = parseToolCalls('```json\n[{"input": {}}]\n```');
    expect(parsed.ok).toBe(false);
  });

  it('rejects an empty answer', () => {
    expect(parseToolCalls('   ')).toEqual({ ok: false, error: 'No tool calls found in the response.' });
  });
});

describe('formatToolResult', () => {
  it('keeps strings and serializes everything else', () => {
    expect(formatToolResult('Success')).toBe('Success');
    expect(formatToolResult({ a: 1 })).toBe('{"a":1}');
    expect(formatToolResult(undefined)).toBe('null');
  });
});

describe('Executor', () => {
  it('runs calls in order and captures tool log lines with results', async () => {
    const client = new FakeApiClient({ '/basket/get': () => ({ items: [], total: 0 }) });
    const { executor } = setup(client, [
      toolCalls({ tool: 'get_basket' }, { tool: 'final_answer', input: { answer: 'done' } }),
    ]);

    const result = await executor.run();

    expect(result).toEqual({
      output: [
        '    [REQ ->] {"tool":"/basket/get"}',
        '    [<- RESP] {"items":[],"total":0}',
        '[get_basket] {"items":[],"total":0}',
        '[FINAL ANSWER] done',
      ].join('\n'),
      steps: 1,
      finished: true,
      finalAnswer: 'done',
    });
  });

  it('stops the step at a thrown tool error and feeds the observation back', async () => {
    const client = new FakeApiClient({
      '/basket/get': () => ({ items: [{ sku: 'gpu-1', quantity: 3 }] }),
      '/basket/checkout': () => {
        throw apiError('insufficient inventory: 1 left');
      },
      '/basket/remove': () => null,
    });
    const { executor, llm } = setup(client, [
      toolCalls({ tool: 'checkout' }, { tool: 'remove_from_basket', input: { sku: 'gpu-1', quantity: 2 } }),
      toolCalls({ tool: 'final_answer', input: { answer: 'stopped' } }),
    ]);

    const result = await executor.run();

    expect(result.output.split('\n')).toEqual([
      '    [REQ ->] {"tool":"/basket/checkout"}',
      '    [<- RESP ERROR] insufficient inventory: 1 left',
      '[TOOL ERROR] checkout: Checkout Failed: insufficient inventory: 1 left',
      '[FINAL ANSWER] stopped',
    ]);
    expect(client.endpoints()).toEqual(['/basket/get', '/basket/checkout']);
    expect(result.steps).toBe(2);

    const secondCall = llm.calls[1]?.messages ?? [];
    expect(secondCall.map((message) => message.role)).toEqual(['user', 'assistant', 'user']);
    expect(secondCall[2]?.content).toBe(
      'Observation:\n' +
        '    [REQ ->] {"tool":"/basket/checkout"}\n' +
        '    [<- RESP ERROR] insufficient inventory: 1 left\n' +
        '[TOOL ERROR] checkout: Checkout Failed: insufficient inventory: 1 left'
    );
  });

  it('records parse errors and the exhausted step budget', async () => {
    const { executor } = setup(new FakeApiClient(), ['no json here', 'still nothing'], 2);

    const result = await executor.run();
    const lines = result.output.split('\n');

    expect(lines).toHaveLength(3);
    expect(lines[0]).toContain('[PARSE ERROR] Tool calls are not valid JSON:');
    expect(lines[1]).toContain('[PARSE ERROR] Tool calls are not valid JSON:');
    expect(lines[2]).toBe('[Executor] Step budget of 2 exhausted without final_answer.');
    expect(result.finished).toBe(false);
    expect(result.finalAnswer).toBeUndefined();
  });

  it('shows unknown tools as error results', async () => {
    const { executor } = setup(new FakeApiClient(), [toolCalls({ tool: 'teleport' })], 1);
    const result = await executor.run();
    expect(result.output.split('\n')[0]).toBe(
      '[teleport] {"error":"Unknown tool \\"teleport\\". Available: search_products, get_basket, add_to_basket, remove_from_basket, apply_coupon, checkout"}'
    );
  });

  it('propagates rate-limit failures and detaches from the logger', async () => {
    const client = new FakeApiClient({
      '/basket/get': () => ({ items: [{ sku: 'a', quantity: 1 }] }),
      '/basket/checkout': () => {
        throw apiError('quota exhausted for today', '/basket/checkout', 429);
      },
    });
    const { executor, actionLogger } = setup(client, [toolCalls({ tool: 'checkout' })]);

    await expect(executor.run()).rejects.toThrow('Checkout Failed: quota exhausted for today');
    expect(actionLogger.listenerCount('line')).toBe(0);
  });

  it('records a domain failure whose text mentions 429 as a tool error', async () => {
    const client = new FakeApiClient({
      '/basket/get': () => ({ items: [{ sku: 'gpu-4290', quantity: 3 }] }),
      '/basket/checkout': () => {
        throw apiError('insufficient inventory for gpu-4290: 3 > 1', '/basket/checkout');
      },
    });
    const { executor } = setup(client, [toolCalls({ tool: 'checkout' }, { tool: 'final_answer' })], 1);

    const result = await executor.run();

    expect(result.output.split('\n')).toContain(
      '[TOOL ERROR] checkout: Checkout Failed: insufficient inventory for gpu-4290: 3 > 1'
    );
    expect(result.finished).toBe(false);
  });

  it('propagates model failures', async () => {
    const { executor } = setup(new FakeApiClient(), [new Error('LLM error (500): upstream')]);
    await expect(executor.run()).rejects.toThrow('LLM error (500): upstream');
  });

  it('builds a prompt from knowledge, goal, tools and rules', () => {
    const { executor } = setup(new FakeApiClient(), []);
    const prompt = executor.buildPrompt();
    expect(prompt.startsWith('STORE KNOWLEDGE\n')).toBe(true);
    expect(prompt).toContain('GOAL: Check the basket.');
    expect(prompt).toContain('"name": "final_answer"');
    expect(prompt).toContain('"name": "apply_coupon"');
    expect(prompt).toContain('6. Treat a null discount as 0.');
    expect(prompt).not.toContain('verify a condition before an action');
  });
});
