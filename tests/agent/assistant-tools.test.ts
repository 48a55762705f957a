import { describe, expect, it } from 'vitest';

import { ActionLogger } from '../../src/agent/logging/action-logger.js';
import { CompletionLatch } from '../../src/agent/orchestrator/completion.js';
import {
  createAssistantTools,
  RESPONSE_SUBMITTED,
  TASK_ALREADY_COMPLETED,
  TASK_COMPLETED_ERROR,
} from '../../src/agent/tools/adapters/assistant-tools.js';
import { ToolRegistry } from '../../src/agent/tools/registry.js';
import { apiError, FakeApiClient } from '../helpers/fakes.js';

function setup(client: FakeApiClient) {
  const logger = new ActionLogger();
  const latch = new CompletionLatch();
  const tools = new ToolRegistry(createAssistantTools({ client, logger, latch }));
  return { logger, latch, tools };
}

describe('assistant tools', () => {
  it('registers directory, wiki, time and response tools', () => {
    const { tools } = setup(new FakeApiClient());
    const names = tools.listNames();
    expect(names).toContain('who_am_i');
    expect(names).toContain('search_customers');
    expect(names).toContain('get_project');
    expect(names).toContain('update_project_team');
    expect(names).toContain('search_wiki');
    expect(names).toContain('time_summary_by_employee');
    expect(names.slice(-2)).toEqual(['respond', 'finish_task']);
    expect(names).toHaveLength(25);
  });

  it('list_employees returns one page with its cursor', async () => {
    const client = new FakeApiClient({
      '/employees/list': () => ({ employees: [{ id: 'jane_doe', name: 'Jane' }], next_offset: 5 }),
    });
    const { tools } = setup(client);

    await expect(tools.execute('list_employees', {})).resolves.toEqual({
      next_offset: 5,
      employees: [{ id: 'jane_doe', name: 'Jane' }],
    });
    expect(client.calls[0]?.payload).toEqual({ limit: 5, offset: 0 });
  });

  it('list calls reject pages above 5', async () => {
    const { tools } = setup(new FakeApiClient());
    const result = await tools.execute('list_projects', { limit: 10 });
    expect(result).toEqual({
      error: 'Invalid input for list_projects: limit: Number must be less than or equal to 5',
    });
  });

  it('search_customers collects every page', async () => {
    const client = new FakeApiClient({
      '/customers/search': (payload) =>
        payload.offset === 0
          ? { companies: [{ id: 'c1' }], next_offset: 1 }
          : { companies: [{ id: 'c2' }], next_offset: null },
    });
    const { tools } = setup(client);

    await expect(tools.execute('search_customers', { query: 'acme' })).resolves.toEqual([
      { id: 'c1' },
      { id: 'c2' },
    ]);
    expect(client.calls.map((call) => call.payload)).toEqual([
      { query: 'acme', offset: 0, limit: 5 },
      { query: 'acme', offset: 1, limit: 5 },
    ]);
  });

  it('get_customer unwraps the record and reports domain errors as values', async () => {
    const client = new FakeApiClient({
      '/customers/get': (payload) => {
        if (payload.id === 'missing') throw apiError('customer not found');
        return { company: { id: payload.id, name: 'Acme' } };
      },
    });
    const { tools } = setup(client);

    await expect(tools.execute('get_customer', { id: 'c1' })).resolves.toEqual({ id: 'c1', name: 'Acme' });
    await expect(tools.execute('get_customer', { id: 'missing' })).resolves.toEqual({
      error: 'customer not found',
    });
  });

  it('update_project_status reports success and failure as strings', async () => {
    let fail = false;
    const client = new FakeApiClient({
      '/projects/status/update': () => {
        if (fail) throw apiError('permission denied');
        return {};
      },
    });
    const { tools } = setup(client);

    await expect(
      tools.execute('update_project_status', { project_id: 'p1', status: 'archived' })
    ).resolves.toBe('Project status updated successfully.');
    expect(client.calls[0]?.payload).toEqual({ id: 'p1', status: 'archived', changed_by: '' });

    fail = true;
    await expect(
      tools.execute('update_project_status', { project_id: 'p1', status: 'active' })
    ).resolves.toBe('Error updating project status: permission denied');
  });

  it('respond submits once, closes the latch and blocks later mutations', async () => {
    const client = new FakeApiClient({
      '/respond': () => ({}),
      '/wiki/update': () => ({}),
    });
    const { tools, latch } = setup(client);

    await expect(
      tools.execute('respond', {
        message: 'Jane leads the project.',
        links: [{ kind: 'employee', id: 'jane_doe' }],
      })
    ).resolves.toBe(RESPONSE_SUBMITTED);
    expect(client.calls[0]?.payload).toEqual({
      message: 'Jane leads the project.',
      outcome: 'ok_answer',
      links: [{ kind: 'employee', id: 'jane_doe' }],
    });
    expect(latch.completedBecause).toBe('respond');

    await expect(tools.execute('respond', { message: 'again' })).resolves.toBe(TASK_ALREADY_COMPLETED);
    await expect(tools.execute('update_wiki', { file: 'a.md', content: 'x' })).resolves.toBe(
      TASK_COMPLETED_ERROR
    );
    expect(client.endpoints()).toEqual(['/respond']);
  });

  it('respond re-raises submission failures', async () => {
    const client = new FakeApiClient({
      '/respond': () => {
        throw apiError('invalid outcome');
      },
    });
    const { tools, latch } = setup(client);

    await expect(tools.execute('respond', { message: 'hi', outcome: 'ok_answer' })).rejects.toThrow(
      'Response submission failed: invalid outcome'
    );
    expect(latch.completed).toBe(false);
  });

  it('finish_task logs the completion marker', async () => {
    const { tools, logger, latch } = setup(new FakeApiClient());

    await expect(tools.execute('finish_task', { reason: 'answered' })).resolves.toBe(
      'Task marked as finished: answered'
    );
    expect(logger.lines()).toEqual(['[TASK FINISHED] answered']);
    expect(latch.completed).toBe(true);
  });

  it('search_wiki passes the regex through', async () => {
    const client = new FakeApiClient({
      '/wiki/search': () => ({ results: [{ path: 'rulebook.md', snippet: 'salary' }] }),
    });
    const { tools } = setup(client);

    await expect(tools.execute('search_wiki', { query_regex: 'salar(y|ies)' })).resolves.toEqual([
      { path: 'rulebook.md', snippet: 'salary' },
    ]);
    expect(client.calls[0]?.payload).toEqual({ query_regex: 'salar(y|ies)' });
  });

  it('log_time fills defaults and rejects malformed dates', async () => {
    const client = new FakeApiClient({ '/time/log': (payload) => ({ id: 't1', ...payload }) });
    const { tools } = setup(client);

    await expect(
      tools.execute('log_time', { employee: 'e1', project: 'p1', hours: 2, date: '2026-03-02' })
    ).resolves.toEqual({
      id: 't1',
      employee: 'e1',
      project: 'p1',
      hours: 2,
      date: '2026-03-02',
      notes: '',
      billable: true,
      work_category: 'customer_project',
    });

    const bad = await tools.execute('log_time', { employee: 'e1', project: 'p1', hours: 2, date: '02/03/2026' });
    expect(bad).toEqual({ error: 'Invalid input for log_time: date: expected YYYY-MM-DD' });
  });
});
