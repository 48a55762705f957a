/**
 * Business Assistant Tools Adapter
 *
 * Company directory (employees, projects, customers), wiki, time tracking
 * and the final response submission for the business-assistant benchmark.
 */

import { z } from 'zod';

import type { ApiPayload } from '../../../api/client.js';
import { errorMessage, isApiError } from '../../../api/errors.js';
import { asRecord, pickNextOffset, pickRecord, pickRecords } from '../../../api/schemas.js';
import { createDispatcher, type Dispatch } from '../dispatch.js';
import { fetchAllPages } from '../pagination.js';
import { defineTool, type ToolDefinition, type ToolSetContext } from '../types.js';

export const TASK_FINISHED_MARKER = '[TASK FINISHED]';
export const RESPONSE_SUBMITTED = 'Response Submitted Successfully. Task Finished.';
export const TASK_ALREADY_COMPLETED = 'Task already completed.';
export const TASK_COMPLETED_ERROR = 'Error: Task completed.';

export const RESPONSE_OUTCOMES = [
  'ok_answer',
  'ok_not_found',
  'denied_security',
  'none_clarification_needed',
  'none_unsupported',
  'error_internal',
] as const;

const LIST_PAGE_MAX = 5;

const PageArgs = {
  limit: z.number().int().positive().max(LIST_PAGE_MAX).default(LIST_PAGE_MAX).describe('Page size (max 5)'),
  offset: z.number().int().nonnegative().default(0).describe('Number of records to skip'),
};

const IdArg = z.string().min(1);
const DateArg = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

const SkillSchema = z.object({ name: z.string(), level: z.number() }).passthrough();
const TeamMemberSchema = z
  .object({
    employee: z.string(),
    time_slice: z.number().min(0).max(1),
    role: z.string(),
  })
  .passthrough();
const LinkSchema = z.object({
  kind: z.enum(['employee', 'project', 'customer', 'wiki', 'location']),
  id: z.string().min(1),
});

/**
 * Read-style call: domain errors come back as `{ error }` for the planner.
 */
async function readOrError<T>(
  dispatch: Dispatch,
  endpoint: string,
  payload: ApiPayload,
  select: (body: unknown) => T
): Promise<T | { error: string }> {
  try {
    return select(await dispatch(endpoint, payload));
  } catch (error) {
    if (!isApiError(error)) throw error;
    return { error: error.message };
  }
}

/**
 * Mutation: refused after completion, domain errors come back as a string.
 */
async function mutateOrError(
  ctx: ToolSetContext,
  dispatch: Dispatch,
  endpoint: string,
  payload: ApiPayload,
  success: string,
  failure: string
): Promise<string> {
  if (ctx.latch.completed) return TASK_COMPLETED_ERROR;
  try {
    await dispatch(endpoint, payload);
    return success;
  } catch (error) {
    if (!isApiError(error)) throw error;
    return `${failure}: ${error.message}`;
  }
}

function entityTools(
  ctx: ToolSetContext,
  dispatch: Dispatch,
  spec: {
    entity: 'employee' | 'project' | 'customer';
    plural: string;
    path: string;
    listKey: string;
    itemKey: string;
  }
): ToolDefinition[] {
  const { entity, plural, path, listKey, itemKey } = spec;

  const list = defineTool({
    name: `list_${plural}`,
    description: `List ${plural} one page at a time. Returns { next_offset, ${listKey} }.`,
    schema: z.object(PageArgs),
    execute: ({ limit, offset }) =>
      readOrError(dispatch, `${path}/list`, { limit, offset }, (body) => ({
        next_offset: pickNextOffset(body),
        [listKey]: pickRecords(body, listKey),
      })),
  });

  const search = defineTool({
    name: `search_${plural}`,
    description: `Search ${plural} by text. Returns every match (pagination handled automatically).`,
    schema: z.object({ query: z.string().min(1).describe('Search text') }),
    execute: async ({ query }) => {
      try {
        return await fetchAllPages(
          async (cursor) => {
            const body = await dispatch(`${path}/search`, {
              query,
              offset: cursor.offset,
              limit: cursor.limit,
            });
            return { items: pickRecords(body, listKey), nextOffset: pickNextOffset(body) };
          },
          { initialLimit: LIST_PAGE_MAX, ...ctx.pagination, logger: ctx.logger }
        );
      } catch (error) {
        if (!isApiError(error)) throw error;
        return [{ error: error.message }];
      }
    },
  });

  const get = defineTool({
    name: `get_${entity}`,
    description: `Get the full ${entity} record by ID.`,
    schema: z.object({ id: IdArg.describe(`The ${entity} ID`) }),
    execute: ({ id }) =>
      readOrError(dispatch, `${path}/get`, { id }, (body) => pickRecord(body, itemKey) ?? {}),
  });

  return [list, search, get];
}

export function createAssistantTools(ctx: ToolSetContext): ToolDefinition[] {
  const { logger, latch } = ctx;
  const dispatch = createDispatcher({ client: ctx.client, logger });

  const whoAmI = defineTool({
    name: 'who_am_i',
    description:
      'Current user context and visibility scope (current_user, is_public, location, department, today, wiki_sha1).',
    schema: z.object({}),
    execute: () => readOrError(dispatch, '/whoami', {}, asRecord),
  });

  const employees = entityTools(ctx, dispatch, {
    entity: 'employee',
    plural: 'employees',
    path: '/employees',
    listKey: 'employees',
    itemKey: 'employee',
  });
  const projects = entityTools(ctx, dispatch, {
    entity: 'project',
    plural: 'projects',
    path: '/projects',
    listKey: 'projects',
    itemKey: 'project',
  });
  const customers = entityTools(ctx, dispatch, {
    entity: 'customer',
    plural: 'customers',
    path: '/customers',
    listKey: 'companies',
    itemKey: 'company',
  });

  const updateEmployee = defineTool({
    name: 'update_employee',
    description: 'Update an employee (salary, skills, wills, notes). Omitted fields stay unchanged.',
    schema: z.object({
      employee_id: IdArg,
      salary: z.number().int().nonnegative().optional(),
      skills: z.array(SkillSchema).optional(),
      wills: z.array(SkillSchema).optional(),
      notes: z.string().optional(),
    }),
    execute: async ({ employee_id, ...changes }) => {
      if (latch.completed) return TASK_COMPLETED_ERROR;
      return readOrError(
        dispatch,
        '/employees/update',
        { employee: employee_id, ...changes, changed_by: '' },
        (body) => pickRecord(body, 'employee') ?? {}
      );
    },
  });

  const updateProjectTeam = defineTool({
    name: 'update_project_team',
    description: 'Replace the team allocation of a project.',
    schema: z.object({ project_id: IdArg, team: z.array(TeamMemberSchema) }),
    execute: ({ project_id, team }) =>
      mutateOrError(
        ctx,
        dispatch,
        '/projects/team/update',
        { id: project_id, team, changed_by: '' },
        'Project team updated successfully.',
        'Error updating project team'
      ),
  });

  const updateProjectStatus = defineTool({
    name: 'update_project_status',
    description: 'Set the status of a project.',
    schema: z.object({ project_id: IdArg, status: z.string().min(1) }),
    execute: ({ project_id, status }) =>
      mutateOrError(
        ctx,
        dispatch,
        '/projects/status/update',
        { id: project_id, status, changed_by: '' },
        'Project status updated successfully.',
        'Error updating project status'
      ),
  });

  const listWiki = defineTool({
    name: 'list_wiki',
    description: 'List all wiki article paths.',
    schema: z.object({}),
    execute: () => readOrError(dispatch, '/wiki/list', {}, asRecord),
  });

  const searchWiki = defineTool({
    name: 'search_wiki',
    description: 'Search wiki articles with a regular expression.',
    schema: z.object({ query_regex: z.string().min(1) }),
    execute: async ({ query_regex }) => {
      const result = await readOrError(dispatch, '/wiki/search', { query_regex }, (body) =>
        pickRecords(body, 'results')
      );
      return Array.isArray(result) ? result : [result];
    },
  });

  const loadWiki = defineTool({
    name: 'load_wiki',
    description: 'Load the content of a wiki article.',
    schema: z.object({ file: z.string().min(1).describe('Wiki path, e.g. rulebook.md') }),
    execute: ({ file }) => readOrError(dispatch, '/wiki/load', { file }, asRecord),
  });

  const updateWiki = defineTool({
    name: 'update_wiki',
    description: 'Create or overwrite a wiki page.',
    schema: z.object({ file: z.string().min(1), content: z.string() }),
    execute: ({ file, content }) =>
      mutateOrError(
        ctx,
        dispatch,
        '/wiki/update',
        { file, content, changed_by: '' },
        'Wiki page updated successfully.',
        'Error updating wiki'
      ),
  });

  const logTime = defineTool({
    name: 'log_time',
    description: 'Log a new time entry for an employee on a project.',
    schema: z.object({
      employee: IdArg,
      project: IdArg,
      hours: z.number().positive(),
      date: DateArg,
      notes: z.string().default(''),
      billable: z.boolean().default(true),
      work_category: z.string().default('customer_project'),
    }),
    execute: async (input) => {
      if (latch.completed) return TASK_COMPLETED_ERROR;
      return readOrError(dispatch, '/time/log', { ...input }, asRecord);
    },
  });

  const getTime = defineTool({
    name: 'get_time',
    description: 'Get a time entry by ID.',
    schema: z.object({ id: IdArg }),
    execute: ({ id }) =>
      readOrError(dispatch, '/time/get', { id }, (body) => pickRecord(body, 'entry') ?? {}),
  });

  const updateTime = defineTool({
    name: 'update_time',
    description: 'Update an existing time entry.',
    schema: z.object({
      id: IdArg,
      date: DateArg,
      hours: z.number().nonnegative(),
      notes: z.string(),
      billable: z.boolean(),
      status: z.string().describe("e.g. 'draft' or 'submitted'"),
      work_category: z.string().default('customer_project'),
    }),
    execute: (input) =>
      mutateOrError(
        ctx,
        dispatch,
        '/time/update',
        { ...input, changed_by: '' },
        'Time entry updated successfully.',
        'Error updating time entry'
      ),
  });

  const searchTime = defineTool({
    name: 'search_time',
    description: 'Search the time entries of an employee (pagination handled automatically).',
    schema: z.object({ employee: IdArg }),
    execute: async ({ employee }) => {
      try {
        return await fetchAllPages(
          async (cursor) => {
            const body = await dispatch('/time/search', {
              employee,
              offset: cursor.offset,
              limit: cursor.limit,
            });
            return { items: pickRecords(body, 'entries'), nextOffset: pickNextOffset(body) };
          },
          { initialLimit: LIST_PAGE_MAX, ...ctx.pagination, logger }
        );
      } catch (error) {
        if (!isApiError(error)) throw error;
        return [{ error: error.message }];
      }
    },
  });

  const summaryByProject = defineTool({
    name: 'time_summary_by_project',
    description: 'Hours grouped by project for a date range.',
    schema: z.object({ date_from: DateArg, date_to: DateArg, projects: z.array(IdArg).default([]) }),
    execute: (input) =>
      readOrError(dispatch, '/time/summary/by-project', { ...input }, (body) =>
        pickRecords(body, 'summaries')
      ),
  });

  const summaryByEmployee = defineTool({
    name: 'time_summary_by_employee',
    description: 'Hours grouped by employee for a date range.',
    schema: z.object({ date_from: DateArg, date_to: DateArg, employees: z.array(IdArg).default([]) }),
    execute: (input) =>
      readOrError(dispatch, '/time/summary/by-employee', { ...input }, (body) =>
        pickRecords(body, 'summaries')
      ),
  });

  const respond = defineTool({
    name: 'respond',
    description:
      'FINAL ACTION. Submit the answer to the user with an outcome and links to every referenced entity.',
    schema: z.object({
      message: z.string(),
      outcome: z.enum(RESPONSE_OUTCOMES).default('ok_answer'),
      links: z.array(LinkSchema).default([]),
    }),
    execute: async ({ message, outcome, links }) => {
      if (latch.completed) return TASK_ALREADY_COMPLETED;
      try {
        await dispatch('/respond', { message, outcome, links });
      } catch (error) {
        throw new Error(`Response submission failed: ${errorMessage(error)}`, { cause: error });
      }
      latch.complete('respond');
      return RESPONSE_SUBMITTED;
    },
  });

  const finishTask = defineTool({
    name: 'finish_task',
    description: 'Signal that the task is finished. Call after respond().',
    schema: z.object({ reason: z.string().min(1).describe('Why the task is finished') }),
    execute: async ({ reason }) => {
      latch.complete(`finish_task: ${reason}`);
      logger.log(`${TASK_FINISHED_MARKER} ${reason}`);
      return `Task marked as finished: ${reason}`;
    },
  });

  return [
    whoAmI,
    ...employees,
    updateEmployee,
    ...projects,
    updateProjectTeam,
    updateProjectStatus,
    ...customers,
    listWiki,
    searchWiki,
    loadWiki,
    updateWiki,
    logTime,
    getTime,
    updateTime,
    searchTime,
    summaryByProject,
    summaryByEmployee,
    respond,
    finishTask,
  ];
}
