/**
 * Session bootstrap client
 *
 * Obtains the task list of a benchmark session, starts/completes tasks and
 * submits the session. The coordinator never talks to this surface.
 */

import fetch from 'node-fetch';
import { z } from 'zod';

import { sendWithRetry } from './request-retry.js';

const StartSessionSchema = z.object({ session_id: z.string() });

const TaskInfoSchema = z.object({
  task_id: z.string(),
  task_text: z.string(),
  status: z.string().optional(),
});

const SessionStatusSchema = z.object({
  session_id: z.string().optional(),
  tasks: z.array(TaskInfoSchema).default([]),
});

const TaskEvaluationSchema = z.object({
  eval: z
    .object({
      score: z.number(),
      logs: z.string().default(''),
    })
    .nullable()
    .optional(),
});

export type TaskInfo = z.infer<typeof TaskInfoSchema>;
export type SessionStatus = z.infer<typeof SessionStatusSchema>;
export type TaskEvaluation = { score: number; logs: string };

export interface SessionStartRequest {
  benchmark: string;
  workspace: string;
  name: string;
  architecture: string;
}

export interface SessionBootstrap {
  startSession(request: SessionStartRequest): Promise<string>;
  sessionStatus(sessionId: string): Promise<SessionStatus>;
  startTask(task: TaskInfo): Promise<void>;
  completeTask(task: TaskInfo): Promise<TaskEvaluation | null>;
  submitSession(sessionId: string): Promise<void>;
}

export class HttpSessionClient implements SessionBootstrap {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly apiKey?: string,
    private readonly timeoutMs = 30_000
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async startSession(request: SessionStartRequest): Promise<string> {
    const body = await this.post('/sessions/start', { ...request });
    return StartSessionSchema.parse(body).session_id;
  }

  async sessionStatus(sessionId: string): Promise<SessionStatus> {
    const body = await this.post('/sessions/status', { session_id: sessionId });
    return SessionStatusSchema.parse(body);
  }

  async startTask(task: TaskInfo): Promise<void> {
    await this.post('/tasks/start', { task_id: task.task_id });
  }

  async completeTask(task: TaskInfo): Promise<TaskEvaluation | null> {
    const body = await this.post('/tasks/complete', { task_id: task.task_id });
    const parsed = TaskEvaluationSchema.parse(body ?? {});
    return parsed.eval ?? null;
  }

  async submitSession(sessionId: string): Promise<void> {
    await this.post('/sessions/submit', { session_id: sessionId });
  }

  private async post(path: string, payload: Record<string, unknown>): Promise<unknown> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }
    const text = await sendWithRetry(
      () =>
        fetch(`${this.baseUrl}${path}`, {
          method: 'POST',
          headers,
          body: JSON.stringify(payload),
          signal: AbortSignal.timeout(this.timeoutMs),
        }),
      path
    );
    return text ? JSON.parse(text) : null;
  }
}
