/**
 * Task runner
 *
 * Retries whole tasks on rate limits and drives a benchmark session: start,
 * then for every task start → run → complete → report, then submit.
 */

import type { BenchmarkApiClient } from '../../api/client.js';
import { errorMessage } from '../../api/errors.js';
import type { SessionBootstrap, SessionStartRequest, TaskInfo } from '../../api/session.js';
import type { DuetConfig } from '../../core/config.js';
import type { LlmClient } from '../../core/llm.js';
import type { Logger } from '../../core/logger.js';
import { retryWithBackoff } from '../../core/retry.js';
import type { DomainProfile, ProfileSettings } from '../profiles/types.js';
import { Coordinator } from './coordinator.js';
import { classifyTaskFailure } from './retry_classifier.js';
import type { CoordinatorResult } from './state.js';

export type TaskRunOutcome = 'success' | 'max_turns' | 'failed';

export interface TaskRunResult {
  outcome: TaskRunOutcome;
  attempts: number;
  result?: CoordinatorResult;
  error?: string;
  reasonCode?: string;
}

export interface TaskRetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  logger?: Logger;
  sleepFn?: (ms: number) => Promise<void>;
}

/**
 * Run a task, re-running it from scratch when it fails on a rate limit or an
 * exhausted quota (waiting `baseDelayMs * attempt`). Any other failure ends
 * the task as `failed`.
 */
export async function runTaskWithRetry(
  run: (attempt: number) => Promise<CoordinatorResult>,
  options: TaskRetryOptions
): Promise<TaskRunResult> {
  const outcome = await retryWithBackoff(run, {
    retries: Math.max(0, options.maxAttempts - 1),
    baseDelayMs: options.baseDelayMs,
    maxDelayMs: options.baseDelayMs * Math.max(1, options.maxAttempts),
    strategy: 'linear',
    isRetryable: (error) => classifyTaskFailure(error).classification === 'rate_limited',
    onRetry: ({ delayMs }) => {
      options.logger?.warn(`Hit Rate Limit. Sleeping ${delayMs / 1000}s before retry...`);
    },
    sleepFn: options.sleepFn,
  });

  if (outcome.ok) {
    return { outcome: outcome.value.outcome, attempts: outcome.attempts, result: outcome.value };
  }

  const { reasonCode } = classifyTaskFailure(outcome.error);
  options.logger?.error(`Task Failed: ${errorMessage(outcome.error)}`);
  return {
    outcome: 'failed',
    attempts: outcome.attempts,
    error: errorMessage(outcome.error),
    reasonCode,
  };
}

export interface TaskRunnerDeps {
  config: DuetConfig;
  profile: DomainProfile;
  settings: ProfileSettings;
  plannerLlm: LlmClient;
  executorLlm?: LlmClient;
  createClient: (task: TaskInfo) => BenchmarkApiClient;
  logger: Logger;
  echo?: (line: string) => void;
}

/**
 * Build a fresh coordinator per attempt and run it under the retry policy.
 */
export function runTask(task: TaskInfo, deps: TaskRunnerDeps): Promise<TaskRunResult> {
  const { config, profile, settings, logger } = deps;
  return runTaskWithRetry(
    () =>
      new Coordinator({
        task: task.task_text,
        profile,
        settings,
        client: deps.createClient(task),
        plannerLlm: deps.plannerLlm,
        executorLlm: deps.executorLlm,
        logger,
        echo: deps.echo,
        pagination: config.pagination,
        contextExtractor: config.contextExtractor,
        temperature: config.agent.temperature,
      }).run(),
    { maxAttempts: config.retry.maxAttempts, baseDelayMs: config.retry.baseDelayMs, logger }
  );
}

export interface SessionTaskReport {
  taskId: string;
  outcome: TaskRunOutcome;
  score: number | null;
  logs?: string;
  error?: string;
}

export interface SessionReport {
  sessionId: string;
  tasks: SessionTaskReport[];
  submitted: boolean;
}

export interface RunSessionParams {
  bootstrap: SessionBootstrap;
  request: SessionStartRequest;
  runTask: (task: TaskInfo) => Promise<TaskRunResult>;
  logger: Logger;
  /** Run only the first N tasks. */
  limit?: number;
}

/**
 * One session end to end. A failing task is reported and the batch moves on;
 * session-level failures (start, status, submit) propagate.
 */
export async function runSession(params: RunSessionParams): Promise<SessionReport> {
  const { bootstrap, logger } = params;
  const sessionId = await bootstrap.startSession(params.request);
  const status = await bootstrap.sessionStatus(sessionId);
  logger.info(`Session ID: ${sessionId}`);

  const tasks = params.limit !== undefined ? status.tasks.slice(0, params.limit) : status.tasks;
  const reports: SessionTaskReport[] = [];

  for (const [index, task] of tasks.entries()) {
    logger.info(`\n${'='.repeat(60)}\nTASK ${index + 1}/${tasks.length} | ID: ${task.task_id}\n${'='.repeat(60)}`);
    reports.push(await runSessionTask(bootstrap, task, params.runTask, logger));
  }

  await bootstrap.submitSession(sessionId);
  logger.info('Session Submitted.');
  return { sessionId, tasks: reports, submitted: true };
}

async function runSessionTask(
  bootstrap: SessionBootstrap,
  task: TaskInfo,
  run: (task: TaskInfo) => Promise<TaskRunResult>,
  logger: Logger
): Promise<SessionTaskReport> {
  let outcome: TaskRunOutcome = 'failed';
  let error: string | undefined;
  try {
    await bootstrap.startTask(task);
    const result = await run(task);
    outcome = result.outcome;
    error = result.error;
  } catch (err) {
    error = errorMessage(err);
    logger.error(`Task ${task.task_id} failed: ${error}`);
  }

  try {
    const evaluation = await bootstrap.completeTask(task);
    if (!evaluation) {
      logger.info('\nTask completed (No evaluation info).');
      return { taskId: task.task_id, outcome, score: null, ...(error !== undefined && { error }) };
    }
    logger.info(`\nSCORE: ${evaluation.score}${evaluation.logs ? `\n${evaluation.logs}` : ''}`);
    return {
      taskId: task.task_id,
      outcome,
      score: evaluation.score,
      logs: evaluation.logs,
      ...(error !== undefined && { error }),
    };
  } catch (err) {
    const message = errorMessage(err);
    logger.error(`Completing task ${task.task_id} failed: ${message}`);
    return { taskId: task.task_id, outcome, score: null, error: error ?? message };
  }
}
