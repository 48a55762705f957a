import { ApiError, LlmRequestError } from '../../api/errors.js';

export type TaskFailureClass = 'rate_limited' | 'terminal';

export interface TaskFailureClassification {
  classification: TaskFailureClass;
  reasonCode: string;
}

// Provider wording for throttling and exhausted quotas.
const RATE_LIMIT_PATTERNS = [
  /ratelimit/,
  /rate[ _]limit/,
  /too many requests/,
  /\b429\b/,
  /\bquota\b/,
];

const RATE_LIMITED: TaskFailureClassification = {
  classification: 'rate_limited',
  reasonCode: 'task.retryable.rate_limit',
};

const TERMINAL: TaskFailureClassification = {
  classification: 'terminal',
  reasonCode: 'task.terminal.unclassified',
};

/**
 * Decide whether a failure that escaped the coordinator is worth re-running
 * the whole task for. Only throttling/quota failures are; everything else
 * ends the task.
 *
 * Errors with an HTTP status are judged by the status alone, following
 * `cause` through wrappers. Message text is only read for errors without one.
 */
export function classifyTaskFailure(error: unknown): TaskFailureClassification {
  if (error instanceof ApiError) {
    return error.status === 429 ? RATE_LIMITED : TERMINAL;
  }
  if (error instanceof LlmRequestError && error.status !== null) {
    return error.status === 429 ? RATE_LIMITED : TERMINAL;
  }
  if (error instanceof Error && error.cause !== undefined) {
    return classifyTaskFailure(error.cause);
  }

  const text = (error instanceof Error ? `${error.name} ${error.message}` : String(error ?? ''))
    .toLowerCase();
  return RATE_LIMIT_PATTERNS.some((pattern) => pattern.test(text)) ? RATE_LIMITED : TERMINAL;
}

export function isRateLimitError(error: unknown): boolean {
  return classifyTaskFailure(error).classification === 'rate_limited';
}
