type RetryOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
};

export type HttpResponseLike = {
  ok: boolean;
  status: number;
  text: () => Promise<string>;
};

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 250;

function toPositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.max(1, Math.floor(parsed));
}

function toNonNegativeInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.max(0, Math.floor(parsed));
}

function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export class HttpStatusError extends Error {
  constructor(
    readonly operation: string,
    readonly status: number,
    readonly body: string
  ) {
    super(`${operation} failed (${status}): ${body || 'no response body'}`);
    this.name = 'HttpStatusError';
  }
}

/**
 * Send a session-bootstrap request, retrying throttled (429) and server-side
 * (5xx) responses plus network failures with linear backoff. Returns the
 * response body of the first successful attempt.
 */
export async function sendWithRetry(
  sendOnce: () => Promise<HttpResponseLike>,
  operation: string,
  options?: RetryOptions
): Promise<string> {
  const maxAttempts =
    options?.maxAttempts ??
    toPositiveInt(process.env.DUET_SESSION_MAX_ATTEMPTS, DEFAULT_MAX_ATTEMPTS);
  const baseDelayMs =
    options?.baseDelayMs ??
    toNonNegativeInt(process.env.DUET_SESSION_RETRY_BASE_MS, DEFAULT_BASE_DELAY_MS);

  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      const response = await sendOnce();
      const body = await response.text().catch(() => '');
      if (response.ok) {
        return body;
      }

      lastError = new HttpStatusError(operation, response.status, body);
      if (!isRetryableStatus(response.status)) {
        throw lastError;
      }
    } catch (error) {
      if (error instanceof HttpStatusError && !isRetryableStatus(error.status)) {
        throw error;
      }
      lastError = error instanceof Error ? error : new Error(String(error));
    }

    if (attempt < maxAttempts) {
      await sleep(baseDelayMs * attempt);
    }
  }

  throw lastError ?? new Error(`${operation} failed after ${maxAttempts} attempts`);
}
