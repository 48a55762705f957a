/**
 * Error types shared by the remote API client, the model client and config.
 */

/**
 * Domain failure reported by the benchmark API (not found, permission,
 * malformed request, pagination overflow...). The message is the server's
 * human-readable text; pagination recovery parses it.
 */
export class ApiError extends Error {
  readonly endpoint: string;
  readonly status: number;

  constructor(message: string, options: { endpoint: string; status: number }) {
    super(message);
    this.name = 'ApiError';
    this.endpoint = options.endpoint;
    this.status = options.status;
  }
}

/**
 * Transport-level failure talking to the model provider.
 */
export class LlmRequestError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = 'LlmRequestError';
    this.status = status;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
