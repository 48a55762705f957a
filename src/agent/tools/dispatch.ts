import type { ApiPayload, BenchmarkApiClient } from '../../api/client.js';
import { errorMessage } from '../../api/errors.js';
import type { ActionLogger } from '../logging/action-logger.js';

export type Dispatch = (endpoint: string, payload?: ApiPayload) => Promise<unknown>;

export const REQUEST_PREFIX = '    [REQ ->]';
export const RESPONSE_PREFIX = '    [<- RESP]';
export const RESPONSE_ERROR_PREFIX = '    [<- RESP ERROR]';

function describeResponse(response: unknown): string {
  if (response === null || response === undefined || response === '') {
    return 'Success';
  }
  return JSON.stringify(response);
}

/**
 * Wrap the API client so every call is logged as a request line followed by
 * exactly one response or error line. Failures are logged and re-raised; the
 * individual tool decides what the agent sees.
 */
export function createDispatcher(params: {
  client: BenchmarkApiClient;
  logger: ActionLogger;
}): Dispatch {
  const { client, logger } = params;

  return async (endpoint, payload = {}) => {
    logger.log(`${REQUEST_PREFIX} ${JSON.stringify({ tool: endpoint, ...payload })}`);

    let response: unknown;
    try {
      response = await client.dispatch(endpoint, payload);
    } catch (error) {
      logger.log(`${RESPONSE_ERROR_PREFIX} ${errorMessage(error)}`);
      throw error;
    }

    logger.log(`${RESPONSE_PREFIX} ${describeResponse(response)}`);
    return response;
  };
}
