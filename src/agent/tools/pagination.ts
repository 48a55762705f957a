/**
 * Adaptive pagination
 *
 * List/search endpoints enforce a page-size ceiling that is never
 * advertised. Asking for too much fails with a message carrying the real
 * ceiling; this module learns it from the error, retries the same offset and
 * walks the remaining pages. It always returns a list (possibly partial) and
 * never lets a limit-discovery failure reach the caller.
 */

import { isApiError } from '../../api/errors.js';
import { isInvalidPagination, matchLimitOverflow } from '../../api/error_patterns.js';
import type { ActionLogger } from '../logging/action-logger.js';

export interface PaginationCursor {
  offset: number;
  limit: number;
}

export interface Page<T> {
  items: T[];
  /** Offset of the next page; absent, null or -1 when exhausted. */
  nextOffset?: number | null;
}

export interface PaginationOptions {
  initialLimit: number;
  maxRetriesPerPage: number;
  maxPages: number;
  logger?: ActionLogger;
}

export type PaginationStopReason =
  | 'exhausted'
  | 'stalled_cursor'
  | 'page_cap'
  | 'retries_exhausted'
  | 'limit_floor'
  | 'unrecoverable_error';

export interface PaginationResult<T> {
  items: T[];
  complete: boolean;
  stopReason: PaginationStopReason;
  finalLimit: number;
  requests: number;
}

export const DEFAULT_PAGINATION: PaginationOptions = {
  initialLimit: 10,
  maxRetriesPerPage: 5,
  maxPages: 200,
};

export function isLastPage(nextOffset: number | null | undefined): boolean {
  return nextOffset === undefined || nextOffset === null || nextOffset === -1;
}

type Recovery = { kind: 'retry'; limit: number } | { kind: 'stop'; reason: PaginationStopReason };

function planRecovery(message: string, limit: number, logger?: ActionLogger): Recovery {
  const overflow = matchLimitOverflow(message);
  if (overflow) {
    // A ceiling that does not shrink the request means the message was misread.
    if (overflow.allowed < 1 || overflow.allowed >= limit) {
      return { kind: 'stop', reason: 'unrecoverable_error' };
    }
    logger?.log(
      `    [Adaptive] Limit exceeded. API says max is ${overflow.allowed}. Retrying...`
    );
    return { kind: 'retry', limit: overflow.allowed };
  }

  if (isInvalidPagination(message)) {
    if (limit <= 1) {
      return { kind: 'stop', reason: 'limit_floor' };
    }
    return { kind: 'retry', limit: Math.max(1, Math.floor(limit / 2)) };
  }

  return { kind: 'stop', reason: 'unrecoverable_error' };
}

export async function paginate<T>(
  fetchPage: (cursor: PaginationCursor) => Promise<Page<T>>,
  options: Partial<PaginationOptions> = {}
): Promise<PaginationResult<T>> {
  const opts = { ...DEFAULT_PAGINATION, ...options };
  const items: T[] = [];
  const cursor: PaginationCursor = { offset: 0, limit: Math.max(1, opts.initialLimit) };
  let requests = 0;

  const finish = (complete: boolean, stopReason: PaginationStopReason): PaginationResult<T> => ({
    items,
    complete,
    stopReason,
    finalLimit: cursor.limit,
    requests,
  });

  for (let pageIndex = 0; pageIndex < opts.maxPages; pageIndex++) {
    let page: Page<T> | null = null;

    for (let attempt = 0; attempt < opts.maxRetriesPerPage && page === null; attempt++) {
      try {
        requests += 1;
        page = await fetchPage({ ...cursor });
      } catch (error) {
        if (!isApiError(error)) {
          throw error;
        }
        const recovery = planRecovery(error.message, cursor.limit, opts.logger);
        if (recovery.kind === 'stop') {
          return finish(false, recovery.reason);
        }
        cursor.limit = recovery.limit;
      }
    }

    if (page === null) {
      return finish(false, 'retries_exhausted');
    }

    items.push(...page.items);

    if (isLastPage(page.nextOffset)) {
      return finish(true, 'exhausted');
    }
    const next = page.nextOffset ?? -1;
    if (next <= cursor.offset) {
      return finish(false, 'stalled_cursor');
    }
    cursor.offset = next;
  }

  return finish(false, 'page_cap');
}

/**
 * Fetch every page and return the accumulated items.
 */
export async function fetchAllPages<T>(
  fetchPage: (cursor: PaginationCursor) => Promise<Page<T>>,
  options: Partial<PaginationOptions> = {}
): Promise<T[]> {
  const result = await paginate(fetchPage, options);
  return result.items;
}
