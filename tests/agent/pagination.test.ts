import { describe, expect, it } from 'vitest';

import { ActionLogger } from '../../src/agent/logging/action-logger.js';
import { fetchAllPages, isLastPage, paginate, type Page, type PaginationCursor } from '../../src/agent/tools/pagination.js';
import { apiError } from '../helpers/fakes.js';

/**
 * Server with a hidden page-size ceiling over `total` numbered items.
 */
function cappedServer(total: number, ceiling: number) {
  const cursors: PaginationCursor[] = [];
  const fetchPage = async (cursor: PaginationCursor): Promise<Page<number>> => {
    cursors.push(cursor);
    if (cursor.limit > ceiling) {
      throw apiError(`page limit exceeded: ${cursor.limit} > ${ceiling}`, '/products/list');
    }
    const items = Array.from({ length: total }, (_, i) => i).slice(cursor.offset, cursor.offset + cursor.limit);
    const next = cursor.offset + items.length;
    return { items, nextOffset: next < total ? next : null };
  };
  return { fetchPage, cursors };
}

describe('paginate', () => {
  it('learns the ceiling from the overflow message and walks every page', async () => {
    const server = cappedServer(7, 3);
    const logger = new ActionLogger();

    const result = await paginate(server.fetchPage, { initialLimit: 10, logger });

    expect(result.items).toEqual([0, 1, 2, 3, 4, 5, 6]);
    expect(result.complete).toBe(true);
    expect(result.stopReason).toBe('exhausted');
    expect(result.finalLimit).toBe(3);
    expect(server.cursors).toEqual([
      { offset: 0, limit: 10 },
      { offset: 0, limit: 3 },
      { offset: 3, limit: 3 },
      { offset: 6, limit: 3 },
    ]);
    expect(result.requests).toBe(4);
    expect(logger.lines()).toEqual([
      '    [Adaptive] Limit exceeded. API says max is 3. Retrying...',
    ]);
  });

  it('treats -1 and a missing cursor as the last page', () => {
    expect(isLastPage(-1)).toBe(true);
    expect(isLastPage(null)).toBe(true);
    expect(isLastPage(undefined)).toBe(true);
    expect(isLastPage(0)).toBe(false);
  });

  it('halves the limit on an invalid-params error', async () => {
    const cursors: PaginationCursor[] = [];
    const result = await paginate(
      async (cursor) => {
        cursors.push(cursor);
        if (cursor.limit > 2) throw apiError('Invalid params for this request');
        return { items: ['x'], nextOffset: -1 };
      },
      { initialLimit: 8 }
    );

    expect(cursors.map((c) => c.limit)).toEqual([8, 4, 2]);
    expect(result.items).toEqual(['x']);
    expect(result.complete).toBe(true);
  });

  it('stops at the limit floor and keeps what it has', async () => {
    let calls = 0;
    const result = await paginate(
      async (cursor): Promise<Page<string>> => {
        calls += 1;
        if (cursor.offset === 0) return { items: ['a'], nextOffset: 1 };
        throw apiError('invalid pagination');
      },
      { initialLimit: 1 }
    );

    expect(result.items).toEqual(['a']);
    expect(result.complete).toBe(false);
    expect(result.stopReason).toBe('limit_floor');
    expect(calls).toBe(2);
  });

  it('gives up on a misread ceiling instead of looping', async () => {
    const result = await paginate(
      async (): Promise<Page<number>> => {
        throw apiError('limit exceeded: 5 > 9');
      },
      { initialLimit: 5 }
    );
    expect(result.stopReason).toBe('unrecoverable_error');
    expect(result.items).toEqual([]);
    expect(result.requests).toBe(1);
  });

  it('returns a partial list on an unrelated domain error', async () => {
    const result = await paginate(
      async (cursor): Promise<Page<number>> => {
        if (cursor.offset === 0) return { items: [1, 2], nextOffset: 2 };
        throw apiError('product catalog offline');
      },
      { initialLimit: 2 }
    );
    expect(result.items).toEqual([1, 2]);
    expect(result.stopReason).toBe('unrecoverable_error');
  });

  it('bounds retries per page', async () => {
    let limit = 100;
    let calls = 0;
    const result = await paginate(
      async (cursor): Promise<Page<number>> => {
        calls += 1;
        limit = cursor.limit;
        throw apiError(`exceeded: ${cursor.limit} > ${cursor.limit - 1}`);
      },
      { initialLimit: 100, maxRetriesPerPage: 5 }
    );
    expect(calls).toBe(5);
    expect(limit).toBe(96);
    expect(result.stopReason).toBe('retries_exhausted');
  });

  it('stops when the cursor does not advance', async () => {
    let calls = 0;
    const result = await paginate(
      async (): Promise<Page<number>> => {
        calls += 1;
        return { items: [calls], nextOffset: 0 };
      },
      { initialLimit: 1 }
    );
    expect(result.items).toEqual([1]);
    expect(result.stopReason).toBe('stalled_cursor');
  });

  it('caps the number of pages', async () => {
    const result = await paginate(
      async (cursor): Promise<Page<number>> => ({ items: [cursor.offset], nextOffset: cursor.offset + 1 }),
      { initialLimit: 1, maxPages: 3 }
    );
    expect(result.items).toEqual([0, 1, 2]);
    expect(result.stopReason).toBe('page_cap');
  });

  it('propagates errors that are not API errors', async () => {
    await expect(
      paginate(async (): Promise<Page<number>> => {
        throw new TypeError('socket hang up');
      })
    ).rejects.toThrow('socket hang up');
  });
});

describe('fetchAllPages', () => {
  it('returns only the items', async () => {
    const server = cappedServer(4, 10);
    await expect(fetchAllPages(server.fetchPage)).resolves.toEqual([0, 1, 2, 3]);
  });
});
