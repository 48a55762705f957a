import { describe, expect, it, vi } from 'vitest';

import { HttpStatusError, sendWithRetry } from '../../src/api/request-retry.js';
import { response, type FakeResponse } from '../helpers/http.js';

describe('sendWithRetry', () => {
  it('retries server errors and returns the first successful body', async () => {
    const send = vi
      .fn<() => Promise<FakeResponse>>()
      .mockResolvedValueOnce(response(503, 'unavailable'))
      .mockResolvedValueOnce(response(200, '{"ok":true}'));

    await expect(sendWithRetry(send, 'status', { maxAttempts: 3, baseDelayMs: 0 })).resolves.toBe(
      '{"ok":true}'
    );
    expect(send).toHaveBeenCalledTimes(2);
  });

  it('retries network failures', async () => {
    const send = vi
      .fn<() => Promise<FakeResponse>>()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(response(200, 'done'));

    await expect(sendWithRetry(send, 'start', { maxAttempts: 2, baseDelayMs: 0 })).resolves.toBe('done');
  });

  it('does not retry client errors', async () => {
    const send = vi.fn<() => Promise<FakeResponse>>().mockResolvedValue(response(404, 'missing'));

    await expect(sendWithRetry(send, 'submit', { maxAttempts: 3, baseDelayMs: 0 })).rejects.toThrow(
      'submit failed (404): missing'
    );
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('throws the last error after the final attempt', async () => {
    const send = vi.fn<() => Promise<FakeResponse>>().mockResolvedValue(response(500, ''));

    const error = await sendWithRetry(send, 'status', { maxAttempts: 2, baseDelayMs: 0 }).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({ message: 'status failed (500): no response body', status: 500 });
    expect(send).toHaveBeenCalledTimes(2);
  });
});
