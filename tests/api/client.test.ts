import { beforeEach, describe, expect, it, vi } from 'vitest';

import { ApiError } from '../../src/api/errors.js';
import { HttpBenchmarkClient } from '../../src/api/client.js';
import { requestBody, response, type FetchFn } from '../helpers/http.js';

const fetchMock = vi.hoisted(() => vi.fn<FetchFn>());

vi.mock('node-fetch', () => ({ default: fetchMock }));

describe('HttpBenchmarkClient', () => {
  const client = new HttpBenchmarkClient({
    baseUrl: 'http://api.test/',
    benchmark: 'store',
    taskId: 't-1',
    apiKey: 'test-key',
  });

  beforeEach(() => {
    fetchMock.mockReset();
  });

  it('posts the payload to the task-scoped endpoint', async () => {
    fetchMock.mockResolvedValueOnce(response(200, { products: [], next_offset: null }));

    const body = await client.dispatch('/products/list', { offset: 0, limit: 3 });

    expect(body).toEqual({ products: [], next_offset: null });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://api.test/store/t-1/products/list');
    expect(init?.method).toBe('POST');
    expect(init?.headers?.Authorization).toBe('Bearer test-key');
    expect(requestBody(init)).toEqual({ offset: 0, limit: 3 });
  });

  it('adds the leading slash and sends an empty payload by default', async () => {
    fetchMock.mockResolvedValueOnce(response(200, ''));

    await expect(client.dispatch('basket/get')).resolves.toBeNull();
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://api.test/store/t-1/basket/get');
    expect(requestBody(init)).toEqual({});
  });

  it('turns a server error into an ApiError carrying its message', async () => {
    fetchMock.mockResolvedValueOnce(response(404, { error: 'product not found' }));

    const error = await client.dispatch('/products/get', { sku: 'x' }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      message: 'product not found',
      endpoint: '/products/get',
      status: 404,
    });
  });

  it('falls back to the status line when the error body is empty', async () => {
    fetchMock.mockResolvedValueOnce(response(500, ''));
    await expect(client.dispatch('/basket/checkout')).rejects.toThrow('HTTP 500');
  });

  it('uses a plain-text error body as the message', async () => {
    fetchMock.mockResolvedValueOnce(response(400, 'page limit exceeded: 10 > 3'));
    await expect(client.dispatch('/products/list')).rejects.toThrow('page limit exceeded: 10 > 3');
  });
});
