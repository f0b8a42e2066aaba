/**
 * @fileoverview Unit tests for fetchWithTimeout error mapping.
 * @module tests/utils/network/fetchWithTimeout.test
 */
import { describe, expect, it, vi } from 'vitest';

import { PipelineErrorCode, isNetworkFailure } from '@/types-global/errors.js';
import { fetchWithTimeout } from '@/utils/index.js';
import { makeContext } from '../../helpers/config.js';

const context = makeContext();
const URL_UNDER_TEST = 'https://api.test/resource';

describe('fetchWithTimeout', () => {
  it('returns successful responses and passes an abort signal', async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response('{}', { status: 200 }),
    );
    vi.stubGlobal('fetch', fetchMock);

    const response = await fetchWithTimeout(
      URL_UNDER_TEST,
      { method: 'GET', timeout: 1000 },
      context,
    );

    expect(response.status).toBe(200);
    expect(fetchMock.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal);
    expect(fetchMock.mock.calls[0]?.[1]).not.toHaveProperty('timeout');
  });

  it('maps 404 to NotFound', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('', { status: 404, statusText: 'Not Found' })),
    );

    await expect(
      fetchWithTimeout(URL_UNDER_TEST, {}, context),
    ).rejects.toMatchObject({
      code: PipelineErrorCode.NotFound,
      details: { statusCode: 404, url: URL_UNDER_TEST },
    });
  });

  it('maps other error statuses to NetworkError', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        async () =>
          new Response('', { status: 502, statusText: 'Bad Gateway' }),
      ),
    );

    await expect(
      fetchWithTimeout(URL_UNDER_TEST, {}, context),
    ).rejects.toMatchObject({
      code: PipelineErrorCode.NetworkError,
      message: 'HTTP error! Status: 502 Bad Gateway',
    });
  });

  it('maps transport failures to NetworkError', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      }),
    );

    const failure = fetchWithTimeout(URL_UNDER_TEST, {}, context);
    await expect(failure).rejects.toMatchObject({
      code: PipelineErrorCode.NetworkError,
      message: `Network error during fetch GET ${URL_UNDER_TEST}: fetch failed`,
    });
    await expect(failure.catch(isNetworkFailure)).resolves.toBe(true);
  });

  it('aborts slow requests with Timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_input: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              const error = new Error('This operation was aborted');
              error.name = 'AbortError';
              reject(error);
            });
          }),
      ),
    );

    await expect(
      fetchWithTimeout(URL_UNDER_TEST, { timeout: 10 }, context),
    ).rejects.toMatchObject({ code: PipelineErrorCode.Timeout });
  });
});
