/**
 * @fileoverview Unit tests for the fetch timeout wrapper.
 * @module tests/utils/network/fetchWithTimeout.test
 */
import { afterEach, describe, expect, it, vi } from 'vitest';

import { JsonRpcErrorCode } from '@/types-global/errors.js';
import { fetchWithTimeout } from '@/utils/network/fetchWithTimeout.js';
import { testContext } from '../../helpers/context.js';

describe('fetchWithTimeout', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns successful responses', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>(async () => new Response('ok', { status: 200 })),
    );

    const response = await fetchWithTimeout(
      'http://engine.test/health',
      { timeout: 100 },
      testContext(),
    );
    await expect(response.text()).resolves.toBe('ok');
  });

  it('raises Timeout when the request is aborted', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              reject(new DOMException('This operation was aborted', 'AbortError'));
            });
          }),
      ),
    );

    await expect(
      fetchWithTimeout('http://engine.test/slow', { timeout: 5 }, testContext()),
    ).rejects.toMatchObject({ code: JsonRpcErrorCode.Timeout });
  });

  it('raises ServiceUnavailable on HTTP errors unless they are allowed', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>(async () => new Response('nope', { status: 502 })),
    );

    await expect(
      fetchWithTimeout('http://engine.test/jobs', { timeout: 100 }, testContext()),
    ).rejects.toMatchObject({
      code: JsonRpcErrorCode.ServiceUnavailable,
      data: expect.objectContaining({ statusCode: 502 }),
    });

    const response = await fetchWithTimeout(
      'http://engine.test/jobs',
      { timeout: 100 },
      testContext(),
      true,
    );
    expect(response.status).toBe(502);
  });

  it('raises ServiceUnavailable on network failures', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>(async () => {
        throw new TypeError('fetch failed');
      }),
    );

    await expect(
      fetchWithTimeout('http://engine.test/jobs', { method: 'POST', timeout: 100 }, testContext()),
    ).rejects.toMatchObject({
      code: JsonRpcErrorCode.ServiceUnavailable,
      message: 'Network error during fetch POST http://engine.test/jobs: fetch failed',
    });
  });
});
