import { describe, it, expect, vi } from 'vitest';
import { createApiClient } from '../src/client.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('createApiClient', () => {
  const request = { deploycode: '6080', test_id: '1', test_case: 'uniswap_callback' };

  it('posts the request as JSON to /test', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse({ success: true, message: 'Test execution succeeded', output: 'ok' }));
    const submit = createApiClient('http://runner.test:8005/', 1000, fetchFn);

    expect(await submit(request)).toEqual({ success: true, message: 'Test execution succeeded', output: 'ok' });

    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe('http://runner.test:8005/test');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify(request));
  });

  it('passes through error bodies from the runner', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse(
      { success: false, message: 'Test template not found: x_test.t.sol', output: '', error: 'Test template not found: x_test.t.sol' },
      404,
    ));

    const result = await createApiClient('http://runner.test', 1000, fetchFn)(request);

    expect(result.success).toBe(false);
    expect(result.message).toBe('Test template not found: x_test.t.sol');
  });

  it('turns a connection failure into a failed result', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });

    expect(await createApiClient('http://runner.test', 1000, fetchFn)(request)).toEqual({
      success: false,
      message: 'Cannot reach the API server at http://runner.test: fetch failed',
      output: '',
    });
  });

  it('reports a timeout', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => {
      throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    });

    expect((await createApiClient('http://runner.test', 2000, fetchFn)(request)).message).toBe('Request timed out after 2s');
  });

  it('rejects a body that is not a test response', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse({ error: 'Bad Gateway' }, 502));

    expect((await createApiClient('http://runner.test', 1000, fetchFn)(request)).message).toBe('HTTP 502: unexpected response body');
  });
});
