import type { TestRequest, TestResponse } from '@symtest/shared';

export type SubmitTest = (req: TestRequest) => Promise<TestResponse>;

function isTestResponse(value: unknown): value is TestResponse {
  return typeof value === 'object' && value !== null
    && 'success' in value && typeof value.success === 'boolean'
    && 'message' in value && typeof value.message === 'string';
}

function failure(message: string): TestResponse {
  return { success: false, message, output: '' };
}

/**
 * Client for the runner's POST /test. Every outcome, including an unreachable
 * server, comes back as a TestResponse so a batch can record it and move on.
 */
export function createApiClient(baseUrl: string, timeoutMs = 600_000, fetchFn: typeof fetch = fetch): SubmitTest {
  const url = `${baseUrl.replace(/\/+$/, '')}/test`;

  return async (req) => {
    let res: Response;
    try {
      res = await fetchFn(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(req),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      // AbortSignal.timeout rejects with a DOMException named TimeoutError
      if (typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError') {
        return failure(`Request timed out after ${timeoutMs / 1000}s`);
      }
      return failure(`Cannot reach the API server at ${baseUrl}: ${err instanceof Error ? err.message : String(err)}`);
    }

    let data: unknown;
    try {
      data = await res.json();
    } catch {
      return failure(`HTTP ${res.status}: response is not JSON`);
    }
    if (isTestResponse(data)) {
      return { ...data, output: typeof data.output === 'string' ? data.output : '' };
    }
    return failure(`HTTP ${res.status}: unexpected response body`);
  };
}
