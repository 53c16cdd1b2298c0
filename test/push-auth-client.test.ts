import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AuthError } from '../src/auth/errors.js';
import { PushAuthClient } from '../src/auth/pushAuthClient.js';

type FetchArgs = [RequestInfo | URL, RequestInit?];

function createClient(requestTimeoutMs = 1_000): PushAuthClient {
  return new PushAuthClient({
    apiBase: 'https://api.push-auth.test/rest/v1.1/',
    bearerToken: 'test-token',
    requestTimeoutMs,
  });
}

describe('PushAuthClient.authorizeLogin', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('posts the push token to the authorization endpoint', async () => {
    const fetchMock = vi
      .fn<(...args: FetchArgs) => Promise<Response>>()
      .mockResolvedValue(new Response(JSON.stringify({ success: true }), { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const result = await createClient().authorizeLogin('abc123');

    expect(result).toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.push-auth.test/rest/v1.1/me/two-step/push-authentication');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      authorization: 'Bearer test-token',
      'content-type': 'application/json',
    });
    expect(init?.body).toBe(JSON.stringify({ action: 'authorize_login', push_token: 'abc123' }));
  });

  it('accepts a bare boolean response', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<(...args: FetchArgs) => Promise<Response>>().mockResolvedValue(new Response('true', { status: 200 })),
    );

    await expect(createClient().authorizeLogin('abc123')).resolves.toEqual({ ok: true });
  });

  it('returns an http error without retrying', async () => {
    const fetchMock = vi
      .fn<(...args: FetchArgs) => Promise<Response>>()
      .mockResolvedValue(new Response('{"error":"unauthorized"}', { status: 403 }));
    vi.stubGlobal('fetch', fetchMock);

    const result = await createClient().authorizeLogin('abc123');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(AuthError);
      expect(result.error.code).toBe('http');
      expect(result.error.status).toBe(403);
      expect(result.error.message).toBe('Push auth request failed: 403 {"error":"unauthorized"}');
    }
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('reports a declined authorization as an invalid response', async () => {
    vi.stubGlobal(
      'fetch',
      vi
        .fn<(...args: FetchArgs) => Promise<Response>>()
        .mockResolvedValue(new Response(JSON.stringify({ success: false }), { status: 200 })),
    );

    const result = await createClient().authorizeLogin('abc123');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('invalid_response');
      expect(result.error.status).toBeNull();
    }
  });

  it('reports a non-JSON body as an invalid response', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<(...args: FetchArgs) => Promise<Response>>().mockResolvedValue(new Response('<html></html>', { status: 200 })),
    );

    const result = await createClient().authorizeLogin('abc123');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('invalid_response');
      expect(result.error.message).toBe('Push auth response was not JSON');
    }
  });

  it('wraps network failures', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<(...args: FetchArgs) => Promise<Response>>().mockRejectedValue(new TypeError('fetch failed')),
    );

    const result = await createClient().authorizeLogin('abc123');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('network');
      expect(result.error.message).toBe('Push auth request failed: fetch failed');
    }
  });

  it('times out hung requests', async () => {
    const fetchMock = vi.fn<(...args: FetchArgs) => Promise<Response>>((_url, init) => {
      const signal = init?.signal;
      return new Promise((_resolve, reject) => {
        signal?.addEventListener('abort', () => {
          reject(new DOMException('Aborted', 'AbortError'));
        });
      });
    });
    vi.stubGlobal('fetch', fetchMock);

    const result = await createClient(5).authorizeLogin('abc123');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('timeout');
      expect(result.error.message).toBe('Push auth request timed out after 100ms');
    }
  });
});
