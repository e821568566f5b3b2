import { describe, expect, it, vi } from 'vitest';
import { AuthError } from '@s3bridge/bridge-core';
import { IssuerClient } from './issuer-client';

const NOW = Date.parse('2024-01-01T00:00:00.000Z');

const successBody = {
  AccessKeyId: 'ASIATESTACCESSKEY',
  SecretAccessKey: 'test-secret',
  SessionToken: 'test-session-token',
  Expiration: '2024-01-01T01:00:00.000Z',
  IssuedAt: '2024-01-01T00:00:00.000Z',
  Service: 'analytics',
  BucketPatterns: ['*-analytics-*', 'analytics-*'],
  Permissions: 'read-only',
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createClient(fetchFn: typeof fetch, timeoutMs?: number): IssuerClient {
  return new IssuerClient({
    baseUrl: 'https://api.test/prod/',
    apiKey: 'test-api-key',
    fetch: fetchFn,
    timeoutMs,
    now: () => NOW,
  });
}

async function fetchError(promise: Promise<unknown>): Promise<AuthError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof AuthError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected fetchCredentials() to fail');
}

describe('IssuerClient', () => {
  it('should request credentials with the API key header', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(successBody));
    const client = createClient(fetchFn);

    const bundle = await client.fetchCredentials('analytics');

    expect(bundle).toEqual({
      accessKey: 'ASIATESTACCESSKEY',
      secretKey: 'test-secret',
      sessionToken: 'test-session-token',
      issuedAt: NOW,
      expiresAt: NOW + 3600 * 1000,
      serviceId: 'analytics',
      bucketPatterns: ['*-analytics-*', 'analytics-*'],
      permissionTier: 'read-only',
    });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('https://api.test/prod/credentials?service=analytics&duration=3600');
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      'X-API-Key': 'test-api-key',
    });
  });

  it('should map a failure body to its error kind', async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockResolvedValue(
        jsonResponse({ error: 'UnknownService', message: 'Unknown service: billing' }, 400)
      );

    const err = await fetchError(createClient(fetchFn).fetchCredentials('billing'));

    expect(err.kind).toBe('UnknownService');
    expect(err.message).toBe('Unknown service: billing');
  });

  it('should map an unrecognized 403 to InvalidApiKey', async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response('Forbidden', { status: 403 }));

    const err = await fetchError(createClient(fetchFn).fetchCredentials('analytics'));

    expect(err.kind).toBe('InvalidApiKey');
    expect(err.message).toBe('Credential service failed with status 403');
  });

  it('should map an unrecognized 5xx to UpstreamFailure', async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockResolvedValue(jsonResponse({ message: 'Internal server error' }, 503));

    const err = await fetchError(createClient(fetchFn).fetchCredentials('analytics'));

    expect(err.kind).toBe('UpstreamFailure');
    expect(err.message).toBe('Internal server error');
  });

  it('should map an unrecognized 4xx to InvalidRequest', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response('', { status: 404 }));

    const err = await fetchError(createClient(fetchFn).fetchCredentials('analytics'));

    expect(err.kind).toBe('InvalidRequest');
    expect(err.message).toBe('Credential service failed with status 404');
  });

  it('should report network failures as UpstreamFailure', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));

    const err = await fetchError(createClient(fetchFn).fetchCredentials('analytics'));

    expect(err.kind).toBe('UpstreamFailure');
    expect(err.message).toBe('Credential service request failed: fetch failed');
  });

  it('should time out a request that never answers', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    const err = await fetchError(createClient(fetchFn, 10).fetchCredentials('analytics'));

    expect(err.kind).toBe('UpstreamFailure');
    expect(err.message).toBe('Credential service timed out after 10ms');
  });

  it('should reject a success response that is not JSON', async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response('<html></html>', { status: 200 }));

    const err = await fetchError(createClient(fetchFn).fetchCredentials('analytics'));

    expect(err.kind).toBe('UpstreamFailure');
    expect(err.message).toBe('Credential service returned invalid JSON');
  });

  it('should reject a credential issued for another service', async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockResolvedValue(jsonResponse({ ...successBody, Service: 'webapp' }));

    const err = await fetchError(createClient(fetchFn).fetchCredentials('analytics'));

    expect(err.kind).toBe('UpstreamFailure');
    expect(err.message).toBe('Credential response is for service webapp, expected analytics');
  });

  it('should require a base URL and an API key', () => {
    expect(() => new IssuerClient({ baseUrl: '', apiKey: 'test-api-key' })).toThrow(
      'Credential API URL is not configured'
    );
    expect(() => new IssuerClient({ baseUrl: 'https://api.test', apiKey: '' })).toThrow(
      'API key is not configured'
    );
  });
});
