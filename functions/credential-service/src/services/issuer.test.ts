import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { AuthError, EnvServiceRegistry } from '@s3bridge/bridge-core';
import { createApiKeyAuthProvider, type PlatformAuthProvider } from '@s3bridge/platform-auth';
import { clampDuration, CredentialIssuer, type CredentialIssuerOptions } from './issuer';
import type { AssumedCredentials, AssumeRoleRequest } from './role-authority';

const NOW = Date.parse('2024-01-01T00:00:00.000Z');

const ANALYTICS_ROLE = 'arn:aws:iam::123456789012:role/analytics-s3-access-role';

const assumed = (expiration?: Date): AssumedCredentials => ({
  accessKeyId: 'ASIATESTACCESSKEY',
  secretAccessKey: 'test-secret',
  sessionToken: 'test-session-token',
  expiration,
});

async function issueError(promise: Promise<unknown>): Promise<AuthError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof AuthError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected issue() to fail');
}

describe('clampDuration', () => {
  it('should cap requests at the ceiling', () => {
    expect(clampDuration(7200, 3600, 3600)).toBe(3600);
    expect(clampDuration(7200, 1800, 1800)).toBe(1800);
  });

  it('should never exceed one hour even if configured higher', () => {
    expect(clampDuration(43200, 43200, 3600)).toBe(3600);
  });

  it('should raise zero, negative and tiny requests to the minimum', () => {
    expect(clampDuration(0, 3600, 3600)).toBe(900);
    expect(clampDuration(-5, 3600, 3600)).toBe(900);
    expect(clampDuration(60, 3600, 3600)).toBe(900);
  });

  it('should keep requests inside the range', () => {
    expect(clampDuration(1200, 3600, 3600)).toBe(1200);
    expect(clampDuration(1200.9, 3600, 3600)).toBe(1200);
  });

  it('should use the default when nothing usable is requested', () => {
    expect(clampDuration(undefined, 3600, 2700)).toBe(2700);
    expect(clampDuration(Number.NaN, 3600, 2700)).toBe(2700);
  });

  it('should keep the floor below a small ceiling', () => {
    expect(clampDuration(60, 600, 600)).toBe(600);
  });
});

describe('CredentialIssuer', () => {
  let env: NodeJS.ProcessEnv;
  let registry: EnvServiceRegistry;
  let assume: Mock<(request: AssumeRoleRequest) => Promise<AssumedCredentials>>;

  const createIssuer = (overrides: Partial<CredentialIssuerOptions> = {}): CredentialIssuer =>
    new CredentialIssuer({
      auth: createApiKeyAuthProvider({ localApiKey: 'test-api-key' }),
      registry,
      authority: { assume },
      now: () => NOW,
      ...overrides,
    });

  beforeEach(() => {
    env = {
      SERVICE_ANALYTICS: JSON.stringify({
        role: ANALYTICS_ROLE,
        buckets: ['*-analytics-*', 'analytics-*'],
        permissions: 'read-only',
      }),
    };
    registry = new EnvServiceRegistry({ env: () => env });
    assume = vi.fn<(request: AssumeRoleRequest) => Promise<AssumedCredentials>>();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should issue a bundle scoped to the registered role', async () => {
    assume.mockResolvedValueOnce(assumed(new Date(NOW + 3600 * 1000)));

    const bundle = await createIssuer().issue({
      apiKey: 'test-api-key',
      serviceId: 'analytics',
    });

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
    expect(assume).toHaveBeenCalledWith({
      roleReference: ANALYTICS_ROLE,
      durationSeconds: 3600,
      sessionName: 'analytics-session-1704067200',
    });
  });

  it('should clamp a two-hour request to one hour', async () => {
    assume.mockResolvedValueOnce(assumed());

    const bundle = await createIssuer().issue({
      apiKey: 'test-api-key',
      serviceId: 'analytics',
      requestedDurationSeconds: 7200,
    });

    expect(assume.mock.calls[0][0].durationSeconds).toBe(3600);
    expect(bundle.expiresAt - bundle.issuedAt).toBeLessThanOrEqual(3600 * 1000);
    expect(bundle.expiresAt).toBe(NOW + 3600 * 1000);
  });

  it('should honor a configured ceiling below one hour', async () => {
    assume.mockResolvedValueOnce(assumed());

    const bundle = await createIssuer({ maxDurationSeconds: 1800 }).issue({
      apiKey: 'test-api-key',
      serviceId: 'analytics',
      requestedDurationSeconds: 7200,
    });

    expect(assume.mock.calls[0][0].durationSeconds).toBe(1800);
    expect(bundle.expiresAt).toBe(NOW + 1800 * 1000);
  });

  it('should never request a zero or negative duration', async () => {
    assume.mockResolvedValue(assumed());

    await createIssuer().issue({
      apiKey: 'test-api-key',
      serviceId: 'analytics',
      requestedDurationSeconds: 0,
    });
    await createIssuer().issue({
      apiKey: 'test-api-key',
      serviceId: 'analytics',
      requestedDurationSeconds: -30,
    });

    expect(assume.mock.calls.map(([request]) => request.durationSeconds)).toEqual([900, 900]);
  });

  it('should trust a shorter expiry granted by the authority', async () => {
    assume.mockResolvedValueOnce(assumed(new Date(NOW + 900 * 1000)));

    const bundle = await createIssuer().issue({
      apiKey: 'test-api-key',
      serviceId: 'analytics',
      requestedDurationSeconds: 3600,
    });

    expect(bundle.expiresAt).toBe(NOW + 900 * 1000);
  });

  it('should cut a longer expiry from the authority to the clamped duration', async () => {
    assume.mockResolvedValueOnce(assumed(new Date(NOW + 7200 * 1000)));

    const bundle = await createIssuer().issue({
      apiKey: 'test-api-key',
      serviceId: 'analytics',
      requestedDurationSeconds: 7200,
    });

    expect(bundle.expiresAt - bundle.issuedAt).toBe(3600 * 1000);
  });

  it('should reject an expiry that is not after the issue time', async () => {
    assume.mockResolvedValueOnce(assumed(new Date(NOW)));

    const error = await issueError(
      createIssuer().issue({ apiKey: 'test-api-key', serviceId: 'analytics' })
    );

    expect(error.kind).toBe('UpstreamFailure');
  });

  it('should reject a wrong API key before touching the registry', async () => {
    const lookup = vi.spyOn(registry, 'lookup');

    const error = await issueError(
      createIssuer().issue({ apiKey: 'wrong-key', serviceId: 'analytics' })
    );

    expect(error.kind).toBe('InvalidApiKey');
    expect(error.message).toBe('Invalid API key');
    expect(lookup).not.toHaveBeenCalled();
    expect(assume).not.toHaveBeenCalled();
  });

  it('should reject a missing API key', async () => {
    const error = await issueError(
      createIssuer().issue({ apiKey: undefined, serviceId: 'analytics' })
    );

    expect(error.kind).toBe('InvalidApiKey');
  });

  it('should fail closed when the key cannot be verified', async () => {
    const error = await issueError(
      createIssuer({ auth: createApiKeyAuthProvider({}) }).issue({
        apiKey: 'test-api-key',
        serviceId: 'analytics',
      })
    );

    expect(error.kind).toBe('UpstreamFailure');
    expect(assume).not.toHaveBeenCalled();
  });

  it('should answer UnknownService for unregistered services', async () => {
    const error = await issueError(
      createIssuer().issue({ apiKey: 'test-api-key', serviceId: 'nonexistent' })
    );

    expect(error.kind).toBe('UnknownService');
    expect(error.message).toBe('Unknown service: nonexistent');
    expect(assume).not.toHaveBeenCalled();
  });

  it('should map registry failures to UpstreamFailure', async () => {
    vi.spyOn(registry, 'lookup').mockRejectedValueOnce(new Error('store offline'));

    const error = await issueError(
      createIssuer().issue({ apiKey: 'test-api-key', serviceId: 'analytics' })
    );

    expect(error.kind).toBe('UpstreamFailure');
    expect(error.message).toBe('Service registry is unavailable');
  });

  it('should surface authority failures without retrying', async () => {
    assume.mockRejectedValueOnce(new Error('AccessDenied: not authorized to assume role'));

    const error = await issueError(
      createIssuer().issue({ apiKey: 'test-api-key', serviceId: 'analytics' })
    );

    expect(error.kind).toBe('UpstreamFailure');
    expect(error.message).toBe('Role assumption failed: AccessDenied: not authorized to assume role');
    expect(assume).toHaveBeenCalledTimes(1);
  });

  it('should read the registry on every request', async () => {
    assume.mockResolvedValue(assumed());
    const issuer = createIssuer();

    await issuer.issue({ apiKey: 'test-api-key', serviceId: 'analytics' });
    delete env.SERVICE_ANALYTICS;

    const error = await issueError(issuer.issue({ apiKey: 'test-api-key', serviceId: 'analytics' }));

    expect(error.kind).toBe('UnknownService');
  });

  it('should check the key with the configured provider', async () => {
    const authenticate = vi.fn<PlatformAuthProvider['authenticate']>().mockResolvedValue({
      success: true,
      context: { type: 'api-key', source: 'environment', authenticatedAt: '2024-01-01T00:00:00.000Z' },
    });
    assume.mockResolvedValueOnce(assumed());

    await createIssuer({ auth: { authenticate, invalidateCache: () => {} } }).issue({
      apiKey: 'any-key',
      serviceId: 'analytics',
    });

    expect(authenticate).toHaveBeenCalledWith('any-key');
  });
});
