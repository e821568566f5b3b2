import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EnvServiceRegistry } from './env-registry';

describe('EnvServiceRegistry', () => {
  let env: NodeJS.ProcessEnv;
  let registry: EnvServiceRegistry;

  beforeEach(() => {
    env = {
      SERVICE_ANALYTICS: JSON.stringify({
        role: 'arn:aws:iam::123456789012:role/analytics-s3-access-role',
        buckets: ['*-analytics-*', 'analytics-*'],
        permissions: 'read-only',
      }),
      SERVICE_WEBAPP: JSON.stringify({
        role: 'arn:aws:iam::123456789012:role/webapp-s3-access-role',
        buckets: ['webapp-*'],
      }),
      OTHER_VARIABLE: 'ignored',
    };
    registry = new EnvServiceRegistry({ env: () => env });
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should resolve a registered service', async () => {
    const result = await registry.lookup('analytics');

    expect(result).toEqual({
      status: 'found',
      service: {
        serviceId: 'analytics',
        bucketPatterns: ['*-analytics-*', 'analytics-*'],
        permissionTier: 'read-only',
        roleReference: 'arn:aws:iam::123456789012:role/analytics-s3-access-role',
      },
    });
  });

  it('should default the tier to read-write', async () => {
    const result = await registry.lookup('webapp');

    expect(result.status).toBe('found');
    if (result.status === 'found') {
      expect(result.service.permissionTier).toBe('read-write');
    }
  });

  it('should report unknown services as not found', async () => {
    expect(await registry.lookup('nonexistent')).toEqual({
      status: 'not-found',
      serviceId: 'nonexistent',
    });
  });

  it('should not match ids case-insensitively', async () => {
    const result = await registry.lookup('ANALYTICS');
    expect(result.status).toBe('not-found');
  });

  it('should treat an empty id as not found', async () => {
    const result = await registry.lookup('');
    expect(result.status).toBe('not-found');
  });

  it('should skip definitions that are not valid JSON', async () => {
    env.SERVICE_BROKEN = '{not json';

    const result = await registry.lookup('broken');

    expect(result.status).toBe('not-found');
    expect(console.warn).toHaveBeenCalledWith(
      '[Registry] Skipping service with invalid JSON definition',
      { serviceId: 'broken' }
    );
  });

  it('should skip definitions without bucket patterns', async () => {
    env.SERVICE_EMPTY = JSON.stringify({ role: 'arn:aws:iam::123456789012:role/x', buckets: [] });

    expect((await registry.lookup('empty')).status).toBe('not-found');
  });

  it('should skip definitions without a role', async () => {
    env.SERVICE_NOROLE = JSON.stringify({ buckets: ['a-*'] });

    expect((await registry.lookup('norole')).status).toBe('not-found');
  });

  it('should skip definitions with an unknown tier', async () => {
    env.SERVICE_ODD = JSON.stringify({
      role: 'arn:aws:iam::123456789012:role/odd',
      buckets: ['odd-*'],
      permissions: 'superuser',
    });

    expect((await registry.lookup('odd')).status).toBe('not-found');
  });

  it('should skip non-object definitions', async () => {
    env.SERVICE_LIST = JSON.stringify(['a-*']);

    expect((await registry.lookup('list')).status).toBe('not-found');
  });

  it('should read the latest environment on every lookup', async () => {
    expect((await registry.lookup('reports')).status).toBe('not-found');

    env.SERVICE_REPORTS = JSON.stringify({
      role: 'arn:aws:iam::123456789012:role/reports',
      buckets: ['reports-*'],
    });

    expect((await registry.lookup('reports')).status).toBe('found');

    delete env.SERVICE_REPORTS;

    expect((await registry.lookup('reports')).status).toBe('not-found');
  });

  describe('universal service', () => {
    it('should map to the bridge access role when the account is known', async () => {
      env.AWS_ACCOUNT_ID = '123456789012';

      expect(await registry.lookup('universal')).toEqual({
        status: 'found',
        service: {
          serviceId: 'universal',
          bucketPatterns: ['*'],
          permissionTier: 'admin',
          roleReference: 'arn:aws:iam::123456789012:role/service-role/s3bridge-access-role',
        },
      });
    });

    it('should be unknown without an account id', async () => {
      expect((await registry.lookup('universal')).status).toBe('not-found');
    });
  });
});
