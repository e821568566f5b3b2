import { beforeEach, describe, expect, it, vi } from 'vitest';

const { mockSend } = vi.hoisted(() => ({
  mockSend: vi.fn(),
}));

vi.mock('@aws-sdk/client-s3', () => ({
  S3Client: vi.fn().mockImplementation(() => ({ send: mockSend })),
  GetObjectCommand: vi.fn().mockImplementation((params) => ({ ...params, _type: 'GetObject' })),
  PutObjectCommand: vi.fn().mockImplementation((params) => ({ ...params, _type: 'PutObject' })),
  ListObjectsV2Command: vi.fn().mockImplementation((params) => ({ ...params, _type: 'ListObjectsV2' })),
  DeleteObjectCommand: vi.fn().mockImplementation((params) => ({ ...params, _type: 'DeleteObject' })),
  HeadObjectCommand: vi.fn().mockImplementation((params) => ({ ...params, _type: 'HeadObject' })),
}));

// Import after mocks
import { AuthError } from '@s3bridge/bridge-core';
import { createBridgeClient } from './index';

const ANALYTICS_PATTERNS = ['*-analytics-*', 'analytics-*'];

function credentialResponse(): Response {
  const issuedAt = Date.now();
  return new Response(
    JSON.stringify({
      AccessKeyId: 'ASIATESTACCESSKEY',
      SecretAccessKey: 'test-secret',
      SessionToken: 'test-session-token',
      Expiration: new Date(issuedAt + 3600 * 1000).toISOString(),
      IssuedAt: new Date(issuedAt).toISOString(),
      Service: 'analytics',
      BucketPatterns: ANALYTICS_PATTERNS,
      Permissions: 'read-only',
    }),
    { status: 200 }
  );
}

describe('createBridgeClient', () => {
  beforeEach(() => {
    mockSend.mockReset();
  });

  it('should let the analytics service read its own buckets only', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockImplementation(async () => credentialResponse());
    mockSend.mockResolvedValue({
      Contents: [{ Key: 'reports/2024-01.json', Size: 128 }],
      IsTruncated: false,
    });

    const { credentials, storage } = createBridgeClient({
      apiUrl: 'https://api.test/prod',
      apiKey: 'test-api-key',
      serviceId: 'analytics',
      region: 'us-east-1',
      bucketPatterns: ANALYTICS_PATTERNS,
      fetch: fetchFn,
    });

    const objects = await storage.listObjects('company-analytics-data');
    expect(objects).toEqual([{ key: 'reports/2024-01.json', size: 128 }]);
    expect(credentials.getState('analytics')).toBe('fresh');
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(mockSend).toHaveBeenCalledTimes(1);

    let denied: unknown;
    try {
      await storage.listObjects('webapp-data');
    } catch (err) {
      denied = err;
    }

    expect(denied).toBeInstanceOf(AuthError);
    expect(denied).toMatchObject({ kind: 'BucketNotAuthorized' });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(mockSend).toHaveBeenCalledTimes(1);
  });
});
