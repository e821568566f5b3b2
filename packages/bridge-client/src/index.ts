/**
 * @s3bridge/bridge-client
 *
 * Client side of the credential broker: issuer HTTP client, per-service
 * credential cache, and S3 operations scoped to a service's buckets.
 */

import { CredentialCache } from './credential-cache';
import { IssuerClient } from './issuer-client';
import { StorageClient } from './storage';

export { IssuerClient } from './issuer-client';
export { CredentialCache } from './credential-cache';
export { StorageClient, isStorageAuthFailure } from './storage';
export type { StorageClientConfig, StoredObject } from './storage';
export type {
  CacheState,
  CredentialCacheOptions,
  CredentialSource,
  GetCredentialsOptions,
  IssuerClientConfig,
} from './types';

export interface BridgeClientConfig {
  apiUrl: string;
  apiKey: string;
  serviceId: string;
  region?: string;
  bucketPatterns?: string[];
  safetyMarginMs?: number;
  fetch?: typeof fetch;
}

/**
 * Wire issuer client, cache and storage client for one service
 */
export function createBridgeClient(config: BridgeClientConfig): {
  credentials: CredentialCache;
  storage: StorageClient;
} {
  const source = new IssuerClient({
    baseUrl: config.apiUrl,
    apiKey: config.apiKey,
    fetch: config.fetch,
  });
  const credentials = new CredentialCache({ source, safetyMarginMs: config.safetyMarginMs });
  const storage = new StorageClient({
    serviceId: config.serviceId,
    credentials,
    region: config.region,
    bucketPatterns: config.bucketPatterns,
  });
  return { credentials, storage };
}
