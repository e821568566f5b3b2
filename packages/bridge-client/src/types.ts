/**
 * Client types
 */

import type { CredentialBundle } from '@s3bridge/bridge-core';

/**
 * Anything that can produce a fresh credential bundle for a service.
 * The cache calls this at most once at a time per service.
 */
export interface CredentialSource {
  fetchCredentials(serviceId: string): Promise<CredentialBundle>;
}

export interface IssuerClientConfig {
  /** Base URL of the credential API (e.g., https://abc123.execute-api.us-east-1.amazonaws.com/prod) */
  baseUrl: string;
  /** Static API key sent as X-API-Key */
  apiKey: string;
  /** Optional fetch implementation (defaults to global fetch) */
  fetch?: typeof fetch;
  /** Request timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Session length to ask for in seconds (default: 3600, the server clamps it) */
  durationSeconds?: number;
  /** Epoch milliseconds */
  now?: () => number;
}

export type CacheState = 'empty' | 'fresh' | 'stale' | 'refreshing';

export interface CredentialCacheOptions {
  source: CredentialSource;
  /** Lead time before expiry at which a bundle counts as stale (default: 10 minutes) */
  safetyMarginMs?: number;
  /** Extra attempts for UpstreamFailure during one refresh (default: 2) */
  maxRetries?: number;
  /** First backoff delay, doubled per attempt (default: 200ms) */
  retryBaseDelayMs?: number;
  /** Epoch milliseconds */
  now?: () => number;
}

export interface GetCredentialsOptions {
  /** Stop waiting after this many ms; the refresh itself carries on */
  timeoutMs?: number;
  /** Stop waiting when aborted; the refresh itself carries on */
  signal?: AbortSignal;
}
