/**
 * Credential Cache
 *
 * Holds the latest bundle per service and refreshes it on demand.
 *
 *   empty ──get──▶ refreshing ──ok──▶ fresh ──margin reached / invalidate──▶ stale
 *                      │                                                    │
 *                      └──fail──▶ stale ◀───────────────────────────────────┘
 *                                   └──get──▶ refreshing
 *
 * At most one refresh is in flight per service; everyone who asks while it
 * runs gets its bundle or its error. Services never wait on each other.
 * After reset() the orphaned call is never cached, and the next refresh for
 * that service starts only once it has settled.
 */

import { AuthError, isRetryable, type CredentialBundle } from '@s3bridge/bridge-core';
import type {
  CacheState,
  CredentialCacheOptions,
  CredentialSource,
  GetCredentialsOptions,
} from './types';

const DEFAULT_SAFETY_MARGIN_MS = 10 * 60 * 1000;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_RETRY_BASE_DELAY_MS = 200;

interface CacheEntry {
  bundle: CredentialBundle | null;
}

interface RefreshControl {
  /** Generation of the service when the refresh started */
  generation: number;
  /** Set by invalidate() while the refresh runs; the result is then not cached */
  invalidated: boolean;
}

interface InflightRefresh {
  control: RefreshControl;
  promise: Promise<CredentialBundle>;
}

function toAuthError(error: unknown): AuthError {
  if (error instanceof AuthError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new AuthError(`Credential refresh failed: ${message}`, 'UpstreamFailure', {
    cause: error,
  });
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class CredentialCache {
  private readonly source: CredentialSource;
  private readonly safetyMarginMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly now: () => number;
  private readonly entries = new Map<string, CacheEntry>();
  // Outlives reset(): an orphaned call still blocks the next one for its service
  private readonly inflight = new Map<string, InflightRefresh>();
  private readonly generations = new Map<string, number>();

  constructor(options: CredentialCacheOptions) {
    this.source = options.source;
    this.safetyMarginMs = options.safetyMarginMs ?? DEFAULT_SAFETY_MARGIN_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Return a fresh bundle, refreshing first when the cached one is stale or absent
   */
  async getCredentials(
    serviceId: string,
    options: GetCredentialsOptions = {}
  ): Promise<CredentialBundle> {
    let entry = this.entries.get(serviceId);
    if (!entry) {
      entry = { bundle: null };
      this.entries.set(serviceId, entry);
    }

    if (entry.bundle && this.isFresh(entry.bundle)) {
      return entry.bundle;
    }

    const refresh = this.currentRefresh(serviceId) ?? this.startRefresh(serviceId, entry);
    return this.waitFor(serviceId, refresh.promise, options);
  }

  getState(serviceId: string): CacheState {
    const entry = this.entries.get(serviceId);
    if (!entry) {
      return 'empty';
    }
    if (this.currentRefresh(serviceId)) {
      return 'refreshing';
    }
    if (entry.bundle && this.isFresh(entry.bundle)) {
      return 'fresh';
    }
    return 'stale';
  }

  /**
   * Force the entry stale, e.g. after the storage backend rejected the credential.
   * With `accessKey`, only a cached bundle carrying that key is dropped, so a
   * late report about an already replaced credential changes nothing.
   * A refresh running at the time still answers its waiters but is not cached.
   * No-op for a service that has never been requested.
   */
  invalidate(serviceId: string, accessKey?: string): void {
    const entry = this.entries.get(serviceId);
    if (!entry) {
      return;
    }
    if (accessKey !== undefined) {
      if (entry.bundle?.accessKey === accessKey) {
        entry.bundle = null;
        console.log('[CredentialCache] Invalidated', { serviceId });
      }
      return;
    }

    entry.bundle = null;
    const running = this.currentRefresh(serviceId);
    if (running) {
      running.control.invalidated = true;
    }
    console.log('[CredentialCache] Invalidated', { serviceId, refreshing: running !== undefined });
  }

  /**
   * Drop the entry entirely (back to empty), e.g. after an API key rotation.
   * A refresh already in flight still answers its waiters but is not cached,
   * and the next refresh for the service starts only once it has settled.
   */
  reset(serviceId: string): void {
    this.entries.delete(serviceId);
    this.generations.set(serviceId, this.generationOf(serviceId) + 1);
  }

  clear(): void {
    for (const serviceId of new Set([...this.entries.keys(), ...this.inflight.keys()])) {
      this.reset(serviceId);
    }
  }

  private isFresh(bundle: CredentialBundle): boolean {
    return this.now() < bundle.expiresAt - this.safetyMarginMs;
  }

  private generationOf(serviceId: string): number {
    return this.generations.get(serviceId) ?? 0;
  }

  /**
   * The in-flight refresh that belongs to the current generation, if any
   */
  private currentRefresh(serviceId: string): InflightRefresh | undefined {
    const refresh = this.inflight.get(serviceId);
    if (refresh && refresh.control.generation === this.generationOf(serviceId)) {
      return refresh;
    }
    return undefined;
  }

  private startRefresh(serviceId: string, entry: CacheEntry): InflightRefresh {
    entry.bundle = null;

    const control: RefreshControl = { generation: this.generationOf(serviceId), invalidated: false };
    const orphaned = this.inflight.get(serviceId);
    const settled = orphaned
      ? orphaned.promise.then(
          () => undefined,
          () => undefined
        )
      : Promise.resolve();

    const promise: Promise<CredentialBundle> = settled
      .then(() => this.fetchWithRetry(serviceId))
      .then((bundle) => {
        if (bundle.expiresAt <= this.now()) {
          throw new AuthError(
            `Credential service returned an expired credential for ${serviceId}`,
            'UpstreamFailure'
          );
        }
        this.store(serviceId, control, bundle);
        return bundle;
      })
      .finally(() => {
        if (this.inflight.get(serviceId)?.promise === promise) {
          this.inflight.delete(serviceId);
        }
      });

    const refresh: InflightRefresh = { control, promise };
    this.inflight.set(serviceId, refresh);

    // Waiters may all have given up; the failure is still reported here
    promise.catch((error: unknown) => {
      console.warn('[CredentialCache] Refresh failed', {
        serviceId,
        error: error instanceof Error ? error.message : String(error),
      });
    });

    return refresh;
  }

  private store(serviceId: string, control: RefreshControl, bundle: CredentialBundle): void {
    const entry = this.entries.get(serviceId);
    if (!entry || control.generation !== this.generationOf(serviceId)) {
      console.log('[CredentialCache] Discarding refresh started before a reset', { serviceId });
      return;
    }
    if (control.invalidated) {
      console.log('[CredentialCache] Discarding refresh invalidated while in flight', { serviceId });
      return;
    }

    entry.bundle = bundle;
    if (!this.isFresh(bundle)) {
      console.warn('[CredentialCache] Refreshed credential is already inside the safety margin', {
        serviceId,
        expiresAt: new Date(bundle.expiresAt).toISOString(),
      });
    }
  }

  private async fetchWithRetry(serviceId: string): Promise<CredentialBundle> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.source.fetchCredentials(serviceId);
      } catch (error) {
        const authError = toAuthError(error);
        if (!isRetryable(authError.kind) || attempt >= this.maxRetries) {
          throw authError;
        }
        const backoff = this.retryBaseDelayMs * 2 ** attempt;
        console.warn('[CredentialCache] Retrying credential refresh', {
          serviceId,
          attempt: attempt + 1,
          backoffMs: backoff,
          error: authError.message,
        });
        await delay(backoff);
      }
    }
  }

  private waitFor(
    serviceId: string,
    refresh: Promise<CredentialBundle>,
    options: GetCredentialsOptions
  ): Promise<CredentialBundle> {
    const { timeoutMs, signal } = options;
    if (timeoutMs === undefined && !signal) {
      return refresh;
    }

    return new Promise<CredentialBundle>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const cleanup = (): void => {
        if (timer !== undefined) {
          clearTimeout(timer);
        }
        signal?.removeEventListener('abort', onAbort);
      };

      function onAbort(): void {
        cleanup();
        reject(new AuthError(`Stopped waiting for credentials for ${serviceId}`, 'UpstreamFailure'));
      }

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          cleanup();
          reject(
            new AuthError(
              `Timed out after ${timeoutMs}ms waiting for credentials for ${serviceId}`,
              'UpstreamFailure'
            )
          );
        }, timeoutMs);
      }

      refresh.then(
        (bundle) => {
          cleanup();
          resolve(bundle);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        }
      );
    });
  }
}
