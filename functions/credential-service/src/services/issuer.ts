/**
 * Credential Issuer
 *
 * Every step is a hard gate; any failure denies the whole request:
 *   1. API key (constant-time compare)
 *   2. Registry lookup
 *   3. Duration clamp
 *   4. Role assumption (not retried here)
 *   5. Stamp issue and expiry times
 * Holds no per-request state.
 */

import {
  AuthError,
  type CredentialBundle,
  type RegistryLookup,
  type ServiceRegistry,
} from '@s3bridge/bridge-core';
import type { PlatformAuthProvider } from '@s3bridge/platform-auth';
import { MAX_SESSION_DURATION_SECONDS, MIN_SESSION_DURATION_SECONDS } from '../config';
import { buildSessionName, type AssumedCredentials, type RoleAuthority } from './role-authority';

export interface IssueRequest {
  apiKey: string | undefined;
  serviceId: string;
  requestedDurationSeconds?: number;
  /** Correlation id for logs */
  requestId?: string;
}

export interface CredentialIssuerOptions {
  auth: PlatformAuthProvider;
  registry: ServiceRegistry;
  authority: RoleAuthority;
  maxDurationSeconds?: number;
  defaultDurationSeconds?: number;
  /** Epoch milliseconds */
  now?: () => number;
}

/**
 * Clamp a requested duration into [MIN, max]. The ceiling never exceeds one hour
 * and the result is never zero or negative.
 */
export function clampDuration(
  requested: number | undefined,
  maxDurationSeconds: number,
  defaultDurationSeconds: number
): number {
  const ceiling = Math.max(1, Math.min(maxDurationSeconds, MAX_SESSION_DURATION_SECONDS));
  const floor = Math.min(MIN_SESSION_DURATION_SECONDS, ceiling);
  const wanted =
    requested === undefined || !Number.isFinite(requested) ? defaultDurationSeconds : requested;
  return Math.min(ceiling, Math.max(floor, Math.floor(wanted)));
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class CredentialIssuer {
  private readonly auth: PlatformAuthProvider;
  private readonly registry: ServiceRegistry;
  private readonly authority: RoleAuthority;
  private readonly maxDurationSeconds: number;
  private readonly defaultDurationSeconds: number;
  private readonly now: () => number;

  constructor(options: CredentialIssuerOptions) {
    this.auth = options.auth;
    this.registry = options.registry;
    this.authority = options.authority;
    this.maxDurationSeconds = options.maxDurationSeconds ?? MAX_SESSION_DURATION_SECONDS;
    this.defaultDurationSeconds = options.defaultDurationSeconds ?? this.maxDurationSeconds;
    this.now = options.now ?? Date.now;
  }

  async issue(request: IssueRequest): Promise<CredentialBundle> {
    const { apiKey, serviceId, requestedDurationSeconds, requestId } = request;
    const logContext = { serviceId, requestId };

    const authResult = await this.auth.authenticate(apiKey);
    if (!authResult.success) {
      const { code, message } = authResult.error;
      if (code === 'MISSING_API_KEY' || code === 'INVALID_API_KEY') {
        console.warn('[Issuer] API key rejected', { ...logContext, code });
        throw new AuthError(message, 'InvalidApiKey');
      }
      console.error('[Issuer] API key verification unavailable', { ...logContext, code, message });
      throw new AuthError('API key verification is unavailable', 'UpstreamFailure');
    }

    let lookup: RegistryLookup;
    try {
      lookup = await this.registry.lookup(serviceId);
    } catch (error) {
      console.error('[Issuer] Registry lookup failed', { ...logContext, error: describe(error) });
      throw new AuthError('Service registry is unavailable', 'UpstreamFailure', { cause: error });
    }

    if (lookup.status === 'not-found') {
      console.warn('[Issuer] Unknown service', logContext);
      throw new AuthError(`Unknown service: ${serviceId}`, 'UnknownService');
    }
    const { service } = lookup;

    const durationSeconds = clampDuration(
      requestedDurationSeconds,
      this.maxDurationSeconds,
      this.defaultDurationSeconds
    );

    let assumed: AssumedCredentials;
    try {
      assumed = await this.authority.assume({
        roleReference: service.roleReference,
        durationSeconds,
        sessionName: buildSessionName(serviceId, this.now()),
      });
    } catch (error) {
      console.error('[Issuer] Role assumption failed', { ...logContext, error: describe(error) });
      throw new AuthError(`Role assumption failed: ${describe(error)}`, 'UpstreamFailure', {
        cause: error,
      });
    }

    const issuedAt = this.now();
    // A shorter grant from the authority wins; a longer one is cut to the clamped duration
    const clampedExpiry = issuedAt + durationSeconds * 1000;
    const expiresAt = assumed.expiration
      ? Math.min(assumed.expiration.getTime(), clampedExpiry)
      : clampedExpiry;

    if (!(expiresAt > issuedAt)) {
      console.error('[Issuer] Authority returned an expired credential', {
        ...logContext,
        expiresAt,
        issuedAt,
      });
      throw new AuthError('Role-assumption authority returned an expired credential', 'UpstreamFailure');
    }

    console.log('[Issuer] Issued credentials', {
      ...logContext,
      tier: service.permissionTier,
      durationSeconds,
      expiresAt: new Date(expiresAt).toISOString(),
    });

    return {
      accessKey: assumed.accessKeyId,
      secretKey: assumed.secretAccessKey,
      sessionToken: assumed.sessionToken,
      issuedAt,
      expiresAt,
      serviceId,
      bucketPatterns: [...service.bucketPatterns],
      permissionTier: service.permissionTier,
    };
  }
}
