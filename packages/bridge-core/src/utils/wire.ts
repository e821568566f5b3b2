/**
 * Wire format of GET /credentials
 */

import { AuthError, isAuthErrorKind, type AuthErrorKind } from '../errors/auth-error';
import type { CredentialBundle, CredentialResponseBody } from '../types/credentials';
import { isPermissionTier } from '../types/service';
import { isRecord } from './guards';

export function toCredentialResponseBody(bundle: CredentialBundle): CredentialResponseBody {
  return {
    AccessKeyId: bundle.accessKey,
    SecretAccessKey: bundle.secretKey,
    SessionToken: bundle.sessionToken,
    Expiration: new Date(bundle.expiresAt).toISOString(),
    IssuedAt: new Date(bundle.issuedAt).toISOString(),
    Service: bundle.serviceId,
    BucketPatterns: [...bundle.bucketPatterns],
    Permissions: bundle.permissionTier,
  };
}

function requireString(record: Record<string, unknown>, field: string): string {
  const value = record[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw new AuthError(`Malformed credential response: missing ${field}`, 'UpstreamFailure');
  }
  return value;
}

function requireTimestamp(record: Record<string, unknown>, field: string): number {
  const time = Date.parse(requireString(record, field));
  if (Number.isNaN(time)) {
    throw new AuthError(`Malformed credential response: invalid ${field}`, 'UpstreamFailure');
  }
  return time;
}

/**
 * Validate a success body. A body that does not describe a complete,
 * well-formed credential is rejected rather than partially used.
 *
 * @param serviceId Service the credential was requested for
 * @param receivedAt Fallback issue time when the body carries none
 */
export function parseCredentialResponseBody(
  body: unknown,
  serviceId: string,
  receivedAt: number
): CredentialBundle {
  if (!isRecord(body)) {
    throw new AuthError('Malformed credential response: expected an object', 'UpstreamFailure');
  }
  const record = body;

  const expiresAt = requireTimestamp(record, 'Expiration');
  const issuedAt = record.IssuedAt === undefined ? receivedAt : requireTimestamp(record, 'IssuedAt');

  if (expiresAt <= issuedAt) {
    throw new AuthError('Malformed credential response: expiry precedes issue time', 'UpstreamFailure');
  }

  if (record.Service !== undefined && record.Service !== serviceId) {
    throw new AuthError(
      `Credential response is for service ${String(record.Service)}, expected ${serviceId}`,
      'UpstreamFailure'
    );
  }

  const patterns = record.BucketPatterns;
  const bucketPatterns =
    Array.isArray(patterns) && patterns.every((p): p is string => typeof p === 'string')
      ? patterns
      : [];

  const permissionTier = isPermissionTier(record.Permissions) ? record.Permissions : 'read-only';

  return {
    accessKey: requireString(record, 'AccessKeyId'),
    secretKey: requireString(record, 'SecretAccessKey'),
    sessionToken: requireString(record, 'SessionToken'),
    issuedAt,
    expiresAt,
    serviceId,
    bucketPatterns,
    permissionTier,
  };
}

/**
 * Read the error kind from a failure body, if it carries a known one
 */
export function parseErrorKind(body: unknown): { kind: AuthErrorKind | null; message: string | null } {
  if (!isRecord(body)) {
    return { kind: null, message: null };
  }
  return {
    kind: isAuthErrorKind(body.error) ? body.error : null,
    message: typeof body.message === 'string' ? body.message : null,
  };
}
