/**
 * Credential broker error kinds
 * - UnknownService: registry miss, permanent until provisioning changes
 * - InvalidApiKey: permanent for the key, never retried
 * - BucketNotAuthorized: bucket outside the service's patterns
 * - UpstreamFailure: transient, retried above the issuer only
 * - InvalidRequest: malformed request parameters
 */
export type AuthErrorKind =
  | 'UnknownService'
  | 'InvalidApiKey'
  | 'BucketNotAuthorized'
  | 'UpstreamFailure'
  | 'InvalidRequest';

export const AUTH_ERROR_KINDS: readonly AuthErrorKind[] = [
  'UnknownService',
  'InvalidApiKey',
  'BucketNotAuthorized',
  'UpstreamFailure',
  'InvalidRequest',
];

/**
 * Authorization / issuance error
 */
export class AuthError extends Error {
  constructor(
    message: string,
    public readonly kind: AuthErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AuthError';
  }
}

export function isAuthErrorKind(value: unknown): value is AuthErrorKind {
  return typeof value === 'string' && AUTH_ERROR_KINDS.some((kind) => kind === value);
}

/**
 * Only upstream failures are worth retrying
 */
export function isRetryable(kind: AuthErrorKind): boolean {
  return kind === 'UpstreamFailure';
}

/**
 * HTTP status used on the wire for each kind
 */
export function httpStatusForKind(kind: AuthErrorKind): number {
  switch (kind) {
    case 'InvalidRequest':
    case 'UnknownService':
      return 400;
    case 'InvalidApiKey':
    case 'BucketNotAuthorized':
      return 403;
    case 'UpstreamFailure':
      return 502;
  }
}
