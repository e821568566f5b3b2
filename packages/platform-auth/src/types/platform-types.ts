/**
 * Platform Authentication Types
 * API key authentication for the credential service
 */

/**
 * API key stored in AWS Secrets Manager, either as JSON {"apiKey": "..."}
 * or as the raw secret string
 */
export interface ApiKeySecret {
  apiKey: string;
}

/**
 * Context after a successful API key check
 */
export interface PlatformAuthContext {
  type: 'api-key';
  /** Where the expected key came from */
  source: 'environment' | 'secrets-manager';
  authenticatedAt: string;
}

export type PlatformAuthResult =
  | { success: true; context: PlatformAuthContext }
  | { success: false; error: PlatformAuthError };

export interface PlatformAuthError {
  code: PlatformAuthErrorCode;
  message: string;
}

export type PlatformAuthErrorCode =
  | 'MISSING_API_KEY'
  | 'INVALID_API_KEY'
  | 'KEY_NOT_CONFIGURED'
  | 'SECRET_NOT_FOUND'
  | 'SECRET_FETCH_ERROR';

/**
 * Configuration for API key authentication.
 * A local key takes precedence over the Secrets Manager secret.
 */
export interface PlatformAuthConfig {
  /** Expected key supplied directly (S3BRIDGE_API_KEY) */
  localApiKey?: string;
  /** AWS Secrets Manager secret name */
  secretName?: string;
  /** AWS region (optional, uses default if not specified) */
  region?: string;
  /** Cache TTL in seconds (default: 300 = 5 minutes) */
  cacheTtlSeconds?: number;
}

/**
 * Auth provider consumed by the credential issuer
 */
export interface PlatformAuthProvider {
  /**
   * Check a presented API key
   * @param apiKey The X-API-Key header value
   */
  authenticate(apiKey: string | undefined): Promise<PlatformAuthResult>;

  /**
   * Invalidate the cached secret (after key rotation)
   */
  invalidateCache(): void;
}
