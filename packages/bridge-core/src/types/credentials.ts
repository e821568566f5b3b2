/**
 * Credential Types
 */

import type { PermissionTier } from './service';

/**
 * Time-boxed storage credentials issued for one service
 * Invariant: expiresAt > issuedAt
 */
export interface CredentialBundle {
  accessKey: string;
  secretKey: string;
  sessionToken: string;
  /** Epoch milliseconds */
  issuedAt: number;
  /** Epoch milliseconds */
  expiresAt: number;
  serviceId: string;
  /** Patterns the credential is scoped to, used for client-side checks */
  bucketPatterns: string[];
  permissionTier: PermissionTier;
}

/**
 * Result of matching a bucket name against a pattern list
 */
export interface AuthorizationDecision {
  allowed: boolean;
  /** First pattern that matched, kept for audit */
  matchedPattern: string | null;
}

/**
 * Successful issuance body returned by GET /credentials
 */
export interface CredentialResponseBody {
  AccessKeyId: string;
  SecretAccessKey: string;
  SessionToken: string;
  /** ISO 8601 */
  Expiration: string;
  /** ISO 8601 */
  IssuedAt: string;
  Service: string;
  BucketPatterns: string[];
  Permissions: PermissionTier;
}

/**
 * Failure body returned by GET /credentials
 */
export interface CredentialErrorBody {
  error: string;
  message: string;
  requestId?: string;
}
