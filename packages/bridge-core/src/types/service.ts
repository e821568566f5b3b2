/**
 * Service Types
 * A service identity and the storage scope it is registered for
 */

/**
 * Coarse action-set classification attached to a service
 * - read-only: GetObject + ListBucket
 * - read-write: read-only + PutObject + DeleteObject
 * - admin: every S3 action
 */
export type PermissionTier = 'read-only' | 'read-write' | 'admin';

export const PERMISSION_TIERS: readonly PermissionTier[] = ['read-only', 'read-write', 'admin'];

/**
 * S3 actions granted by each tier. The delegated role's policy enforces these;
 * the broker only decides which role to request.
 */
export const TIER_ACTIONS: Readonly<Record<PermissionTier, readonly string[]>> = {
  'read-only': ['s3:GetObject', 's3:ListBucket'],
  'read-write': ['s3:GetObject', 's3:PutObject', 's3:DeleteObject', 's3:ListBucket'],
  admin: ['s3:*'],
};

/**
 * Registry entry for a service identity
 */
export interface ServiceDefinition {
  /** Logical caller name, not a secret */
  serviceId: string;
  /** Ordered, non-empty list of bucket glob patterns */
  bucketPatterns: string[];
  permissionTier: PermissionTier;
  /** Delegated role ARN handed to the role-assumption authority */
  roleReference: string;
}

export function isPermissionTier(value: unknown): value is PermissionTier {
  return typeof value === 'string' && PERMISSION_TIERS.some((tier) => tier === value);
}
