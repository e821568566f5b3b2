/**
 * Validation of raw registry records coming from provisioning tooling
 */

import { isPermissionTier, type PermissionTier, type ServiceDefinition } from '../types/service';

export type ServiceRecordResult =
  | { valid: true; service: ServiceDefinition }
  | { valid: false; reason: string };

/**
 * Build a ServiceDefinition from loosely-typed fields.
 * Anything missing or malformed is rejected rather than defaulted to a wider scope.
 */
export function toServiceDefinition(
  serviceId: string,
  fields: {
    role: unknown;
    buckets: unknown;
    permissions: unknown;
  },
  defaultTier: PermissionTier
): ServiceRecordResult {
  if (typeof fields.role !== 'string' || fields.role.length === 0) {
    return { valid: false, reason: 'missing role reference' };
  }

  if (!Array.isArray(fields.buckets) || fields.buckets.length === 0) {
    return { valid: false, reason: 'bucket patterns must be a non-empty list' };
  }

  const bucketPatterns: string[] = [];
  for (const pattern of fields.buckets) {
    if (typeof pattern !== 'string' || pattern.length === 0) {
      return { valid: false, reason: 'bucket patterns must be non-empty strings' };
    }
    bucketPatterns.push(pattern);
  }

  let permissionTier = defaultTier;
  if (fields.permissions !== undefined) {
    if (!isPermissionTier(fields.permissions)) {
      return { valid: false, reason: `unknown permission tier ${String(fields.permissions)}` };
    }
    permissionTier = fields.permissions;
  }

  return {
    valid: true,
    service: {
      serviceId,
      bucketPatterns,
      permissionTier,
      roleReference: fields.role,
    },
  };
}
