/**
 * Environment-backed Service Registry
 *
 * Provisioning writes one variable per service onto the credential function:
 *   SERVICE_ANALYTICS={"role":"arn:aws:iam::123456789012:role/analytics-s3-access-role","buckets":["analytics-*"],"permissions":"read-only"}
 * The service id is the suffix after SERVICE_, lower-cased.
 */

import type { PermissionTier } from '../types/service';
import { isRecord } from '../utils/guards';
import { toServiceDefinition } from './service-record';
import { found, notFound, type RegistryLookup, type ServiceRegistry } from './types';

const SERVICE_PREFIX = 'SERVICE_';

export const UNIVERSAL_SERVICE_ID = 'universal';

export interface EnvServiceRegistryOptions {
  /** Defaults to process.env, read on every lookup */
  env?: () => NodeJS.ProcessEnv;
  /** Tier for entries that omit "permissions" (default: read-write) */
  defaultTier?: PermissionTier;
}

/**
 * Role for the built-in universal service, or null when the account is unknown
 */
export function universalRoleArn(accountId: string | undefined): string | null {
  if (!accountId) {
    return null;
  }
  return `arn:aws:iam::${accountId}:role/service-role/s3bridge-access-role`;
}

export class EnvServiceRegistry implements ServiceRegistry {
  private readonly readEnv: () => NodeJS.ProcessEnv;
  private readonly defaultTier: PermissionTier;

  constructor(options: EnvServiceRegistryOptions = {}) {
    this.readEnv = options.env ?? (() => process.env);
    this.defaultTier = options.defaultTier ?? 'read-write';
  }

  async lookup(serviceId: string): Promise<RegistryLookup> {
    const env = this.readEnv();

    if (serviceId === UNIVERSAL_SERVICE_ID) {
      const role = universalRoleArn(env.AWS_ACCOUNT_ID);
      if (!role) {
        console.warn('[Registry] universal service requested but AWS_ACCOUNT_ID is not set');
        return notFound(serviceId);
      }
      return found({
        serviceId,
        bucketPatterns: ['*'],
        permissionTier: 'admin',
        roleReference: role,
      });
    }

    const raw = this.findVariable(env, serviceId);
    if (raw === undefined) {
      return notFound(serviceId);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      console.warn('[Registry] Skipping service with invalid JSON definition', { serviceId });
      return notFound(serviceId);
    }

    if (!isRecord(parsed)) {
      console.warn('[Registry] Skipping service with non-object definition', { serviceId });
      return notFound(serviceId);
    }

    const result = toServiceDefinition(
      serviceId,
      { role: parsed.role, buckets: parsed.buckets, permissions: parsed.permissions },
      this.defaultTier
    );

    if (!result.valid) {
      console.warn('[Registry] Skipping malformed service definition', {
        serviceId,
        reason: result.reason,
      });
      return notFound(serviceId);
    }

    return found(result.service);
  }

  private findVariable(env: NodeJS.ProcessEnv, serviceId: string): string | undefined {
    if (!serviceId) {
      return undefined;
    }
    for (const [key, value] of Object.entries(env)) {
      if (!key.startsWith(SERVICE_PREFIX) || value === undefined) {
        continue;
      }
      if (key.slice(SERVICE_PREFIX.length).toLowerCase() === serviceId) {
        return value;
      }
    }
    return undefined;
  }
}
