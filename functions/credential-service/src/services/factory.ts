import { createServiceRegistry } from '@s3bridge/bridge-core';
import { createApiKeyAuthProvider } from '@s3bridge/platform-auth';
import type { IssuerConfig } from '../config';
import { CredentialIssuer } from './issuer';
import { StsRoleAuthority } from './role-authority';

/**
 * Wire the production issuer from configuration
 */
export function createCredentialIssuer(config: IssuerConfig): CredentialIssuer {
  return new CredentialIssuer({
    auth: createApiKeyAuthProvider({
      localApiKey: config.localApiKey,
      secretName: config.apiKeySecretName,
      region: config.region,
      cacheTtlSeconds: config.apiKeyCacheTtlSeconds,
    }),
    registry: createServiceRegistry(config.registryBackend),
    authority: new StsRoleAuthority({
      region: config.region,
      timeoutMs: config.authorityTimeoutMs,
    }),
    maxDurationSeconds: config.maxDurationSeconds,
    defaultDurationSeconds: config.defaultDurationSeconds,
  });
}
