/**
 * Credential service configuration
 *
 * Read from the environment at call time; the deployment sets these on the
 * Lambda function.
 */

import type { RegistryBackend } from '@s3bridge/bridge-core';

export const MAX_SESSION_DURATION_SECONDS = 3600;
export const MIN_SESSION_DURATION_SECONDS = 900;
const DEFAULT_AUTHORITY_TIMEOUT_MS = 30_000;
const DEFAULT_API_KEY_CACHE_TTL_SECONDS = 300;

export interface IssuerConfig {
  /** Expected API key supplied directly (S3BRIDGE_API_KEY) */
  localApiKey?: string;
  /** Secrets Manager secret holding the expected API key (API_KEY_SECRET_NAME) */
  apiKeySecretName?: string;
  apiKeyCacheTtlSeconds: number;
  region?: string;
  registryBackend: RegistryBackend;
  /** Ceiling for issued sessions, never above one hour */
  maxDurationSeconds: number;
  /** Duration used when the caller does not ask for one */
  defaultDurationSeconds: number;
  /** Timeout for the role-assumption call */
  authorityTimeoutMs: number;
}

function positiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    console.warn(`[Config] Ignoring invalid ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

function registryBackend(env: NodeJS.ProcessEnv): RegistryBackend {
  const raw = env.REGISTRY_BACKEND;
  if (raw === undefined || raw === '' || raw === 'env') {
    return 'env';
  }
  if (raw === 'dynamodb') {
    return 'dynamodb';
  }
  console.warn(`[Config] Unknown REGISTRY_BACKEND=${raw}, using env`);
  return 'env';
}

export function loadIssuerConfig(env: NodeJS.ProcessEnv = process.env): IssuerConfig {
  const maxDurationSeconds = Math.min(
    positiveInt(env, 'MAX_SESSION_DURATION_SECONDS', MAX_SESSION_DURATION_SECONDS),
    MAX_SESSION_DURATION_SECONDS
  );

  return {
    localApiKey: env.S3BRIDGE_API_KEY || undefined,
    apiKeySecretName: env.API_KEY_SECRET_NAME || undefined,
    apiKeyCacheTtlSeconds: positiveInt(
      env,
      'API_KEY_CACHE_TTL_SECONDS',
      DEFAULT_API_KEY_CACHE_TTL_SECONDS
    ),
    region: env.AWS_REGION || undefined,
    registryBackend: registryBackend(env),
    maxDurationSeconds,
    defaultDurationSeconds: Math.min(
      positiveInt(env, 'DEFAULT_SESSION_DURATION_SECONDS', maxDurationSeconds),
      maxDurationSeconds
    ),
    authorityTimeoutMs: positiveInt(env, 'ROLE_AUTHORITY_TIMEOUT_MS', DEFAULT_AUTHORITY_TIMEOUT_MS),
  };
}
