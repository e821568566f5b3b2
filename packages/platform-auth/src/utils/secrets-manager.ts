/**
 * AWS Secrets Manager utilities for API key authentication
 */

import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import type { ApiKeySecret } from '../types/platform-types';

const DEFAULT_CACHE_TTL_SECONDS = 300;

const secretCache = new Map<string, { secret: ApiKeySecret; expiresAt: number }>();
let secretsClient: SecretsManagerClient | null = null;

function getClient(region?: string): SecretsManagerClient {
  if (!secretsClient) {
    secretsClient = new SecretsManagerClient(region ? { region } : {});
  }
  return secretsClient;
}

/**
 * Parse a secret string. JSON objects must carry a string "apiKey";
 * anything that is not a JSON object is taken as the key itself.
 */
export function parseApiKeySecret(secretName: string, secretString: string): ApiKeySecret {
  let parsed: unknown;
  try {
    parsed = JSON.parse(secretString);
  } catch {
    return { apiKey: secretString };
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { apiKey: secretString };
  }

  const apiKey = 'apiKey' in parsed ? parsed.apiKey : undefined;
  if (typeof apiKey !== 'string' || apiKey.length === 0) {
    throw new Error(`Secret ${secretName} missing or invalid 'apiKey'`);
  }
  return { apiKey };
}

/**
 * Fetch the expected API key from AWS Secrets Manager
 * @param secretName The secret name in Secrets Manager
 * @param region Optional AWS region
 * @param cacheTtlSeconds Cache TTL in seconds (default: 300)
 */
export async function getApiKeySecret(
  secretName: string,
  region?: string,
  cacheTtlSeconds = DEFAULT_CACHE_TTL_SECONDS
): Promise<ApiKeySecret> {
  const now = Date.now();

  const cached = secretCache.get(secretName);
  if (cached && now < cached.expiresAt) {
    return cached.secret;
  }

  const client = getClient(region);

  const response = await client.send(
    new GetSecretValueCommand({
      SecretId: secretName,
    })
  );

  if (!response.SecretString) {
    throw new Error(`Secret ${secretName} has no string value`);
  }

  const secret = parseApiKeySecret(secretName, response.SecretString);

  secretCache.set(secretName, { secret, expiresAt: now + cacheTtlSeconds * 1000 });

  return secret;
}

/**
 * Invalidate the cached secret(s)
 * Call this when you need to force a refresh (e.g., after key rotation)
 */
export function invalidateSecretCache(secretName?: string): void {
  if (secretName) {
    secretCache.delete(secretName);
    return;
  }
  secretCache.clear();
}

/**
 * Reset the Secrets Manager client (for testing)
 */
export function resetSecretsClient(): void {
  secretsClient = null;
  invalidateSecretCache();
}
