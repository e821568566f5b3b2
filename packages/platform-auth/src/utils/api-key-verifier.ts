/**
 * API Key verification utilities
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import type {
  PlatformAuthConfig,
  PlatformAuthContext,
  PlatformAuthProvider,
  PlatformAuthResult,
} from '../types/platform-types';
import { getApiKeySecret, invalidateSecretCache } from './secrets-manager';

/**
 * Constant-time string comparison.
 * Both sides are hashed first so neither content nor length leaks through timing.
 */
export function secureCompare(a: string, b: string): boolean {
  const digestA = createHash('sha256').update(a, 'utf8').digest();
  const digestB = createHash('sha256').update(b, 'utf8').digest();
  return timingSafeEqual(digestA, digestB);
}

function authenticated(source: PlatformAuthContext['source']): PlatformAuthResult {
  return {
    success: true,
    context: {
      type: 'api-key',
      source,
      authenticatedAt: new Date().toISOString(),
    },
  };
}

const INVALID_KEY: PlatformAuthResult = {
  success: false,
  error: {
    code: 'INVALID_API_KEY',
    message: 'Invalid API key',
  },
};

/**
 * Verify a presented API key against the configured one
 *
 * @param apiKey The X-API-Key header value
 * @param config Platform auth configuration
 */
export async function verifyApiKey(
  apiKey: string | undefined,
  config: PlatformAuthConfig = {}
): Promise<PlatformAuthResult> {
  const { localApiKey, secretName, region, cacheTtlSeconds } = config;

  if (!apiKey) {
    return {
      success: false,
      error: {
        code: 'MISSING_API_KEY',
        message: 'X-API-Key header is required',
      },
    };
  }

  if (localApiKey) {
    return secureCompare(apiKey, localApiKey) ? authenticated('environment') : INVALID_KEY;
  }

  if (!secretName) {
    return {
      success: false,
      error: {
        code: 'KEY_NOT_CONFIGURED',
        message: 'No API key is configured for the credential service',
      },
    };
  }

  let expected: string;
  try {
    expected = (await getApiKeySecret(secretName, region, cacheTtlSeconds)).apiKey;
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    const name = error instanceof Error ? error.name : '';

    if (name === 'ResourceNotFoundException' || message.includes('not found')) {
      return {
        success: false,
        error: {
          code: 'SECRET_NOT_FOUND',
          message: `API key secret not found: ${secretName}`,
        },
      };
    }

    return {
      success: false,
      error: {
        code: 'SECRET_FETCH_ERROR',
        message: `Failed to fetch API key: ${message}`,
      },
    };
  }

  return secureCompare(apiKey, expected) ? authenticated('secrets-manager') : INVALID_KEY;
}

/**
 * Create an API Key auth provider bound to one configuration
 */
export function createApiKeyAuthProvider(config: PlatformAuthConfig = {}): PlatformAuthProvider {
  return {
    async authenticate(apiKey: string | undefined): Promise<PlatformAuthResult> {
      return verifyApiKey(apiKey, config);
    },

    invalidateCache(): void {
      invalidateSecretCache(config.secretName);
    },
  };
}
