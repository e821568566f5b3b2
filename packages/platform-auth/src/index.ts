/**
 * Platform Authentication for S3Bridge
 *
 * API key authentication for the credential service, with the expected key
 * taken from the environment or AWS Secrets Manager.
 */

export type {
  ApiKeySecret,
  PlatformAuthContext,
  PlatformAuthResult,
  PlatformAuthError,
  PlatformAuthErrorCode,
  PlatformAuthConfig,
  PlatformAuthProvider,
} from './types/platform-types';

export {
  getApiKeySecret,
  parseApiKeySecret,
  invalidateSecretCache,
  resetSecretsClient,
} from './utils/secrets-manager';

export { secureCompare, verifyApiKey, createApiKeyAuthProvider } from './utils/api-key-verifier';
