/**
 * Type exports for @s3bridge/bridge-core
 */

export type { PermissionTier, ServiceDefinition } from './service';
export { PERMISSION_TIERS, TIER_ACTIONS, isPermissionTier } from './service';

export type {
  CredentialBundle,
  AuthorizationDecision,
  CredentialResponseBody,
  CredentialErrorBody,
} from './credentials';
