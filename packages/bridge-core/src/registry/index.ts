export type { RegistryLookup, ServiceRegistry } from './types';
export { found, notFound } from './types';
export { toServiceDefinition, type ServiceRecordResult } from './service-record';
export {
  EnvServiceRegistry,
  UNIVERSAL_SERVICE_ID,
  universalRoleArn,
  type EnvServiceRegistryOptions,
} from './env-registry';
export { DynamoServiceRegistry, type DynamoServiceRegistryOptions } from './dynamodb-registry';
export { createServiceRegistry, type RegistryBackend } from './factory';
