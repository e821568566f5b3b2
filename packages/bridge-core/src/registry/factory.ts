import { DynamoServiceRegistry } from './dynamodb-registry';
import { EnvServiceRegistry } from './env-registry';
import type { ServiceRegistry } from './types';

export type RegistryBackend = 'env' | 'dynamodb';

/**
 * Pick the registry implementation named by REGISTRY_BACKEND
 */
export function createServiceRegistry(backend: RegistryBackend): ServiceRegistry {
  switch (backend) {
    case 'dynamodb':
      return new DynamoServiceRegistry();
    case 'env':
      return new EnvServiceRegistry();
  }
}
