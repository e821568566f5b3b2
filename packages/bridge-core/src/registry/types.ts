/**
 * Service Registry read path
 */

import type { ServiceDefinition } from '../types/service';

export type RegistryLookup =
  | { status: 'found'; service: ServiceDefinition }
  | { status: 'not-found'; serviceId: string };

/**
 * Read-only lookup from service identity to its registered scope.
 * Implementations read the latest snapshot on every call; callers must
 * treat `not-found` as a terminal denial.
 */
export interface ServiceRegistry {
  lookup(serviceId: string): Promise<RegistryLookup>;
}

export function found(service: ServiceDefinition): RegistryLookup {
  return { status: 'found', service };
}

export function notFound(serviceId: string): RegistryLookup {
  return { status: 'not-found', serviceId };
}
