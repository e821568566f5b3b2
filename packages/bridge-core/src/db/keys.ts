/**
 * DynamoDB Key Builders
 */

import { META_SK, PREFIX } from './constants';

export function servicePK(serviceId: string): string {
  return `${PREFIX.SERVICE}${serviceId}`;
}

export function serviceKeys(serviceId: string): { pk: string; sk: string } {
  return { pk: servicePK(serviceId), sk: META_SK };
}
