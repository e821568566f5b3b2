/**
 * DynamoDB Table Constants
 */

export const META_SK = '#META';

export const PREFIX = {
  SERVICE: 'SERVICE#',
} as const;
