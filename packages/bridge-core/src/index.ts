/**
 * @s3bridge/bridge-core
 *
 * Shared pieces of the credential broker
 * - Service and credential types
 * - Bucket pattern matcher
 * - Error taxonomy
 * - Service registry read path (environment and DynamoDB)
 */

export * from './types';
export * from './errors';
export * from './utils';
export * from './registry';
export * from './db';
