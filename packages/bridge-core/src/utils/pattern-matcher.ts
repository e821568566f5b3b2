/**
 * Bucket pattern matching
 *
 * A pattern is a literal bucket name where `*` stands for any run of
 * characters (including none). There is no other wildcard and no escaping.
 * Matching is case-sensitive and anchored at both ends.
 */

import { AuthError } from '../errors/auth-error';
import type { AuthorizationDecision } from '../types/credentials';

/**
 * Check a single pattern against a bucket name
 */
export function matchesPattern(bucketName: string, pattern: string): boolean {
  const segments = pattern.split('*');

  if (segments.length === 1) {
    return bucketName === pattern;
  }

  const head = segments[0];
  const tail = segments[segments.length - 1];

  if (bucketName.length < head.length + tail.length) {
    return false;
  }
  if (!bucketName.startsWith(head) || !bucketName.endsWith(tail)) {
    return false;
  }

  // Leftmost placement of each middle segment between head and tail
  const limit = bucketName.length - tail.length;
  let cursor = head.length;

  for (let i = 1; i < segments.length - 1; i++) {
    const segment = segments[i];
    if (segment === '') {
      continue;
    }
    const index = bucketName.indexOf(segment, cursor);
    if (index === -1 || index + segment.length > limit) {
      return false;
    }
    cursor = index + segment.length;
  }

  return true;
}

/**
 * Match a bucket name against an ordered pattern list. First match wins.
 */
export function matchBucket(bucketName: string, patterns: readonly string[]): AuthorizationDecision {
  for (const pattern of patterns) {
    if (matchesPattern(bucketName, pattern)) {
      return { allowed: true, matchedPattern: pattern };
    }
  }
  return { allowed: false, matchedPattern: null };
}

export function isBucketAuthorized(bucketName: string, patterns: readonly string[]): boolean {
  return matchBucket(bucketName, patterns).allowed;
}

/**
 * Throw BucketNotAuthorized unless some pattern matches
 * @returns The matched pattern
 */
export function assertBucketAuthorized(
  bucketName: string,
  patterns: readonly string[],
  serviceId?: string
): string {
  const decision = matchBucket(bucketName, patterns);
  if (!decision.allowed || decision.matchedPattern === null) {
    const owner = serviceId ? ` for service ${serviceId}` : '';
    throw new AuthError(`Bucket ${bucketName} is not authorized${owner}`, 'BucketNotAuthorized');
  }
  return decision.matchedPattern;
}
