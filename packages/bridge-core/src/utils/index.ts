export {
  matchesPattern,
  matchBucket,
  isBucketAuthorized,
  assertBucketAuthorized,
} from './pattern-matcher';
export { isRecord } from './guards';
export { toCredentialResponseBody, parseCredentialResponseBody, parseErrorKind } from './wire';
