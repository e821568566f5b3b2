export {
  AuthError,
  AUTH_ERROR_KINDS,
  isAuthErrorKind,
  isRetryable,
  httpStatusForKind,
  type AuthErrorKind,
} from './auth-error';
