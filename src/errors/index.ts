/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

// Validation, resource and auth errors (4xx)
export {
  ValidationError,
  SchemaValidationError,
  ResourceError,
  ResourceNotFoundError,
  AuthenticationError,
} from './ApplicationError.js';

// Operational errors (5xx)
export {
  OperationalError,
  DatabaseError,
  DuplicateKeyError,
  FileSystemError,
  NetworkError,
  TransientNetworkError,
  ProviderError,
  RateLimitError,
  UnexpectedResponseError,
} from './ApplicationError.js';

// Permanent errors (5xx - not retryable)
export {
  PermanentError,
  ConfigurationError,
} from './ApplicationError.js';

// Remote job lifecycle errors
export {
  JobNotFoundError,
  RemoteJobFailure,
  PollingTimeoutError,
  JobCanceledError,
  RehostFailure,
  StageExecutionError,
  toApplicationError,
} from './jobErrors.js';

// Retry strategies
export {
  RetryStrategy,
  DEFAULT_RETRY_POLICY,
  NETWORK_RETRY_POLICY,
  computeBackoffDelay,
  createRetryStrategy,
  extractRetryAfter,
} from './RetryStrategy.js';

export type {
  RetryPolicy,
  RetryResult,
} from './RetryStrategy.js';
