/**
 * Unified Error Hierarchy for anchorcast
 *
 * Provides a consistent, type-safe error system with:
 * - Machine-readable error codes
 * - Job and stage context on every error raised by the orchestration layer
 * - Retry hints consumed by RetryStrategy and the poller
 * - HTTP status code mapping for the API
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation Errors (4xx)
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',

  // Resource Errors (4xx)
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',

  // Authentication (4xx)
  AUTH_AUTHENTICATION_FAILED = 'AUTH_AUTHENTICATION_FAILED',

  // Database Errors (5xx - operational)
  DATABASE_CONNECTION_FAILED = 'DATABASE_CONNECTION_FAILED',
  DATABASE_QUERY_FAILED = 'DATABASE_QUERY_FAILED',
  DATABASE_DUPLICATE_KEY = 'DATABASE_DUPLICATE_KEY',

  // File System Errors (5xx - operational)
  FS_PERMISSION_DENIED = 'FS_PERMISSION_DENIED',
  FS_READ_FAILED = 'FS_READ_FAILED',
  FS_WRITE_FAILED = 'FS_WRITE_FAILED',

  // Network Errors (5xx - operational, retryable)
  NETWORK_CONNECTION_FAILED = 'NETWORK_CONNECTION_FAILED',
  NETWORK_TIMEOUT = 'NETWORK_TIMEOUT',

  // Provider Errors (5xx - operational)
  PROVIDER_RATE_LIMIT = 'PROVIDER_RATE_LIMIT',
  PROVIDER_SERVER_ERROR = 'PROVIDER_SERVER_ERROR',
  PROVIDER_INVALID_RESPONSE = 'PROVIDER_INVALID_RESPONSE',

  // Remote job lifecycle
  JOB_REMOTE_FAILED = 'JOB_REMOTE_FAILED',
  JOB_POLLING_TIMEOUT = 'JOB_POLLING_TIMEOUT',
  JOB_CANCELED = 'JOB_CANCELED',
  JOB_REHOST_FAILED = 'JOB_REHOST_FAILED',

  // Pipeline
  PIPELINE_STAGE_FAILED = 'PIPELINE_STAGE_FAILED',

  // Configuration Errors (5xx - permanent)
  CONFIG_INVALID = 'CONFIG_INVALID',

  // Generic fallback
  UNKNOWN = 'UNKNOWN',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'submit', 'fetchStatus') */
  operation?: string;

  /** Remote or local job id the error relates to */
  jobId?: string;

  /** Pipeline stage name ('script', 'audio', 'video') */
  stage?: string;

  /** Work item the stage was processing */
  itemId?: string;

  /** Entity type being operated on (e.g., 'job') */
  entityType?: string;

  /** Entity ID if applicable */
  entityId?: string | number;

  /** Duration of operation before failure (ms) */
  durationMs?: number;

  /** Attempt number if retrying */
  attemptNumber?: number;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 * All custom errors in anchorcast should extend this class
 */
export abstract class ApplicationError extends Error {
  /**
   * Machine-readable error code
   */
  public readonly code: ErrorCode;

  /**
   * HTTP status code for API responses (0 for non-HTTP errors)
   */
  public readonly statusCode: number;

  /**
   * Whether this error is operational (expected) vs programmer error
   */
  public readonly isOperational: boolean;

  /**
   * Whether this error is retryable
   */
  public readonly retryable: boolean;

  /**
   * Rich context for logging and debugging
   */
  public readonly context: ErrorContext;

  /**
   * Original error that caused this error (if wrapped)
   */
  public readonly cause?: Error;

  /**
   * Timestamp when error was created
   */
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    options: {
      isOperational?: boolean;
      retryable?: boolean;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    if (options.cause) {
      this.cause = options.cause;
    }
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /** Job id carried in the context, if any */
  get jobId(): string | undefined {
    return this.context.jobId;
  }

  /** Stage name carried in the context, if any */
  get stage(): string | undefined {
    return this.context.stage;
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      } : undefined,
    };
  }
}

// ============================================
// VALIDATION ERRORS (4xx - Client Error)
// ============================================

export class ValidationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.VALIDATION_INPUT_INVALID, 400, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class SchemaValidationError extends ValidationError {
  constructor(
    public readonly errors: Array<{ path: string; message: string }>,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Schema validation failed: ${errors.length} error(s)`,
      { ...context, metadata: { ...context?.metadata, errors } }
    );
  }
}

// ============================================
// RESOURCE ERRORS (4xx - Client Error)
// ============================================

export class ResourceError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ResourceNotFoundError extends ResourceError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceId: string | number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `${resourceType} not found: ${resourceId}`,
      ErrorCode.RESOURCE_NOT_FOUND,
      404,
      { ...context, entityType: resourceType, entityId: resourceId },
      cause
    );
  }
}

// ============================================
// AUTHENTICATION (4xx)
// ============================================

export class AuthenticationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.AUTH_AUTHENTICATION_FAILED, 401, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

// ============================================
// OPERATIONAL ERRORS (5xx)
// ============================================

export class OperationalError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: true,
      retryable,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

// Database Errors
export class DatabaseError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DATABASE_QUERY_FAILED,
    retryable = true,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, 500, retryable, context, cause);
  }
}

export class DuplicateKeyError extends DatabaseError {
  constructor(
    public readonly table: string,
    public readonly key: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Duplicate key in table '${table}': ${key}`,
      ErrorCode.DATABASE_DUPLICATE_KEY,
      false,
      { ...context, metadata: { ...context?.metadata, table, key } }
    );
  }
}

// File System Errors
export class FileSystemError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode,
    public readonly path: string,
    retryable = false,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      500,
      retryable,
      { ...context, metadata: { ...context?.metadata, path } },
      cause
    );
  }
}

// Network Errors
export class NetworkError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NETWORK_CONNECTION_FAILED,
    public readonly url?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      503,
      true, // Network errors are retryable
      { ...context, metadata: { ...context?.metadata, url } },
      cause
    );
  }
}

/**
 * Timeouts, dropped connections and 5xx answers from a remote service.
 * The client never retries these itself; the poller does.
 */
export class TransientNetworkError extends NetworkError {
  constructor(
    message: string,
    public readonly httpStatusCode?: number,
    url?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      httpStatusCode === undefined ? ErrorCode.NETWORK_TIMEOUT : ErrorCode.PROVIDER_SERVER_ERROR,
      url,
      { ...context, metadata: { ...context?.metadata, httpStatusCode } },
      cause
    );
  }
}

// Provider Errors
export class ProviderError extends OperationalError {
  constructor(
    message: string,
    public readonly providerName: string,
    code: ErrorCode,
    statusCode: number,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      statusCode,
      retryable,
      { service: providerName, ...context },
      cause
    );
  }
}

export class RateLimitError extends ProviderError {
  constructor(
    providerName: string,
    public readonly retryAfter?: number,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Rate limit exceeded for provider: ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_RATE_LIMIT,
      429,
      true, // Retryable after delay
      { ...context, metadata: { ...context?.metadata, retryAfter } }
    );
  }
}

/**
 * A response that could not be interpreted: an unexpected HTTP status,
 * a body without the fields the caller needs, or a completed job without output.
 */
export class UnexpectedResponseError extends ProviderError {
  constructor(
    providerName: string,
    message: string,
    public readonly httpStatusCode?: number,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      providerName,
      ErrorCode.PROVIDER_INVALID_RESPONSE,
      502,
      false,
      { ...context, metadata: { ...context?.metadata, httpStatusCode } },
      cause
    );
  }
}

// ============================================
// PERMANENT ERRORS (5xx - Not Retryable)
// ============================================

export class PermanentError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: false, // These are programmer errors
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ConfigurationError extends PermanentError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      ErrorCode.CONFIG_INVALID,
      500,
      { ...context, metadata: { ...context?.metadata, configKey } }
    );
  }
}
