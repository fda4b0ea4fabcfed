/**
 * Core error definitions
 *
 * Error classes, codes, and factory functions shared by every layer
 * (config, db, services, cli).
 */

/**
 * Sanitize error messages to remove sensitive information in production.
 * Strips internal paths, addresses, connection strings, and stack frames.
 */
export function sanitizeErrorMessage(message: string): string {
  // Check production mode dynamically for testability
  if (process.env.NODE_ENV !== 'production') {
    return message;
  }

  return (
    message
      // Unix paths: /Users/..., /home/..., /var/..., /root/..., etc.
      .replace(
        /\/(?:Users|home|var|tmp|etc|opt|usr|private|root|srv|mnt|lib|bin|sbin|proc|sys|boot|dev|run)\/[^\s:,)'"]+/gi,
        '[REDACTED_PATH]'
      )
      // Windows paths: C:\Users\..., D:\...
      .replace(/[A-Z]:\\[^\s:,)'"]+/gi, '[REDACTED_PATH]')
      // IPv4 addresses
      .replace(
        /\b(?:(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\.){3}(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\b/g,
        '[REDACTED_IP]'
      )
      // Connection strings with credentials
      .replace(
        /(?:postgres|postgresql|mysql|redis|mongodb|amqp):\/\/[^:]+:[^@]+@[^\s]+/gi,
        '[REDACTED_CONNECTION_STRING]'
      )
      // Stack trace lines
      .replace(/at\s+[\w.<>]+\s+\([^)]+\)/g, '[REDACTED_STACK]')
      .replace(/at\s+[^\s]+:[0-9]+:[0-9]+/g, '[REDACTED_STACK]')
  );
}

export class LifeQueryError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LifeQueryError';
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error codes for programmatic handling
 */
export const ErrorCodes = {
  // Validation errors (1000-1999)
  MISSING_REQUIRED_FIELD: 'E1000',
  INVALID_PARAMETER: 'E1004',

  // Resource errors (2000-2999)
  NOT_FOUND: 'E2000',

  // Database errors (4000-4999)
  DATABASE_ERROR: 'E4000',
  MIGRATION_ERROR: 'E4001',
  CONNECTION_ERROR: 'E4002',

  // System errors (5000-5999)
  UNKNOWN_ERROR: 'E5000',
  INTERNAL_ERROR: 'E5001',

  // Language model errors (7000-7999)
  LLM_FAILED: 'E7001',
  LLM_PARSE_ERROR: 'E7002',

  // Embedding errors (8000-8999)
  EMBEDDING_DISABLED: 'E8000',
  EMBEDDING_FAILED: 'E8001',
  EMBEDDING_EMPTY_TEXT: 'E8002',
  EMBEDDING_PROVIDER_ERROR: 'E8003',

  // Network/External errors (10000-10999)
  NETWORK_ERROR: 'E10000',
  TIMEOUT: 'E10002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Database-specific errors
 */
export class DatabaseError extends LifeQueryError {
  constructor(
    message: string,
    code: string = ErrorCodes.DATABASE_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = 'DatabaseError';
  }
}

/**
 * Network/external service errors
 */
export class NetworkError extends LifeQueryError {
  constructor(
    message: string,
    public readonly service: string,
    public readonly isRetryable: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message, ErrorCodes.NETWORK_ERROR, { ...context, service, isRetryable });
    this.name = 'NetworkError';
  }
}

/**
 * Timeout error
 */
export class TimeoutError extends LifeQueryError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`, ErrorCodes.TIMEOUT, {
      ...context,
      operation,
      timeoutMs,
    });
    this.name = 'TimeoutError';
  }
}

/**
 * Create a validation error with helpful context
 */
export function createValidationError(
  field: string,
  message: string,
  suggestion?: string
): LifeQueryError {
  return new LifeQueryError(
    `Validation error: ${field} - ${message}${suggestion ? `. Suggestion: ${suggestion}` : ''}`,
    ErrorCodes.MISSING_REQUIRED_FIELD,
    { field, suggestion }
  );
}

/**
 * Create a not found error with resource details
 */
export function createNotFoundError(resource: string, identifier?: string): LifeQueryError {
  const message = identifier ? `${resource} not found: ${identifier}` : `${resource} not found`;

  return new LifeQueryError(message, ErrorCodes.NOT_FOUND, {
    resource,
    identifier,
    suggestion: `Check that the ${resource} exists and you have the correct ID`,
  });
}

/**
 * Create an LLM failure error
 */
export function createLlmError(message: string, details?: Record<string, unknown>): LifeQueryError {
  return new LifeQueryError(`Language model call failed: ${message}`, ErrorCodes.LLM_FAILED, {
    ...details,
    suggestion: 'Check that the chat model is loaded and reachable',
  });
}

/**
 * Create an LLM response parse error
 */
export function createLlmResponseParseError(reason: string, raw: string): LifeQueryError {
  return new LifeQueryError(
    `Could not parse language model response: ${reason}`,
    ErrorCodes.LLM_PARSE_ERROR,
    { preview: raw.slice(0, 200) }
  );
}

/**
 * Create an embedding disabled error
 */
export function createEmbeddingDisabledError(): LifeQueryError {
  return new LifeQueryError('Embeddings are disabled', ErrorCodes.EMBEDDING_DISABLED, {
    suggestion: 'Enable embeddings by setting LIFEQ_EMBEDDING_PROVIDER to lmstudio, ollama or openai',
  });
}

/**
 * Create an embedding error
 */
export function createEmbeddingError(
  message: string,
  details?: Record<string, unknown>
): LifeQueryError {
  return new LifeQueryError(`Embedding failed: ${message}`, ErrorCodes.EMBEDDING_FAILED, {
    ...details,
    suggestion: 'Check embedding provider configuration and API keys',
  });
}

/**
 * Create an embedding empty text error
 */
export function createEmbeddingEmptyTextError(): LifeQueryError {
  return new LifeQueryError('Cannot embed empty text', ErrorCodes.EMBEDDING_EMPTY_TEXT, {
    suggestion: 'Provide non-empty text for embedding',
  });
}

/**
 * Create an embedding provider error
 */
export function createEmbeddingProviderError(provider: string, message: string): LifeQueryError {
  return new LifeQueryError(
    `${provider} embedding error: ${message}`,
    ErrorCodes.EMBEDDING_PROVIDER_ERROR,
    { provider, suggestion: `Check ${provider} server and model configuration` }
  );
}

/**
 * Normalize an unknown thrown value to a message string
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
