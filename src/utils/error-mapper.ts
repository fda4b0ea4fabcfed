import { LifeQueryError, ErrorCodes } from '../core/errors.js';
import { createComponentLogger } from './logger.js';

const logger = createComponentLogger('error-mapper');

export interface MappedError {
  message: string;
  code: string;
  details?: Record<string, unknown>;
}

/**
 * Map any error to a standardized internal format
 */
export function mapError(error: unknown): MappedError {
  // 1. Known LifeQueryError
  if (error instanceof LifeQueryError) {
    return {
      message: error.message,
      code: error.code,
      details: error.context,
    };
  }

  // 2. Standard errors
  if (error instanceof Error) {
    const message = error.message;

    if (message.includes('ENOENT')) {
      return { message, code: ErrorCodes.NOT_FOUND };
    }
    if (message.includes('SQLITE_BUSY') || message.includes('database is locked')) {
      return { message, code: ErrorCodes.DATABASE_ERROR };
    }

    logger.warn({ error: message }, 'Unmapped internal error');
    return { message, code: ErrorCodes.INTERNAL_ERROR };
  }

  // 3. Fallback
  logger.warn({ error: String(error) }, 'Unmapped unknown error');
  return {
    message: String(error),
    code: ErrorCodes.UNKNOWN_ERROR,
  };
}
