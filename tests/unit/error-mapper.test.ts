/**
 * Unit tests for error-mapper utilities
 */

import { describe, it, expect } from 'vitest';
import { mapError } from '../../src/utils/error-mapper.js';
import { LifeQueryError, ErrorCodes, createNotFoundError } from '../../src/core/errors.js';

describe('Error Mapper', () => {
  it('passes LifeQueryError through with its context', () => {
    const error = new LifeQueryError('Bad period', ErrorCodes.INVALID_PARAMETER, { field: 'period' });

    expect(mapError(error)).toEqual({
      message: 'Bad period',
      code: ErrorCodes.INVALID_PARAMETER,
      details: { field: 'period' },
    });
  });

  it('maps missing files to NOT_FOUND', () => {
    const result = mapError(new Error("ENOENT: no such file or directory, open 'records.json'"));
    expect(result.code).toBe(ErrorCodes.NOT_FOUND);
  });

  it('maps a locked SQLite database to DATABASE_ERROR', () => {
    expect(mapError(new Error('SQLITE_BUSY: database is locked')).code).toBe(ErrorCodes.DATABASE_ERROR);
  });

  it('maps other errors to INTERNAL_ERROR', () => {
    expect(mapError(new Error('boom'))).toEqual({ message: 'boom', code: ErrorCodes.INTERNAL_ERROR });
  });

  it('maps thrown non-errors to UNKNOWN_ERROR', () => {
    expect(mapError('plain string')).toEqual({ message: 'plain string', code: ErrorCodes.UNKNOWN_ERROR });
  });

  it('keeps factory error codes', () => {
    const result = mapError(createNotFoundError('record', 'f9'));
    expect(result.message).toBe('record not found: f9');
    expect(result.code).toBe(ErrorCodes.NOT_FOUND);
  });
});
