import { describe, it, expect } from 'vitest';
import { maskSensitiveStrings, sanitizeForLogging } from '../../src/utils/sanitize.js';

describe('sanitizeForLogging', () => {
  it('redacts values under sensitive keys', () => {
    expect(sanitizeForLogging({ apiKey: 'test-secret', model: 'local-model' })).toEqual({
      apiKey: '***REDACTED***',
      model: 'local-model',
    });
  });

  it('walks nested objects and arrays', () => {
    expect(sanitizeForLogging({ providers: [{ token: 'test-token', name: 'lmstudio' }] })).toEqual({
      providers: [{ token: '***REDACTED***', name: 'lmstudio' }],
    });
  });

  it('passes primitives through', () => {
    expect(sanitizeForLogging(42)).toBe(42);
    expect(sanitizeForLogging(null)).toBeNull();
  });

  it('masks bearer tokens inside strings', () => {
    expect(maskSensitiveStrings('Authorization: Bearer test-token')).toBe(
      'Authorization: Bea...***REDACTED***'
    );
  });

  it('sanitizes error messages', () => {
    const sanitized = sanitizeForLogging(new Error('rejected Bearer test-token'));
    expect(sanitized).toMatchObject({ name: 'Error', message: 'rejected Bea...***REDACTED***' });
  });
});
