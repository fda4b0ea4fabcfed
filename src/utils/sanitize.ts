/**
 * Sanitization utilities for logging
 * Prevents provider credentials from reaching log output
 */

/**
 * Patterns that indicate sensitive data
 */
const SENSITIVE_KEY_PATTERNS = [/api[-_]?key/i, /token/i, /secret/i, /password/i, /auth/i, /bearer/i];

/**
 * Credential formats seen in OpenAI-compatible provider configuration
 */
const API_KEY_PATTERNS = [
  // OpenAI API keys: sk-... (including project keys sk-proj-...)
  /sk-[a-zA-Z0-9\-_]{20,}/g,

  // Generic API keys with common prefixes
  /api[-_]?key[-_]?[a-zA-Z0-9]{16,}/gi,

  // Bearer tokens
  /bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi,

  // JWT tokens (three base64url segments)
  /eyJ[a-zA-Z0-9_-]{10,}\.[a-zA-Z0-9_-]{10,}\.[a-zA-Z0-9_-]{10,}/g,
];

const REDACTED = '***REDACTED***';

/**
 * Sanitize a value for safe logging
 * Recursively processes objects and arrays to mask sensitive data
 */
export function sanitizeForLogging(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return maskSensitiveStrings(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitizeForLogging(item));
  }

  if (value instanceof Error) {
    return sanitizeError(value);
  }

  if (typeof value === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      sanitized[key] = isSensitiveKey(key) ? REDACTED : sanitizeForLogging(val);
    }
    return sanitized;
  }

  return value;
}

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Mask API keys and sensitive patterns in strings
 */
export function maskSensitiveStrings(str: string): string {
  let masked = str;

  for (const pattern of API_KEY_PATTERNS) {
    masked = masked.replace(pattern, (match) => {
      // Keep first few characters for debugging context
      const prefix = match.substring(0, Math.min(3, match.length));
      return `${prefix}...${REDACTED}`;
    });
  }

  return masked;
}

/**
 * Sanitize error objects for logging
 * Preserves error message and stack trace while masking sensitive data
 */
export function sanitizeError(error: Error): Record<string, unknown> {
  return {
    name: error.name,
    message: maskSensitiveStrings(error.message),
    stack: error.stack ? maskSensitiveStrings(error.stack) : undefined,
    ...Object.fromEntries(
      Object.entries(error).map(([key, value]) => [
        key,
        isSensitiveKey(key) ? REDACTED : sanitizeForLogging(value),
      ])
    ),
  };
}
