/**
 * CLI Error Handling
 *
 * Provides consistent error handling for CLI commands.
 */

import { sanitizeErrorMessage } from '../../core/errors.js';
import { mapError } from '../../utils/error-mapper.js';

/**
 * Write the error to stderr as JSON and set a non-zero exit code. Returns so
 * that the command's cleanup still runs.
 */
export function handleCliError(error: unknown): void {
  const mapped = mapError(error);

  const output = {
    error: sanitizeErrorMessage(mapped.message),
    code: mapped.code,
    ...(mapped.details ? { details: mapped.details } : {}),
  };

  console.error(JSON.stringify(output, null, 2));
  process.exitCode = 1;
}
