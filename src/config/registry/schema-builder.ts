/**
 * Zod Schema Builder
 *
 * Registry-driven config building and validation helpers.
 */

import { z } from 'zod';
import type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta, ParserType } from './types.js';
import { parseBoolean, parseNumber, parseInt_, parseString, resolveDataPath } from './parsers.js';
import { createValidationError } from '../../core/errors.js';

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Format Zod validation errors into human-readable messages
 */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((err) => {
    const path = err.path.map(String).join('.');
    return `${path}: ${err.message}`;
  });
}

/**
 * Validate a config object against a schema.
 * Returns the validated config or throws with clear error messages.
 */
export function validateConfig<T>(config: unknown, schema: z.ZodType<T>): T {
  const result = schema.safeParse(config);

  if (!result.success) {
    const errors = formatZodErrors(result.error);
    const errorMessage = `Configuration validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`;
    throw createValidationError('config', errorMessage);
  }

  return result.data;
}

// =============================================================================
// CONFIG BUILDING FROM REGISTRY
// =============================================================================

/**
 * Infer parser type from Zod schema when not explicitly specified
 */
function inferParserFromSchema(schema: z.ZodTypeAny): ParserType {
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodNumber) return schema.isInt ? 'int' : 'number';
  if (schema instanceof z.ZodOptional) return inferParserFromSchema(schema.unwrap());
  return 'string';
}

/**
 * Parse an environment variable value using the option's parser.
 * The result is untyped here; the composed config schema narrows it.
 */
export function parseEnvValue(option: ConfigOptionMeta, envValue: string | undefined): unknown {
  const defaultValue = option.defaultValue;
  const parserType: ParserType = option.parse ?? inferParserFromSchema(option.schema);

  // Path parser resolves default values too
  if (parserType === 'path') {
    return resolveDataPath(envValue, typeof defaultValue === 'string' ? defaultValue : '');
  }

  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }

  switch (parserType) {
    case 'boolean':
      return parseBoolean(envValue, defaultValue === true);
    case 'number':
      return parseNumber(envValue, typeof defaultValue === 'number' ? defaultValue : 0);
    case 'int':
      return parseInt_(envValue, typeof defaultValue === 'number' ? defaultValue : 0);
    case 'string':
      if (option.allowedValues) {
        return parseString(
          envValue,
          typeof defaultValue === 'string' ? defaultValue : '',
          option.allowedValues
        );
      }
      return envValue;
  }
}

/**
 * Build a config section from registry metadata
 */
function buildSectionFromRegistry(section: ConfigSectionMeta): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, option] of Object.entries(section.options)) {
    const envValue = option.envKey ? process.env[option.envKey] : undefined;
    result[key] = parseEnvValue(option, envValue);
  }

  return result;
}

/**
 * Build raw config values from registry metadata.
 * This is the single source of truth - no manual env var reading needed.
 */
export function buildConfigFromRegistry(registry: ConfigRegistry): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, section] of Object.entries(registry.sections)) {
    result[key] = buildSectionFromRegistry(section);
  }

  return result;
}
