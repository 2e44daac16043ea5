import { logger } from './logger';

// Utility functions for configuration parsing

/**
 * Parse environment variable with type conversion
 */
export function parseEnvVar<T>(
  key: string,
  defaultValue: T,
  parser: (value: string) => T
): T {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  try {
    return parser(value);
  } catch (error) {
    logger.warn({ key, value, defaultValue, error }, `Invalid value for ${key}, using default`);
    return defaultValue;
  }
}

/**
 * Parse integer with validation
 */
export function parseIntWithValidation(
  value: string,
  min?: number,
  max?: number
): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new Error(`Invalid integer: ${value}`);
  }

  const parsed = parseInt(trimmed, 10);

  if (min !== undefined && parsed < min) {
    throw new Error(`Value ${parsed} is below minimum ${min}`);
  }

  if (max !== undefined && parsed > max) {
    throw new Error(`Value ${parsed} is above maximum ${max}`);
  }

  return parsed;
}

/**
 * Parse positive integer
 */
export function parsePositiveInt(key: string, defaultValue: number): number {
  return parseEnvVar(key, defaultValue, (value) =>
    parseIntWithValidation(value, 1)
  );
}

/**
 * Parse non-negative integer
 */
export function parseNonNegativeInt(key: string, defaultValue: number): number {
  return parseEnvVar(key, defaultValue, (value) =>
    parseIntWithValidation(value, 0)
  );
}

/**
 * Parse TCP port
 */
export function parsePort(key: string, defaultValue: number): number {
  return parseEnvVar(key, defaultValue, (value) =>
    parseIntWithValidation(value, 1, 65535)
  );
}

/**
 * Parse non-empty string
 */
export function parseString(key: string, defaultValue: string): string {
  return parseEnvVar(key, defaultValue, (value) => value.trim());
}

/**
 * Parse string restricted to a fixed set of values
 */
export function parseEnum<T extends string>(
  key: string,
  defaultValue: T,
  allowed: readonly T[]
): T {
  return parseEnvVar(key, defaultValue, (value) => {
    const match = allowed.find((candidate) => candidate === value.trim());
    if (match === undefined) {
      throw new Error(`Expected one of ${allowed.join(', ')}`);
    }
    return match;
  });
}
