/**
 * Environment variable parsing
 *
 * Values are read once at startup. Anything malformed raises a
 * ConfigurationError so the process fails before it starts serving.
 */

import { ConfigurationError } from '../errors.js';
import { DEFAULT_SHUTDOWN_TIME_SECONDS } from '../types/config.js';

const UNSIGNED_INTEGER = /^\d+$/;

/**
 * Parse an unsigned base-10 integer, or return the fallback when unset
 */
export function parseInteger(
  variable: string,
  value: string | undefined,
  fallback: number,
): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const trimmed = value.trim();
  if (!UNSIGNED_INTEGER.test(trimmed)) {
    throw new ConfigurationError(variable, `expected an integer, got "${value}"`);
  }

  return parseInt(trimmed, 10);
}

/**
 * Parse SHUTDOWN_TIME (integer seconds) into milliseconds
 *
 * Only an unset variable falls back to the default: an empty value is not an
 * integer and fails like any other. Zero is accepted.
 */
export function parseShutdownTime(value: string | undefined): number {
  if (value === undefined) {
    return DEFAULT_SHUTDOWN_TIME_SECONDS * 1000;
  }

  const trimmed = value.trim();
  if (!UNSIGNED_INTEGER.test(trimmed)) {
    throw new ConfigurationError('SHUTDOWN_TIME', `expected an integer, got "${value}"`);
  }

  return parseInt(trimmed, 10) * 1000;
}

/**
 * Parse a TCP port
 */
export function parsePort(variable: string, value: string | undefined, fallback: number): number {
  const port = parseInteger(variable, value, fallback);
  if (port > 65535) {
    throw new ConfigurationError(variable, `port out of range: ${port}`);
  }
  return port;
}

/**
 * Parse a boolean flag (true/false/1/0, case-insensitive)
 */
export function parseBoolean(
  variable: string,
  value: string | undefined,
  fallback: boolean,
): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigurationError(variable, `expected true or false, got "${value}"`);
  }
}

/**
 * Split a comma-separated list, dropping empty entries
 */
export function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}
