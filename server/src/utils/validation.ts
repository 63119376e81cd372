import { ConfigurationError } from './errors';

/**
 * Check if a string is a valid HTTP or HTTPS URL
 */
export function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Parse an optional numeric setting from YAML or the environment.
 * Empty or missing values yield undefined so callers can apply defaults.
 * @throws ConfigurationError if the value is present but not a finite number
 */
export function parseNumber(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null) return undefined;

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`${field} must be a finite number`, field);
    }
    return value;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return undefined;
    const parsed = Number(trimmed);
    if (!Number.isFinite(parsed)) {
      throw new ConfigurationError(`${field} must be a number, got "${value}"`, field);
    }
    return parsed;
  }

  throw new ConfigurationError(`${field} must be a number`, field);
}

/**
 * Parse an optional boolean setting. Accepts true/false, 1/0, yes/no.
 */
export function parseBoolean(value: unknown, field: string): boolean | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'boolean') return value;

  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '') return undefined;
    if (['true', '1', 'yes'].includes(normalized)) return true;
    if (['false', '0', 'no'].includes(normalized)) return false;
  }

  throw new ConfigurationError(`${field} must be a boolean`, field);
}

/**
 * Parse an optional string setting.
 */
export function parseString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigurationError(`${field} must be a string`, field);
  }
  return value.trim();
}

/**
 * Split a comma-separated list, dropping empty entries.
 */
export function splitList(raw: string): string[] {
  return raw
    .split(',')
    .map(item => item.trim())
    .filter(item => item !== '');
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
