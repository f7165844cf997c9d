import { EncodingError } from '../utils/errors.js';

/**
 * Recursively drops empty values: undefined, null, '', false, 0, empty arrays
 * and objects left with no fields. Returns undefined when nothing remains.
 */
export function omitEmpty(value: unknown): unknown {
  if (value === undefined || value === null || value === '' || value === false || value === 0) {
    return undefined;
  }

  if (Array.isArray(value)) {
    const items = value.map(omitEmpty).filter(item => item !== undefined);
    return items.length > 0 ? items : undefined;
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value)
      .map(([key, field]) => [key, omitEmpty(field)] as const)
      .filter(([, field]) => field !== undefined);
    return entries.length > 0 ? Object.fromEntries(entries) : undefined;
  }

  return value;
}

/**
 * Serializes a value to JSON with empty fields left out.
 *
 * @throws EncodingError if the value cannot be represented as JSON.
 */
export function encodeJson(value: unknown): string {
  try {
    return JSON.stringify(omitEmpty(value) ?? {});
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new EncodingError(`Failed to encode request body: ${message}`, { cause: error });
  }
}

