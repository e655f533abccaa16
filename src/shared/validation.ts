import { ValidationError } from './errors';

// Identifiers end up inside store keys; delimiters and glob characters would
// let one tenant's key address another's.
const UNSAFE_IDENTIFIER = /[:*?[\]\s]/;

export function isSafeIdentifier(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0 && value.length <= 256 && !UNSAFE_IDENTIFIER.test(value);
}

/**
 * Throws a single ValidationError naming every missing or unusable field.
 */
export function requireIdentifiers(fields: Record<string, unknown>): void {
  const invalid = Object.entries(fields)
    .filter(([, value]) => !isSafeIdentifier(value))
    .map(([name]) => name);

  if (invalid.length > 0) {
    throw new ValidationError(`Missing or invalid: ${invalid.join(', ')}`, invalid);
  }
}

export function requireNonEmpty(fields: Record<string, unknown>): void {
  const missing = Object.entries(fields)
    .filter(([, value]) => typeof value !== 'string' || value.length === 0)
    .map(([name]) => name);

  if (missing.length > 0) {
    throw new ValidationError(`Missing required fields: ${missing.join(', ')}`, missing);
  }
}
