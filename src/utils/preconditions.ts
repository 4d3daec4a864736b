import { ValidationError } from '../errors/types.js';

/**
 * Trim a required text field, rejecting blank values.
 */
export function requireText(value: string, field: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(`${field} must not be blank`, field);
  }
  return trimmed;
}

/**
 * Trim an optional text field. Missing values become the empty string.
 */
export function optionalText(value: string | null | undefined): string {
  return value == null ? '' : value.trim();
}

export function requireFinite(value: number, field: string): number {
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${field} must be finite`, field);
  }
  return value;
}

export function requireNonNegativeInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be >= 0`, field);
  }
  return value;
}

export function requirePositiveInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be > 0`, field);
  }
  return value;
}

export function requireRatio(value: number, field: string): number {
  requireFinite(value, field);
  if (value < 0 || value > 1) {
    throw new ValidationError(`${field} must be in range [0.0, 1.0]`, field);
  }
  return value;
}

export function requireNonNegative(value: number, field: string): number {
  requireFinite(value, field);
  if (value < 0) {
    throw new ValidationError(`${field} must be >= 0.0`, field);
  }
  return value;
}
