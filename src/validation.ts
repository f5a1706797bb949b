import { config } from './config.js';
import { MINUTE_MS } from './calendar.js';
import { ValidationError } from './errors.js';

export function read_enum_value<T extends string>(
  field: string,
  value: unknown,
  allowed: readonly T[],
): T | ValidationError {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    return new ValidationError(field, `${field} must be one of ${allowed.join(', ')}, got ${JSON.stringify(value)}`);
  }
  return match;
}

export function read_required_text(field: string, value: unknown, max_length = 10_000): string | ValidationError {
  if (typeof value !== 'string' || !value.trim()) {
    return new ValidationError(field, `${field} is required`);
  }
  const trimmed = value.trim();
  if (trimmed.length > max_length) {
    return new ValidationError(field, `${field} must be at most ${max_length} characters`);
  }
  return trimmed;
}

export function read_optional_text(field: string, value: unknown): string | null | ValidationError {
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') return new ValidationError(field, `${field} must be text`);
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

export function read_integer(field: string, value: unknown, min: number, max: number): number | ValidationError {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    return new ValidationError(field, `${field} must be an integer between ${min} and ${max}`);
  }
  return value;
}

export function read_instant(field: string, value: unknown): number | ValidationError {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return new ValidationError(field, `${field} must be an epoch-millisecond timestamp`);
  }
  return value;
}

/**
 * Accepts instants that are in the future, or at most
 * `scheduling.grace_minutes` in the past.
 */
export function read_future_instant(field: string, value: unknown, now: number): number | ValidationError {
  const instant = read_instant(field, value);
  if (instant instanceof ValidationError) return instant;
  const earliest = now - config.scheduling.grace_minutes * MINUTE_MS;
  if (instant < earliest) {
    return new ValidationError(field, `${field} must not be in the past`);
  }
  return instant;
}

export function read_duration(field: string, value: unknown): number | ValidationError {
  return read_integer(field, value, 1, config.scheduling.max_duration_minutes);
}
