import type { Digit } from './Cell.ts';

const MAX_DIGIT = 9;

export function assertNonNullable<T>(value: T, errorOrMessage?: Error | string): asserts value is NonNullable<T> {
  if (value !== null && value !== undefined) {
    return;
  }
  errorOrMessage ??= value === null ? 'Value is null' : 'Value is undefined';
  const error = typeof errorOrMessage === 'string' ? new Error(errorOrMessage) : errorOrMessage;
  throw error;
}

export function ensureDigit(value: number): Digit {
  if (!isDigit(value)) {
    throw new Error(`Expected a digit 1-9, got ${String(value)}`);
  }
  return value;
}

export function ensureNonNullable<T>(value: T, errorOrMessage?: Error | string): NonNullable<T> {
  assertNonNullable(value, errorOrMessage);
  return value;
}

export function isDigit(value: number): value is Digit {
  return Number.isInteger(value) && value >= 1 && value <= MAX_DIGIT;
}
