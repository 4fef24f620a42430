/**
 * Strict Validation Module
 *
 * Throw-on-error validators for configuration and viewport input.
 * Assertion signatures narrow the checked value for the caller.
 */

import { ValidationError } from "./errors";

function fail(field: string, message: string, value: unknown): never {
  throw new ValidationError(message, field, value);
}

/**
 * Assert value is a finite number
 */
export function assertNumber(
  value: unknown,
  field: string,
): asserts value is number {
  if (typeof value !== "number") {
    fail(field, `expected number, got ${typeof value}`, value);
  }
  if (!Number.isFinite(value)) {
    fail(field, `must be finite, got ${value}`, value);
  }
}

/**
 * Assert value is a positive number (> 0)
 */
export function assertPositiveNumber(
  value: unknown,
  field: string,
): asserts value is number {
  assertNumber(value, field);
  if (value <= 0) {
    fail(field, `must be positive, got ${value}`, value);
  }
}

/**
 * Assert value is a non-negative number (>= 0)
 */
export function assertNonNegativeNumber(
  value: unknown,
  field: string,
): asserts value is number {
  assertNumber(value, field);
  if (value < 0) {
    fail(field, `cannot be negative, got ${value}`, value);
  }
}

/**
 * Assert value is a function
 */
export function assertFunction(
  value: unknown,
  field: string,
): asserts value is (...args: never[]) => unknown {
  if (typeof value !== "function") {
    fail(field, `expected function, got ${typeof value}`, value);
  }
}
