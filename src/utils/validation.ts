/**
 * Input validation utilities
 */

import { DateTime } from 'luxon';
import { invalidInputError, type SchedulerError } from './error.js';
import { parseTimeOfDay } from './datetime.js';

/**
 * Builds the error a failed check throws; callers validating policy pass configurationError
 */
export type ErrorFactory = (message: string, details?: Record<string, unknown>) => SchedulerError;

/**
 * Validate that a value is a non-empty string
 */
export function validateNonEmptyString(
  value: unknown,
  fieldName: string,
  makeError: ErrorFactory = invalidInputError
): asserts value is string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw makeError(`${fieldName} must be a non-empty string`);
  }
}

/**
 * Validate positive integer
 */
export function validatePositiveInteger(
  value: unknown,
  fieldName: string,
  makeError: ErrorFactory = invalidInputError
): asserts value is number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw makeError(`${fieldName} must be a positive integer. Got: ${String(value)}`);
  }
}

/**
 * Validate non-negative integer
 */
export function validateNonNegativeInteger(
  value: unknown,
  fieldName: string,
  makeError: ErrorFactory = invalidInputError
): asserts value is number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw makeError(`${fieldName} must be a non-negative integer. Got: ${String(value)}`);
  }
}

/**
 * Validate that a whole number of minutes sits on the grid
 */
export function validateMultipleOf(
  value: number,
  quantum: number,
  fieldName: string,
  makeError: ErrorFactory = invalidInputError
): void {
  if (value % quantum !== 0) {
    throw makeError(`${fieldName} must be a multiple of ${quantum} minutes. Got: ${value}`, {
      field: fieldName,
      value,
      quantum,
    });
  }
}

/**
 * Validate IANA timezone
 */
export function validateTimezone(
  value: unknown,
  fieldName: string,
  makeError: ErrorFactory = invalidInputError
): asserts value is string {
  validateNonEmptyString(value, fieldName, makeError);
  const dt = DateTime.now().setZone(value);
  if (!dt.isValid) {
    throw makeError(`${fieldName} must be a valid IANA timezone. Got: "${value}"`);
  }
}

/**
 * Validate an HH:mm time of day
 */
export function validateTimeOfDay(
  value: unknown,
  fieldName: string,
  makeError: ErrorFactory = invalidInputError
): asserts value is string {
  validateNonEmptyString(value, fieldName, makeError);
  if (!parseTimeOfDay(value)) {
    throw makeError(`${fieldName} must be in HH:mm format. Got: "${value}"`);
  }
}

/**
 * Normalize an interviewer identifier: trim, collapse whitespace, lowercase
 */
export function normalizePersonId(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Sanitize string input (trim whitespace, limit length)
 */
export function sanitizeString(value: string, maxLength: number = 1000): string {
  return value.trim().slice(0, maxLength);
}
