// Unit tests for input validation helpers (validation.ts)
import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  normalizePersonId,
  sanitizeString,
  validateMultipleOf,
  validateNonEmptyString,
  validateNonNegativeInteger,
  validatePositiveInteger,
  validateTimeOfDay,
  validateTimezone,
} from '../src/utils/validation.js';
import { configurationError, SchedulerError } from '../src/utils/error.js';

function isCode(code: string) {
  return (error: unknown): boolean => error instanceof SchedulerError && error.code === code;
}

describe('normalizePersonId', () => {
  it('should trim, collapse whitespace and lowercase', () => {
    assert.strictEqual(normalizePersonId('  Jane   Q.\tDoe '), 'jane q. doe');
    assert.strictEqual(normalizePersonId('Jane@Example.COM'), 'jane@example.com');
  });
});

describe('sanitizeString', () => {
  it('should trim and cap length', () => {
    assert.strictEqual(sanitizeString('  Staff Engineer  '), 'Staff Engineer');
    assert.strictEqual(sanitizeString('abcdef', 3), 'abc');
  });
});

describe('number validators', () => {
  it('should accept valid values', () => {
    assert.doesNotThrow(() => validatePositiveInteger(15, 'quantum'));
    assert.doesNotThrow(() => validateNonNegativeInteger(0, 'gap'));
    assert.doesNotThrow(() => validateMultipleOf(45, 15, 'duration'));
  });

  it('should raise INVALID_INPUT by default', () => {
    assert.throws(() => validatePositiveInteger(1.5, 'quantum'), (error: unknown) =>
      error instanceof SchedulerError &&
      error.code === 'INVALID_INPUT' &&
      error.message === 'quantum must be a positive integer. Got: 1.5'
    );
    assert.throws(() => validateNonNegativeInteger(-1, 'gap'), isCode('INVALID_INPUT'));
    assert.throws(() => validatePositiveInteger('15', 'quantum'), isCode('INVALID_INPUT'));
  });

  it('should raise the error built by the supplied factory', () => {
    assert.throws(
      () => validateMultipleOf(20, 15, 'duration', configurationError),
      (error: unknown) =>
        error instanceof SchedulerError &&
        error.code === 'CONFIGURATION_ERROR' &&
        error.details?.quantum === 15
    );
  });
});

describe('string validators', () => {
  it('should reject blank strings', () => {
    assert.throws(() => validateNonEmptyString('   ', 'name'), isCode('INVALID_INPUT'));
    assert.throws(() => validateNonEmptyString(undefined, 'name'), isCode('INVALID_INPUT'));
  });

  it('should validate IANA timezones', () => {
    assert.doesNotThrow(() => validateTimezone('Europe/Berlin', 'timezone'));
    assert.throws(() => validateTimezone('Nowhere/Special', 'timezone'), isCode('INVALID_INPUT'));
  });

  it('should validate HH:mm times of day', () => {
    assert.doesNotThrow(() => validateTimeOfDay('08:30', 'start'));
    assert.throws(() => validateTimeOfDay('8:30', 'start'), isCode('INVALID_INPUT'));
    assert.throws(() => validateTimeOfDay('25:00', 'start', configurationError), isCode('CONFIGURATION_ERROR'));
  });
});
