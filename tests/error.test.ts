// Unit tests for error handling (error.ts)
import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  configurationError,
  ErrorCodes,
  formatErrorForMCP,
  invalidDateRangeError,
  missingFieldError,
  SchedulerError,
  searchAbortedError,
  wrapError,
} from '../src/utils/error.js';

describe('SchedulerError', () => {
  it('should serialize to JSON for MCP responses', () => {
    const error = configurationError('Durations must be positive', { interviewer: 'alice' });
    assert.deepStrictEqual(error.toJSON(), {
      error: true,
      code: 'CONFIGURATION_ERROR',
      message: 'Durations must be positive',
      retryable: false,
      details: { interviewer: 'alice' },
    });
  });

  it('should prefix user messages with the code description', () => {
    assert.strictEqual(
      missingFieldError('csv').toUserMessage(),
      'A required field is missing. Missing required field: csv'
    );
  });

  it('should use the date range code for empty intervals', () => {
    assert.strictEqual(invalidDateRangeError('Leg 1 must end after it starts').code, ErrorCodes.INVALID_DATE_RANGE);
  });
});

describe('searchAbortedError', () => {
  it('should mark timeouts retryable and cancellations not', () => {
    const timeout = searchAbortedError('timeout', { timeoutMs: 10 });
    const cancelled = searchAbortedError('cancelled');

    assert.strictEqual(timeout.retryable, true);
    assert.deepStrictEqual(timeout.details, { reason: 'timeout', timeoutMs: 10 });
    assert.strictEqual(cancelled.retryable, false);
    assert.strictEqual(cancelled.message, 'Agenda search was cancelled');
  });
});

describe('wrapError', () => {
  it('should pass scheduler errors through', () => {
    const original = configurationError('bad');
    assert.strictEqual(wrapError(original), original);
  });

  it('should wrap other errors as internal errors', () => {
    const cause = new Error('boom');
    const wrapped = wrapError(cause, { operation: 'find_interview_agendas' });

    assert.ok(wrapped instanceof SchedulerError);
    assert.strictEqual(wrapped.code, 'INTERNAL_ERROR');
    assert.strictEqual(wrapped.message, 'find_interview_agendas: boom');
    assert.strictEqual(wrapped.cause, cause);
  });

  it('should wrap thrown strings and unknown values', () => {
    assert.strictEqual(wrapError('plain text').message, 'plain text');
    assert.strictEqual(wrapError(42).message, 'An unexpected error occurred');
  });
});

describe('formatErrorForMCP', () => {
  it('should list message, code, retry hint and details', () => {
    assert.strictEqual(
      formatErrorForMCP(searchAbortedError('timeout', { timeoutMs: 10 })),
      [
        'Error: Agenda search exceeded its time budget',
        'Code: SEARCH_ABORTED',
        'This error is retryable.',
        'Details: {"reason":"timeout","timeoutMs":10}',
      ].join('\n')
    );
  });

  it('should omit optional lines', () => {
    assert.strictEqual(
      formatErrorForMCP(new SchedulerError('x', ErrorCodes.INTERNAL_ERROR)),
      'Error: x\nCode: INTERNAL_ERROR'
    );
  });
});
