/**
 * Error handling utilities for the interview agenda server
 */

/**
 * Error codes used throughout the application
 */
export const ErrorCodes = {
  // Input validation
  INVALID_INPUT: 'INVALID_INPUT',
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',
  INVALID_DATE_RANGE: 'INVALID_DATE_RANGE',

  // Durations and policy
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',

  // Search control
  SEARCH_ABORTED: 'SEARCH_ABORTED',

  // Internal errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Custom error class for the scheduler
 */
export class SchedulerError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    options?: {
      retryable?: boolean;
      details?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'SchedulerError';
    this.code = code;
    this.retryable = options?.retryable ?? false;
    this.details = options?.details;
  }

  /**
   * Convert to a JSON-serializable object for MCP responses
   */
  toJSON(): Record<string, unknown> {
    return {
      error: true,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }

  /**
   * Format as user-friendly message
   */
  toUserMessage(): string {
    return `${ErrorMessages[this.code]} ${this.message}`;
  }
}

/**
 * Create a configuration error (invalid durations or policy)
 */
export function configurationError(
  message: string,
  details?: Record<string, unknown>
): SchedulerError {
  return new SchedulerError(message, ErrorCodes.CONFIGURATION_ERROR, { details });
}

/**
 * Create an invalid input error
 */
export function invalidInputError(
  message: string,
  details?: Record<string, unknown>
): SchedulerError {
  return new SchedulerError(message, ErrorCodes.INVALID_INPUT, { details });
}

/**
 * Create an invalid date range error (an interval that does not end after it starts)
 */
export function invalidDateRangeError(
  message: string,
  details?: Record<string, unknown>
): SchedulerError {
  return new SchedulerError(message, ErrorCodes.INVALID_DATE_RANGE, { details });
}

/**
 * Create a missing field error
 */
export function missingFieldError(field: string): SchedulerError {
  return new SchedulerError(
    `Missing required field: ${field}`,
    ErrorCodes.MISSING_REQUIRED_FIELD,
    { details: { field } }
  );
}

/**
 * Create a search aborted error (cancelled by the caller or timed out)
 */
export function searchAbortedError(
  reason: 'cancelled' | 'timeout',
  details?: Record<string, unknown>
): SchedulerError {
  const message =
    reason === 'timeout'
      ? 'Agenda search exceeded its time budget'
      : 'Agenda search was cancelled';
  return new SchedulerError(message, ErrorCodes.SEARCH_ABORTED, {
    retryable: reason === 'timeout',
    details: { reason, ...details },
  });
}

/**
 * Wrap an unknown error as SchedulerError
 */
export function wrapError(
  error: unknown,
  context?: {
    operation?: string;
  }
): SchedulerError {
  if (error instanceof SchedulerError) {
    return error;
  }

  const message =
    error instanceof Error
      ? error.message
      : typeof error === 'string'
        ? error
        : 'An unexpected error occurred';

  return new SchedulerError(
    context?.operation ? `${context.operation}: ${message}` : message,
    ErrorCodes.INTERNAL_ERROR,
    {
      cause: error instanceof Error ? error : undefined,
    }
  );
}

/**
 * Format a SchedulerError for MCP response
 */
export function formatErrorForMCP(error: SchedulerError): string {
  const lines: string[] = [];

  lines.push(`Error: ${error.message}`);
  lines.push(`Code: ${error.code}`);

  if (error.retryable) {
    lines.push('This error is retryable.');
  }

  if (error.details) {
    lines.push(`Details: ${JSON.stringify(error.details)}`);
  }

  return lines.join('\n');
}

/**
 * Error code to user-friendly message mapping
 */
export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.INVALID_INPUT]: 'Invalid input provided.',
  [ErrorCodes.MISSING_REQUIRED_FIELD]: 'A required field is missing.',
  [ErrorCodes.INVALID_DATE_RANGE]: 'Invalid date range specified.',
  [ErrorCodes.CONFIGURATION_ERROR]: 'Scheduling configuration is invalid.',
  [ErrorCodes.SEARCH_ABORTED]: 'The agenda search was stopped before it finished.',
  [ErrorCodes.INTERNAL_ERROR]: 'An internal error occurred.',
};
