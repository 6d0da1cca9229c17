/**
 * @fileoverview Standardized error handling utilities.
 *
 * Provides consistent error patterns across the codebase:
 * - AppError: Base class for application-specific errors
 * - FileAccessError / ParseError / ComparisonError / UsageError: the failures
 *   a single agenda run can end with
 * - exitCodeFor: Maps any thrown value to a process exit code
 */

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** The calendar file is missing or could not be read. */
export class FileAccessError extends AppError {
  constructor(path: string, reason: string) {
    super(`Cannot read calendar file ${path}: ${reason}`, 'FILE_ACCESS', false, { path, reason });
    this.name = 'FileAccessError';
  }
}

/** The calendar text is not a usable iCalendar document. */
export class ParseError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PARSE', false, context);
    this.name = 'ParseError';
  }
}

/** An event start cannot be compared with an absolute instant. */
export class ComparisonError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'COMPARISON', false, context);
    this.name = 'ComparisonError';
  }
}

/** The command line was not `ics-agenda <file.ics>`. */
export class UsageError extends AppError {
  constructor(message: string) {
    super(message, 'USAGE');
    this.name = 'UsageError';
  }
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Exit code for a failed run. Usage mistakes get 2, everything else 1.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof UsageError) return EXIT_USAGE;
  return EXIT_FAILURE;
}

/** Message suitable for the error stream, whatever was thrown. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
