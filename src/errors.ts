/**
 * Error class for subsample operations
 */
export class SubsampleError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'SubsampleError';

    // Maintains proper stack trace for where the error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SubsampleError);
    }
  }
}

/**
 * Wraps an unknown failure in a SubsampleError, passing existing ones through untouched.
 */
export function toSubsampleError(error: unknown, message: string): SubsampleError {
  return error instanceof SubsampleError ? error : new SubsampleError(message, error);
}
