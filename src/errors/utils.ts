import { CondSpecError } from './condspec-error';
import { ErrorContext } from './types';

interface ErrorLike {
  message: string;
  stack?: string;
}

// Errors thrown by Node internals can come from another realm and fail
// `instanceof Error`.
function asErrorLike(error: unknown): ErrorLike | undefined {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return {
      message: error.message,
      stack: 'stack' in error && typeof error.stack === 'string' ? error.stack : undefined,
    };
  }
  return undefined;
}

/**
 * Normalize arbitrary thrown values into CondSpecError instances. Library
 * errors pass through with the extra context merged in.
 */
export function normalizeError(error: unknown, context?: ErrorContext): CondSpecError {
  if (error instanceof CondSpecError) {
    if (context) {
      error.context = {
        ...error.context,
        ...context,
      };
    }
    return error;
  }

  const errorLike = asErrorLike(error);
  if (errorLike) {
    return new CondSpecError({
      message: errorLike.message,
      code: 'INTERNAL_UNEXPECTED',
      category: 'internal',
      context: {
        ...context,
        cause: errorLike.stack ?? errorLike.message,
      },
      cause: error,
    });
  }

  return new CondSpecError({
    message: 'Unknown error',
    code: 'UNKNOWN',
    category: 'unknown',
    context,
    cause: error,
  });
}

/**
 * Human readable reason for any thrown value, used when a failure is turned
 * into a validation issue.
 */
export function describeError(error: unknown): string {
  return asErrorLike(error)?.message ?? String(error);
}
