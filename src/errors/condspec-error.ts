import { CondSpecErrorOptions, ErrorCategory, ErrorCode, ErrorContext, SerializedError } from './types';

/**
 * Root of every error condspec throws. Validation problems are never thrown;
 * these cover bad definitions, bad options, expression failures and file
 * access.
 */
export class CondSpecError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public context?: ErrorContext;
  public readonly cause?: unknown;

  constructor(options: CondSpecErrorOptions) {
    super(options.message);
    this.name = new.target.name;
    this.code = options.code;
    this.category = options.category;
    this.context = options.context;
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * JSON-safe form written by `ErrorLogger`. Nested library errors are
   * serialised in full; any other cause is reduced to a string.
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      context: this.context,
      stack: this.stack,
      cause: describeCause(this.cause),
    };
  }
}

function describeCause(cause: unknown): SerializedError | string | undefined {
  if (cause === undefined || cause === null) {
    return undefined;
  }
  if (cause instanceof CondSpecError) {
    return cause.toJSON();
  }
  if (cause instanceof Error) {
    return `${cause.name}: ${cause.message}`;
  }
  if (typeof cause === 'string') {
    return cause;
  }
  try {
    return JSON.stringify(cause);
  } catch (serializationError) {
    return `Unserializable cause: ${String(serializationError)}`;
  }
}
