import { CondSpecError } from './condspec-error';
import { ErrorContext } from './types';

export interface InvalidInputErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * Raw content handed to the library could not be read (not a string, empty,
 * too large, or not parseable).
 */
export class InvalidInputError extends CondSpecError {
  constructor(message: string, options: InvalidInputErrorOptions = {}) {
    super({
      message,
      code: 'VALIDATION_INVALID_INPUT',
      category: 'validation',
      context: options.context,
      cause: options.cause,
    });
  }
}
