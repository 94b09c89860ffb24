import { CondSpecError } from './condspec-error';
import { ErrorLogger } from './logger';
import { ErrorContext } from './types';
import { normalizeError } from './utils';

export interface HandleOptions {
  /** Source module recorded in the error context */
  module?: string;
  /** Defaults to a console-backed logger */
  logger?: ErrorLogger;
}

export class ErrorHandler {
  private static readonly defaultLogger = new ErrorLogger();

  /**
   * Normalize, log and rethrow. Async public operations call this from their
   * `catch` block so that each failure leaving them is logged exactly once,
   * tagged with the operation name.
   */
  static handle(
    error: unknown,
    operation: string,
    context: ErrorContext = {},
    options: HandleOptions = {}
  ): never {
    const logger = options.logger ?? this.defaultLogger;
    const wrapped = this.toLibraryError(error, operation, context, options.module);
    logger.logError(wrapped, wrapped.context);
    throw wrapped;
  }

  private static toLibraryError(
    error: unknown,
    operation: string,
    context: ErrorContext,
    module: string | undefined
  ): CondSpecError {
    const fullContext: ErrorContext = { ...context, operation };
    if (module) {
      fullContext.module = module;
    }
    return normalizeError(error, fullContext);
  }
}
