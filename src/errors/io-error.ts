import { CondSpecError } from './condspec-error';
import { ErrorCode, ErrorContext } from './types';

export interface IOErrorOptions {
  code?: Extract<ErrorCode, 'IO_NOT_FOUND' | 'IO_PERMISSION_DENIED' | 'IO_SIZE_LIMIT'>;
  context?: ErrorContext;
  cause?: unknown;
}

export class IOError extends CondSpecError {
  constructor(message: string, options: IOErrorOptions = {}) {
    super({
      message,
      code: options.code ?? 'IO_NOT_FOUND',
      category: 'io',
      context: options.context,
      cause: options.cause,
    });
  }
}

export class PathTraversalError extends IOError {
  constructor(attemptedPath: string, context: ErrorContext = {}) {
    super(`Path traversal attempt detected: ${attemptedPath}`, {
      code: 'IO_PERMISSION_DENIED',
      context: {
        ...context,
        attemptedPath,
      },
    });
  }
}
