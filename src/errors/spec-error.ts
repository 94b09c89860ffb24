import { CondSpecError } from './condspec-error';
import { ErrorCode, ErrorContext } from './types';

export interface SpecDefinitionErrorOptions {
  code?: Extract<ErrorCode, 'SPEC_INVALID' | 'SPEC_PATTERN_INVALID'>;
  issues?: readonly string[];
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * Raised when a spec definition itself is malformed (bad wire format,
 * unsupported file type, uncompilable pattern).
 */
export class SpecDefinitionError extends CondSpecError {
  public readonly issues: readonly string[];

  constructor(message: string, options: SpecDefinitionErrorOptions = {}) {
    super({
      message,
      code: options.code ?? 'SPEC_INVALID',
      category: 'spec',
      context: options.context,
      cause: options.cause,
    });
    this.issues = options.issues ?? [];
  }
}
