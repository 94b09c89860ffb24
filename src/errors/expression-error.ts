import { CondSpecError } from './condspec-error';
import { ErrorCode, ErrorContext } from './types';

export interface ExpressionErrorOptions {
  expression?: string;
  position?: number;
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * Shared base for failures raised while tokenizing, parsing or evaluating a
 * condition expression.
 */
export abstract class ExpressionError extends CondSpecError {
  public readonly expression?: string;
  public readonly position?: number;

  protected constructor(
    message: string,
    code: Extract<ErrorCode, 'EXPRESSION_SYNTAX' | 'EXPRESSION_EVALUATION'>,
    options: ExpressionErrorOptions
  ) {
    super({
      message,
      code,
      category: 'expression',
      context: {
        ...options.context,
        expression: options.expression,
        position: options.position,
      },
      cause: options.cause,
    });
    this.expression = options.expression;
    this.position = options.position;
  }
}

export class ExpressionSyntaxError extends ExpressionError {
  constructor(message: string, options: ExpressionErrorOptions = {}) {
    super(message, 'EXPRESSION_SYNTAX', options);
  }
}

export class ExpressionEvaluationError extends ExpressionError {
  constructor(message: string, options: ExpressionErrorOptions = {}) {
    super(message, 'EXPRESSION_EVALUATION', options);
  }
}
