import { CondSpecError } from './condspec-error';
import { ErrorContext } from './types';

export interface ConfigErrorOptions {
  issues?: readonly string[];
  context?: ErrorContext;
  cause?: unknown;
}

export class ConfigError extends CondSpecError {
  public readonly issues: readonly string[];

  constructor(message: string, options: ConfigErrorOptions = {}) {
    super({
      message,
      code: 'CONFIG_INVALID',
      category: 'config',
      context: options.context,
      cause: options.cause,
    });
    this.issues = options.issues ?? [];
  }
}
