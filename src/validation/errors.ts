import { ZodError, ZodIssue } from 'zod';
import { ConfigError } from '../errors/config-error';
import { SpecDefinitionError } from '../errors/spec-error';

/**
 * Render a zod issue path the same way validation paths are rendered:
 * `properties.email.pattern`, `conditions[0].if`.
 */
export function formatIssuePath(path: readonly (string | number)[], root: string): string {
  if (path.length === 0) {
    return root;
  }
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') {
      return `${acc}[${segment}]`;
    }
    return acc === '' ? segment : `${acc}.${segment}`;
  }, '');
}

export function formatZodIssue(issue: ZodIssue, root: string): string {
  const field = formatIssuePath(issue.path, root);
  switch (issue.code) {
    case 'invalid_type':
      if (issue.received === 'undefined') {
        return `${field} is required`;
      }
      return `${field} must be of type ${issue.expected}, got ${issue.received}`;
    case 'unrecognized_keys':
      return `${field} has unknown key(s): ${issue.keys.join(', ')}`;
    case 'invalid_enum_value':
      return `${field} must be one of ${issue.options.join(', ')}`;
    case 'too_small': {
      const comparator = issue.inclusive ? 'at least' : 'greater than';
      if (issue.type === 'string') {
        return `${field} must be ${comparator} ${issue.minimum} characters`;
      }
      if (issue.type === 'array') {
        return `${field} must contain ${comparator} ${issue.minimum} items`;
      }
      return `${field} must be ${comparator} ${issue.minimum}`;
    }
    case 'too_big': {
      const comparator = issue.inclusive ? 'at most' : 'less than';
      if (issue.type === 'string') {
        return `${field} must be ${comparator} ${issue.maximum} characters`;
      }
      if (issue.type === 'array') {
        return `${field} must contain ${comparator} ${issue.maximum} items`;
      }
      return `${field} must be ${comparator} ${issue.maximum}`;
    }
    default:
      return `${field}: ${issue.message}`;
  }
}

function summarize(messages: readonly string[], fallbackMessage: string): string {
  if (messages.length === 0) {
    return fallbackMessage;
  }
  return messages.length === 1 ? messages[0] : messages.join('; ');
}

/**
 * Turn whatever a spec parse threw into a SpecDefinitionError, keeping the
 * original as `cause`.
 */
export function normalizeSpecError(
  error: unknown,
  fallbackMessage = 'Invalid spec definition'
): SpecDefinitionError {
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => formatZodIssue(issue, 'spec'));
    return new SpecDefinitionError(summarize(issues, fallbackMessage), {
      issues,
      cause: error,
    });
  }

  if (error instanceof SpecDefinitionError) {
    return error;
  }

  if (error instanceof Error) {
    return new SpecDefinitionError(`${fallbackMessage}: ${error.message}`, { cause: error });
  }

  return new SpecDefinitionError(fallbackMessage, { cause: error });
}

export function toConfigError(error: ZodError): ConfigError {
  const issues = error.issues.map((issue) => formatZodIssue(issue, 'options'));
  return new ConfigError(summarize(issues, 'Invalid validator options'), {
    issues,
    cause: error,
  });
}
