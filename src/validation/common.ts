import YAML from 'yaml';
import { z } from 'zod';
import { InvalidInputError } from '../errors/input-error';
import { describeError } from '../errors/utils';
import type { Spec } from '../types/spec';
import { normalizeSpecError, toConfigError } from './errors';
import { ValidatorConfig, ValidatorConfigSchema } from './schemas/config-schema';
import { SpecSchema } from './schemas/spec-schema';

const DEFAULT_MAX_CONTENT_SIZE = 1024 * 1024; // 1MB

export interface StructuredContentOptions {
  /** Largest accepted input in characters (default: 1MB); `null` for no limit */
  readonly maxSize?: number | null;
}

function contentSchema(label: string, maxSize: number | null) {
  const schema = z
    .string({
      required_error: `${label} content is required`,
      invalid_type_error: `${label} content must be a string`,
    })
    .min(1, `${label} content cannot be empty`);
  return maxSize === null
    ? schema
    : schema.max(maxSize, `${label} content exceeds maximum allowed size`);
}

function checkContent(rawContent: unknown, label: string, options: StructuredContentOptions): string {
  const maxSize = options.maxSize === undefined ? DEFAULT_MAX_CONTENT_SIZE : options.maxSize;
  const result = contentSchema(label, maxSize).safeParse(rawContent);
  if (!result.success) {
    throw new InvalidInputError(result.error.issues[0]?.message ?? `Invalid ${label} content`, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Parse JSON text into an untyped value tree.
 *
 * @throws InvalidInputError carrying the parser's reason as its message
 */
export function jsonContent(rawContent: string, options: StructuredContentOptions = {}): unknown {
  const sanitized = checkContent(rawContent, 'JSON', options);
  try {
    return JSON.parse(sanitized);
  } catch (error) {
    throw new InvalidInputError(describeError(error), { cause: error });
  }
}

/**
 * Parse YAML text into an untyped value tree. `yaml` does not evaluate custom
 * tags, so the result is plain data.
 */
export function yamlContent(rawContent: string, options: StructuredContentOptions = {}): unknown {
  const sanitized = checkContent(rawContent, 'YAML', options);
  try {
    return YAML.parse(sanitized);
  } catch (error) {
    throw new InvalidInputError(describeError(error), { cause: error });
  }
}

/**
 * Check an already parsed document against the spec wire format.
 *
 * @throws SpecDefinitionError listing every problem found
 */
export function parseSpecValue(document: unknown): Spec {
  const result = SpecSchema.safeParse(document);
  if (!result.success) {
    throw normalizeSpecError(result.error);
  }
  return result.data;
}

/**
 * Parse a spec from its JSON wire form.
 */
export function parseSpec(json: string): Spec {
  let document: unknown;
  try {
    document = jsonContent(json);
  } catch (error) {
    throw normalizeSpecError(error, 'Failed to parse spec JSON');
  }
  return parseSpecValue(document);
}

/**
 * Parse a spec written in YAML.
 */
export function parseSpecYAML(yaml: string): Spec {
  let document: unknown;
  try {
    document = yamlContent(yaml);
  } catch (error) {
    throw normalizeSpecError(error, 'Failed to parse spec YAML');
  }
  return parseSpecValue(document);
}

/**
 * @throws ConfigError when an option is out of range or unknown
 */
export function parseValidatorConfig(input: unknown): ValidatorConfig {
  const result = ValidatorConfigSchema.safeParse(input);
  if (!result.success) {
    throw toConfigError(result.error);
  }
  return result.data;
}
