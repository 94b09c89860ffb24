/**
 * condspec
 *
 * Validates JSON-like data against declarative specs whose per-field rules
 * can depend on other fields of the same object.
 *
 * @module index
 */

export { validate, validateJSON, createValidator, getDefaultValidator, SpecValidator } from './validator/validator';
export type { ValidatorOptions } from './validator/validator';
export { resolveConditions, hasExpressions } from './validator/conditions';
export type { ConditionErrorReporter } from './validator/conditions';
export { PatternCache } from './validator/pattern-cache';

export { evalExpression } from './expression/evaluator';
export type { ExpressionContext } from './expression/evaluator';
export { tokenize } from './expression/tokenizer';
export type { Token, ComparisonOperator } from './expression/tokenizer';

export { mergeSpecs, SpecMerger } from './merge/spec-merge';
export { SpecBuilder } from './builder/spec-builder';
export type { SpecInput, SpecInputs } from './builder/spec-builder';
export { SpecLoader } from './loaders/spec-loader';
export type { SpecLoaderOptions } from './loaders/spec-loader';

export {
  formatIssue,
  topLevelField,
  groupErrorsByField,
  groupAllErrorsByField,
  errorsForField,
  validateField,
} from './helpers/results';

export { parseSpec, parseSpecYAML, parseSpecValue } from './validation/common';
export { SpecSchema, ConditionSchema, JsonValueSchema } from './validation/schemas/spec-schema';
export type { StringLengthMode, ValidatorConfig } from './validation/schemas/config-schema';

export { SPEC_TYPES, isSpecType } from './types/spec';
export type {
  Spec,
  SpecType,
  SpecOverrides,
  Condition,
  ValidationIssue,
  ValidationResult,
} from './types/spec';
export type { JsonValue } from './types/value';

export { CondSpecError } from './errors/condspec-error';
export {
  ExpressionError,
  ExpressionSyntaxError,
  ExpressionEvaluationError,
} from './errors/expression-error';
export { SpecDefinitionError } from './errors/spec-error';
export { IOError, PathTraversalError } from './errors/io-error';
export { ConfigError } from './errors/config-error';
export { InvalidInputError } from './errors/input-error';
export { ErrorLogger } from './errors/logger';
export type { LogSink, LogLevel } from './errors/logger';
export { ErrorHandler } from './errors/handler';
export type { ErrorCategory, ErrorCode, ErrorContext, SerializedError } from './errors/types';
