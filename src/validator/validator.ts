/**
 * Structural validator.
 *
 * Walks a value tree against a spec tree and collects every violation in one
 * pass. Nothing here throws for bad data or a broken spec fragment: both end
 * up as issues in the result.
 *
 * @module validator/validator
 */

import { ErrorLogger } from '../errors/logger';
import { describeError } from '../errors/utils';
import { Condition, Spec, SpecType, ValidationIssue, ValidationResult, isSpecType } from '../types/spec';
import { Value, classify, formatValue, kindName, valuesEqual } from '../types/value';
import { hasOwn } from '../utils/object';
import { jsonContent, parseValidatorConfig } from '../validation/common';
import { ValidatorConfig, ValidatorConfigInput } from '../validation/schemas/config-schema';
import { resolveConditions } from './conditions';
import { PatternCache } from './pattern-cache';

export interface ValidatorOptions extends ValidatorConfigInput {
  /** Receives a warning for every failing condition expression or pattern */
  logger?: ErrorLogger;
}

export function joinPath(base: string, field: string): string {
  if (base === '') {
    return field;
  }
  if (field === '') {
    return base;
  }
  return `${base}.${field}`;
}

export function indexPath(base: string, index: number): string {
  return `${base}[${index}]`;
}

/**
 * Accumulator for a single validate call.
 */
class ValidationPass {
  private readonly issues: ValidationIssue[] = [];

  constructor(
    private readonly config: ValidatorConfig,
    private readonly patterns: PatternCache,
    private readonly logger?: ErrorLogger
  ) {}

  result(): ValidationResult {
    return { valid: this.issues.length === 0, errors: this.issues };
  }

  addIssue(path: string, message: string): void {
    this.issues.push({ path, message });
  }

  validateNode(input: unknown, spec: Spec, path: string): void {
    if (!spec || !spec.type) {
      return;
    }

    const value = classify(input);
    if (value.kind === 'null') {
      if (spec.type !== 'null') {
        this.addIssue(path, `expected type ${spec.type}, got null`);
      }
      return;
    }

    if (isSpecType(spec.type)) {
      this.checkType(value, spec.type, spec, path);
    } else {
      this.addIssue(path, `unknown type: ${spec.type}`);
    }

    if (spec.enum && spec.enum.length > 0) {
      this.checkEnum(input, spec.enum, path);
    }
  }

  private checkType(value: Value, type: SpecType, spec: Spec, path: string): void {
    switch (type) {
      case 'string':
        return this.checkString(value, spec, path);
      case 'number':
        return this.checkNumber(value, spec, path);
      case 'integer':
        return this.checkInteger(value, spec, path);
      case 'boolean':
        if (value.kind !== 'boolean') {
          this.addIssue(path, `expected boolean, got ${kindName(value)}`);
        }
        return;
      case 'object':
        return this.checkObject(value, spec, path);
      case 'array':
        return this.checkArray(value, spec, path);
      case 'null':
        this.addIssue(path, 'expected null, got non-null value');
        return;
    }
  }

  private checkString(value: Value, spec: Spec, path: string): void {
    if (value.kind !== 'string') {
      this.addIssue(path, `expected string, got ${kindName(value)}`);
      return;
    }

    const text = value.value;
    if (spec.allowEmpty === true && text === '') {
      return;
    }

    const length = this.measure(text);
    if (spec.minLength !== undefined && length < spec.minLength) {
      this.addIssue(path, `string length ${length} is less than minimum ${spec.minLength}`);
    }
    if (spec.maxLength !== undefined && length > spec.maxLength) {
      this.addIssue(path, `string length ${length} is greater than maximum ${spec.maxLength}`);
    }
    if (spec.pattern !== undefined) {
      this.checkPattern(text, spec.pattern, path);
    }
  }

  private checkPattern(text: string, pattern: string, path: string): void {
    let regex: RegExp;
    try {
      regex = this.patterns.compile(pattern);
    } catch (error) {
      const reason = describeError(error);
      this.addIssue(path, `invalid pattern: ${reason}`);
      this.logger?.logWarning('Spec pattern failed to compile', {
        module: 'validator',
        data: { path, pattern, reason },
      });
      return;
    }

    if (!regex.test(text)) {
      this.addIssue(path, `string does not match pattern: ${pattern}`);
    }
  }

  private checkNumber(value: Value, spec: Spec, path: string): void {
    if (value.kind !== 'number') {
      this.addIssue(path, `expected number, got ${kindName(value)}`);
      return;
    }
    this.checkRange('number', value.value, spec, path);
  }

  private checkInteger(value: Value, spec: Spec, path: string): void {
    if (value.kind !== 'number') {
      this.addIssue(path, `expected integer, got ${kindName(value)}`);
      return;
    }
    if (!Number.isInteger(value.value)) {
      this.addIssue(path, `expected integer, got float: ${value.value}`);
      return;
    }
    this.checkRange('integer', value.value, spec, path);
  }

  private checkRange(label: 'number' | 'integer', num: number, spec: Spec, path: string): void {
    if (spec.min !== undefined && num < spec.min) {
      this.addIssue(path, `${label} ${num} is less than minimum ${spec.min}`);
    }
    if (spec.max !== undefined && num > spec.max) {
      this.addIssue(path, `${label} ${num} is greater than maximum ${spec.max}`);
    }
  }

  private checkObject(value: Value, spec: Spec, path: string): void {
    if (value.kind !== 'object') {
      this.addIssue(path, `expected object, got ${kindName(value)}`);
      return;
    }

    const fields = value.fields;
    const effective =
      spec.conditions && spec.conditions.length > 0
        ? resolveConditions(fields, spec, (condition, error) =>
            this.reportConditionError(condition, error)
          )
        : new Map<string, Spec>();

    for (const name of spec.required ?? []) {
      if (!hasOwn(fields, name)) {
        this.addIssue(joinPath(path, name), 'required field is missing');
      }
    }

    const declared = spec.properties ?? {};
    for (const [name, declaredSpec] of Object.entries(declared)) {
      if (!hasOwn(fields, name)) {
        continue;
      }
      this.validateNode(fields[name], effective.get(name) ?? declaredSpec, joinPath(path, name));
    }
  }

  private checkArray(value: Value, spec: Spec, path: string): void {
    if (value.kind !== 'array') {
      this.addIssue(path, `expected array, got ${kindName(value)}`);
      return;
    }

    const count = value.items.length;
    if (spec.minLength !== undefined && count < spec.minLength) {
      this.addIssue(path, `array length ${count} is less than minimum ${spec.minLength}`);
    }
    if (spec.maxLength !== undefined && count > spec.maxLength) {
      this.addIssue(path, `array length ${count} is greater than maximum ${spec.maxLength}`);
    }

    const items = spec.items;
    if (items) {
      value.items.forEach((item, index) => this.validateNode(item, items, indexPath(path, index)));
    }
  }

  private checkEnum(input: unknown, allowed: readonly unknown[], path: string): void {
    if (allowed.some((candidate) => valuesEqual(input, candidate))) {
      return;
    }
    const options = allowed.map((candidate) => formatValue(candidate)).join(', ');
    this.addIssue(path, `value not in enum: ${formatValue(input)} (allowed: ${options})`);
  }

  private reportConditionError(condition: Condition, error: unknown): void {
    const reason = describeError(error);
    this.addIssue('', `error evaluating condition '${condition.if}': ${reason}`);
    this.logger?.logWarning('Condition expression failed', {
      module: 'validator/conditions',
      data: { expression: condition.if, reason },
    });
  }

  private measure(text: string): number {
    return this.config.stringLength === 'utf16' ? text.length : Array.from(text).length;
  }
}

/**
 * Reusable validator. Specs are never mutated, so one instance can serve any
 * number of specs and calls.
 */
export class SpecValidator {
  private readonly config: ValidatorConfig;
  private readonly patterns: PatternCache;
  private readonly logger?: ErrorLogger;

  /**
   * @throws ConfigError when an option is invalid
   */
  constructor(options: ValidatorOptions = {}) {
    const { logger, ...config } = options;
    this.config = parseValidatorConfig(config);
    this.patterns = new PatternCache(this.config.patternCacheSize);
    this.logger = logger;
  }

  /** Snapshot of the resolved options */
  get options(): Readonly<ValidatorConfig> {
    return Object.freeze({ ...this.config });
  }

  validate(value: unknown, spec: Spec | null | undefined): ValidationResult {
    const pass = new ValidationPass(this.config, this.patterns, this.logger);
    if (!spec) {
      pass.addIssue('', 'spec is nil');
    } else {
      pass.validateNode(value, spec, '');
    }
    return pass.result();
  }

  /**
   * Parse JSON text, then validate it. A parse failure is reported as a
   * single root issue prefixed with `invalid JSON: `.
   */
  validateJSON(json: string, spec: Spec | null | undefined): ValidationResult {
    const limit = this.config.maxContentSize;
    if (limit !== undefined && json.length > limit) {
      return {
        valid: false,
        errors: [
          { path: '', message: `input too large: ${json.length} characters (max: ${limit})` },
        ],
      };
    }

    let value: unknown;
    try {
      value = jsonContent(json, { maxSize: null });
    } catch (error) {
      return {
        valid: false,
        errors: [{ path: '', message: `invalid JSON: ${describeError(error)}` }],
      };
    }
    return this.validate(value, spec);
  }
}

export function createValidator(options: ValidatorOptions = {}): SpecValidator {
  return new SpecValidator(options);
}

let defaultValidator: SpecValidator | undefined;

export function getDefaultValidator(): SpecValidator {
  if (!defaultValidator) {
    defaultValidator = new SpecValidator();
  }
  return defaultValidator;
}

/**
 * Validate a value against a spec with default options.
 */
export function validate(value: unknown, spec: Spec | null | undefined): ValidationResult {
  return getDefaultValidator().validate(value, spec);
}

/**
 * Validate JSON text against a spec with default options.
 */
export function validateJSON(json: string, spec: Spec | null | undefined): ValidationResult {
  return getDefaultValidator().validateJSON(json, spec);
}
