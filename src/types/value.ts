/**
 * Value model for data under validation.
 *
 * Input arrives untyped (usually straight from `JSON.parse`), so every node
 * is classified into a closed union before any check looks at it.
 *
 * @module types/value
 */

/**
 * JSON-compatible value.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ValueKind = 'null' | 'boolean' | 'number' | 'string' | 'array' | 'object';

/**
 * Classified view of an input node. `unsupported` covers host values with no
 * JSON counterpart (functions, symbols); they fail every type check.
 */
export type Value =
  | { readonly kind: 'null' }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'array'; readonly items: readonly unknown[] }
  | { readonly kind: 'object'; readonly fields: Readonly<Record<string, unknown>> }
  | { readonly kind: 'unsupported'; readonly typeName: string };

const NUMERIC_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function classify(input: unknown): Value {
  if (input === null || input === undefined) {
    return { kind: 'null' };
  }
  if (Array.isArray(input)) {
    return { kind: 'array', items: input };
  }
  if (isRecord(input)) {
    return { kind: 'object', fields: input };
  }

  switch (typeof input) {
    case 'boolean':
      return { kind: 'boolean', value: input };
    case 'number':
      return { kind: 'number', value: input };
    case 'bigint':
      return { kind: 'number', value: Number(input) };
    case 'string':
      return { kind: 'string', value: input };
    default:
      return { kind: 'unsupported', typeName: typeof input };
  }
}

/**
 * Name used in "expected X, got Y" messages.
 */
export function kindName(value: Value): string {
  return value.kind === 'unsupported' ? value.typeName : value.kind;
}

export function isNumericText(text: string): boolean {
  return NUMERIC_TEXT.test(text.trim());
}

/**
 * Numeric reading of a value: numbers as they are, numeric strings parsed,
 * anything else null.
 */
export function toNumber(input: unknown): number | null {
  const value = classify(input);
  if (value.kind === 'number') {
    return value.value;
  }
  if (value.kind === 'string' && isNumericText(value.value)) {
    return Number(value.value);
  }
  return null;
}

export interface EqualityOptions {
  /** Treat a numeric string and a number as equal when they denote the same number */
  coerceNumericStrings?: boolean;
}

/**
 * Structural equality over the value model. Numbers compare by numeric value;
 * null equals only null; otherwise kinds must match.
 */
export function valuesEqual(left: unknown, right: unknown, options: EqualityOptions = {}): boolean {
  const a = classify(left);
  const b = classify(right);

  if (options.coerceNumericStrings && a.kind !== b.kind) {
    const numericPair =
      (a.kind === 'number' && b.kind === 'string') || (a.kind === 'string' && b.kind === 'number');
    if (numericPair) {
      const x = toNumber(left);
      const y = toNumber(right);
      return x !== null && y !== null && x === y;
    }
  }

  switch (a.kind) {
    case 'null':
      return b.kind === 'null';
    case 'boolean':
      return b.kind === 'boolean' && b.value === a.value;
    case 'number':
      return b.kind === 'number' && b.value === a.value;
    case 'string':
      return b.kind === 'string' && b.value === a.value;
    case 'array':
      return (
        b.kind === 'array' &&
        a.items.length === b.items.length &&
        a.items.every((item, index) => valuesEqual(item, b.items[index], options))
      );
    case 'object': {
      if (b.kind !== 'object') {
        return false;
      }
      const keys = Object.keys(a.fields);
      return (
        keys.length === Object.keys(b.fields).length &&
        keys.every(
          (key) =>
            Object.prototype.hasOwnProperty.call(b.fields, key) &&
            valuesEqual(a.fields[key], b.fields[key], options)
        )
      );
    }
    case 'unsupported':
      return left === right;
  }
}

/**
 * Render a value for an error message. Strings are printed bare.
 */
export function formatValue(input: unknown): string {
  const value = classify(input);
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'boolean':
    case 'number':
      return String(value.value);
    case 'string':
      return value.value;
    case 'unsupported':
      return value.typeName;
    case 'array':
    case 'object':
      try {
        return JSON.stringify(input) ?? value.kind;
      } catch {
        return value.kind;
      }
  }
}
