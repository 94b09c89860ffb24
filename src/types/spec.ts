/**
 * Spec and result types.
 *
 * Field names match the JSON wire format one to one, so a parsed spec
 * document is a `Spec` as it stands.
 *
 * @module types/spec
 */

import type { JsonValue } from './value';

export const SPEC_TYPES = ['string', 'number', 'integer', 'boolean', 'object', 'array', 'null'] as const;

export type SpecType = (typeof SPEC_TYPES)[number];

export function isSpecType(value: unknown): value is SpecType {
  return SPEC_TYPES.some((type) => type === value);
}

/**
 * Overrides keyed by field name.
 */
export type SpecOverrides = Readonly<Record<string, Spec>>;

/**
 * A guarded set of overrides for the fields of one object.
 */
export interface Condition {
  /** Boolean expression over the object's own fields, e.g. `enabled == true` */
  readonly if: string;
  readonly then: SpecOverrides;
  readonly else?: SpecOverrides;
}

/**
 * Declarative schema node. Every constraint is optional; an absent constraint
 * is not checked. A spec without `type` skips type checking entirely, which
 * lets condition overrides carry only the constraints they change.
 */
export interface Spec {
  /** One of {@link SPEC_TYPES}; other names are reported as unknown types */
  readonly type?: string;
  readonly properties?: SpecOverrides;
  readonly items?: Spec;
  readonly required?: readonly string[];
  readonly conditions?: readonly Condition[];

  /** Inclusive lower bound for number/integer */
  readonly min?: number;
  /** Inclusive upper bound for number/integer */
  readonly max?: number;
  /** String length or array element count */
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly pattern?: string;
  readonly enum?: readonly JsonValue[];
  /** An empty string passes every other string constraint */
  readonly allowEmpty?: boolean;
}

export interface ValidationIssue {
  /** `""` at the root, `a.b` for fields, `a[0]` for elements */
  readonly path: string;
  readonly message: string;
}

export interface ValidationResult {
  /** Always `errors.length === 0` */
  readonly valid: boolean;
  readonly errors: readonly ValidationIssue[];
}
