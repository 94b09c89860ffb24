/**
 * Condition resolution: which per-field overrides apply to one object.
 *
 * @module validator/conditions
 */

import { evalExpression } from '../expression/evaluator';
import { SpecMerger } from '../merge/spec-merge';
import type { Condition, Spec } from '../types/spec';
import { getOwn } from '../utils/object';

export type ConditionErrorReporter = (condition: Condition, error: unknown) => void;

const merger = new SpecMerger();

/**
 * Evaluate the conditions of `spec` against `fields` and return the effective
 * spec of every field a selected branch mentions.
 *
 * Conditions run in declaration order and always see the original field
 * values. A later override for the same field is merged on top of the
 * earlier result; the first override of a field starts from its declared
 * property spec, or stands alone when the field is undeclared. A condition
 * whose expression fails is reported and contributes nothing.
 */
export function resolveConditions(
  fields: Readonly<Record<string, unknown>>,
  spec: Spec,
  onError: ConditionErrorReporter
): Map<string, Spec> {
  const effective = new Map<string, Spec>();

  for (const condition of spec.conditions ?? []) {
    let outcome: boolean;
    try {
      outcome = evalExpression(condition.if, fields);
    } catch (error) {
      onError(condition, error);
      continue;
    }

    const overrides = outcome ? condition.then : condition.else;
    if (!overrides) {
      continue;
    }

    for (const [name, override] of Object.entries(overrides)) {
      const current = effective.get(name) ?? getOwn(spec.properties, name);
      effective.set(name, current ? merger.merge(current, override) : override);
    }
  }

  return effective;
}

/**
 * True when the spec, or any spec reachable through `properties` or `items`,
 * carries conditions. Callers use it to decide whether a spec can be
 * evaluated by a client that lacks an expression engine.
 */
export function hasExpressions(spec: Spec | null | undefined): boolean {
  if (!spec) {
    return false;
  }
  if (spec.conditions && spec.conditions.length > 0) {
    return true;
  }
  if (spec.properties && Object.values(spec.properties).some((child) => hasExpressions(child))) {
    return true;
  }
  return hasExpressions(spec.items);
}
