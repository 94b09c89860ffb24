/**
 * Helpers for presenting validation results, independent of any UI
 * framework.
 *
 * @module helpers/results
 */

import type { Spec, ValidationIssue, ValidationResult } from '../types/spec';
import { validate } from '../validator/validator';

export function formatIssue(issue: ValidationIssue): string {
  return issue.path === '' ? issue.message : `${issue.path}: ${issue.message}`;
}

/**
 * First segment of an issue path: `address` for `address.city` and for
 * `address[0]`. Root issues map to `""`.
 */
export function topLevelField(path: string): string {
  const match = /[.[]/.exec(path);
  return match ? path.slice(0, match.index) : path;
}

/**
 * Top-level field → first message reported under it.
 */
export function groupErrorsByField(result: ValidationResult): Record<string, string> {
  const grouped: Record<string, string> = {};
  for (const issue of result.errors) {
    const field = topLevelField(issue.path);
    if (!Object.prototype.hasOwnProperty.call(grouped, field)) {
      grouped[field] = issue.message;
    }
  }
  return grouped;
}

export function groupAllErrorsByField(result: ValidationResult): Record<string, ValidationIssue[]> {
  const grouped: Record<string, ValidationIssue[]> = {};
  for (const issue of result.errors) {
    const field = topLevelField(issue.path);
    const bucket = Object.prototype.hasOwnProperty.call(grouped, field) ? grouped[field] : undefined;
    if (bucket) {
      bucket.push(issue);
    } else {
      grouped[field] = [issue];
    }
  }
  return grouped;
}

/**
 * Issues reported at `field` or anywhere below it.
 */
export function errorsForField(result: ValidationResult, field: string): ValidationIssue[] {
  return result.errors.filter(
    (issue) =>
      issue.path === field || issue.path.startsWith(`${field}.`) || issue.path.startsWith(`${field}[`)
  );
}

/**
 * Validate a single field in the context of the whole object, so that
 * conditions reading sibling fields still apply.
 */
export function validateField(
  name: string,
  value: unknown,
  allValues: Readonly<Record<string, unknown>>,
  spec: Spec
): ValidationResult {
  const result = validate({ ...allValues, [name]: value }, spec);
  const errors = errorsForField(result, name);
  return { valid: errors.length === 0, errors };
}
