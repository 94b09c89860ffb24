import { describe, expect, test } from '@jest/globals';
import { z } from 'zod';
import { SpecDefinitionError } from '../../src/errors/spec-error';
import {
  formatIssuePath,
  formatZodIssue,
  normalizeSpecError,
  toConfigError,
} from '../../src/validation/errors';

describe('validation/errors', () => {
  test('formatIssuePath renders dotted and indexed paths', () => {
    expect(formatIssuePath([], 'spec')).toBe('spec');
    expect(formatIssuePath(['properties', 'email', 'pattern'], 'spec')).toBe('properties.email.pattern');
    expect(formatIssuePath(['conditions', 0, 'then'], 'spec')).toBe('conditions[0].then');
  });

  test('formatZodIssue describes missing and mistyped values', () => {
    const schema = z.object({ name: z.string(), count: z.number() });
    const result = schema.safeParse({ count: 'x' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => formatZodIssue(issue, 'input'))).toEqual([
        'name is required',
        'count must be of type number, got string',
      ]);
    }
  });

  test('formatZodIssue falls back to the zod message', () => {
    const schema = z.string().refine((value) => value.startsWith('a'), 'must start with a');
    const result = schema.safeParse('b');
    if (!result.success) {
      expect(formatZodIssue(result.error.issues[0], 'value')).toBe('value: must start with a');
    }
  });

  test('normalizeSpecError passes SpecDefinitionError through', () => {
    const original = new SpecDefinitionError('bad');
    expect(normalizeSpecError(original)).toBe(original);
  });

  test('normalizeSpecError wraps other values', () => {
    expect(normalizeSpecError(new Error('nope'), 'Failed').message).toBe('Failed: nope');
    expect(normalizeSpecError('nope').message).toBe('Invalid spec definition');
  });

  test('toConfigError keeps every issue', () => {
    const schema = z.object({ a: z.number(), b: z.number() }).strict();
    const result = schema.safeParse({});
    if (!result.success) {
      const error = toConfigError(result.error);
      expect(error.issues).toEqual(['a is required', 'b is required']);
      expect(error.message).toBe('a is required; b is required');
    }
  });
});
