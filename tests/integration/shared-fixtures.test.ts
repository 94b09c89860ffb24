/**
 * Runs every spec under tests/fixtures/specs against its case file.
 */

import { beforeAll, describe, expect, test } from '@jest/globals';
import { validate } from '../../src/validator/validator';
import type { Spec } from '../../src/types/spec';
import { FixtureCase, loadFixtureCases, loadFixtureSpec } from '../utils/spec-fixtures';

const suites: Array<[string, string]> = [
  ['account_signup.json', 'account_signup.json'],
  ['shipping_order.yaml', 'shipping_order.json'],
  ['feature_flags.json', 'feature_flags.json'],
];

describe.each(suites)('fixture %s', (specFile, casesFile) => {
  let spec: Spec;
  let cases: FixtureCase[];

  beforeAll(async () => {
    spec = await loadFixtureSpec(specFile);
    cases = await loadFixtureCases(casesFile);
  });

  test('every case matches its expected outcome', () => {
    for (const fixture of cases) {
      const result = validate(fixture.data, spec);
      expect({ name: fixture.name, valid: result.valid }).toEqual({
        name: fixture.name,
        valid: fixture.valid,
      });
      if (fixture.errors) {
        expect({ name: fixture.name, errors: result.errors }).toEqual({
          name: fixture.name,
          errors: fixture.errors,
        });
      }
    }
  });
});
