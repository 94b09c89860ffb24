import { describe, expect, test } from '@jest/globals';
import { SpecBuilder } from '../../src/builder/spec-builder';
import { validate } from '../../src/validator/validator';

describe('SpecBuilder', () => {
  test('builds typed leaf specs with constraints', () => {
    expect(SpecBuilder.string().minLength(1).maxLength(20).pattern(/^[a-z]+$/).build()).toEqual({
      type: 'string',
      minLength: 1,
      maxLength: 20,
      pattern: '^[a-z]+$',
    });
    expect(SpecBuilder.integer().min(0).max(10).build()).toEqual({ type: 'integer', min: 0, max: 10 });
    expect(SpecBuilder.number().oneOf(1, 2.5).build()).toEqual({ type: 'number', enum: [1, 2.5] });
    expect(SpecBuilder.boolean().build()).toEqual({ type: 'boolean' });
    expect(SpecBuilder.nullType().build()).toEqual({ type: 'null' });
    expect(SpecBuilder.string().allowEmpty().build()).toEqual({ type: 'string', allowEmpty: true });
  });

  test('every step returns a new builder', () => {
    const base = SpecBuilder.string().minLength(1);
    const short = base.maxLength(5);
    expect(base.build()).toEqual({ type: 'string', minLength: 1 });
    expect(short.build()).toEqual({ type: 'string', minLength: 1, maxLength: 5 });
  });

  test('builds objects from builders and plain specs', () => {
    const spec = SpecBuilder.object({
      name: SpecBuilder.string(),
      age: { type: 'integer', min: 0 },
    })
      .property('email', SpecBuilder.string().pattern('@'))
      .required('name', 'email')
      .required('name')
      .build();

    expect(spec).toEqual({
      type: 'object',
      properties: {
        name: { type: 'string' },
        age: { type: 'integer', min: 0 },
        email: { type: 'string', pattern: '@' },
      },
      required: ['name', 'email'],
    });
  });

  test('builds arrays', () => {
    expect(SpecBuilder.array(SpecBuilder.integer()).minLength(1).build()).toEqual({
      type: 'array',
      items: { type: 'integer' },
      minLength: 1,
    });
    expect(SpecBuilder.array().items({ type: 'string' }).build()).toEqual({
      type: 'array',
      items: { type: 'string' },
    });
  });

  test('when appends conditions in order', () => {
    const spec = SpecBuilder.object({ kind: SpecBuilder.string(), code: SpecBuilder.string() })
      .when("kind == 'a'", { code: SpecBuilder.override().minLength(2) })
      .when("kind == 'b'", { code: { maxLength: 1 } }, { code: SpecBuilder.override().allowEmpty(false) })
      .build();

    expect(spec.conditions).toEqual([
      { if: "kind == 'a'", then: { code: { minLength: 2 } } },
      { if: "kind == 'b'", then: { code: { maxLength: 1 } }, else: { code: { allowEmpty: false } } },
    ]);
  });

  test('built specs validate like hand-written ones', () => {
    const spec = SpecBuilder.object({
      enabled: SpecBuilder.boolean(),
      value: SpecBuilder.string(),
    })
      .when('enabled == true', { value: SpecBuilder.override().minLength(1) })
      .build();

    expect(validate({ enabled: true, value: '' }, spec).errors).toEqual([
      { path: 'value', message: 'string length 0 is less than minimum 1' },
    ]);
  });

  test('from wraps an existing spec', () => {
    expect(SpecBuilder.from({ type: 'string' }).maxLength(3).build()).toEqual({
      type: 'string',
      maxLength: 3,
    });
  });
});
