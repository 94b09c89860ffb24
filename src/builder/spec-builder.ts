/**
 * Fluent spec construction.
 *
 * Every modifier returns a new builder, so a partially configured builder can
 * be shared as a base:
 *
 * ```ts
 * const name = SpecBuilder.string().minLength(1);
 * const spec = SpecBuilder.object({ first: name, last: name.maxLength(40) })
 *   .required('first')
 *   .build();
 * ```
 *
 * @module builder/spec-builder
 */

import type { Condition, Spec, SpecType } from '../types/spec';
import type { JsonValue } from '../types/value';

export type SpecInput = SpecBuilder | Spec;

export type SpecInputs = Readonly<Record<string, SpecInput>>;

function toSpec(input: SpecInput): Spec {
  return input instanceof SpecBuilder ? input.build() : input;
}

function toSpecs(inputs: SpecInputs): Record<string, Spec> {
  return Object.fromEntries(Object.entries(inputs).map(([name, input]) => [name, toSpec(input)]));
}

export class SpecBuilder {
  private constructor(private readonly spec: Spec) {}

  static string(): SpecBuilder {
    return SpecBuilder.ofType('string');
  }

  static number(): SpecBuilder {
    return SpecBuilder.ofType('number');
  }

  static integer(): SpecBuilder {
    return SpecBuilder.ofType('integer');
  }

  static boolean(): SpecBuilder {
    return SpecBuilder.ofType('boolean');
  }

  static nullType(): SpecBuilder {
    return SpecBuilder.ofType('null');
  }

  static object(properties: SpecInputs = {}): SpecBuilder {
    return new SpecBuilder({ type: 'object', properties: toSpecs(properties) });
  }

  static array(items?: SpecInput): SpecBuilder {
    return new SpecBuilder(items ? { type: 'array', items: toSpec(items) } : { type: 'array' });
  }

  /**
   * Typeless fragment, for use in `when` branches.
   */
  static override(): SpecBuilder {
    return new SpecBuilder({});
  }

  static from(spec: Spec): SpecBuilder {
    return new SpecBuilder(spec);
  }

  private static ofType(type: SpecType): SpecBuilder {
    return new SpecBuilder({ type });
  }

  min(value: number): SpecBuilder {
    return this.with({ min: value });
  }

  max(value: number): SpecBuilder {
    return this.with({ max: value });
  }

  minLength(value: number): SpecBuilder {
    return this.with({ minLength: value });
  }

  maxLength(value: number): SpecBuilder {
    return this.with({ maxLength: value });
  }

  pattern(source: string | RegExp): SpecBuilder {
    return this.with({ pattern: typeof source === 'string' ? source : source.source });
  }

  oneOf(...values: JsonValue[]): SpecBuilder {
    return this.with({ enum: values });
  }

  allowEmpty(value = true): SpecBuilder {
    return this.with({ allowEmpty: value });
  }

  property(name: string, input: SpecInput): SpecBuilder {
    return this.with({ properties: { ...this.spec.properties, [name]: toSpec(input) } });
  }

  items(input: SpecInput): SpecBuilder {
    return this.with({ items: toSpec(input) });
  }

  /** Appends to the names already required */
  required(...names: string[]): SpecBuilder {
    const current = this.spec.required ?? [];
    return this.with({ required: [...current, ...names.filter((name) => !current.includes(name))] });
  }

  /** Appends a condition after the existing ones */
  when(expression: string, then: SpecInputs, otherwise?: SpecInputs): SpecBuilder {
    const condition: Condition = otherwise
      ? { if: expression, then: toSpecs(then), else: toSpecs(otherwise) }
      : { if: expression, then: toSpecs(then) };
    return this.with({ conditions: [...(this.spec.conditions ?? []), condition] });
  }

  build(): Spec {
    return this.spec;
  }

  private with(changes: Spec): SpecBuilder {
    return new SpecBuilder({ ...this.spec, ...changes });
  }
}
