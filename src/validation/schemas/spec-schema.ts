import { z } from 'zod';
import { ExpressionSyntaxError } from '../../errors/expression-error';
import { evalExpression } from '../../expression/evaluator';
import { Condition, SPEC_TYPES, Spec } from '../../types/spec';
import type { JsonValue } from '../../types/value';

const LengthBound = z
  .number({
    invalid_type_error: 'Length bound must be a number',
  })
  .int('Length bound must be an integer')
  .nonnegative('Length bound must be zero or positive');

/**
 * Syntax-only check: with an empty context every field is absent, so only a
 * malformed expression can throw.
 */
const ExpressionSchema = z.string().superRefine((value, ctx) => {
  try {
    evalExpression(value, {});
  } catch (error) {
    if (error instanceof ExpressionSyntaxError) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `invalid expression: ${error.message}`,
      });
      return;
    }
    throw error;
  }
});

const PatternSchema = z.string().superRefine((value, ctx) => {
  try {
    new RegExp(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid pattern: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
});

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const ConditionSchema: z.ZodType<Condition> = z.lazy(() =>
  z
    .object({
      if: ExpressionSchema,
      then: z.record(SpecSchema),
      else: z.record(SpecSchema).optional(),
    })
    .strict()
);

/**
 * JSON wire format of a spec. Unknown keys are rejected.
 */
export const SpecSchema: z.ZodType<Spec> = z.lazy(() =>
  z
    .object({
      type: z.enum(SPEC_TYPES).optional(),
      properties: z.record(SpecSchema).optional(),
      items: SpecSchema.optional(),
      required: z.array(z.string()).optional(),
      conditions: z.array(ConditionSchema).optional(),
      min: z.number().optional(),
      max: z.number().optional(),
      minLength: LengthBound.optional(),
      maxLength: LengthBound.optional(),
      pattern: PatternSchema.optional(),
      enum: z.array(JsonValueSchema).optional(),
      allowEmpty: z.boolean().optional(),
    })
    .strict()
);
