import { z } from 'zod';

const NonNegativeInteger = z
  .number({
    invalid_type_error: 'Value must be a number',
  })
  .int('Value must be an integer')
  .nonnegative('Value must be zero or positive');

export const StringLengthModeSchema = z.enum(['codepoints', 'utf16']);

export const ValidatorConfigSchema = z
  .object({
    /** Compiled patterns kept per validator; 0 disables the cache */
    patternCacheSize: NonNegativeInteger.max(100_000).default(256),
    /** How string length is counted for minLength/maxLength */
    stringLength: StringLengthModeSchema.default('codepoints'),
    /** Largest JSON document accepted by validateJSON, in characters; unlimited when unset */
    maxContentSize: NonNegativeInteger.min(1).optional(),
  })
  .strict();

export type StringLengthMode = z.infer<typeof StringLengthModeSchema>;
export type ValidatorConfig = z.infer<typeof ValidatorConfigSchema>;
export type ValidatorConfigInput = z.input<typeof ValidatorConfigSchema>;
