import { z } from 'zod';
import { ValidationError } from './errors';

/**
 * Zod validation helpers
 */

export interface FieldIssue {
  field: string;
  message: string;
}

/**
 * Flatten zod issues into field/message pairs for error responses
 */
export function formatZodIssues(error: z.ZodError): FieldIssue[] {
  return error.errors.map((e) => ({
    field: e.path.join('.'),
    message: e.message,
  }));
}

/**
 * Validate and parse data with a Zod schema, raising a ValidationError
 */
export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what = 'input'): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, formatZodIssues(result.error));
  }
  return result.data;
}

/**
 * Safe validation that returns a result object instead of throwing
 */
export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): { success: true; data: T } | { success: false; error: z.ZodError } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

export const schemas = {
  positiveInt: z.number().int().positive(),
  nonEmptyString: z.string().trim().min(1),
  httpUrl: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), { message: 'URL must use http or https' }),
};
