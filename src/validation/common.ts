import { z } from 'zod';
import { ValidationError } from '../errors';
import { isDateKey } from '../utils/dates';

export const dateKeySchema = z.string().trim().refine(isDateKey, { message: 'Expected a date as YYYY-MM-DD' });

export const idSchema = z.string().trim().min(1).max(64);

export const reasonSchema = z
  .string()
  .trim()
  .min(10, { message: 'Reason must be at least 10 characters' })
  .max(2000);

export const fromNotAfterTo = (r: { from?: string; to?: string }) => !r.from || !r.to || r.from <= r.to;
export const rangeOrderError = { message: 'from must not be after to', path: ['to'] };

// extend with extra fields, then `.refine(fromNotAfterTo, rangeOrderError)`
export const dateRangeSchema = z.object({
  from: dateKeySchema,
  to: dateKeySchema,
});

export const pagingSchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(details[0]?.message ?? 'Invalid input', details);
  }
  return result.data;
}
