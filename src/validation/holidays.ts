import { z } from 'zod';
import { dateKeySchema, dateRangeSchema, fromNotAfterTo, rangeOrderError } from './common';

export const holidaySchema = z.object({
  date: dateKeySchema,
  name: z.string().trim().min(1).max(200),
});

export const holidayRangeSchema = dateRangeSchema.refine(fromNotAfterTo, rangeOrderError);
