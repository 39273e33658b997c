import { z } from 'zod';
import { MAX_MINUTES_PER_DAY } from '../services/attendanceCalculator';
import { dateKeySchema, idSchema } from './common';

export const callLogEntrySchema = z.object({
  employeeId: idSchema,
  date: dateKeySchema,
  durationMinutes: z
    .number()
    .int()
    .min(0, { message: 'Call duration cannot be negative' })
    .max(MAX_MINUTES_PER_DAY, { message: 'Call duration cannot exceed 24 hours' }),
  callCount: z.number().int().min(0).default(0),
  source: z
    .string()
    .trim()
    .min(1)
    .max(50)
    .transform((s) => s.toUpperCase())
    .default('MANUAL'),
});

export type CallLogEntryInput = z.infer<typeof callLogEntrySchema>;

export const bulkCallLogSchema = z.object({
  entries: z.array(z.unknown()).min(1).max(5000),
  source: z.string().trim().min(1).max(50).optional(),
  upsert: z.boolean().default(true),
});

export const callLogQuerySchema = z.object({
  employeeId: idSchema.optional(),
  from: dateKeySchema.optional(),
  to: dateKeySchema.optional(),
  source: z.string().trim().min(1).max(50).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export type CallLogQuery = z.infer<typeof callLogQuerySchema>;
