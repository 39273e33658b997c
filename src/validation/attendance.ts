import { z } from 'zod';
import { ATTENDANCE_STATUSES, RECORD_SOURCES } from '../entities/AttendanceRecord';
import { MAX_MINUTES_PER_DAY } from '../services/attendanceCalculator';
import { daySpan, isDateKey } from '../utils/dates';
import { dateKeySchema, dateRangeSchema, fromNotAfterTo, idSchema, pagingSchema, rangeOrderError, reasonSchema } from './common';

// one batch run covers at most a year of dates
export const MAX_CALCULATION_DAYS = 366;

export const withinCalculationLimit = (r: { from?: string; to?: string }) =>
  !r.from || !r.to || !isDateKey(r.from) || !isDateKey(r.to) || r.to < r.from || daySpan(r.from, r.to) <= MAX_CALCULATION_DAYS;
export const calculationLimitError = { message: `A calculation covers at most ${MAX_CALCULATION_DAYS} days`, path: ['to'] };

const minutesSchema = z
  .number()
  .int({ message: 'Minutes must be a whole number' })
  .min(0, { message: 'Minutes cannot be negative' })
  .max(MAX_MINUTES_PER_DAY, { message: 'Minutes cannot exceed 24 hours' });

export const overrideSchema = z
  .object({
    employeeId: idSchema,
    date: dateKeySchema,
    minutes: minutesSchema.optional(),
    callCount: z.number().int().min(0).optional(),
    status: z.enum(ATTENDANCE_STATUSES).optional(),
    reason: reasonSchema,
  })
  .refine((o) => o.minutes !== undefined || o.status !== undefined, {
    message: 'Provide minutes or status',
    path: ['minutes'],
  });

export const resetSchema = z.object({
  reason: reasonSchema,
});

export const recordQuerySchema = dateRangeSchema
  .extend({
    employeeId: idSchema,
    status: z.enum(ATTENDANCE_STATUSES).optional(),
    source: z.enum(RECORD_SOURCES).optional(),
  })
  .refine(fromNotAfterTo, rangeOrderError);

export type RecordQuery = z.infer<typeof recordQuerySchema>;

export const summaryQuerySchema = dateRangeSchema
  .extend({ employeeId: idSchema })
  .refine(fromNotAfterTo, rangeOrderError);

export const reportQuerySchema = dateRangeSchema
  .extend({
    department: z.string().trim().min(1).optional(),
  })
  .refine(fromNotAfterTo, rangeOrderError);

export type ReportQuery = z.infer<typeof reportQuerySchema>;

export const auditQuerySchema = pagingSchema
  .extend({
    employeeId: idSchema.optional(),
    from: dateKeySchema.optional(),
    to: dateKeySchema.optional(),
  })
  .refine(fromNotAfterTo, rangeOrderError);

export type AuditQuery = z.infer<typeof auditQuerySchema>;

// one date, or an inclusive range; neither means today
export const calculateSchema = z
  .object({
    date: dateKeySchema.optional(),
    from: dateKeySchema.optional(),
    to: dateKeySchema.optional(),
  })
  .refine((b) => !(b.date && (b.from || b.to)), { message: 'Use either date or from/to', path: ['date'] })
  .refine((b) => Boolean(b.from) === Boolean(b.to), { message: 'from and to go together', path: ['to'] })
  .refine(fromNotAfterTo, rangeOrderError)
  .refine(withinCalculationLimit, calculationLimitError);

export const thresholdsSchema = z.object({
  fullDayMinutes: z.number().int(),
  halfDayMinutes: z.number().int(),
});
