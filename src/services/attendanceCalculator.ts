import type { AttendanceStatus } from '../entities/AttendanceRecord';
import { ValidationError } from '../errors';
import type { Thresholds } from '../types';

export const MAX_MINUTES_PER_DAY = 24 * 60;

export function thresholdProblems(t: Thresholds): string[] {
  const problems: string[] = [];
  if (!Number.isInteger(t.fullDayMinutes) || !Number.isInteger(t.halfDayMinutes)) {
    problems.push('Thresholds must be whole minutes');
  }
  if (t.halfDayMinutes <= 0) problems.push('Half day minutes must be greater than zero');
  if (t.fullDayMinutes <= t.halfDayMinutes) problems.push('Full day minutes must be greater than half day minutes');
  if (t.fullDayMinutes > MAX_MINUTES_PER_DAY) problems.push(`Full day minutes cannot exceed ${MAX_MINUTES_PER_DAY}`);
  return problems;
}

/**
 * Classify a day's total call time. Both thresholds are inclusive lower bounds:
 * `fullDay <= m` is PRESENT, `halfDay <= m < fullDay` is HALF_DAY, anything less is ABSENT.
 */
export function calculateStatus(minutes: number, thresholds: Thresholds): AttendanceStatus {
  if (!Number.isInteger(minutes) || minutes < 0) {
    throw new ValidationError(`Call minutes must be a non-negative whole number, got ${minutes}`);
  }
  if (minutes >= thresholds.fullDayMinutes) return 'PRESENT';
  if (minutes >= thresholds.halfDayMinutes) return 'HALF_DAY';
  return 'ABSENT';
}

/** Paid-day weight used by summaries and the payroll export. */
export function payableWeight(status: AttendanceStatus): number {
  switch (status) {
    case 'PRESENT':
      return 1;
    case 'HALF_DAY':
      return 0.5;
    case 'ABSENT':
      return 0;
  }
}
