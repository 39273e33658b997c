import type { AppRole } from './entities/Employee';

/** Whoever performs an operation: a logged-in user, or the system for batch jobs. */
export type Actor = {
  id: string;
  role: AppRole;
  username?: string;
};

export const SYSTEM_ACTOR: Actor = { id: 'SYSTEM', role: 'admin', username: 'system' };

// directory row behind the built-in `admin` login
export const ADMIN_EMPLOYEE_ID = 'ADMIN';

export type Thresholds = {
  fullDayMinutes: number;
  halfDayMinutes: number;
};

export type AttendanceSummary = {
  employeeId: string;
  from: string;
  to: string;
  totalDays: number;
  present: number;
  halfDay: number;
  absent: number;
  totalMinutes: number;
  totalCalls: number;
  manualUpdates: number;
  // PRESENT counts 1, HALF_DAY 0.5; what a payroll run would pay for
  payableDays: number;
};

export type Clock = () => Date;
