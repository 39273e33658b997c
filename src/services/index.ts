import { DataSource } from 'typeorm';
import { config } from '../config';
import type { Clock } from '../types';
import { AttendanceOverrideService } from './attendanceOverrideService';
import { AttendanceQueryService } from './attendanceQueryService';
import { AttendanceScheduler } from './attendanceScheduler';
import { CalendarService } from './calendarService';
import type { SlashDateOrder } from './callLogImport';
import { CallLogService } from './callLogService';
import { ExpenseService } from './expenseService';
import { PermissionService } from './permissionService';
import { ReimbursementService } from './reimbursementService';
import { ThresholdConfigService } from './thresholdConfigService';

export type ServiceOptions = {
  now?: Clock;
  weeklyOffDays?: readonly number[];
  sheetDateOrder?: SlashDateOrder;
};

export type Services = ReturnType<typeof createServices>;

/** Wires every service against one DataSource; tests pass a fixed clock and the in-memory database. */
export function createServices(dataSource: DataSource, opts: ServiceOptions = {}) {
  const now = opts.now ?? (() => new Date());
  const permissions = new PermissionService(dataSource);
  const calendar = new CalendarService(dataSource, permissions, opts.weeklyOffDays ?? config.attendance.weeklyOffDays);
  const thresholds = new ThresholdConfigService(dataSource, permissions);
  const callLogs = new CallLogService(dataSource, permissions, now, opts.sheetDateOrder ?? config.callLogs.sheetDateOrder);

  return {
    permissions,
    calendar,
    thresholds,
    callLogs,
    scheduler: new AttendanceScheduler(dataSource, calendar, thresholds, callLogs),
    overrides: new AttendanceOverrideService(dataSource, permissions, calendar, thresholds, callLogs, now),
    attendance: new AttendanceQueryService(dataSource, permissions, now),
    expenses: new ExpenseService(dataSource, permissions, now),
    reimbursements: new ReimbursementService(dataSource, permissions, now),
  };
}
