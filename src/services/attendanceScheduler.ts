import { DataSource } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { AttendanceRecord } from '../entities/AttendanceRecord';
import { ConflictError, ValidationError, errorMessage, isUniqueViolation } from '../errors';
import { createLogger } from '../logger';
import type { Thresholds } from '../types';
import { DateKey, eachDay } from '../utils/dates';
import { calculateStatus } from './attendanceCalculator';
import { lockRecord } from './attendanceRecordStore';
import type { CallLogService, DailyCallTotal } from './callLogService';
import type { WorkingDayCalendar } from './calendarService';
import { activeEmployeeIds } from './employeeDirectory';
import type { ThresholdConfigService } from './thresholdConfigService';

const log = createLogger('scheduler');

type EmployeeOutcome = 'created' | 'updated' | 'unchanged' | 'skippedManual';

export type DailyRunSummary = {
  date: DateKey;
  workingDay: boolean;
  configVersion: number | null;
  created: number;
  updated: number;
  unchanged: number;
  skippedManual: number;
  skippedInactive: number;
  failed: { employeeId: string; error: string }[];
  // set when the whole date could not run (no active thresholds, database down)
  error?: string;
};

export type RangeRunSummary = {
  from: DateKey;
  to: DateKey;
  ok: boolean;
  results: DailyRunSummary[];
};

function emptyRun(date: DateKey, workingDay: boolean): DailyRunSummary {
  return {
    date,
    workingDay,
    configVersion: null,
    created: 0,
    updated: 0,
    unchanged: 0,
    skippedManual: 0,
    skippedInactive: 0,
    failed: [],
  };
}

export function runSucceeded(run: DailyRunSummary): boolean {
  return run.error === undefined && run.failed.length === 0;
}

/**
 * Turns a day's call logs into AUTO attendance records. Safe to re-run: rows
 * whose inputs did not change are left untouched and MANUAL rows are never
 * written.
 */
export class AttendanceScheduler {
  constructor(
    private readonly dataSource: DataSource,
    private readonly calendar: WorkingDayCalendar,
    private readonly thresholds: ThresholdConfigService,
    private readonly callLogs: CallLogService,
  ) {}

  async runForDate(date: DateKey): Promise<DailyRunSummary> {
    if (!(await this.calendar.isWorkingDay(date))) {
      log.info(`${date} is not a working day, nothing to calculate`);
      return emptyRun(date, false);
    }

    const summary = emptyRun(date, true);
    const config = await this.thresholds.findActive();
    if (!config) {
      summary.error = 'No active attendance threshold configuration';
      log.error(`${date}: ${summary.error}`);
      return summary;
    }
    summary.configVersion = config.version;
    const thresholds: Thresholds = { fullDayMinutes: config.fullDayMinutes, halfDayMinutes: config.halfDayMinutes };

    const totals = await this.callLogs.dailyTotals(date);
    const active = await activeEmployeeIds(
      this.dataSource.manager,
      totals.map((t) => t.employeeId),
    );

    for (const total of totals) {
      if (!active.has(total.employeeId)) {
        summary.skippedInactive += 1;
        log.debug(`${date}: skipping inactive or unknown employee ${total.employeeId}`);
        continue;
      }
      try {
        const outcome = await this.applyTotal(date, total, thresholds, config.version);
        summary[outcome] += 1;
      } catch (err) {
        log.error(`${date}: attendance for ${total.employeeId} failed`, err);
        summary.failed.push({ employeeId: total.employeeId, error: errorMessage(err) });
      }
    }

    log.info(
      `${date} (v${config.version}): ${summary.created} created, ${summary.updated} updated, ` +
        `${summary.unchanged} unchanged, ${summary.skippedManual} manual, ${summary.failed.length} failed`,
    );
    return summary;
  }

  async runForRange(from: DateKey, to: DateKey): Promise<RangeRunSummary> {
    if (from > to) throw new ValidationError('from must not be after to');
    const results: DailyRunSummary[] = [];
    for (const date of eachDay(from, to)) {
      try {
        results.push(await this.runForDate(date));
      } catch (err) {
        log.error(`Attendance run for ${date} failed`, err);
        results.push({ ...emptyRun(date, true), error: errorMessage(err) });
      }
    }
    return { from, to, ok: results.every(runSucceeded), results };
  }

  private async applyTotal(
    date: DateKey,
    total: DailyCallTotal,
    thresholds: Thresholds,
    configVersion: number,
  ): Promise<EmployeeOutcome> {
    const status = calculateStatus(total.minutes, thresholds);

    try {
      return await this.dataSource.transaction<EmployeeOutcome>(async (manager) => {
        const repo = manager.getRepository(AttendanceRecord);
        const existing = await lockRecord(manager, total.employeeId, date);

        if (existing?.source === 'MANUAL') return 'skippedManual';
        if (
          existing &&
          existing.status === status &&
          existing.minutes === total.minutes &&
          existing.callCount === total.calls &&
          existing.configVersion === configVersion
        ) {
          return 'unchanged';
        }

        if (existing) {
          existing.status = status;
          existing.minutes = total.minutes;
          existing.callCount = total.calls;
          existing.configVersion = configVersion;
          await repo.save(existing);
          return 'updated';
        }

        await repo.insert({
          id: uuidv4(),
          employeeId: total.employeeId,
          date,
          status,
          minutes: total.minutes,
          callCount: total.calls,
          source: 'AUTO',
          configVersion,
          reason: null,
          updatedBy: null,
        });
        return 'created';
      });
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError(`Attendance for ${total.employeeId} on ${date} was written concurrently`);
      throw err;
    }
  }
}
