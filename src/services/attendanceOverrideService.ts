import { DataSource, EntityManager } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { AttendanceRecord, AttendanceStatus } from '../entities/AttendanceRecord';
import { AuditAction, AuditEntry } from '../entities/AuditEntry';
import { ConflictError, NotFoundError, ValidationError, isUniqueViolation } from '../errors';
import { createLogger } from '../logger';
import type { Actor, Clock } from '../types';
import { todayKey } from '../utils/dates';
import { overrideSchema, resetSchema } from '../validation/attendance';
import { parseInput } from '../validation/common';
import { calculateStatus } from './attendanceCalculator';
import { lockRecord, lockRecordById } from './attendanceRecordStore';
import type { WorkingDayCalendar } from './calendarService';
import type { CallLogService } from './callLogService';
import { requireActiveEmployee } from './employeeDirectory';
import type { PermissionService } from './permissionService';
import type { ThresholdConfigService } from './thresholdConfigService';

const log = createLogger('override');

export type ManualChange = {
  record: AttendanceRecord;
  audit: AuditEntry;
};

type Snapshot = Pick<AttendanceRecord, 'status' | 'minutes' | 'source'>;

/** Manual attendance changes. Each one writes the record and its audit entry in one transaction. */
export class AttendanceOverrideService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly permissions: PermissionService,
    private readonly calendar: WorkingDayCalendar,
    private readonly thresholds: ThresholdConfigService,
    private readonly callLogs: CallLogService,
    private readonly now: Clock = () => new Date(),
  ) {}

  async override(actor: Actor, raw: unknown): Promise<ManualChange> {
    const input = parseInput(overrideSchema, raw);
    await this.permissions.authorize(actor, 'attendance.override');
    if (input.date > todayKey(this.now())) throw new ValidationError('Cannot override attendance for a future date');
    await requireActiveEmployee(this.dataSource.manager, input.employeeId);

    try {
      return await this.dataSource.transaction(async (manager) => {
        const repo = manager.getRepository(AttendanceRecord);
        const existing = await lockRecord(manager, input.employeeId, input.date);
        const minutes = input.minutes ?? existing?.minutes ?? 0;
        const status: AttendanceStatus = input.status ?? (await this.statusFor(manager, minutes));
        const before: Snapshot | null = existing ? { status: existing.status, minutes: existing.minutes, source: existing.source } : null;

        const record =
          existing ??
          repo.create({
            id: uuidv4(),
            employeeId: input.employeeId,
            date: input.date,
            callCount: 0,
            configVersion: null,
          });
        record.status = status;
        record.minutes = minutes;
        if (input.callCount !== undefined) record.callCount = input.callCount;
        record.source = 'MANUAL';
        record.reason = input.reason;
        record.updatedBy = actor.id;
        const saved = await repo.save(record);

        const audit = await this.appendAudit(manager, 'OVERRIDE', saved, before, input.reason, actor);
        log.info(`${actor.id} set ${input.employeeId} ${input.date} to ${status} (was ${before?.status ?? 'none'})`);
        return { record: saved, audit };
      });
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictError(`Attendance for ${input.employeeId} on ${input.date} changed concurrently, retry`);
      }
      throw err;
    }
  }

  /**
   * Hands a MANUAL record back to the scheduler, recomputing it from the day's call logs.
   * Days the scheduler skips have no AUTO state to return to, so those stay manual.
   */
  async reset(actor: Actor, recordId: string, raw: unknown): Promise<ManualChange> {
    const { reason } = parseInput(resetSchema, raw);
    await this.permissions.authorize(actor, 'attendance.override');

    return this.dataSource.transaction(async (manager) => {
      const record = await lockRecordById(manager, recordId);
      if (!record) throw new NotFoundError(`Attendance record ${recordId} not found`);
      if (record.source !== 'MANUAL') throw new ConflictError('Only manual attendance records can be reset');
      if (!(await this.calendar.isWorkingDay(record.date))) {
        throw new ConflictError(`${record.date} is not a working day; override the record instead`);
      }

      const config = await this.thresholds.getActive(manager);
      const total = await this.callLogs.totalFor(record.employeeId, record.date, manager);
      const before: Snapshot = { status: record.status, minutes: record.minutes, source: record.source };

      record.status = calculateStatus(total.minutes, config);
      record.minutes = total.minutes;
      record.callCount = total.calls;
      record.configVersion = config.version;
      record.source = 'AUTO';
      record.reason = null;
      record.updatedBy = null;
      const saved = await manager.getRepository(AttendanceRecord).save(record);

      const audit = await this.appendAudit(manager, 'RESET', saved, before, reason, actor);
      log.info(`${actor.id} reset ${record.employeeId} ${record.date} to AUTO ${saved.status}`);
      return { record: saved, audit };
    });
  }

  private async statusFor(manager: EntityManager, minutes: number): Promise<AttendanceStatus> {
    const config = await this.thresholds.getActive(manager);
    return calculateStatus(minutes, config);
  }

  private async appendAudit(
    manager: EntityManager,
    action: AuditAction,
    record: AttendanceRecord,
    before: Snapshot | null,
    reason: string,
    actor: Actor,
  ): Promise<AuditEntry> {
    const repo = manager.getRepository(AuditEntry);
    const entry = repo.create({
      id: uuidv4(),
      attendanceRecordId: record.id,
      employeeId: record.employeeId,
      date: record.date,
      action,
      previousStatus: before?.status ?? null,
      newStatus: record.status,
      previousMinutes: before?.minutes ?? null,
      newMinutes: record.minutes,
      previousSource: before?.source ?? null,
      newSource: record.source,
      reason,
      actor: actor.id,
      timestamp: this.now(),
    });
    return repo.save(entry);
  }
}
