import { Between, DataSource, FindOptionsWhere, In, LessThan } from 'typeorm';
import { AttendanceRecord } from '../entities/AttendanceRecord';
import { AuditEntry } from '../entities/AuditEntry';
import { Employee } from '../entities/Employee';
import { ValidationError } from '../errors';
import { createLogger } from '../logger';
import type { Actor, AttendanceSummary, Clock } from '../types';
import type { DateKey } from '../utils/dates';
import { AuditQuery, RecordQuery, ReportQuery } from '../validation/attendance';
import { payableWeight } from './attendanceCalculator';
import type { PermissionService } from './permissionService';

const log = createLogger('attendance-query');

export type AuditPage = {
  total: number;
  limit: number;
  offset: number;
  entries: AuditEntry[];
};

export function summarize(employeeId: string, from: DateKey, to: DateKey, records: AttendanceRecord[]): AttendanceSummary {
  const summary: AttendanceSummary = {
    employeeId,
    from,
    to,
    totalDays: records.length,
    present: 0,
    halfDay: 0,
    absent: 0,
    totalMinutes: 0,
    totalCalls: 0,
    manualUpdates: 0,
    payableDays: 0,
  };
  for (const r of records) {
    if (r.status === 'PRESENT') summary.present += 1;
    else if (r.status === 'HALF_DAY') summary.halfDay += 1;
    else summary.absent += 1;
    summary.totalMinutes += r.minutes;
    summary.totalCalls += r.callCount;
    if (r.source === 'MANUAL') summary.manualUpdates += 1;
    summary.payableDays += payableWeight(r.status);
  }
  return summary;
}

export class AttendanceQueryService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly permissions: PermissionService,
    private readonly now: Clock = () => new Date(),
  ) {}

  private get records() {
    return this.dataSource.getRepository(AttendanceRecord);
  }

  private get audit() {
    return this.dataSource.getRepository(AuditEntry);
  }

  // employees read their own attendance; anyone else needs attendance.view_all
  private async authorizeRead(actor: Actor, employeeId: string): Promise<void> {
    if (actor.id === employeeId) return;
    await this.permissions.authorize(actor, 'attendance.view_all');
  }

  async findRecords(actor: Actor, query: RecordQuery): Promise<AttendanceRecord[]> {
    await this.authorizeRead(actor, query.employeeId);
    const where: FindOptionsWhere<AttendanceRecord> = {
      employeeId: query.employeeId,
      date: Between(query.from, query.to),
    };
    if (query.status) where.status = query.status;
    if (query.source) where.source = query.source;
    return this.records.find({ where, order: { date: 'ASC' } });
  }

  async summary(actor: Actor, employeeId: string, from: DateKey, to: DateKey): Promise<AttendanceSummary> {
    await this.authorizeRead(actor, employeeId);
    const rows = await this.records.find({ where: { employeeId, date: Between(from, to) }, order: { date: 'ASC' } });
    return summarize(employeeId, from, to, rows);
  }

  /** One summary per employee with at least one record in the period. */
  async report(actor: Actor, query: ReportQuery): Promise<AttendanceSummary[]> {
    await this.permissions.authorize(actor, 'attendance.view_all');
    const where: FindOptionsWhere<AttendanceRecord> = { date: Between(query.from, query.to) };
    if (query.department) {
      const members = await this.dataSource.getRepository(Employee).find({
        select: { id: true },
        where: { department: query.department },
      });
      if (members.length === 0) return [];
      where.employeeId = In(members.map((m) => m.id));
    }
    const rows = await this.records.find({ where, order: { employeeId: 'ASC', date: 'ASC' } });

    const byEmployee = new Map<string, AttendanceRecord[]>();
    for (const row of rows) {
      const list = byEmployee.get(row.employeeId) ?? [];
      list.push(row);
      byEmployee.set(row.employeeId, list);
    }
    return [...byEmployee.entries()].map(([employeeId, list]) => summarize(employeeId, query.from, query.to, list));
  }

  async auditTrail(actor: Actor, query: AuditQuery): Promise<AuditPage> {
    await this.permissions.authorize(actor, 'attendance.view_audit');
    const where: FindOptionsWhere<AuditEntry> = {};
    if (query.employeeId) where.employeeId = query.employeeId;
    if (query.from || query.to) where.date = Between(query.from ?? '0000-01-01', query.to ?? '9999-12-31');
    const [entries, total] = await this.audit.findAndCount({
      where,
      order: { timestamp: 'DESC', id: 'ASC' },
      take: query.limit,
      skip: query.offset,
    });
    return { total, limit: query.limit, offset: query.offset, entries };
  }

  async recordAudit(actor: Actor, recordId: string): Promise<AuditEntry[]> {
    await this.permissions.authorize(actor, 'attendance.view_audit');
    return this.audit.find({ where: { attendanceRecordId: recordId }, order: { timestamp: 'ASC' } });
  }

  /** Deletes audit entries written more than `days` days ago. Attendance records stay. */
  async purgeAudit(days: number): Promise<number> {
    if (!Number.isInteger(days) || days < 1) throw new ValidationError('Retention must be a positive number of days');
    const cutoff = new Date(this.now().getTime() - days * 24 * 60 * 60 * 1000);
    const result = await this.audit.delete({ timestamp: LessThan(cutoff) });
    const removed = result.affected ?? 0;
    log.info(`Purged ${removed} audit entries older than ${cutoff.toISOString()}`);
    return removed;
  }
}
