import { Between, DataSource, EntityManager, FindOptionsWhere, LessThanOrEqual, MoreThanOrEqual } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { CallLog } from '../entities/CallLog';
import { AppError, ConflictError, ErrorCode, ValidationError, errorMessage, isUniqueViolation } from '../errors';
import { createLogger } from '../logger';
import type { Actor, Clock } from '../types';
import { DateKey, todayKey } from '../utils/dates';
import { CallLogEntryInput, CallLogQuery, callLogEntrySchema } from '../validation/callLogs';
import { parseInput } from '../validation/common';
import { SheetFormat, SlashDateOrder, buildCallLogTemplate, parseCallLogSheet } from './callLogImport';
import { requireActiveEmployee } from './employeeDirectory';
import type { PermissionService } from './permissionService';

const log = createLogger('call-logs');

export type IngestOutcome = 'created' | 'updated';

export type IngestFailure = {
  index: number;
  employeeId?: string;
  kind: ErrorCode | 'INTERNAL';
  message: string;
};

export type IngestSummary = {
  created: number;
  updated: number;
  failed: number;
  errors: IngestFailure[];
};

export type IngestOptions = {
  // false: an existing (employee, date, source) row is a conflict instead of an update
  upsert?: boolean;
  // applied to entries that carry no source of their own
  source?: string;
};

export type DailyCallTotal = {
  employeeId: string;
  minutes: number;
  calls: number;
};

function emptySummary(): IngestSummary {
  return { created: 0, updated: 0, failed: 0, errors: [] };
}

function employeeIdOf(raw: unknown): string | undefined {
  if (typeof raw === 'object' && raw !== null && 'employeeId' in raw && typeof raw.employeeId === 'string') {
    return raw.employeeId;
  }
  return undefined;
}

export class CallLogService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly permissions: PermissionService,
    private readonly now: Clock = () => new Date(),
    private readonly dateOrder: SlashDateOrder = 'DMY',
  ) {}

  private get repo() {
    return this.dataSource.getRepository(CallLog);
  }

  async ingestOne(actor: Actor, raw: unknown, opts: IngestOptions = {}): Promise<{ outcome: IngestOutcome; log: CallLog }> {
    await this.permissions.authorize(actor, 'attendance.ingest');
    return this.upsertEntry(this.parseEntry(raw, opts.source), opts.upsert ?? true);
  }

  /** Per-item ingestion: a bad entry is counted and reported, the rest still land. */
  async ingest(actor: Actor, entries: unknown[], opts: IngestOptions = {}): Promise<IngestSummary> {
    await this.permissions.authorize(actor, 'attendance.ingest');
    const summary = emptySummary();
    for (const [index, raw] of entries.entries()) {
      await this.tally(summary, index, employeeIdOf(raw), () =>
        this.upsertEntry(this.parseEntry(raw, opts.source), opts.upsert ?? true),
      );
    }
    log.info(`Ingested ${entries.length} call logs: ${summary.created} created, ${summary.updated} updated, ${summary.failed} failed`);
    return summary;
  }

  /** Failures are reported by sheet row number (the header is row 1). */
  async importSheet(actor: Actor, data: Buffer, format: SheetFormat, opts: IngestOptions = {}): Promise<IngestSummary> {
    await this.permissions.authorize(actor, 'attendance.ingest');
    const rows = parseCallLogSheet(data, format, opts.source ?? 'CSV', this.dateOrder);
    const summary = emptySummary();
    for (const row of rows) {
      if ('error' in row) {
        summary.failed += 1;
        summary.errors.push({ index: row.rowNumber, employeeId: row.employeeId, kind: 'VALIDATION_ERROR', message: row.error });
        continue;
      }
      await this.tally(summary, row.rowNumber, employeeIdOf(row.entry), () =>
        this.upsertEntry(this.parseEntry(row.entry), opts.upsert ?? true),
      );
    }
    log.info(`Imported ${rows.length} ${format} rows: ${summary.created} created, ${summary.updated} updated, ${summary.failed} failed`);
    return summary;
  }

  /** The xlsx upload template; its notes sheet names the date order imports use. */
  template(): Buffer {
    return buildCallLogTemplate(this.dateOrder);
  }

  async list(query: CallLogQuery): Promise<CallLog[]> {
    const where: FindOptionsWhere<CallLog> = {};
    if (query.employeeId) where.employeeId = query.employeeId;
    if (query.source) where.source = query.source.toUpperCase();
    if (query.from && query.to) where.date = Between(query.from, query.to);
    else if (query.from) where.date = MoreThanOrEqual(query.from);
    else if (query.to) where.date = LessThanOrEqual(query.to);
    return this.repo.find({ where, order: { date: 'DESC', employeeId: 'ASC' }, take: query.limit });
  }

  /** Minutes and calls per employee for one day, summed across sources. */
  async dailyTotals(date: DateKey, manager: EntityManager = this.dataSource.manager): Promise<DailyCallTotal[]> {
    const logs = await manager.getRepository(CallLog).find({ where: { date }, order: { employeeId: 'ASC' } });
    const totals = new Map<string, DailyCallTotal>();
    for (const entry of logs) {
      const total = totals.get(entry.employeeId) ?? { employeeId: entry.employeeId, minutes: 0, calls: 0 };
      total.minutes += entry.durationMinutes;
      total.calls += entry.callCount;
      totals.set(entry.employeeId, total);
    }
    return [...totals.values()];
  }

  async totalFor(employeeId: string, date: DateKey, manager: EntityManager = this.dataSource.manager): Promise<DailyCallTotal> {
    const logs = await manager.getRepository(CallLog).findBy({ employeeId, date });
    return {
      employeeId,
      minutes: logs.reduce((sum, l) => sum + l.durationMinutes, 0),
      calls: logs.reduce((sum, l) => sum + l.callCount, 0),
    };
  }

  private parseEntry(raw: unknown, defaultSource?: string): CallLogEntryInput {
    const withSource =
      defaultSource && typeof raw === 'object' && raw !== null && !('source' in raw) ? { ...raw, source: defaultSource } : raw;
    return parseInput(callLogEntrySchema, withSource);
  }

  private async upsertEntry(entry: CallLogEntryInput, upsert: boolean): Promise<{ outcome: IngestOutcome; log: CallLog }> {
    if (entry.date > todayKey(this.now())) throw new ValidationError('Call date cannot be in the future');
    await requireActiveEmployee(this.dataSource.manager, entry.employeeId);

    const key = { employeeId: entry.employeeId, date: entry.date, source: entry.source };
    const existing = await this.repo.findOneBy(key);
    if (existing) {
      if (!upsert) {
        throw new ConflictError(`Call log for ${entry.employeeId} on ${entry.date} from ${entry.source} already exists`);
      }
      existing.durationMinutes = entry.durationMinutes;
      existing.callCount = entry.callCount;
      return { outcome: 'updated', log: await this.repo.save(existing) };
    }

    const created = this.repo.create({ id: uuidv4(), ...key, durationMinutes: entry.durationMinutes, callCount: entry.callCount });
    try {
      await this.repo.insert(created);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictError(`Call log for ${entry.employeeId} on ${entry.date} was written concurrently, retry`);
      }
      throw err;
    }
    return { outcome: 'created', log: created };
  }

  private async tally(
    summary: IngestSummary,
    index: number,
    employeeId: string | undefined,
    run: () => Promise<{ outcome: IngestOutcome }>,
  ): Promise<void> {
    try {
      const { outcome } = await run();
      summary[outcome] += 1;
    } catch (err) {
      summary.failed += 1;
      if (err instanceof AppError) {
        summary.errors.push({ index, employeeId, kind: err.code, message: err.message });
      } else {
        log.error(`Ingestion of item ${index} failed`, err);
        summary.errors.push({ index, employeeId, kind: 'INTERNAL', message: errorMessage(err) });
      }
    }
  }
}
