import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { AttendanceConfig } from '../src/entities/AttendanceConfig';
import { AttendanceRecord } from '../src/entities/AttendanceRecord';
import { AuditEntry } from '../src/entities/AuditEntry';
import { AuthorizationError, ConflictError, NotFoundError, ValidationError } from '../src/errors';
import type { Actor } from '../src/types';
import { Holiday } from '../src/entities/Holiday';
import { ADMIN, TestContext, addEmployee, createTestContext } from './helpers/fixtures';
import { WRITE_REFUSED, refuseInserts } from './helpers/failingWrites';

const MONDAY = '2026-10-12';

describe('AttendanceOverrideService', () => {
  let ctx: TestContext;
  let caller: Actor;

  const auditCount = (recordId: string) => ctx.dataSource.getRepository(AuditEntry).countBy({ attendanceRecordId: recordId });

  beforeEach(async () => {
    ctx = await createTestContext();
    await addEmployee(ctx.dataSource, 'E1');
    caller = await addEmployee(ctx.dataSource, 'E2', { jobPosition: 'Tele Caller' });
  });

  afterEach(async () => {
    await ctx.dataSource.destroy();
  });

  describe('override', () => {
    it('accepts a ten character reason', async () => {
      const { record, audit } = await ctx.services.overrides.override(ADMIN, {
        employeeId: 'E1',
        date: MONDAY,
        minutes: 171,
        reason: 'fixed typo',
      });

      expect(record).toMatchObject({ status: 'PRESENT', minutes: 171, source: 'MANUAL', reason: 'fixed typo', updatedBy: 'ADMIN' });
      expect(audit).toMatchObject({
        attendanceRecordId: record.id,
        action: 'OVERRIDE',
        previousStatus: null,
        newStatus: 'PRESENT',
        previousSource: null,
        newSource: 'MANUAL',
        actor: 'ADMIN',
      });
    });

    it('rejects a nine character reason', async () => {
      await expect(
        ctx.services.overrides.override(ADMIN, { employeeId: 'E1', date: MONDAY, minutes: 171, reason: 'too short' }),
      ).rejects.toThrow('Reason must be at least 10 characters');
      expect(await ctx.dataSource.getRepository(AttendanceRecord).count()).toBe(0);
    });

    it('needs minutes or a status', async () => {
      await expect(
        ctx.services.overrides.override(ADMIN, { employeeId: 'E1', date: MONDAY, reason: 'forgot to log calls' }),
      ).rejects.toThrow(ValidationError);
    });

    it('lets an explicit status win over minutes', async () => {
      const { record } = await ctx.services.overrides.override(ADMIN, {
        employeeId: 'E1',
        date: MONDAY,
        minutes: 30,
        status: 'HALF_DAY',
        reason: 'client visit in the afternoon',
      });
      expect(record.status).toBe('HALF_DAY');
      expect(record.minutes).toBe(30);
    });

    it('denies callers without the permission', async () => {
      await expect(
        ctx.services.overrides.override(caller, { employeeId: 'E1', date: MONDAY, minutes: 200, reason: 'fixed typo' }),
      ).rejects.toThrow(AuthorizationError);
    });

    it('allows team leaders through their job position', async () => {
      const lead = await addEmployee(ctx.dataSource, 'TL1', { jobPosition: 'Team Leader - Collections' });
      const { audit } = await ctx.services.overrides.override(lead, {
        employeeId: 'E1',
        date: MONDAY,
        minutes: 200,
        reason: 'dialer outage, verified',
      });
      expect(audit.actor).toBe('TL1');
    });

    it('rejects future dates', async () => {
      await expect(
        ctx.services.overrides.override(ADMIN, { employeeId: 'E1', date: '2026-10-19', minutes: 200, reason: 'fixed typo' }),
      ).rejects.toThrow('Cannot override attendance for a future date');
    });

    it('rejects unknown employees', async () => {
      await expect(
        ctx.services.overrides.override(ADMIN, { employeeId: 'NOPE', date: MONDAY, minutes: 200, reason: 'fixed typo' }),
      ).rejects.toThrow(NotFoundError);
    });

    it('needs active thresholds to compute a status from minutes', async () => {
      await ctx.dataSource.getRepository(AttendanceConfig).update({ isActive: true }, { isActive: false });
      await expect(
        ctx.services.overrides.override(ADMIN, { employeeId: 'E1', date: MONDAY, minutes: 200, reason: 'fixed typo' }),
      ).rejects.toThrow('No active attendance threshold configuration');
    });

    it('writes one audit entry per change, recording the previous values', async () => {
      await ctx.services.callLogs.ingestOne(ADMIN, { employeeId: 'E1', date: MONDAY, durationMinutes: 130 });
      await ctx.services.scheduler.runForDate(MONDAY);

      const first = await ctx.services.overrides.override(ADMIN, {
        employeeId: 'E1',
        date: MONDAY,
        status: 'PRESENT',
        reason: 'calls made from personal phone',
      });
      const second = await ctx.services.overrides.override(ADMIN, {
        employeeId: 'E1',
        date: MONDAY,
        status: 'ABSENT',
        reason: 'was on leave, logs belong to a colleague',
      });

      expect(first.audit).toMatchObject({
        previousStatus: 'HALF_DAY',
        previousMinutes: 130,
        previousSource: 'AUTO',
        newStatus: 'PRESENT',
        newMinutes: 130,
      });
      expect(second.audit).toMatchObject({ previousStatus: 'PRESENT', previousSource: 'MANUAL', newStatus: 'ABSENT' });
      expect(second.record.id).toBe(first.record.id);
      expect(await auditCount(first.record.id)).toBe(2);
    });

    it('leaves the record untouched when the audit entry cannot be written', async () => {
      await ctx.services.callLogs.ingestOne(ADMIN, { employeeId: 'E1', date: MONDAY, durationMinutes: 130 });
      await ctx.services.scheduler.runForDate(MONDAY);
      refuseInserts(ctx.dataSource, AuditEntry);

      await expect(
        ctx.services.overrides.override(ADMIN, { employeeId: 'E1', date: MONDAY, status: 'PRESENT', reason: 'calls made from personal phone' }),
      ).rejects.toThrow(WRITE_REFUSED);

      const record = await ctx.dataSource.getRepository(AttendanceRecord).findOneByOrFail({ employeeId: 'E1', date: MONDAY });
      expect(record).toMatchObject({ status: 'HALF_DAY', source: 'AUTO', reason: null, updatedBy: null });
      expect(await ctx.dataSource.getRepository(AuditEntry).count()).toBe(0);
    });

    it('creates no record when the audit entry for a new record fails', async () => {
      refuseInserts(ctx.dataSource, AuditEntry);

      await expect(
        ctx.services.overrides.override(ADMIN, { employeeId: 'E1', date: MONDAY, minutes: 171, reason: 'fixed typo' }),
      ).rejects.toThrow(WRITE_REFUSED);

      expect(await ctx.dataSource.getRepository(AttendanceRecord).count()).toBe(0);
    });
  });

  describe('reset', () => {
    it('recomputes a MANUAL record from call logs and audits the reset', async () => {
      await ctx.services.callLogs.ingestOne(ADMIN, { employeeId: 'E1', date: MONDAY, durationMinutes: 125, callCount: 12 });
      const { record } = await ctx.services.overrides.override(ADMIN, {
        employeeId: 'E1',
        date: MONDAY,
        status: 'PRESENT',
        reason: 'manager approved full day',
      });

      const reset = await ctx.services.overrides.reset(ADMIN, record.id, { reason: 'approval withdrawn' });

      expect(reset.record).toMatchObject({
        status: 'HALF_DAY',
        minutes: 125,
        callCount: 12,
        source: 'AUTO',
        configVersion: 1,
        reason: null,
        updatedBy: null,
      });
      expect(reset.audit).toMatchObject({
        action: 'RESET',
        previousStatus: 'PRESENT',
        previousSource: 'MANUAL',
        newStatus: 'HALF_DAY',
        newSource: 'AUTO',
      });
      expect(await auditCount(record.id)).toBe(2);
    });

    it('hands the record back to the scheduler', async () => {
      await ctx.services.callLogs.ingestOne(ADMIN, { employeeId: 'E1', date: MONDAY, durationMinutes: 90 });
      const { record } = await ctx.services.overrides.override(ADMIN, {
        employeeId: 'E1',
        date: MONDAY,
        status: 'PRESENT',
        reason: 'manager approved full day',
      });
      await ctx.services.overrides.reset(ADMIN, record.id, { reason: 'approval withdrawn' });
      await ctx.services.callLogs.ingestOne(ADMIN, { employeeId: 'E1', date: MONDAY, durationMinutes: 180 });

      const run = await ctx.services.scheduler.runForDate(MONDAY);

      expect(run).toMatchObject({ updated: 1, skippedManual: 0 });
    });

    it('refuses to reset an AUTO record', async () => {
      await ctx.services.callLogs.ingestOne(ADMIN, { employeeId: 'E1', date: MONDAY, durationMinutes: 90 });
      await ctx.services.scheduler.runForDate(MONDAY);
      const auto = await ctx.dataSource.getRepository(AttendanceRecord).findOneByOrFail({ employeeId: 'E1' });

      await expect(ctx.services.overrides.reset(ADMIN, auto.id, { reason: 'nothing to reset' })).rejects.toThrow(ConflictError);
    });

    it('keeps the manual record when the reset audit entry cannot be written', async () => {
      await ctx.services.callLogs.ingestOne(ADMIN, { employeeId: 'E1', date: MONDAY, durationMinutes: 125 });
      const { record } = await ctx.services.overrides.override(ADMIN, {
        employeeId: 'E1',
        date: MONDAY,
        status: 'PRESENT',
        reason: 'manager approved full day',
      });
      refuseInserts(ctx.dataSource, AuditEntry);

      await expect(ctx.services.overrides.reset(ADMIN, record.id, { reason: 'approval withdrawn' })).rejects.toThrow(WRITE_REFUSED);

      const stored = await ctx.dataSource.getRepository(AttendanceRecord).findOneByOrFail({ id: record.id });
      expect(stored).toMatchObject({ status: 'PRESENT', source: 'MANUAL', reason: 'manager approved full day', updatedBy: 'ADMIN' });
      const trail = await ctx.dataSource.getRepository(AuditEntry).findBy({ attendanceRecordId: record.id });
      expect(trail.map((a) => a.action)).toEqual(['OVERRIDE']);
    });

    it('refuses to reset a record on a weekly off day', async () => {
      const { record } = await ctx.services.overrides.override(ADMIN, {
        employeeId: 'E1',
        date: '2026-10-11',
        status: 'PRESENT',
        reason: 'worked the sunday campaign',
      });

      await expect(ctx.services.overrides.reset(ADMIN, record.id, { reason: 'campaign cancelled' })).rejects.toThrow(
        '2026-10-11 is not a working day; override the record instead',
      );
      const stored = await ctx.dataSource.getRepository(AttendanceRecord).findOneByOrFail({ id: record.id });
      expect(stored.source).toBe('MANUAL');
    });

    it('refuses to reset a record on a holiday', async () => {
      await ctx.dataSource.getRepository(Holiday).insert({ id: 'h1', date: MONDAY, name: 'Founders Day' });
      const { record } = await ctx.services.overrides.override(ADMIN, {
        employeeId: 'E1',
        date: MONDAY,
        status: 'PRESENT',
        reason: 'worked through the holiday',
      });

      await expect(ctx.services.overrides.reset(ADMIN, record.id, { reason: 'shift was not approved' })).rejects.toThrow(ConflictError);
    });

    it('reports unknown records', async () => {
      await expect(ctx.services.overrides.reset(ADMIN, 'missing', { reason: 'nothing to reset' })).rejects.toThrow(NotFoundError);
    });
  });
});
