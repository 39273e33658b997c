import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { AttendanceConfig } from '../src/entities/AttendanceConfig';
import { AuthorizationError, ConflictError, NotFoundError, ValidationError } from '../src/errors';
import { ADMIN, TestContext, addEmployee, createTestContext } from './helpers/fixtures';
import { beforeInsertOf } from './helpers/failingWrites';

describe('ThresholdConfigService', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
  });

  afterEach(async () => {
    await ctx.dataSource.destroy();
  });

  it('starts from the configured defaults as version 1', async () => {
    const active = await ctx.services.thresholds.getActive();
    expect(active).toMatchObject({ version: 1, fullDayMinutes: 171, halfDayMinutes: 121, isActive: true, createdBy: 'SYSTEM' });
  });

  it('does not add a version when one is already active', async () => {
    await ctx.services.thresholds.ensureActive({ fullDayMinutes: 200, halfDayMinutes: 100 });
    expect(await ctx.services.thresholds.listVersions()).toHaveLength(1);
  });

  it('activates a new version and keeps exactly one active', async () => {
    const v2 = await ctx.services.thresholds.create(ADMIN, { fullDayMinutes: 180, halfDayMinutes: 90 });

    expect(v2).toMatchObject({ version: 2, isActive: true, createdBy: 'ADMIN' });
    const versions = await ctx.services.thresholds.listVersions();
    expect(versions.map((v) => [v.version, v.isActive])).toEqual([
      [2, true],
      [1, false],
    ]);
  });

  it('re-activates an older version', async () => {
    const v1 = await ctx.services.thresholds.getActive();
    await ctx.services.thresholds.create(ADMIN, { fullDayMinutes: 180, halfDayMinutes: 90 });

    await ctx.services.thresholds.activate(ADMIN, v1.id);

    expect((await ctx.services.thresholds.getActive()).version).toBe(1);
    expect((await ctx.services.thresholds.listVersions()).filter((v) => v.isActive)).toHaveLength(1);
  });

  it('validates the thresholds', async () => {
    await expect(ctx.services.thresholds.create(ADMIN, { fullDayMinutes: 100, halfDayMinutes: 150 })).rejects.toThrow(
      new ValidationError('Full day minutes must be greater than half day minutes'),
    );
    expect(await ctx.services.thresholds.listVersions()).toHaveLength(1);
  });

  it('requires attendance.configure', async () => {
    const employee = await addEmployee(ctx.dataSource, 'E1');
    await expect(ctx.services.thresholds.create(employee, { fullDayMinutes: 180, halfDayMinutes: 90 })).rejects.toThrow(
      AuthorizationError,
    );
  });

  it('reports an unknown version', async () => {
    await expect(ctx.services.thresholds.activate(ADMIN, 'missing')).rejects.toThrow(NotFoundError);
  });

  it('reports a version number taken by a concurrent writer as a conflict', async () => {
    let raced = false;
    beforeInsertOf(ctx.dataSource, AttendanceConfig, async (event) => {
      if (raced) return;
      raced = true;
      await event.manager.getRepository(AttendanceConfig).insert({
        id: 'rival-version',
        version: event.entity.version,
        fullDayMinutes: 190,
        halfDayMinutes: 95,
        isActive: false,
        createdBy: 'RIVAL',
      });
    });

    await expect(ctx.services.thresholds.create(ADMIN, { fullDayMinutes: 180, halfDayMinutes: 90 })).rejects.toThrow(
      ConflictError,
    );

    const versions = await ctx.services.thresholds.listVersions();
    expect(versions.map((v) => [v.version, v.isActive])).toEqual([[1, true]]);
  });
});
