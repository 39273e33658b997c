import { DataSource, EntityManager } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { AttendanceConfig } from '../entities/AttendanceConfig';
import { ConflictError, NotFoundError, ValidationError, isUniqueViolation } from '../errors';
import { createLogger } from '../logger';
import type { Actor, Thresholds } from '../types';
import { thresholdProblems } from './attendanceCalculator';
import type { PermissionService } from './permissionService';

const log = createLogger('thresholds');

/**
 * Versioned threshold store. Exactly one version is active; callers read it once
 * per run and pass the value on, so a change only affects the next run.
 */
export class ThresholdConfigService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly permissions: PermissionService,
  ) {}

  private get repo() {
    return this.dataSource.getRepository(AttendanceConfig);
  }

  async findActive(manager: EntityManager = this.dataSource.manager): Promise<AttendanceConfig | null> {
    return manager.getRepository(AttendanceConfig).findOneBy({ isActive: true });
  }

  async getActive(manager?: EntityManager): Promise<AttendanceConfig> {
    const active = await this.findActive(manager);
    if (!active) throw new ValidationError('No active attendance threshold configuration');
    return active;
  }

  async listVersions(): Promise<AttendanceConfig[]> {
    return this.repo.find({ order: { version: 'DESC' } });
  }

  async create(actor: Actor, thresholds: Thresholds): Promise<AttendanceConfig> {
    await this.permissions.authorize(actor, 'attendance.configure');
    return this.insertVersion(actor.id, thresholds);
  }

  async activate(actor: Actor, id: string): Promise<AttendanceConfig> {
    await this.permissions.authorize(actor, 'attendance.configure');
    return this.dataSource.transaction(async (manager) => {
      const repo = manager.getRepository(AttendanceConfig);
      const target = await repo.findOneBy({ id });
      if (!target) throw new NotFoundError(`Threshold configuration ${id} not found`);
      if (target.isActive) return target;
      await repo.update({ isActive: true }, { isActive: false });
      await repo.update({ id }, { isActive: true });
      target.isActive = true;
      log.info(`${actor.id} re-activated threshold version ${target.version}`);
      return target;
    });
  }

  /** Seeds the first version from configured defaults when the table is empty. */
  async ensureActive(defaults: Thresholds, createdBy = 'SYSTEM'): Promise<AttendanceConfig> {
    const active = await this.findActive();
    if (active) return active;
    log.info(`No active thresholds, creating ${defaults.fullDayMinutes}/${defaults.halfDayMinutes}`);
    return this.insertVersion(createdBy, defaults);
  }

  private async insertVersion(createdBy: string, thresholds: Thresholds): Promise<AttendanceConfig> {
    const problems = thresholdProblems(thresholds);
    if (problems.length > 0) throw new ValidationError(problems[0], problems);

    let saved: AttendanceConfig;
    try {
      saved = await this.dataSource.transaction(async (manager) => {
        const repo = manager.getRepository(AttendanceConfig);
        const latest = await repo.find({ order: { version: 'DESC' }, take: 1 });
        const version = (latest[0]?.version ?? 0) + 1;
        await repo.update({ isActive: true }, { isActive: false });
        const row = repo.create({
          id: uuidv4(),
          version,
          fullDayMinutes: thresholds.fullDayMinutes,
          halfDayMinutes: thresholds.halfDayMinutes,
          isActive: true,
          createdBy,
        });
        return repo.save(row);
      });
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError('Another threshold version was saved at the same time, retry');
      throw err;
    }
    log.info(`Threshold version ${saved.version} active: full ${saved.fullDayMinutes}, half ${saved.halfDayMinutes}`);
    return saved;
  }
}
